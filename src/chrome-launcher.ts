import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs';
import readline from 'node:readline';
import type { Readable } from 'node:stream';
import { spawn } from 'node:child_process';
import { findChromeExecutable } from './chrome-locator.js';
import type { LaunchConfig } from './config.js';
import { ChromeNotFoundError, IllegalStateError, LaunchFailedError, StartupTimeoutError } from './errors.js';
import { createLogger, describeError } from './logging.js';
import {
  isProcessAlive,
  processRegistry,
  registerExitHook,
  removeExitHook,
  type ExitHookTarget,
} from './process-registry.js';
import type { ChromeChildProcess, ChromeExecutable } from './types.js';

const logger = createLogger('chrome-launcher');

/** Matches the line Chrome prints once its DevTools server is up. */
export const DEVTOOLS_ENDPOINT_PATTERN = /DevTools listening on (ws:\/\/\S+)/;

const FORCE_KILL_WAIT_MS = 5_000;
const PROFILE_DIR_PREFIX = 'chromepress-profile-';
const STARTUP_OUTPUT_TAIL = 10;

export type SpawnChrome = (command: string, args: string[]) => ChromeChildProcess;
export type LocateChrome = () => ChromeExecutable | null;

export interface SupervisorDeps {
  /** Starts the browser process. Defaults to `child_process.spawn` with piped output. */
  spawn?: SpawnChrome;
  /** Finds a browser when the config names none. Defaults to {@link findChromeExecutable}. */
  locate?: LocateChrome;
}

const defaultSpawn: SpawnChrome = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], env: { ...process.env } });

// ── Flags ──

const STABILITY_FLAGS = [
  '--disable-background-networking',
  '--disable-background-timer-throttling',
  '--disable-backgrounding-occluded-windows',
  '--disable-breakpad',
  '--disable-client-side-phishing-detection',
  '--disable-component-extensions-with-background-pages',
  '--disable-component-update',
  '--disable-default-apps',
  '--disable-extensions',
  '--disable-features=TranslateUI,MediaRouter',
  '--disable-hang-monitor',
  '--disable-ipc-flooding-protection',
  '--disable-popup-blocking',
  '--disable-prompt-on-repost',
  '--disable-renderer-backgrounding',
  '--disable-session-crashed-bubble',
  '--disable-sync',
  '--hide-crash-restore-bubble',
  '--metrics-recording-only',
  '--no-default-browser-check',
  '--no-first-run',
  '--safebrowsing-disable-auto-update',
  '--password-store=basic',
  '--use-mock-keychain',
];

/**
 * Command-line arguments for a supervised Chrome. Caller extras come last so
 * they override anything before them; `about:blank` gives the session a page
 * to attach to.
 */
export function buildChromeArgs(config: LaunchConfig, userDataDir: string): string[] {
  const args: string[] = [];
  if (config.headless) args.push('--headless=new');
  if (config.disableGpu) args.push('--disable-gpu');
  args.push('--remote-allow-origins=*');
  args.push(...STABILITY_FLAGS);
  args.push(`--remote-debugging-port=${config.debugPort}`);
  args.push(`--user-data-dir=${userDataDir}`);
  if (config.noSandbox) args.push('--no-sandbox');
  if (config.disableDevShmUsage) args.push('--disable-dev-shm-usage');
  if (config.windowSize) args.push(`--window-size=${config.windowSize}`);
  args.push(...config.extraArgs);
  args.push('about:blank');
  return args;
}

// ── Endpoint Discovery ──

/** The `ws://` URL announced on `line`, or `null`. */
export function parseDevToolsEndpoint(line: string): string | null {
  const match = DEVTOOLS_ENDPOINT_PATTERN.exec(line);
  return match?.[1] ?? null;
}

/**
 * Scan the child's stdout and stderr for the DevTools announcement.
 * Both streams keep being drained afterwards so the pipes never fill.
 */
function waitForEndpoint(proc: ChromeChildProcess, timeoutMs: number): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const tail: string[] = [];
    let settled = false;

    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      proc.removeListener('exit', onExit);
      proc.removeListener('error', onError);
      settle();
    };

    const onLine = (line: string): void => {
      logger.trace(`[chrome] ${line}`);
      if (settled) return;
      tail.push(line);
      if (tail.length > STARTUP_OUTPUT_TAIL) tail.shift();
      const endpoint = parseDevToolsEndpoint(line);
      if (endpoint) finish(() => resolve(endpoint));
    };

    const onExit = (code: number | null, signal: NodeJS.Signals | null): void => {
      const output = tail.length ? `. Last output:\n${tail.join('\n')}` : '';
      finish(() => reject(new StartupTimeoutError(
        `Chrome exited before announcing its DevTools endpoint (code: ${code ?? 'none'}, signal: ${signal ?? 'none'})${output}`,
        timeoutMs,
      )));
    };

    const onError = (err: Error): void => {
      finish(() => reject(new LaunchFailedError(`Failed to start Chrome: ${err.message}`, { cause: err })));
    };

    const timer = setTimeout(() => {
      finish(() => reject(new StartupTimeoutError(
        `Chrome did not announce its DevTools endpoint within ${timeoutMs}ms`,
        timeoutMs,
      )));
    }, timeoutMs);

    proc.once('exit', onExit);
    proc.once('error', onError);

    const streams = [proc.stdout, proc.stderr].filter((s): s is Readable => s !== null);
    for (const input of streams) {
      readline.createInterface({ input, crlfDelay: Infinity }).on('line', onLine);
    }
  });
}

// ── Process Control ──

function signalQuietly(proc: ChromeChildProcess, signal: NodeJS.Signals): void {
  try {
    proc.kill(signal);
  } catch (err) {
    logger.warn(`Failed to send ${signal} to Chrome (PID: ${proc.pid ?? 'unknown'}): ${describeError(err)}`);
  }
}

/** Resolves `true` once the process has exited, `false` if `timeoutMs` passes first. */
function waitForExit(proc: ChromeChildProcess, timeoutMs: number): Promise<boolean> {
  if (!isProcessAlive(proc)) return Promise.resolve(true);
  return new Promise<boolean>((resolve) => {
    const onExit = (): void => {
      clearTimeout(timer);
      resolve(true);
    };
    const timer = setTimeout(() => {
      proc.removeListener('exit', onExit);
      resolve(false);
    }, timeoutMs);
    proc.once('exit', onExit);
  });
}

/** SIGTERM, then SIGKILL after `graceMs`. Gives up after one more bounded wait. */
async function terminate(proc: ChromeChildProcess, graceMs: number): Promise<void> {
  const pid = proc.pid ?? 'unknown';
  if (!isProcessAlive(proc)) {
    logger.debug(`Chrome process (PID: ${pid}) already exited`);
    return;
  }
  logger.debug(`Sending SIGTERM to Chrome (PID: ${pid})`);
  signalQuietly(proc, 'SIGTERM');
  if (await waitForExit(proc, graceMs)) {
    logger.info(`Chrome process terminated gracefully (PID: ${pid})`);
    return;
  }
  logger.warn(`Chrome did not exit within ${graceMs}ms, sending SIGKILL (PID: ${pid})`);
  signalQuietly(proc, 'SIGKILL');
  if (!await waitForExit(proc, FORCE_KILL_WAIT_MS)) {
    logger.error(`Chrome process (PID: ${pid}) still running ${FORCE_KILL_WAIT_MS}ms after SIGKILL`);
  }
}

async function removeDir(dir: string): Promise<void> {
  try {
    await fs.promises.rm(dir, { recursive: true, force: true, maxRetries: 3, retryDelay: 200 });
    logger.debug(`Deleted user data directory: ${dir}`);
  } catch (err) {
    logger.warn(`Failed to delete user data directory ${dir}: ${describeError(err)}`);
  }
}

// ── Supervised Chrome ──

export interface SupervisedChromeInit {
  process: ChromeChildProcess;
  endpoint: string;
  executable: ChromeExecutable;
  userDataDir: string;
  ownsUserDataDir: boolean;
}

/** A running Chrome started by {@link ChromeSupervisor}. */
export class SupervisedChrome implements ExitHookTarget {
  readonly process: ChromeChildProcess;
  readonly pid: number;
  /** DevTools WebSocket URL announced at startup. */
  readonly endpoint: string;
  readonly executable: ChromeExecutable;
  readonly userDataDir: string;
  /** Whether the user data directory was created by the supervisor (and is deleted with it). */
  readonly ownsUserDataDir: boolean;
  readonly startedAt: number;
  private userDataDirReleased = false;

  constructor(init: SupervisedChromeInit) {
    this.process = init.process;
    this.pid = init.process.pid ?? -1;
    this.endpoint = init.endpoint;
    this.executable = init.executable;
    this.userDataDir = init.userDataDir;
    this.ownsUserDataDir = init.ownsUserDataDir;
    this.startedAt = Date.now();
  }

  get isAlive(): boolean {
    return isProcessAlive(this.process);
  }

  forceKill(): void {
    if (this.isAlive) this.process.kill('SIGKILL');
  }

  releaseUserDataDirSync(): void {
    if (!this.claimUserDataDir()) return;
    fs.rmSync(this.userDataDir, { recursive: true, force: true, maxRetries: 3, retryDelay: 200 });
  }

  async releaseUserDataDir(): Promise<void> {
    if (!this.claimUserDataDir()) return;
    await removeDir(this.userDataDir);
  }

  /** Latch: true for the first caller only, and only for an owned directory. */
  private claimUserDataDir(): boolean {
    if (!this.ownsUserDataDir || this.userDataDirReleased) return false;
    this.userDataDirReleased = true;
    return true;
  }
}

// ── Supervisor ──

/**
 * Owns the lifecycle of one Chrome process: start it, learn its DevTools
 * endpoint from its own output, and stop it again.
 *
 * A supervisor launches at most once. After {@link shutdown} it is closed for good.
 */
export class ChromeSupervisor {
  readonly config: LaunchConfig;
  private readonly spawnChrome: SpawnChrome;
  private readonly locate: LocateChrome;
  private chrome: SupervisedChrome | null = null;
  private launching = false;
  private shutdownPromise: Promise<void> | null = null;

  constructor(config: LaunchConfig, deps: SupervisorDeps = {}) {
    this.config = config;
    this.spawnChrome = deps.spawn ?? defaultSpawn;
    this.locate = deps.locate ?? (() => findChromeExecutable());
  }

  get running(): SupervisedChrome | null {
    return this.chrome;
  }

  get isRunning(): boolean {
    return this.chrome !== null && this.chrome.isAlive;
  }

  get isClosed(): boolean {
    return this.shutdownPromise !== null;
  }

  /**
   * Start Chrome and wait for its DevTools endpoint.
   *
   * @throws ChromeNotFoundError when no executable is configured or found
   * @throws LaunchFailedError when the profile directory or the process cannot be created
   * @throws StartupTimeoutError when Chrome exits or stays silent past `startupTimeoutMs`
   */
  async launch(): Promise<SupervisedChrome> {
    if (this.isClosed) throw new IllegalStateError('ChromeSupervisor has been shut down');
    if (this.chrome || this.launching) throw new IllegalStateError('Chrome is already running');
    this.launching = true;
    try {
      const chrome = await this.start();
      if (this.isClosed) {
        await discard(chrome, this.config.shutdownTimeoutMs);
        throw new IllegalStateError('ChromeSupervisor was shut down while Chrome was starting');
      }
      this.chrome = chrome;
      return chrome;
    } finally {
      this.launching = false;
    }
  }

  private async start(): Promise<SupervisedChrome> {
    const executable = this.resolveExecutable();
    const { dir, owned } = await this.prepareUserDataDir();
    const args = buildChromeArgs(this.config, dir);
    logger.info(`Launching ${executable.kind} from ${executable.path}`);
    logger.debug(`Chrome arguments: ${args.join(' ')}`);

    let proc: ChromeChildProcess;
    try {
      proc = this.spawnChrome(executable.path, args);
    } catch (err) {
      if (owned) await removeDir(dir);
      throw new LaunchFailedError(`Failed to start Chrome: ${describeError(err)}`, { cause: err });
    }

    let endpoint: string;
    try {
      endpoint = await waitForEndpoint(proc, this.config.startupTimeoutMs);
    } catch (err) {
      logger.error(`Chrome startup failed (PID: ${proc.pid ?? 'unknown'}): ${describeError(err)}`);
      if (isProcessAlive(proc)) signalQuietly(proc, 'SIGKILL');
      if (owned) await removeDir(dir);
      throw err;
    }

    proc.on('error', (err) => {
      logger.warn(`Chrome process error (PID: ${proc.pid ?? 'unknown'}): ${err.message}`);
    });

    const chrome = new SupervisedChrome({ process: proc, endpoint, executable, userDataDir: dir, ownsUserDataDir: owned });
    processRegistry.register(proc);
    registerExitHook(chrome);
    logger.info(`Chrome started (PID: ${chrome.pid}), DevTools endpoint: ${endpoint}`);
    return chrome;
  }

  private resolveExecutable(): ChromeExecutable {
    if (this.config.executablePath) return { kind: 'custom', path: this.config.executablePath };
    const found = this.locate();
    if (!found) throw new ChromeNotFoundError();
    return found;
  }

  private async prepareUserDataDir(): Promise<{ dir: string; owned: boolean }> {
    try {
      if (this.config.userDataDir) {
        await fs.promises.mkdir(this.config.userDataDir, { recursive: true });
        return { dir: this.config.userDataDir, owned: false };
      }
      const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), PROFILE_DIR_PREFIX));
      logger.debug(`Created user data directory: ${dir}`);
      return { dir, owned: true };
    } catch (err) {
      throw new LaunchFailedError(`Failed to prepare user data directory: ${describeError(err)}`, { cause: err });
    }
  }

  /**
   * Stop Chrome (graceful, then forced) and delete an owned profile directory.
   * Safe to call any number of times; later calls share the first one's outcome.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) this.shutdownPromise = this.stop();
    return this.shutdownPromise;
  }

  private async stop(): Promise<void> {
    const chrome = this.chrome;
    this.chrome = null;
    if (!chrome) {
      logger.debug('Shutdown requested with no running Chrome');
      return;
    }
    await discard(chrome, this.config.shutdownTimeoutMs);
  }
}

async function discard(chrome: SupervisedChrome, graceMs: number): Promise<void> {
  logger.info(`Shutting down Chrome (PID: ${chrome.pid})`);
  processRegistry.unregister(chrome.process);
  removeExitHook(chrome);
  await terminate(chrome.process, graceMs);
  await chrome.releaseUserDataDir();
}

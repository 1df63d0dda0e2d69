import { createLogger, describeError } from './logging.js';

const logger = createLogger('process-registry');

/** Anything with a pid that can be checked for liveness and killed. */
export interface TrackedProcess {
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

/** A process whose exit hook can kill it and remove its owned directory. */
export interface ExitHookTarget {
  readonly pid: number;
  /** Synchronous: runs inside the host's `exit` event. */
  forceKill(): void;
  /** Synchronous: deletes the owned user-data directory at most once. */
  releaseUserDataDirSync(): void;
}

export function isProcessAlive(proc: TrackedProcess): boolean {
  return proc.exitCode === null && proc.signalCode === null;
}

/** Metadata kept for a registered process. */
export class RegistryEntry {
  readonly pid: number;
  readonly registeredAt: Date;
  readonly aliveAtRegistration: boolean;

  constructor(proc: TrackedProcess, now: Date = new Date()) {
    this.pid = proc.pid ?? 0;
    this.registeredAt = now;
    this.aliveAtRegistration = isProcessAlive(proc);
  }

  ageMs(): number {
    return Date.now() - this.registeredAt.getTime();
  }

  toString(): string {
    return `RegistryEntry{pid=${this.pid}, registeredAt=${this.registeredAt.toISOString()}, age=${this.ageMs()}ms, wasAlive=${this.aliveAtRegistration}}`;
  }
}

// ── Process Table ──

/**
 * Process-wide table of every browser process launched by this library.
 *
 * Filled when a browser starts, drained when it shuts down or the host exits.
 * Entries are independent of each other, so every operation is a single map
 * operation.
 */
export class ProcessRegistry {
  private readonly active = new Map<TrackedProcess, RegistryEntry>();

  register(proc: TrackedProcess): RegistryEntry {
    const entry = new RegistryEntry(proc);
    this.active.set(proc, entry);
    logger.info(`Registered Chrome process (PID: ${entry.pid}, Total active: ${this.active.size})`);
    logger.debug(`Process details: ${entry.toString()}`);
    return entry;
  }

  unregister(proc: TrackedProcess): boolean {
    const entry = this.active.get(proc);
    if (!entry) {
      logger.debug(`Attempted to unregister process that was not in registry (PID: ${proc.pid ?? 'unknown'})`);
      return false;
    }
    this.active.delete(proc);
    logger.info(`Unregistered Chrome process (PID: ${entry.pid}, Total active: ${this.active.size})`);
    return true;
  }

  isRegistered(proc: TrackedProcess): boolean {
    return this.active.has(proc);
  }

  getMetadata(proc: TrackedProcess): RegistryEntry | undefined {
    return this.active.get(proc);
  }

  get activeCount(): number {
    return this.active.size;
  }

  entries(): RegistryEntry[] {
    return [...this.active.values()];
  }

  /** Drop entries whose process died without being unregistered. Returns how many were dropped. */
  healthCheck(): number {
    logger.debug(`Performing health check on ${this.active.size} registered processes`);
    let cleaned = 0;
    for (const [proc, entry] of this.active) {
      if (isProcessAlive(proc)) continue;
      logger.info(`Health check detected dead process (PID: ${entry.pid}), removing from registry`);
      this.active.delete(proc);
      cleaned++;
    }
    if (cleaned > 0) {
      logger.info(`Health check cleaned up ${cleaned} dead process(es). Remaining active: ${this.active.size}`);
    } else {
      logger.debug(`Health check completed. All ${this.active.size} processes are alive`);
    }
    return cleaned;
  }

  /** Emergency stop: SIGKILL every live process and empty the table. Returns how many were killed. */
  cleanupAll(): number {
    logger.warn(`Emergency cleanup initiated for ${this.active.size} active processes`);
    let terminated = 0;
    for (const [proc, entry] of this.active) {
      if (!isProcessAlive(proc)) continue;
      logger.warn(`Forcibly terminating Chrome process (PID: ${entry.pid})`);
      try {
        proc.kill('SIGKILL');
        terminated++;
      } catch (err) {
        logger.warn(`Failed to kill PID ${entry.pid}: ${describeError(err)}`);
      }
    }
    this.active.clear();
    logger.warn(`Emergency cleanup completed. Terminated ${terminated} process(es)`);
    return terminated;
  }

  clear(): void {
    this.active.clear();
  }
}

export const processRegistry = new ProcessRegistry();

// ── Exit Hooks ──

type ExitListener = () => void;

const exitHooks = new Map<ExitHookTarget, ExitListener>();
let hostTerminating = false;
let exitListenersInstalled = false;
let signalHandlersInstalled = false;

const FORWARDED_SIGNALS: ReadonlyArray<[NodeJS.Signals, number]> = [['SIGHUP', 1], ['SIGINT', 2], ['SIGTERM', 15]];

function markTerminating(): void {
  hostTerminating = true;
  logger.debug('Host process exit detected');
}

function runExitHooks(): void {
  for (const hook of [...exitHooks.values()]) hook();
}

function ensureExitListeners(): void {
  if (exitListenersInstalled) return;
  // Prepended so the flag is set before any per-process hook runs.
  process.prependListener('exit', markTerminating);
  process.on('exit', runExitHooks);
  exitListenersInstalled = true;
}

/**
 * Listener for `signal` that exits with `128 + code` so exit hooks run, unless
 * the host has added a listener of its own by the time the signal arrives.
 */
export function createSignalForwarder(signal: NodeJS.Signals, code: number): () => void {
  return () => {
    if (process.listenerCount(signal) > 0) {
      logger.debug(`Received ${signal}, leaving shutdown to the host`);
      return;
    }
    logger.debug(`Received ${signal}, exiting`);
    process.exit(128 + code);
  };
}

/**
 * Turn SIGINT/SIGTERM/SIGHUP into a regular `process.exit` so that exit hooks
 * run. Signals the host already handles are left alone.
 */
export function installSignalHandlers(): void {
  if (signalHandlersInstalled) return;
  signalHandlersInstalled = true;
  for (const [signal, code] of FORWARDED_SIGNALS) {
    if (process.listenerCount(signal) > 0) continue;
    process.once(signal, createSignalForwarder(signal, code));
  }
}

export function isHostTerminating(): boolean {
  return hostTerminating;
}

/**
 * Add an exit hook that force-kills `target` and removes its owned user-data
 * directory if the host exits before normal shutdown. All hooks run from one
 * shared `exit` listener.
 */
export function registerExitHook(target: ExitHookTarget): ExitListener {
  ensureExitListeners();
  installSignalHandlers();
  const existing = exitHooks.get(target);
  if (existing) return existing;

  const hook: ExitListener = () => {
    logger.debug(`Executing exit hook for Chrome process (PID: ${target.pid})`);
    try {
      target.forceKill();
    } catch (err) {
      logger.warn(`Exit hook could not kill PID ${target.pid}: ${describeError(err)}`);
    }
    try {
      target.releaseUserDataDirSync();
    } catch (err) {
      logger.warn(`Exit hook could not remove user data dir of PID ${target.pid}: ${describeError(err)}`);
    }
  };
  exitHooks.set(target, hook);
  logger.debug(`Registered exit hook for Chrome process (PID: ${target.pid})`);
  return hook;
}

/** Remove the exit hook of `target`. A no-op while the host is already exiting. */
export function removeExitHook(target: ExitHookTarget): boolean {
  if (hostTerminating) {
    logger.trace('Host is exiting, skipping exit hook removal');
    return false;
  }
  if (!exitHooks.has(target)) {
    logger.debug(`No exit hook found for Chrome process (PID: ${target.pid})`);
    return false;
  }
  exitHooks.delete(target);
  logger.debug(`Removed exit hook for Chrome process (PID: ${target.pid})`);
  return true;
}

export function registeredHookCount(): number {
  return exitHooks.size;
}

export function isHookRegistered(target: ExitHookTarget): boolean {
  return exitHooks.has(target);
}

import { EventEmitter } from 'node:events';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PassThrough } from 'node:stream';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  ChromeSupervisor,
  SupervisedChrome,
  buildChromeArgs,
  parseDevToolsEndpoint,
  type SpawnChrome,
} from './chrome-launcher.js';
import { resolveLaunchConfig } from './config.js';
import {
  ChromeNotFoundError,
  IllegalStateError,
  LaunchFailedError,
  StartupTimeoutError,
} from './errors.js';
import { isHookRegistered, processRegistry } from './process-registry.js';
import type { ChromeChildProcess, LaunchOptions } from './types.js';

const ENDPOINT = 'ws://127.0.0.1:41234/devtools/browser/5f1c2d3e-test';
const ANNOUNCEMENT = `DevTools listening on ${ENDPOINT}\n`;

class FakeChild extends EventEmitter implements ChromeChildProcess {
  pid = 4242;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  stdout = new PassThrough();
  stderr = new PassThrough();
  readonly signals: Array<NodeJS.Signals | number | undefined> = [];
  /** Signals that make the fake exit. */
  exitOn: NodeJS.Signals[] = ['SIGTERM', 'SIGKILL'];

  kill(signal?: NodeJS.Signals | number): boolean {
    this.signals.push(signal);
    if (typeof signal === 'string' && this.exitOn.includes(signal)) this.exit(null, signal);
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null): void {
    this.exitCode = code;
    this.signalCode = signal;
    this.emit('exit', code, signal);
  }
}

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chromepress-test-'));
  tempDirs.push(dir);
  return dir;
}

function userDataDirArg(args: string[]): string {
  const arg = args.find(a => a.startsWith('--user-data-dir='));
  if (!arg) throw new Error('no --user-data-dir argument');
  return arg.slice('--user-data-dir='.length);
}

function createSupervisor(opts: LaunchOptions, spawn: SpawnChrome): ChromeSupervisor {
  const config = resolveLaunchConfig(opts, {});
  return new ChromeSupervisor(config, { spawn, locate: () => ({ kind: 'chrome', path: '/opt/fake/chrome' }) });
}

afterEach(() => {
  processRegistry.clear();
  for (const dir of tempDirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

describe('buildChromeArgs', () => {
  it('starts with the headless and origin flags and ends with about:blank', () => {
    const args = buildChromeArgs(resolveLaunchConfig({}, {}), '/tmp/profile');
    expect(args.slice(0, 3)).toEqual(['--headless=new', '--disable-gpu', '--remote-allow-origins=*']);
    expect(args).toContain('--remote-debugging-port=0');
    expect(args).toContain('--user-data-dir=/tmp/profile');
    expect(args).not.toContain('--no-sandbox');
    expect(args).not.toContain('--disable-dev-shm-usage');
    expect(args[args.length - 1]).toBe('about:blank');
  });

  it('puts optional flags after the profile and caller extras last', () => {
    const config = resolveLaunchConfig({
      headless: false,
      disableGpu: false,
      debugPort: 9333,
      noSandbox: true,
      disableDevShmUsage: true,
      windowSize: '800,600',
      extraArgs: ['--lang=de'],
    }, {});
    const args = buildChromeArgs(config, '/p');
    expect(args[0]).toBe('--remote-allow-origins=*');
    expect(args).not.toContain('--headless=new');
    expect(args).not.toContain('--disable-gpu');
    expect(args.slice(args.indexOf('--remote-debugging-port=9333'))).toEqual([
      '--remote-debugging-port=9333',
      '--user-data-dir=/p',
      '--no-sandbox',
      '--disable-dev-shm-usage',
      '--window-size=800,600',
      '--lang=de',
      'about:blank',
    ]);
  });
});

describe('parseDevToolsEndpoint', () => {
  it('extracts the WebSocket URL', () => {
    expect(parseDevToolsEndpoint(`DevTools listening on ${ENDPOINT}`)).toBe(ENDPOINT);
  });

  it('ignores other output', () => {
    expect(parseDevToolsEndpoint('[1019/101010.123:ERROR:gpu_init.cc] Passthrough is not supported')).toBeNull();
  });
});

describe('ChromeSupervisor', () => {
  it('launches, reads the endpoint from stderr and registers the process', async () => {
    const child = new FakeChild();
    const spawn = vi.fn<SpawnChrome>(() => {
      child.stderr.write(ANNOUNCEMENT);
      return child;
    });
    const supervisor = createSupervisor({}, spawn);

    const chrome = await supervisor.launch();

    expect(chrome.endpoint).toBe(ENDPOINT);
    expect(chrome.pid).toBe(4242);
    expect(chrome.ownsUserDataDir).toBe(true);
    expect(fs.existsSync(chrome.userDataDir)).toBe(true);
    expect(spawn).toHaveBeenCalledTimes(1);
    expect(spawn.mock.calls[0]?.[0]).toBe('/opt/fake/chrome');
    expect(supervisor.isRunning).toBe(true);
    expect(processRegistry.isRegistered(child)).toBe(true);
    expect(isHookRegistered(chrome)).toBe(true);

    await supervisor.shutdown();
  });

  it('also accepts the announcement on stdout', async () => {
    const child = new FakeChild();
    const supervisor = createSupervisor({}, () => {
      child.stdout.write('some banner\n');
      child.stdout.write(ANNOUNCEMENT);
      return child;
    });

    const chrome = await supervisor.launch();

    expect(chrome.endpoint).toBe(ENDPOINT);
    await supervisor.shutdown();
  });

  it('shuts down gracefully, removes the owned directory and is idempotent', async () => {
    const child = new FakeChild();
    const supervisor = createSupervisor({}, () => {
      child.stderr.write(ANNOUNCEMENT);
      return child;
    });
    const chrome = await supervisor.launch();

    await supervisor.shutdown();
    await supervisor.shutdown();
    await supervisor.shutdown();

    expect(child.signals).toEqual(['SIGTERM']);
    expect(fs.existsSync(chrome.userDataDir)).toBe(false);
    expect(processRegistry.isRegistered(child)).toBe(false);
    expect(isHookRegistered(chrome)).toBe(false);
    expect(supervisor.isClosed).toBe(true);
    expect(supervisor.running).toBeNull();
  });

  it('escalates to SIGKILL when Chrome ignores SIGTERM', async () => {
    const child = new FakeChild();
    child.exitOn = ['SIGKILL'];
    const supervisor = createSupervisor({ shutdownTimeoutMs: 50 }, () => {
      child.stderr.write(ANNOUNCEMENT);
      return child;
    });
    await supervisor.launch();

    await supervisor.shutdown();

    expect(child.signals).toEqual(['SIGTERM', 'SIGKILL']);
    expect(child.signalCode).toBe('SIGKILL');
  });

  it('keeps a caller-provided user data directory', async () => {
    const dir = makeTempDir();
    const child = new FakeChild();
    const spawn = vi.fn<SpawnChrome>(() => {
      child.stderr.write(ANNOUNCEMENT);
      return child;
    });
    const supervisor = createSupervisor({ userDataDir: dir }, spawn);

    const chrome = await supervisor.launch();
    await supervisor.shutdown();

    expect(chrome.ownsUserDataDir).toBe(false);
    expect(userDataDirArg(spawn.mock.calls[0]?.[1] ?? [])).toBe(dir);
    expect(fs.existsSync(dir)).toBe(true);
  });

  it('fails with StartupTimeoutError and cleans up when Chrome exits before announcing', async () => {
    const child = new FakeChild();
    const spawn = vi.fn<SpawnChrome>(() => {
      setImmediate(() => child.exit(1, null));
      return child;
    });
    const supervisor = createSupervisor({}, spawn);

    const error = await supervisor.launch().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StartupTimeoutError);
    expect(error).toHaveProperty('message', 'Chrome exited before announcing its DevTools endpoint (code: 1, signal: none)');
    expect(fs.existsSync(userDataDirArg(spawn.mock.calls[0]?.[1] ?? []))).toBe(false);
    expect(processRegistry.activeCount).toBe(0);
    expect(supervisor.running).toBeNull();
  });

  it('kills a silent Chrome once the startup timeout elapses', async () => {
    const child = new FakeChild();
    const supervisor = createSupervisor({ startupTimeoutMs: 50 }, () => child);

    const error = await supervisor.launch().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StartupTimeoutError);
    expect(error).toHaveProperty('message', 'Chrome did not announce its DevTools endpoint within 50ms');
    expect(error).toHaveProperty('timeoutMs', 50);
    expect(child.signals).toEqual(['SIGKILL']);
  });

  it('reports a spawn error as LaunchFailedError', async () => {
    const child = new FakeChild();
    const supervisor = createSupervisor({}, () => {
      setImmediate(() => child.emit('error', new Error('spawn /opt/fake/chrome ENOENT')));
      return child;
    });

    await expect(supervisor.launch()).rejects.toThrow(new LaunchFailedError('Failed to start Chrome: spawn /opt/fake/chrome ENOENT'));
  });

  it('reports a throwing spawn as LaunchFailedError', async () => {
    const supervisor = createSupervisor({}, () => {
      throw new Error('EACCES');
    });

    await expect(supervisor.launch()).rejects.toBeInstanceOf(LaunchFailedError);
  });

  it('fails with ChromeNotFoundError when no executable is found', async () => {
    const supervisor = new ChromeSupervisor(resolveLaunchConfig({}, {}), {
      spawn: () => new FakeChild(),
      locate: () => null,
    });

    await expect(supervisor.launch()).rejects.toBeInstanceOf(ChromeNotFoundError);
  });

  it('refuses a second launch and any launch after shutdown', async () => {
    const child = new FakeChild();
    const supervisor = createSupervisor({}, () => {
      child.stderr.write(ANNOUNCEMENT);
      return child;
    });
    await supervisor.launch();

    await expect(supervisor.launch()).rejects.toBeInstanceOf(IllegalStateError);
    await supervisor.shutdown();
    await expect(supervisor.launch()).rejects.toThrow('ChromeSupervisor has been shut down');
  });

  it('shuts down cleanly when nothing was launched', async () => {
    const supervisor = createSupervisor({}, () => new FakeChild());

    await expect(supervisor.shutdown()).resolves.toBeUndefined();
    expect(supervisor.isClosed).toBe(true);
  });
});

describe('SupervisedChrome', () => {
  it('deletes an owned directory only once', () => {
    const dir = makeTempDir();
    const chrome = new SupervisedChrome({
      process: new FakeChild(),
      endpoint: ENDPOINT,
      executable: { kind: 'chrome', path: '/opt/fake/chrome' },
      userDataDir: dir,
      ownsUserDataDir: true,
    });

    chrome.releaseUserDataDirSync();
    expect(fs.existsSync(dir)).toBe(false);

    fs.mkdirSync(dir);
    chrome.releaseUserDataDirSync();
    expect(fs.existsSync(dir)).toBe(true);
  });

  it('never deletes a directory it does not own', () => {
    const dir = makeTempDir();
    const chrome = new SupervisedChrome({
      process: new FakeChild(),
      endpoint: ENDPOINT,
      executable: { kind: 'custom', path: '/opt/fake/chrome' },
      userDataDir: dir,
      ownsUserDataDir: false,
    });

    chrome.releaseUserDataDirSync();

    expect(fs.existsSync(dir)).toBe(true);
  });

  it('force-kills only a live process', () => {
    const child = new FakeChild();
    const chrome = new SupervisedChrome({
      process: child,
      endpoint: ENDPOINT,
      executable: { kind: 'chrome', path: '/opt/fake/chrome' },
      userDataDir: '/unused',
      ownsUserDataDir: false,
    });

    chrome.forceKill();
    chrome.forceKill();

    expect(child.signals).toEqual(['SIGKILL']);
    expect(chrome.isAlive).toBe(false);
  });
});

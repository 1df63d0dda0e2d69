import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs';
import { execFile, execFileSync } from 'node:child_process';
import type { ChromeExecutable, ChromeKind } from './types.js';
import { createLogger } from './logging.js';

const logger = createLogger('chrome-locator');

/** File-name fragments that identify a Chromium-family browser binary. */
const PRODUCT_TOKENS = ['chrome', 'chromium', 'msedge', 'edge', 'brave'];

const WHICH_NAMES = ['google-chrome', 'google-chrome-stable', 'chromium', 'chromium-browser'];

const WINDOWS_REGISTRY_KEY = 'HKEY_LOCAL_MACHINE\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\App Paths\\chrome.exe';

function execText(command: string, args: string[], timeoutMs = 1200): string | null {
  try {
    const output = execFileSync(command, args, {
      timeout: timeoutMs,
      encoding: 'utf8',
      maxBuffer: 1024 * 1024,
      stdio: ['ignore', 'pipe', 'ignore'],
    });
    return String(output ?? '').trim() || null;
  } catch { return null; }
}

function inferKindFromExeName(name: string): ChromeKind {
  const lower = name.toLowerCase();
  if (lower.includes('brave')) return 'brave';
  if (lower.includes('edge')) return 'edge';
  if (lower.includes('chromium')) return 'chromium';
  return 'chrome';
}

/**
 * A path is a usable browser when it is an existing regular file, executable
 * (outside Windows), and its file name carries a known product token.
 */
export function isValidChromeExecutable(filePath: string, platform: NodeJS.Platform = process.platform): boolean {
  let stat: fs.Stats;
  try { stat = fs.statSync(filePath); } catch { return false; }
  if (!stat.isFile()) return false;
  if (platform !== 'win32') {
    try { fs.accessSync(filePath, fs.constants.X_OK); } catch { return false; }
  }
  const fileName = (platform === 'win32' ? path.win32.basename(filePath) : path.basename(filePath)).toLowerCase();
  return PRODUCT_TOKENS.some(token => fileName.includes(token));
}

/** First candidate that passes {@link isValidChromeExecutable}, in order. */
export function findFirstExe(candidates: ChromeExecutable[], platform: NodeJS.Platform = process.platform): ChromeExecutable | null {
  for (const c of candidates) {
    if (isValidChromeExecutable(c.path, platform)) return c;
  }
  return null;
}

// ── Mac Detection ──

function macCandidates(): ChromeExecutable[] {
  const home = os.homedir();
  const app = (kind: ChromeKind, bundle: string, exe: string): ChromeExecutable[] => [
    { kind, path: `/Applications/${bundle}.app/Contents/MacOS/${exe}` },
    { kind, path: path.join(home, `Applications/${bundle}.app/Contents/MacOS/${exe}`) },
  ];
  return [
    ...app('chrome', 'Google Chrome', 'Google Chrome'),
    ...app('chromium', 'Chromium', 'Chromium'),
    ...app('edge', 'Microsoft Edge', 'Microsoft Edge'),
    ...app('brave', 'Brave Browser', 'Brave Browser'),
  ];
}

// ── Linux Detection ──

function linuxCandidates(): ChromeExecutable[] {
  return [
    { kind: 'chrome', path: '/usr/bin/google-chrome' },
    { kind: 'chrome', path: '/usr/bin/google-chrome-stable' },
    { kind: 'chromium', path: '/usr/bin/chromium' },
    { kind: 'chromium', path: '/usr/bin/chromium-browser' },
    { kind: 'chromium', path: '/snap/bin/chromium' },
    { kind: 'chrome', path: '/usr/local/bin/google-chrome' },
    { kind: 'chromium', path: '/usr/local/bin/chromium' },
    { kind: 'chrome', path: '/opt/google/chrome/chrome' },
    { kind: 'edge', path: '/usr/bin/microsoft-edge' },
    { kind: 'edge', path: '/usr/bin/microsoft-edge-stable' },
    { kind: 'brave', path: '/usr/bin/brave-browser' },
  ];
}

function findWithWhich(): ChromeExecutable | null {
  for (const name of WHICH_NAMES) {
    const resolved = execText('which', [name], 800);
    if (!resolved) continue;
    const first = resolved.split(/\r?\n/)[0]?.trim();
    if (first && isValidChromeExecutable(first)) {
      return { kind: inferKindFromExeName(path.basename(first)), path: first };
    }
  }
  return null;
}

// ── Windows Detection ──

function windowsCandidates(env: NodeJS.ProcessEnv): ChromeExecutable[] {
  const localAppData = env.LOCALAPPDATA ?? '';
  const programFiles = env.ProgramFiles ?? 'C:\\Program Files';
  const programFilesX86 = env['ProgramFiles(x86)'] ?? 'C:\\Program Files (x86)';
  const j = path.win32.join;
  const candidates: ChromeExecutable[] = [
    { kind: 'chrome', path: j(programFiles, 'Google', 'Chrome', 'Application', 'chrome.exe') },
    { kind: 'chrome', path: j(programFilesX86, 'Google', 'Chrome', 'Application', 'chrome.exe') },
  ];
  if (localAppData) {
    candidates.push({ kind: 'chrome', path: j(localAppData, 'Google', 'Chrome', 'Application', 'chrome.exe') });
    candidates.push({ kind: 'chromium', path: j(localAppData, 'Chromium', 'Application', 'chrome.exe') });
  }
  candidates.push({ kind: 'edge', path: j(programFiles, 'Microsoft', 'Edge', 'Application', 'msedge.exe') });
  candidates.push({ kind: 'edge', path: j(programFilesX86, 'Microsoft', 'Edge', 'Application', 'msedge.exe') });
  candidates.push({ kind: 'brave', path: j(programFiles, 'BraveSoftware', 'Brave-Browser', 'Application', 'brave.exe') });
  return candidates;
}

/** Extract the `(Default)    REG_SZ    <path>` value from `reg query` output. */
export function parseRegistryDefaultValue(output: string): string | null {
  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed.toLowerCase().startsWith('(default)')) continue;
    const parts = trimmed.split('REG_SZ');
    const value = parts[1]?.trim();
    if (value) return value;
  }
  return null;
}

function findInWindowsRegistry(): ChromeExecutable | null {
  const output = execText('reg', ['query', WINDOWS_REGISTRY_KEY, '/ve'], 2000);
  if (!output) return null;
  const exePath = parseRegistryDefaultValue(output);
  if (!exePath || !isValidChromeExecutable(exePath)) return null;
  return { kind: 'chrome', path: exePath };
}

// ── Resolve Executable ──

/**
 * Search the host for a Chromium-family browser.
 *
 * Well-known install locations are tried first, in priority order. Windows
 * then falls back to the `App Paths` registry entry; Linux and macOS fall back
 * to `which`. Returns `null` when nothing usable is found.
 */
export function findChromeExecutable(platform: NodeJS.Platform = process.platform): ChromeExecutable | null {
  let found: ChromeExecutable | null = null;
  if (platform === 'darwin') found = findFirstExe(macCandidates()) ?? findWithWhich();
  else if (platform === 'linux') found = findFirstExe(linuxCandidates()) ?? findWithWhich();
  else if (platform === 'win32') found = findFirstExe(windowsCandidates(process.env)) ?? findInWindowsRegistry();
  if (found) logger.debug(`Detected ${found.kind} at ${found.path}`);
  else logger.debug(`No browser found on ${platform}`);
  return found;
}

/**
 * Stronger check: run `<path> --version` and look for a product name in the
 * output. The child is killed when the check ends, whatever the outcome.
 */
export async function validateChromeVersion(exePath: string, timeoutMs = 10_000): Promise<boolean> {
  if (!isValidChromeExecutable(exePath)) return false;
  return await new Promise<boolean>((resolve) => {
    const child = execFile(exePath, ['--version'], { timeout: timeoutMs, killSignal: 'SIGKILL', encoding: 'utf8' }, (err, stdout, stderr) => {
      if (child.exitCode === null && child.signalCode === null) child.kill('SIGKILL');
      if (err) {
        logger.debug(`Version check failed for ${exePath}: ${err.message}`);
        resolve(false);
        return;
      }
      const output = `${stdout}\n${stderr}`.toLowerCase();
      logger.trace(`Version output for ${exePath}: ${output.trim()}`);
      resolve(PRODUCT_TOKENS.some(token => output.includes(token)));
    });
  });
}

import fs from 'node:fs';
import { z } from 'zod';
import { InvalidConfigError } from './errors.js';
import { createLogger } from './logging.js';
import type { LaunchOptions } from './types.js';

const logger = createLogger('config');

export const DEFAULT_STARTUP_TIMEOUT_MS = 30_000;
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5_000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 30_000;

const positiveMs = z.number().int().positive();

export const LaunchConfigSchema = z.object({
  executablePath: z.string().trim().min(1)
    .refine(p => fs.existsSync(p), p => ({ message: `executablePath not found: ${p}` }))
    .optional(),
  headless: z.boolean().default(true),
  debugPort: z.number().int().min(0).max(65535).default(0),
  userDataDir: z.string().trim().min(1).optional(),
  disableGpu: z.boolean().default(true),
  noSandbox: z.boolean().default(false),
  disableDevShmUsage: z.boolean().default(false),
  windowSize: z.string().regex(/^\d+,\d+$/, 'windowSize must look like "1280,1024"').optional(),
  extraArgs: z.array(z.string().min(1)).default([]),
  startupTimeoutMs: positiveMs.default(DEFAULT_STARTUP_TIMEOUT_MS),
  shutdownTimeoutMs: positiveMs.default(DEFAULT_SHUTDOWN_TIMEOUT_MS),
  connectTimeoutMs: positiveMs.default(DEFAULT_CONNECT_TIMEOUT_MS),
});

/** Fully resolved, immutable launch configuration. */
export type LaunchConfig = Readonly<Omit<z.infer<typeof LaunchConfigSchema>, 'extraArgs'>> & {
  readonly extraArgs: readonly string[];
};

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}

function envNumber(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (Number.isFinite(parsed)) return parsed;
  logger.warn(`Ignoring ${name}=${value}: not a number`);
  return undefined;
}

function envDefaults(env: NodeJS.ProcessEnv): LaunchOptions {
  return {
    executablePath: env.CHROMEPRESS_CHROME_PATH || undefined,
    headless: envFlag(env.CHROMEPRESS_HEADLESS),
    noSandbox: envFlag(env.CHROMEPRESS_NO_SANDBOX),
    disableDevShmUsage: envFlag(env.CHROMEPRESS_DISABLE_DEV_SHM_USAGE),
    startupTimeoutMs: envNumber('CHROMEPRESS_STARTUP_TIMEOUT_MS', env.CHROMEPRESS_STARTUP_TIMEOUT_MS),
  };
}

function definedEntries(opts: LaunchOptions): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(opts)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/**
 * Build a launch configuration from caller options layered over
 * `CHROMEPRESS_*` environment variables and defaults.
 *
 * @throws InvalidConfigError when a value is out of range or the executable path does not exist
 */
export function resolveLaunchConfig(opts: LaunchOptions = {}, env: NodeJS.ProcessEnv = process.env): LaunchConfig {
  const merged = { ...definedEntries(envDefaults(env)), ...definedEntries(opts) };
  const parsed = LaunchConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new InvalidConfigError('launch options', issues);
  }
  const config = parsed.data;
  return Object.freeze({ ...config, extraArgs: Object.freeze([...config.extraArgs]) });
}

/** True when running inside a Docker or Kubernetes container. */
export function isDocker(): boolean {
  try {
    if (fs.existsSync('/.dockerenv')) return true;
    if (fs.existsSync('/proc/1/cgroup')) {
      const cgroup = fs.readFileSync('/proc/1/cgroup', 'utf-8');
      return cgroup.includes('docker') || cgroup.includes('kubepods');
    }
  } catch {
    // not Linux
  }
  return false;
}

import type { Readable } from 'node:stream';
import type { Protocol } from 'playwright-core/types/protocol';

// ── Chrome Launcher ──

/** Supported browser types that can be detected and launched. */
export type ChromeKind = 'chrome' | 'chromium' | 'edge' | 'brave' | 'custom';

/** A detected browser executable on the system. */
export interface ChromeExecutable {
  /** The type of browser (chrome, chromium, edge, etc.) */
  kind: ChromeKind;
  /** Absolute path to the browser executable */
  path: string;
}

/** Options for launching a new browser instance. Anything omitted falls back to the environment, then to defaults. */
export interface LaunchOptions {
  /** Path to a specific browser executable. Auto-detected if omitted. */
  executablePath?: string;
  /** Run in headless mode (no visible window). Default: `true` */
  headless?: boolean;
  /** CDP port to use. `0` lets Chrome pick a free port. Default: `0` */
  debugPort?: number;
  /** Custom user data directory. A temporary one is created (and deleted on shutdown) if omitted. */
  userDataDir?: string;
  /** Pass `--disable-gpu`. Default: `true` */
  disableGpu?: boolean;
  /** Disable Chrome's sandbox (needed in some Docker/CI environments). Default: `false` */
  noSandbox?: boolean;
  /** Pass `--disable-dev-shm-usage` (small `/dev/shm` in containers). Default: `false` */
  disableDevShmUsage?: boolean;
  /** Window size as `"width,height"`, e.g. `"1280,1024"` */
  windowSize?: string;
  /** Additional Chrome command-line arguments, appended last so they override defaults. */
  extraArgs?: string[];
  /** How long to wait for Chrome to announce its DevTools endpoint. Default: `30000` */
  startupTimeoutMs?: number;
  /** How long to wait for a graceful exit before killing Chrome. Default: `5000` */
  shutdownTimeoutMs?: number;
  /** How long to wait for the CDP connection to open. Default: `30000` */
  connectTimeoutMs?: number;
}

/**
 * The subset of `ChildProcess` the supervisor relies on.
 * Tests substitute an EventEmitter-based fake.
 */
export interface ChromeChildProcess {
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'error', listener: (err: Error) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  removeListener(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  removeListener(event: 'error', listener: (err: Error) => void): this;
}

// ── Control Session ──

/** What to load into the page before rendering. */
export type ContentSource =
  | { url: string }
  | { html: string; baseUrl?: string };

/** Protocol domains the session can switch on and off. */
export type ProtocolDomain = 'Page' | 'Runtime' | 'Network';

/** Outcome of evaluating an expression in the page. */
export interface EvaluationResult {
  /** The JSON value of the result (`undefined` for values that don't serialize) */
  value: unknown;
  /** Set when the expression threw */
  exceptionText?: string;
}

export interface EvaluateOptions {
  /**
   * Wait for a Promise result to settle and return its value. When off, a
   * Promise comes back as an (empty) object. Default: `false`
   */
  awaitPromise?: boolean;
}

/** A network lifecycle event observed on the page. */
export type NetworkActivity =
  | { type: 'requestStarted'; requestId: string; url: string }
  | { type: 'requestFinished'; requestId: string }
  | { type: 'requestFailed'; requestId: string; errorText: string };

/**
 * The slice of a control session the readiness waits use. `ControlSession`
 * implements it; tests supply fakes.
 */
export interface PageChannel {
  evaluate(expression: string, opts?: EvaluateOptions): Promise<EvaluationResult>;
  enableDomain(domain: ProtocolDomain): Promise<void>;
  disableDomain(domain: ProtocolDomain): Promise<void>;
  /** Subscribe to network activity. Returns the unsubscribe function. */
  onNetworkEvent(listener: (event: NetworkActivity) => void): () => void;
}

/** Parameters of `Page.printToPDF`. */
export type PrintOptions = Protocol.Page.printToPDFParameters;

// ── Readiness ──

/** Sleep for a fixed duration. */
export interface FixedDelayWait {
  readonly kind: 'fixedDelay';
  readonly durationMs: number;
}

/** Wait until the page has made (almost) no network requests for a while. */
export interface NetworkIdleWait {
  readonly kind: 'networkIdle';
  readonly quietPeriodMs: number;
  readonly maxInflight: number;
}

/** Wait until an element matching a CSS selector exists (or is visible). */
export interface ElementWait {
  readonly kind: 'element';
  readonly selector: string;
  readonly visibleOnly: boolean;
  readonly pollIntervalMs: number;
}

/** Wait until a JavaScript expression evaluates to a truthy value. */
export interface CustomPredicateWait {
  readonly kind: 'customPredicate';
  readonly expression: string;
  readonly pollIntervalMs: number;
}

export type WaitSpec = FixedDelayWait | NetworkIdleWait | ElementWait | CustomPredicateWait;

/** Options accepted by every readiness wait. */
export interface AwaitOptions {
  /** Aborting this signal interrupts the wait with an `InterruptedError`. */
  signal?: AbortSignal;
}

/** Options for a full navigate → wait → render run. */
export interface GenerateOptions extends AwaitOptions {
  /** Readiness condition checked after navigation. Skipped if omitted. */
  waitFor?: WaitSpec;
  /** Deadline for `waitFor`. Default: `30000` */
  waitTimeoutMs?: number;
  /** Deadline for the navigation itself. Default: `30000` */
  navigationTimeoutMs?: number;
  /** `Page.printToPDF` parameters. */
  print?: PrintOptions;
}

import { ChromeSupervisor } from './chrome-launcher.js';
import { resolveLaunchConfig, type LaunchConfig } from './config.js';
import { ControlSession, type NavigateOptions } from './connection.js';
import { IllegalStateError } from './errors.js';
import { createLogger, describeError } from './logging.js';
import { awaitReady, describeWait, parseWaitSpec } from './wait/index.js';
import type {
  AwaitOptions,
  ContentSource,
  GenerateOptions,
  LaunchOptions,
  PageChannel,
  PrintOptions,
  WaitSpec,
} from './types.js';

const logger = createLogger('chromepress');

export const DEFAULT_WAIT_TIMEOUT_MS = 30_000;

const URL_SCHEME = /^[a-z][a-z0-9+.-]*:/i;

/** What the facade needs from a started Chrome. */
export interface LaunchedChrome {
  readonly endpoint: string;
}

/** What the facade needs from a process supervisor. `ChromeSupervisor` is the real one. */
export interface SupervisorHandle {
  launch(): Promise<LaunchedChrome>;
  shutdown(): Promise<void>;
}

/** What the facade needs from a control session. `ControlSession` is the real one. */
export interface SessionHandle extends PageChannel {
  connect(): Promise<void>;
  navigate(source: ContentSource, opts?: NavigateOptions): Promise<void>;
  printToPdf(params?: PrintOptions): Promise<Buffer>;
  close(): Promise<void>;
}

export interface ChromePressDeps {
  createSupervisor?: (config: LaunchConfig) => SupervisorHandle;
  createSession?: (endpoint: string, config: LaunchConfig) => SessionHandle;
}

/** A string with a URL scheme is a URL; anything else is HTML markup. */
export function toContentSource(source: ContentSource | string): ContentSource {
  if (typeof source !== 'string') return source;
  return URL_SCHEME.test(source.trim()) ? { url: source.trim() } : { html: source };
}

async function release(session: SessionHandle | null, supervisor: SupervisorHandle | null): Promise<void> {
  if (session) {
    try {
      await session.close();
    } catch (err) {
      logger.warn(`Failed to close control session: ${describeError(err)}`);
    }
  }
  if (supervisor) {
    try {
      await supervisor.shutdown();
    } catch (err) {
      logger.warn(`Failed to shut down Chrome: ${describeError(err)}`);
    }
  }
}

/**
 * Turns web pages and HTML into PDFs with a headless Chrome it manages itself.
 *
 * Chrome is started lazily by the first operation that needs it and stays up
 * until {@link close}. Operations on one instance run one at a time, in call order.
 *
 * @example
 * ```ts
 * const press = new ChromePress({ noSandbox: true });
 * try {
 *   const pdf = await press.generate('https://example.com', {
 *     waitFor: networkIdle(),
 *     print: { printBackground: true },
 *   });
 *   await fs.writeFile('example.pdf', pdf);
 * } finally {
 *   await press.close();
 * }
 * ```
 */
export class ChromePress {
  readonly config: LaunchConfig;
  private readonly createSupervisor: (config: LaunchConfig) => SupervisorHandle;
  private readonly createSession: (endpoint: string, config: LaunchConfig) => SessionHandle;
  private supervisor: SupervisorHandle | null = null;
  private session: SessionHandle | null = null;
  private queue: Promise<void> = Promise.resolve();
  private closePromise: Promise<void> | null = null;
  private torndown = false;

  /**
   * Validates the options. Nothing is launched until the first operation.
   *
   * @throws InvalidConfigError when an option is out of range
   */
  constructor(options: LaunchOptions = {}, deps: ChromePressDeps = {}) {
    this.config = resolveLaunchConfig(options);
    this.createSupervisor = deps.createSupervisor ?? (config => new ChromeSupervisor(config));
    this.createSession = deps.createSession
      ?? ((endpoint, config) => new ControlSession(endpoint, { connectTimeoutMs: config.connectTimeoutMs }));
  }

  /** Whether Chrome is running and connected. */
  get isInitialized(): boolean {
    return this.session !== null;
  }

  get isClosed(): boolean {
    return this.closePromise !== null;
  }

  // ── Lock ──

  /** Run `task` after every previously queued task has settled. */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }

  private assertOpen(): void {
    if (this.closePromise) throw new IllegalStateError('ChromePress has been closed');
  }

  /** Must run inside {@link exclusive}. */
  private async ensureInitialized(): Promise<SessionHandle> {
    if (this.torndown) throw new IllegalStateError('ChromePress has been closed');
    if (this.session) return this.session;

    logger.info('Starting Chrome');
    const supervisor = this.createSupervisor(this.config);
    let session: SessionHandle | null = null;
    try {
      const chrome = await supervisor.launch();
      session = this.createSession(chrome.endpoint, this.config);
      await session.connect();
      this.supervisor = supervisor;
      this.session = session;
      logger.info(`Ready (endpoint: ${chrome.endpoint})`);
      return session;
    } catch (err) {
      logger.error(`Initialization failed: ${describeError(err)}`);
      await release(session, supervisor);
      throw err;
    }
  }

  // ── Operations ──

  /**
   * Load a URL or an HTML document. A plain string is treated as a URL when
   * it starts with a scheme (`https:`, `file:`, `data:` …), otherwise as HTML.
   *
   * @throws NavigationError when loading fails or times out
   */
  async navigate(source: ContentSource | string, opts: NavigateOptions = {}): Promise<void> {
    this.assertOpen();
    const content = toContentSource(source);
    return this.exclusive(async () => {
      const session = await this.ensureInitialized();
      await session.navigate(content, opts);
    });
  }

  /**
   * Wait until the loaded page satisfies `spec`.
   *
   * @throws TimeoutError when the condition is not met within `timeoutMs`
   * @throws InterruptedError when `opts.signal` aborts
   */
  async awaitReady(spec: WaitSpec, timeoutMs: number = DEFAULT_WAIT_TIMEOUT_MS, opts: AwaitOptions = {}): Promise<void> {
    this.assertOpen();
    const checked = parseWaitSpec(spec);
    return this.exclusive(async () => {
      const session = await this.ensureInitialized();
      await awaitReady(session, checked, timeoutMs, opts);
    });
  }

  /**
   * Print the current page.
   *
   * @returns The PDF bytes
   * @throws RenderError when Chrome fails to print
   */
  async render(print: PrintOptions = {}): Promise<Buffer> {
    this.assertOpen();
    return this.exclusive(async () => {
      const session = await this.ensureInitialized();
      return session.printToPdf(print);
    });
  }

  /**
   * Navigate, wait and render in one go. No other operation on this instance
   * runs in between.
   *
   * @example
   * ```ts
   * const pdf = await press.generate('<h1>Invoice</h1>', { waitFor: fixedDelay(500) });
   * ```
   */
  async generate(source: ContentSource | string, opts: GenerateOptions = {}): Promise<Buffer> {
    this.assertOpen();
    const content = toContentSource(source);
    const waitFor = opts.waitFor ? parseWaitSpec(opts.waitFor) : null;
    return this.exclusive(async () => {
      const session = await this.ensureInitialized();
      await session.navigate(content, { timeoutMs: opts.navigationTimeoutMs });
      if (waitFor) {
        logger.debug(`Waiting for ${describeWait(waitFor)}`);
        await awaitReady(session, waitFor, opts.waitTimeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS, { signal: opts.signal });
      }
      return session.printToPdf(opts.print);
    });
  }

  /**
   * Disconnect and stop Chrome. Waits for queued operations first. Calling it
   * again returns the same promise; every other operation fails afterwards.
   */
  close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.exclusive(async () => {
        this.torndown = true;
        const { session, supervisor } = this;
        this.session = null;
        this.supervisor = null;
        if (!session && !supervisor) {
          logger.debug('Closed before Chrome was started');
          return;
        }
        logger.info('Closing');
        await release(session, supervisor);
      });
    }
    return this.closePromise;
  }
}

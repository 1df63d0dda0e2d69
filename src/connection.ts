import { setTimeout as sleep } from 'node:timers/promises';
import { chromium } from 'playwright-core';
import type { Browser, CDPSession } from 'playwright-core';
import type { Protocol } from 'playwright-core/types/protocol';
import { DEFAULT_CONNECT_TIMEOUT_MS } from './config.js';
import { ConnectionError, IllegalStateError, NavigationError, RenderError } from './errors.js';
import { createLogger, describeError } from './logging.js';
import type {
  ContentSource,
  EvaluateOptions,
  EvaluationResult,
  NetworkActivity,
  PageChannel,
  PrintOptions,
  ProtocolDomain,
} from './types.js';

const logger = createLogger('connection');

export const DEFAULT_NAVIGATION_TIMEOUT_MS = 30_000;
const READY_STATE_POLL_MS = 50;
const PDF_MAGIC = '%PDF-';

const ENABLE_COMMANDS = { Page: 'Page.enable', Runtime: 'Runtime.enable', Network: 'Network.enable' } as const;
const DISABLE_COMMANDS = { Page: 'Page.disable', Runtime: 'Runtime.disable', Network: 'Network.disable' } as const;

// Endpoints that currently have an open session.
const openEndpoints = new Set<string>();

export interface ControlSessionOptions {
  /** Deadline for opening the connection. Default: `30000` */
  connectTimeoutMs?: number;
}

export interface NavigateOptions {
  /** Deadline for the whole navigation, including the load. Default: `30000` */
  timeoutMs?: number;
}

/**
 * Insert `<base href>` so relative URLs in injected HTML resolve against
 * `baseUrl`. Goes right after `<head>` when there is one, else in front.
 */
export function injectBaseHref(html: string, baseUrl: string): string {
  const tag = `<base href="${baseUrl.replace(/&/g, '&amp;').replace(/"/g, '&quot;')}">`;
  const head = /<head(\s[^>]*)?>/i.exec(html);
  if (!head) return tag + html;
  const at = head.index + head[0].length;
  return html.slice(0, at) + tag + html.slice(at);
}

/** Values JSON cannot carry come back as strings such as `"NaN"`, `"-0"` or `"12n"`. */
export function parseUnserializable(raw: string): unknown {
  switch (raw) {
    case 'NaN': return Number.NaN;
    case 'Infinity': return Number.POSITIVE_INFINITY;
    case '-Infinity': return Number.NEGATIVE_INFINITY;
    case '-0': return -0;
  }
  if (/^-?\d+n$/.test(raw)) return BigInt(raw.slice(0, -1));
  return raw;
}

interface EventWaiter {
  fired: Promise<boolean>;
  cancel(): void;
}

function waitForLoadEvent(cdp: CDPSession, timeoutMs: number): EventWaiter {
  let cancel = (): void => {};
  const fired = new Promise<boolean>((resolve) => {
    const onLoad = (): void => {
      clearTimeout(timer);
      resolve(true);
    };
    const timer = setTimeout(() => {
      cdp.off('Page.loadEventFired', onLoad);
      resolve(false);
    }, timeoutMs);
    cdp.once('Page.loadEventFired', onLoad);
    cancel = () => {
      clearTimeout(timer);
      cdp.off('Page.loadEventFired', onLoad);
      resolve(false);
    };
  });
  return { fired, cancel };
}

/**
 * One DevTools connection to a running Chrome, attached to a single page.
 *
 * At most one session may be open per endpoint at a time.
 */
export class ControlSession implements PageChannel {
  readonly endpoint: string;
  private readonly connectTimeoutMs: number;
  private browser: Browser | null = null;
  private cdp: CDPSession | null = null;
  private holdsEndpoint = false;
  private closed = false;

  constructor(endpoint: string, opts: ControlSessionOptions = {}) {
    this.endpoint = endpoint;
    this.connectTimeoutMs = opts.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  }

  get isConnected(): boolean {
    return this.cdp !== null && !this.closed;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Open the connection and attach to the first page, creating one if needed.
   *
   * @throws ConnectionError when the endpoint cannot be reached. The session can be retried.
   * @throws IllegalStateError when already connected, closed, or another session holds the endpoint
   */
  async connect(): Promise<void> {
    if (this.closed) throw new IllegalStateError('Control session is closed');
    if (this.cdp) throw new IllegalStateError(`Control session for ${this.endpoint} is already connected`);
    if (openEndpoints.has(this.endpoint)) {
      throw new IllegalStateError(`A control session is already open for ${this.endpoint}`);
    }
    openEndpoints.add(this.endpoint);
    this.holdsEndpoint = true;

    logger.debug(`Connecting to ${this.endpoint}`);
    let browser: Browser;
    try {
      browser = await chromium.connectOverCDP(this.endpoint, { timeout: this.connectTimeoutMs });
    } catch (err) {
      this.releaseEndpoint();
      throw new ConnectionError(this.endpoint, describeError(err), { cause: err });
    }

    try {
      const context = browser.contexts()[0] ?? await browser.newContext();
      const page = context.pages()[0] ?? await context.newPage();
      this.cdp = await context.newCDPSession(page);
      this.browser = browser;
    } catch (err) {
      this.releaseEndpoint();
      await browser.close().catch((closeErr: unknown) => {
        logger.debug(`Ignoring disconnect failure after attach error: ${describeError(closeErr)}`);
      });
      throw new ConnectionError(this.endpoint, `could not attach to a page: ${describeError(err)}`, { cause: err });
    }
    logger.info(`Connected to ${this.endpoint}`);
  }

  private requireCdp(): CDPSession {
    if (this.closed) throw new IllegalStateError('Control session is closed');
    if (!this.cdp) throw new IllegalStateError('Control session is not connected');
    return this.cdp;
  }

  private releaseEndpoint(): void {
    if (!this.holdsEndpoint) return;
    openEndpoints.delete(this.endpoint);
    this.holdsEndpoint = false;
  }

  // ── Navigation ──

  /**
   * Load a URL, or inject an HTML document, and wait until it has loaded.
   *
   * @throws NavigationError when Chrome reports an error or the load misses the deadline
   */
  async navigate(source: ContentSource, opts: NavigateOptions = {}): Promise<void> {
    const cdp = this.requireCdp();
    const timeoutMs = opts.timeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT_MS;
    const deadline = Date.now() + timeoutMs;
    await cdp.send('Page.enable');
    if ('url' in source) {
      await this.navigateTo(cdp, source.url, timeoutMs);
      return;
    }
    const target = source.baseUrl ?? 'about:blank';
    await this.navigateTo(cdp, target, timeoutMs);
    const html = source.baseUrl ? injectBaseHref(source.html, source.baseUrl) : source.html;
    await this.setDocumentContent(cdp, html, target);
    await this.waitForReadyState(target, deadline, timeoutMs);
    logger.debug(`Loaded ${html.length} characters of HTML`);
  }

  private async navigateTo(cdp: CDPSession, url: string, timeoutMs: number): Promise<void> {
    logger.debug(`Navigating to ${url}`);
    const load = waitForLoadEvent(cdp, timeoutMs);
    let result: Protocol.Page.navigateReturnValue;
    try {
      result = await cdp.send('Page.navigate', { url });
    } catch (err) {
      load.cancel();
      throw new NavigationError(`Failed to navigate to ${url}: ${describeError(err)}`, url, { cause: err });
    }
    if (result.errorText) {
      load.cancel();
      throw new NavigationError(`Navigation to ${url} failed: ${result.errorText}`, url);
    }
    if (!await load.fired) {
      throw new NavigationError(`Navigation to ${url} did not finish loading within ${timeoutMs}ms`, url);
    }
  }

  private async setDocumentContent(cdp: CDPSession, html: string, target: string): Promise<void> {
    try {
      const { frameTree } = await cdp.send('Page.getFrameTree');
      await cdp.send('Page.setDocumentContent', { frameId: frameTree.frame.id, html });
    } catch (err) {
      throw new NavigationError(`Failed to set document content: ${describeError(err)}`, target, { cause: err });
    }
  }

  private async waitForReadyState(target: string, deadline: number, timeoutMs: number): Promise<void> {
    while (Date.now() < deadline) {
      const { value } = await this.evaluate('document.readyState').catch((err: unknown) => {
        logger.debug(`readyState check failed: ${describeError(err)}`);
        return { value: undefined };
      });
      if (value === 'complete') return;
      await sleep(Math.max(0, Math.min(READY_STATE_POLL_MS, deadline - Date.now())));
    }
    throw new NavigationError(`Document content did not finish loading within ${timeoutMs}ms`, target);
  }

  // ── Page Channel ──

  /** Evaluate `expression` in the page and return its JSON value. */
  async evaluate(expression: string, opts: EvaluateOptions = {}): Promise<EvaluationResult> {
    const cdp = this.requireCdp();
    const { result, exceptionDetails } = await cdp.send('Runtime.evaluate', {
      expression,
      returnByValue: true,
      awaitPromise: opts.awaitPromise ?? false,
    });
    if (exceptionDetails) {
      return { value: undefined, exceptionText: exceptionDetails.exception?.description ?? exceptionDetails.text };
    }
    if (result.unserializableValue !== undefined) return { value: parseUnserializable(result.unserializableValue) };
    return { value: result.value };
  }

  async enableDomain(domain: ProtocolDomain): Promise<void> {
    await this.requireCdp().send(ENABLE_COMMANDS[domain]);
  }

  async disableDomain(domain: ProtocolDomain): Promise<void> {
    await this.requireCdp().send(DISABLE_COMMANDS[domain]);
  }

  onNetworkEvent(listener: (event: NetworkActivity) => void): () => void {
    const cdp = this.requireCdp();
    const onStarted = (e: Protocol.Events['Network.requestWillBeSent']): void => {
      listener({ type: 'requestStarted', requestId: e.requestId, url: e.request.url });
    };
    const onFinished = (e: Protocol.Events['Network.loadingFinished']): void => {
      listener({ type: 'requestFinished', requestId: e.requestId });
    };
    const onFailed = (e: Protocol.Events['Network.loadingFailed']): void => {
      listener({ type: 'requestFailed', requestId: e.requestId, errorText: e.errorText });
    };
    cdp.on('Network.requestWillBeSent', onStarted);
    cdp.on('Network.loadingFinished', onFinished);
    cdp.on('Network.loadingFailed', onFailed);
    return () => {
      cdp.off('Network.requestWillBeSent', onStarted);
      cdp.off('Network.loadingFinished', onFinished);
      cdp.off('Network.loadingFailed', onFailed);
    };
  }

  // ── Rendering ──

  /**
   * Print the current page to PDF.
   *
   * @throws RenderError when the call fails or Chrome returns something that is not a PDF
   */
  async printToPdf(params: PrintOptions = {}): Promise<Buffer> {
    const cdp = this.requireCdp();
    let data: string;
    try {
      ({ data } = await cdp.send('Page.printToPDF', params));
    } catch (err) {
      throw new RenderError(`Page.printToPDF failed: ${describeError(err)}`, { cause: err });
    }
    const pdf = Buffer.from(data, 'base64');
    if (pdf.length === 0) throw new RenderError('Chrome returned an empty PDF');
    if (pdf.subarray(0, PDF_MAGIC.length).toString('latin1') !== PDF_MAGIC) {
      throw new RenderError('Chrome returned data that is not a PDF');
    }
    logger.debug(`Rendered PDF (${pdf.length} bytes)`);
    return pdf;
  }

  /** Detach and disconnect. Chrome itself keeps running. Safe to call repeatedly. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const { cdp, browser } = this;
    this.cdp = null;
    this.browser = null;
    this.releaseEndpoint();
    if (cdp) {
      try {
        await cdp.detach();
      } catch (err) {
        logger.debug(`Ignoring CDP detach failure: ${describeError(err)}`);
      }
    }
    if (browser) {
      try {
        await browser.close();
      } catch (err) {
        logger.warn(`Failed to disconnect from ${this.endpoint}: ${describeError(err)}`);
      }
    }
    logger.debug(`Closed control session for ${this.endpoint}`);
  }
}

import { EventEmitter } from 'node:events';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ControlSession, injectBaseHref, parseUnserializable } from './connection.js';
import { ConnectionError, IllegalStateError, NavigationError, RenderError } from './errors.js';
import type { NetworkActivity } from './types.js';

const connectOverCDP = vi.hoisted(() => vi.fn());

vi.mock('playwright-core', () => ({
  chromium: { connectOverCDP },
}));

type Handler = (params: Record<string, unknown> | undefined, cdp: FakeCdp) => unknown;

class FakeCdp extends EventEmitter {
  handlers: Record<string, Handler> = {};
  send = vi.fn(async (method: string, params?: Record<string, unknown>) => {
    const handler = this.handlers[method];
    return handler ? handler(params, this) : {};
  });
  detach = vi.fn(async () => undefined);
}

/** Page.navigate that fires the load event on the next turn. */
const navigateAndLoad: Handler = (_params, cdp) => {
  setImmediate(() => cdp.emit('Page.loadEventFired', { timestamp: 1 }));
  return { frameId: 'main-frame', loaderId: 'loader-1' };
};

function createBrowser(cdp: FakeCdp, pages: unknown[] = [{ name: 'page-1' }]) {
  const context = {
    pages: () => pages,
    newPage: vi.fn(async () => ({ name: 'created' })),
    newCDPSession: vi.fn(async () => cdp),
  };
  const browser = {
    contexts: () => [context],
    newContext: vi.fn(async () => context),
    close: vi.fn(async () => undefined),
  };
  return { browser, context };
}

const sessions: ControlSession[] = [];

async function connected(endpoint: string, cdp = new FakeCdp()) {
  const { browser, context } = createBrowser(cdp);
  connectOverCDP.mockResolvedValueOnce(browser);
  const session = new ControlSession(endpoint, { connectTimeoutMs: 1234 });
  sessions.push(session);
  await session.connect();
  return { session, cdp, browser, context };
}

function sentMethods(cdp: FakeCdp): string[] {
  return cdp.send.mock.calls.map(call => call[0]);
}

afterEach(async () => {
  for (const session of sessions.splice(0)) await session.close();
  connectOverCDP.mockReset();
});

describe('ControlSession.connect', () => {
  it('connects over CDP and attaches to the first page', async () => {
    const { context } = await connected('ws://127.0.0.1:9222/devtools/browser/a');

    expect(connectOverCDP).toHaveBeenCalledWith('ws://127.0.0.1:9222/devtools/browser/a', { timeout: 1234 });
    expect(context.newCDPSession).toHaveBeenCalledWith({ name: 'page-1' });
    expect(context.newPage).not.toHaveBeenCalled();
  });

  it('opens a page when the context has none', async () => {
    const cdp = new FakeCdp();
    const { browser, context } = createBrowser(cdp, []);
    connectOverCDP.mockResolvedValueOnce(browser);
    const session = new ControlSession('ws://127.0.0.1:9222/devtools/browser/b');
    sessions.push(session);

    await session.connect();

    expect(context.newCDPSession).toHaveBeenCalledWith({ name: 'created' });
    expect(session.isConnected).toBe(true);
  });

  it('wraps connection failures and can be retried', async () => {
    const endpoint = 'ws://127.0.0.1:9222/devtools/browser/c';
    connectOverCDP.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
    const session = new ControlSession(endpoint);
    sessions.push(session);

    await expect(session.connect()).rejects.toThrow(new ConnectionError(endpoint, 'connect ECONNREFUSED'));
    expect(session.isConnected).toBe(false);

    connectOverCDP.mockResolvedValueOnce(createBrowser(new FakeCdp()).browser);
    await session.connect();
    expect(session.isConnected).toBe(true);
  });

  it('allows one open session per endpoint', async () => {
    const endpoint = 'ws://127.0.0.1:9222/devtools/browser/d';
    const { session } = await connected(endpoint);
    const second = new ControlSession(endpoint);
    sessions.push(second);

    await expect(second.connect()).rejects.toBeInstanceOf(IllegalStateError);
    await expect(session.connect()).rejects.toBeInstanceOf(IllegalStateError);

    await session.close();
    connectOverCDP.mockResolvedValueOnce(createBrowser(new FakeCdp()).browser);
    await second.connect();
    expect(second.isConnected).toBe(true);
  });

  it('refuses commands before connecting', async () => {
    const session = new ControlSession('ws://127.0.0.1:9222/devtools/browser/e');
    await expect(session.evaluate('1')).rejects.toThrow('Control session is not connected');
  });
});

describe('ControlSession.navigate', () => {
  it('navigates to a URL and waits for the load event', async () => {
    const { session, cdp } = await connected('ws://127.0.0.1:9222/devtools/browser/f');
    cdp.handlers['Page.navigate'] = navigateAndLoad;

    await session.navigate({ url: 'https://example.com/' });

    expect(sentMethods(cdp)).toEqual(['Page.enable', 'Page.navigate']);
    expect(cdp.send).toHaveBeenCalledWith('Page.navigate', { url: 'https://example.com/' });
    expect(cdp.listenerCount('Page.loadEventFired')).toBe(0);
  });

  it('raises NavigationError for an errorText', async () => {
    const { session, cdp } = await connected('ws://127.0.0.1:9222/devtools/browser/g');
    cdp.handlers['Page.navigate'] = () => ({ frameId: 'main-frame', errorText: 'net::ERR_NAME_NOT_RESOLVED' });

    const error = await session.navigate({ url: 'https://unknown.test/' }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NavigationError);
    expect(error).toHaveProperty('message', 'Navigation to https://unknown.test/ failed: net::ERR_NAME_NOT_RESOLVED');
    expect(error).toHaveProperty('target', 'https://unknown.test/');
    expect(cdp.listenerCount('Page.loadEventFired')).toBe(0);
  });

  it('raises NavigationError when the page never loads', async () => {
    const { session, cdp } = await connected('ws://127.0.0.1:9222/devtools/browser/h');
    cdp.handlers['Page.navigate'] = () => ({ frameId: 'main-frame' });

    await expect(session.navigate({ url: 'https://slow.test/' }, { timeoutMs: 30 }))
      .rejects.toThrow('Navigation to https://slow.test/ did not finish loading within 30ms');
  });

  it('injects HTML with a base URL into the main frame', async () => {
    const { session, cdp } = await connected('ws://127.0.0.1:9222/devtools/browser/i');
    cdp.handlers['Page.navigate'] = navigateAndLoad;
    cdp.handlers['Page.getFrameTree'] = () => ({ frameTree: { frame: { id: 'main-frame' } } });
    cdp.handlers['Runtime.evaluate'] = () => ({ result: { type: 'string', value: 'complete' } });

    await session.navigate({
      html: '<html><head><title>Doc</title></head><body>Hi</body></html>',
      baseUrl: 'https://example.com/docs/',
    });

    expect(cdp.send).toHaveBeenCalledWith('Page.navigate', { url: 'https://example.com/docs/' });
    expect(cdp.send).toHaveBeenCalledWith('Page.setDocumentContent', {
      frameId: 'main-frame',
      html: '<html><head><base href="https://example.com/docs/"><title>Doc</title></head><body>Hi</body></html>',
    });
  });

  it('injects HTML into about:blank without a base URL', async () => {
    const { session, cdp } = await connected('ws://127.0.0.1:9222/devtools/browser/j');
    cdp.handlers['Page.navigate'] = navigateAndLoad;
    cdp.handlers['Page.getFrameTree'] = () => ({ frameTree: { frame: { id: 'blank-frame' } } });
    cdp.handlers['Runtime.evaluate'] = () => ({ result: { type: 'string', value: 'complete' } });

    await session.navigate({ html: '<p>plain</p>' });

    expect(cdp.send).toHaveBeenCalledWith('Page.navigate', { url: 'about:blank' });
    expect(cdp.send).toHaveBeenCalledWith('Page.setDocumentContent', { frameId: 'blank-frame', html: '<p>plain</p>' });
  });

  it('times out when injected HTML never completes', async () => {
    const { session, cdp } = await connected('ws://127.0.0.1:9222/devtools/browser/k');
    cdp.handlers['Page.navigate'] = navigateAndLoad;
    cdp.handlers['Page.getFrameTree'] = () => ({ frameTree: { frame: { id: 'main-frame' } } });
    cdp.handlers['Runtime.evaluate'] = () => ({ result: { type: 'string', value: 'loading' } });

    await expect(session.navigate({ html: '<img src="slow.png">' }, { timeoutMs: 120 }))
      .rejects.toThrow('Document content did not finish loading within 120ms');
  });
});

describe('injectBaseHref', () => {
  it('prepends the tag when there is no head', () => {
    expect(injectBaseHref('<p>x</p>', 'https://a.test/?q="1"&b'))
      .toBe('<base href="https://a.test/?q=&quot;1&quot;&amp;b"><p>x</p>');
  });

  it('keeps head attributes', () => {
    expect(injectBaseHref('<HEAD lang="en"></HEAD>', 'https://a.test/'))
      .toBe('<HEAD lang="en"><base href="https://a.test/"></HEAD>');
  });

  it('does not mistake a header element for head', () => {
    expect(injectBaseHref('<header>x</header>', 'https://a.test/'))
      .toBe('<base href="https://a.test/"><header>x</header>');
  });
});

describe('ControlSession.evaluate', () => {
  it('returns the value by value', async () => {
    const { session, cdp } = await connected('ws://127.0.0.1:9222/devtools/browser/l');
    cdp.handlers['Runtime.evaluate'] = () => ({ result: { type: 'object', value: { ready: true } } });

    await expect(session.evaluate('({ ready: true })')).resolves.toEqual({ value: { ready: true } });
    expect(cdp.send).toHaveBeenCalledWith('Runtime.evaluate', {
      expression: '({ ready: true })',
      returnByValue: true,
      awaitPromise: false,
    });
  });

  it('returns a promise result as an object unless asked to await it', async () => {
    const { session, cdp } = await connected('ws://127.0.0.1:9222/devtools/browser/l2');
    cdp.handlers['Runtime.evaluate'] = params => params?.awaitPromise === true
      ? { result: { type: 'number', value: 0 } }
      : { result: { type: 'object', subtype: 'promise', value: {} } };

    await expect(session.evaluate('Promise.resolve(0)')).resolves.toEqual({ value: {} });
    await expect(session.evaluate('Promise.resolve(0)', { awaitPromise: true })).resolves.toEqual({ value: 0 });
    expect(cdp.send).toHaveBeenLastCalledWith('Runtime.evaluate', {
      expression: 'Promise.resolve(0)',
      returnByValue: true,
      awaitPromise: true,
    });
  });

  it('reports exceptions as text', async () => {
    const { session, cdp } = await connected('ws://127.0.0.1:9222/devtools/browser/m');
    cdp.handlers['Runtime.evaluate'] = () => ({
      result: { type: 'object', subtype: 'error' },
      exceptionDetails: {
        text: 'Uncaught',
        exception: { type: 'object', description: 'ReferenceError: missing is not defined' },
      },
    });

    await expect(session.evaluate('missing')).resolves.toEqual({
      value: undefined,
      exceptionText: 'ReferenceError: missing is not defined',
    });
  });

  it('decodes unserializable numbers', async () => {
    const { session, cdp } = await connected('ws://127.0.0.1:9222/devtools/browser/n');
    cdp.handlers['Runtime.evaluate'] = () => ({ result: { type: 'number', unserializableValue: 'NaN' } });

    const { value } = await session.evaluate('0 / 0');

    expect(value).toBeNaN();
  });
});

describe('parseUnserializable', () => {
  it('handles negative zero, infinities and bigints', () => {
    expect(Object.is(parseUnserializable('-0'), -0)).toBe(true);
    expect(parseUnserializable('-Infinity')).toBe(Number.NEGATIVE_INFINITY);
    expect(parseUnserializable('12n')).toBe(12n);
  });
});

describe('ControlSession domains and network events', () => {
  it('enables and disables domains', async () => {
    const { session, cdp } = await connected('ws://127.0.0.1:9222/devtools/browser/o');

    await session.enableDomain('Network');
    await session.disableDomain('Runtime');

    expect(sentMethods(cdp)).toEqual(['Network.enable', 'Runtime.disable']);
  });

  it('maps network events and unsubscribes', async () => {
    const { session, cdp } = await connected('ws://127.0.0.1:9222/devtools/browser/p');
    const events: NetworkActivity[] = [];

    const unsubscribe = session.onNetworkEvent(event => events.push(event));
    cdp.emit('Network.requestWillBeSent', { requestId: 'r1', request: { url: 'https://a.test/app.css' } });
    cdp.emit('Network.loadingFinished', { requestId: 'r1' });
    cdp.emit('Network.loadingFailed', { requestId: 'r2', errorText: 'net::ERR_FAILED' });
    unsubscribe();
    cdp.emit('Network.requestWillBeSent', { requestId: 'r3', request: { url: 'https://a.test/late.js' } });

    expect(events).toEqual([
      { type: 'requestStarted', requestId: 'r1', url: 'https://a.test/app.css' },
      { type: 'requestFinished', requestId: 'r1' },
      { type: 'requestFailed', requestId: 'r2', errorText: 'net::ERR_FAILED' },
    ]);
    expect(cdp.listenerCount('Network.requestWillBeSent')).toBe(0);
  });
});

describe('ControlSession.printToPdf', () => {
  it('decodes the PDF', async () => {
    const { session, cdp } = await connected('ws://127.0.0.1:9222/devtools/browser/q');
    cdp.handlers['Page.printToPDF'] = () => ({ data: Buffer.from('%PDF-1.7 body').toString('base64') });

    const pdf = await session.printToPdf({ landscape: true });

    expect(pdf.toString('latin1')).toBe('%PDF-1.7 body');
    expect(cdp.send).toHaveBeenCalledWith('Page.printToPDF', { landscape: true });
  });

  it('rejects empty output', async () => {
    const { session, cdp } = await connected('ws://127.0.0.1:9222/devtools/browser/r');
    cdp.handlers['Page.printToPDF'] = () => ({ data: '' });

    await expect(session.printToPdf()).rejects.toThrow(new RenderError('Chrome returned an empty PDF'));
  });

  it('rejects output that is not a PDF', async () => {
    const { session, cdp } = await connected('ws://127.0.0.1:9222/devtools/browser/s');
    cdp.handlers['Page.printToPDF'] = () => ({ data: Buffer.from('<html></html>').toString('base64') });

    await expect(session.printToPdf()).rejects.toThrow('Chrome returned data that is not a PDF');
  });

  it('wraps protocol failures', async () => {
    const { session, cdp } = await connected('ws://127.0.0.1:9222/devtools/browser/t');
    cdp.handlers['Page.printToPDF'] = () => {
      throw new Error('Printing failed');
    };

    const error = await session.printToPdf().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RenderError);
    expect(error).toHaveProperty('message', 'Page.printToPDF failed: Printing failed');
  });
});

describe('ControlSession.close', () => {
  it('detaches and disconnects once', async () => {
    const { session, cdp, browser } = await connected('ws://127.0.0.1:9222/devtools/browser/u');

    await session.close();
    await session.close();

    expect(cdp.detach).toHaveBeenCalledTimes(1);
    expect(browser.close).toHaveBeenCalledTimes(1);
    expect(session.isClosed).toBe(true);
    await expect(session.evaluate('1')).rejects.toThrow('Control session is closed');
    await expect(session.connect()).rejects.toBeInstanceOf(IllegalStateError);
  });

  it('swallows detach failures', async () => {
    const { session, cdp, browser } = await connected('ws://127.0.0.1:9222/devtools/browser/v');
    cdp.detach.mockRejectedValueOnce(new Error('Target closed'));

    await expect(session.close()).resolves.toBeUndefined();
    expect(browser.close).toHaveBeenCalledTimes(1);
  });
});

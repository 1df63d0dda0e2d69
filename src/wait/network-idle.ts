import { InterruptedError, TimeoutError } from '../errors.js';
import { createLogger, describeError } from '../logging.js';
import type { AwaitOptions, NetworkActivity, NetworkIdleWait, PageChannel } from '../types.js';
import { requirePositiveTimeout, throwIfAborted } from './poll.js';

const logger = createLogger('wait');

export const NETWORK_IDLE_CHECK_INTERVAL_MS = 50;

/** In-flight request count and time of the last network event. */
export class NetworkActivityTracker {
  private inflightCount = 0;
  private lastActivityAt: number;

  constructor(now: number = Date.now()) {
    this.lastActivityAt = now;
  }

  get inflight(): number {
    return this.inflightCount;
  }

  get lastActivity(): number {
    return this.lastActivityAt;
  }

  record(event: NetworkActivity, now: number = Date.now()): void {
    if (event.type === 'requestStarted') {
      this.inflightCount++;
    } else {
      // Requests that started before we subscribed can finish without a start.
      this.inflightCount = Math.max(0, this.inflightCount - 1);
    }
    this.lastActivityAt = now;
    logger.trace(`Network ${event.type} ${event.requestId} (inflight: ${this.inflightCount})`);
  }

  isIdle(quietPeriodMs: number, maxInflight: number, now: number = Date.now()): boolean {
    return this.inflightCount <= maxInflight && now - this.lastActivityAt >= quietPeriodMs;
  }
}

/**
 * Resolve once at most `maxInflight` requests are pending and nothing has
 * happened on the network for `quietPeriodMs`.
 */
export async function awaitNetworkIdle(
  channel: PageChannel,
  spec: NetworkIdleWait,
  timeoutMs: number,
  opts: AwaitOptions = {},
): Promise<void> {
  requirePositiveTimeout(timeoutMs);
  throwIfAborted(opts.signal);
  const { signal } = opts;
  logger.debug(`Waiting for network idle (quiet: ${spec.quietPeriodMs}ms, max inflight: ${spec.maxInflight}, timeout: ${timeoutMs}ms)`);

  await channel.enableDomain('Network');
  const tracker = new NetworkActivityTracker();
  let unsubscribe: (() => void) | null = null;
  try {
    unsubscribe = channel.onNetworkEvent(event => tracker.record(event));
    await new Promise<void>((resolve, reject) => {
      const cleanup = (): void => {
        clearInterval(checker);
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };
      const onAbort = (): void => {
        cleanup();
        reject(new InterruptedError('Network idle wait was interrupted'));
      };
      const checker = setInterval(() => {
        if (!tracker.isIdle(spec.quietPeriodMs, spec.maxInflight)) return;
        cleanup();
        resolve();
      }, NETWORK_IDLE_CHECK_INTERVAL_MS);
      checker.unref();
      const timer = setTimeout(() => {
        cleanup();
        reject(new TimeoutError(
          `Network did not become idle within ${timeoutMs}ms (inflight requests: ${tracker.inflight})`,
          `network idle (quiet ${spec.quietPeriodMs}ms, max inflight ${spec.maxInflight})`,
          timeoutMs,
        ));
      }, timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });
      if (signal?.aborted) onAbort();
    });
    logger.debug(`Network is idle (inflight: ${tracker.inflight})`);
  } finally {
    unsubscribe?.();
    await channel.disableDomain('Network').catch((err: unknown) => {
      logger.warn(`Failed to disable Network domain: ${describeError(err)}`);
    });
  }
}

import { TimeoutError } from '../errors.js';
import { createLogger, describeError } from '../logging.js';
import type { AwaitOptions, CustomPredicateWait, PageChannel } from '../types.js';
import { pollUntil, requirePositiveTimeout } from './poll.js';

const logger = createLogger('wait');

const MAX_EXPRESSION_LENGTH = 100;

/** JavaScript truthiness of an evaluated value. */
export function isTruthy(value: unknown): boolean {
  if (value === null || value === undefined || value === false || value === '') return false;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'bigint') return value !== 0n;
  return true;
}

/** Shorten `text` to `max` characters, ending in `...` when cut. */
export function truncate(text: string, max = MAX_EXPRESSION_LENGTH): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

export async function awaitCustomPredicate(
  channel: PageChannel,
  spec: CustomPredicateWait,
  timeoutMs: number,
  opts: AwaitOptions = {},
): Promise<void> {
  requirePositiveTimeout(timeoutMs);
  const shown = truncate(spec.expression);
  logger.debug(`Waiting for condition ${shown} (timeout: ${timeoutMs}ms)`);

  await channel.enableDomain('Runtime');
  try {
    const met = await pollUntil(async () => {
      try {
        const { value, exceptionText } = await channel.evaluate(spec.expression);
        if (exceptionText) {
          logger.debug(`Condition threw: ${exceptionText}`);
          return false;
        }
        return isTruthy(value);
      } catch (err) {
        logger.debug(`Condition evaluation failed: ${describeError(err)}`);
        return false;
      }
    }, { timeoutMs, intervalMs: spec.pollIntervalMs, signal: opts.signal });

    if (!met) {
      throw new TimeoutError(`Custom condition not met within ${timeoutMs}ms: ${shown}`, shown, timeoutMs);
    }
    logger.debug('Custom condition met');
  } finally {
    await channel.disableDomain('Runtime').catch((err: unknown) => {
      logger.warn(`Failed to disable Runtime domain: ${describeError(err)}`);
    });
  }
}

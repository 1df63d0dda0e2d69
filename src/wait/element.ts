import { TimeoutError } from '../errors.js';
import { createLogger, describeError } from '../logging.js';
import type { AwaitOptions, ElementWait, PageChannel } from '../types.js';
import { pollUntil, requirePositiveTimeout } from './poll.js';

const logger = createLogger('wait');

/** Page-side expression that is `true` once the element exists (and, if asked, is visible). */
export function elementCheckExpression(selector: string, visibleOnly: boolean): string {
  const sel = JSON.stringify(selector);
  if (!visibleOnly) return `document.querySelector(${sel}) !== null`;
  return `(() => {
  const el = document.querySelector(${sel});
  if (!el) return false;
  const rect = el.getBoundingClientRect();
  const style = window.getComputedStyle(el);
  return rect.width > 0 && rect.height > 0 && style.visibility !== 'hidden' && style.display !== 'none';
})()`;
}

export async function awaitElement(
  channel: PageChannel,
  spec: ElementWait,
  timeoutMs: number,
  opts: AwaitOptions = {},
): Promise<void> {
  requirePositiveTimeout(timeoutMs);
  const state = spec.visibleOnly ? 'visible' : 'present';
  const expression = elementCheckExpression(spec.selector, spec.visibleOnly);
  logger.debug(`Waiting for '${spec.selector}' to be ${state} (timeout: ${timeoutMs}ms)`);

  await channel.enableDomain('Runtime');
  try {
    const met = await pollUntil(async () => {
      try {
        const { value, exceptionText } = await channel.evaluate(expression);
        if (exceptionText) logger.debug(`Element check for '${spec.selector}' threw: ${exceptionText}`);
        return value === true;
      } catch (err) {
        logger.debug(`Element check for '${spec.selector}' failed: ${describeError(err)}`);
        return false;
      }
    }, { timeoutMs, intervalMs: spec.pollIntervalMs, signal: opts.signal });

    if (!met) {
      throw new TimeoutError(
        `Element with selector '${spec.selector}' was not ${state} within ${timeoutMs}ms`,
        `element '${spec.selector}' ${state}`,
        timeoutMs,
      );
    }
    logger.debug(`Element '${spec.selector}' is ${state}`);
  } finally {
    await channel.disableDomain('Runtime').catch((err: unknown) => {
      logger.warn(`Failed to disable Runtime domain: ${describeError(err)}`);
    });
  }
}

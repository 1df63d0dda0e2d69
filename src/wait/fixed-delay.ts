import { createLogger } from '../logging.js';
import type { AwaitOptions, FixedDelayWait } from '../types.js';
import { pause } from './poll.js';

const logger = createLogger('wait');

/** Sleep for the configured duration. Touches neither the page nor the deadline. */
export async function awaitFixedDelay(spec: FixedDelayWait, opts: AwaitOptions = {}): Promise<void> {
  logger.debug(`Waiting ${spec.durationMs}ms`);
  await pause(spec.durationMs, opts.signal);
}

import { z } from 'zod';
import { InvalidConfigError } from '../errors.js';
import type {
  AwaitOptions,
  CustomPredicateWait,
  ElementWait,
  FixedDelayWait,
  NetworkIdleWait,
  PageChannel,
  WaitSpec,
} from '../types.js';
import { awaitCustomPredicate } from './custom-predicate.js';
import { awaitElement } from './element.js';
import { awaitFixedDelay } from './fixed-delay.js';
import { awaitNetworkIdle } from './network-idle.js';

export { isTruthy, truncate } from './custom-predicate.js';
export { elementCheckExpression } from './element.js';
export { NetworkActivityTracker, NETWORK_IDLE_CHECK_INTERVAL_MS } from './network-idle.js';

export const DEFAULT_FIXED_DELAY_MS = 2_000;
export const DEFAULT_QUIET_PERIOD_MS = 500;
export const DEFAULT_MAX_INFLIGHT = 0;
export const DEFAULT_POLL_INTERVAL_MS = 100;

// ── Schemas ──

const positiveMs = z.number().int().positive();
const text = z.string().trim().min(1);

const FixedDelaySchema = z.object({
  kind: z.literal('fixedDelay'),
  durationMs: positiveMs.default(DEFAULT_FIXED_DELAY_MS),
});

const NetworkIdleSchema = z.object({
  kind: z.literal('networkIdle'),
  quietPeriodMs: positiveMs.default(DEFAULT_QUIET_PERIOD_MS),
  maxInflight: z.number().int().nonnegative().default(DEFAULT_MAX_INFLIGHT),
});

const ElementSchema = z.object({
  kind: z.literal('element'),
  selector: text,
  visibleOnly: z.boolean().default(false),
  pollIntervalMs: positiveMs.default(DEFAULT_POLL_INTERVAL_MS),
});

const CustomPredicateSchema = z.object({
  kind: z.literal('customPredicate'),
  expression: text,
  pollIntervalMs: positiveMs.default(DEFAULT_POLL_INTERVAL_MS),
});

export const WaitSpecSchema = z.discriminatedUnion('kind', [
  FixedDelaySchema,
  NetworkIdleSchema,
  ElementSchema,
  CustomPredicateSchema,
]);

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new InvalidConfigError('wait spec', issues);
  }
  return parsed.data;
}

/**
 * Validate a wait description (for example one read from JSON), filling in
 * defaults for omitted fields.
 *
 * @throws InvalidConfigError when the kind is unknown or a field is out of range
 */
export function parseWaitSpec(input: unknown): WaitSpec {
  return Object.freeze(validate(WaitSpecSchema, input));
}

// ── Constructors ──

export function fixedDelay(durationMs: number = DEFAULT_FIXED_DELAY_MS): FixedDelayWait {
  return Object.freeze(validate(FixedDelaySchema, { kind: 'fixedDelay', durationMs }));
}

export function networkIdle(
  quietPeriodMs: number = DEFAULT_QUIET_PERIOD_MS,
  maxInflight: number = DEFAULT_MAX_INFLIGHT,
): NetworkIdleWait {
  return Object.freeze(validate(NetworkIdleSchema, { kind: 'networkIdle', quietPeriodMs, maxInflight }));
}

export function elementPresent(selector: string, pollIntervalMs: number = DEFAULT_POLL_INTERVAL_MS): ElementWait {
  return Object.freeze(validate(ElementSchema, { kind: 'element', selector, visibleOnly: false, pollIntervalMs }));
}

export function elementVisible(selector: string, pollIntervalMs: number = DEFAULT_POLL_INTERVAL_MS): ElementWait {
  return Object.freeze(validate(ElementSchema, { kind: 'element', selector, visibleOnly: true, pollIntervalMs }));
}

export function customPredicate(expression: string, pollIntervalMs: number = DEFAULT_POLL_INTERVAL_MS): CustomPredicateWait {
  return Object.freeze(validate(CustomPredicateSchema, { kind: 'customPredicate', expression, pollIntervalMs }));
}

// ── Dispatch ──

/**
 * Block until the page satisfies `spec`.
 *
 * `timeoutMs` bounds every kind except `fixedDelay`, which always sleeps for
 * its own duration.
 *
 * @throws TimeoutError when the condition is not met in time
 * @throws InterruptedError when `opts.signal` aborts
 * @throws RangeError when `timeoutMs` is not positive (all kinds but `fixedDelay`)
 */
export async function awaitReady(
  channel: PageChannel,
  spec: WaitSpec,
  timeoutMs: number,
  opts: AwaitOptions = {},
): Promise<void> {
  switch (spec.kind) {
    case 'fixedDelay':
      return awaitFixedDelay(spec, opts);
    case 'networkIdle':
      return awaitNetworkIdle(channel, spec, timeoutMs, opts);
    case 'element':
      return awaitElement(channel, spec, timeoutMs, opts);
    case 'customPredicate':
      return awaitCustomPredicate(channel, spec, timeoutMs, opts);
    default: {
      const unknownSpec: never = spec;
      throw new InvalidConfigError('wait spec', [`unknown kind in ${JSON.stringify(unknownSpec)}`]);
    }
  }
}

/** Short human-readable form of a wait, for logs. */
export function describeWait(spec: WaitSpec): string {
  switch (spec.kind) {
    case 'fixedDelay': return `fixed delay ${spec.durationMs}ms`;
    case 'networkIdle': return `network idle (quiet ${spec.quietPeriodMs}ms, max inflight ${spec.maxInflight})`;
    case 'element': return `element '${spec.selector}' ${spec.visibleOnly ? 'visible' : 'present'}`;
    case 'customPredicate': return `condition ${spec.expression}`;
  }
}

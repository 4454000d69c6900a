/**
 * Flow-control configuration and demand validation.
 *
 * @module validation
 */

import {
  ConfigValidationError,
  InvalidDemandError,
  type FieldValidationError,
} from '../errors/stream-error.js';

/**
 * What happens to an incoming item when the buffer is full and there is no
 * demand to drain it.
 *
 * - `drop-head`: discard the oldest buffered item, append the new one
 * - `drop-tail`: the incoming item replaces the newest buffered item
 * - `drop-buffer`: discard the whole buffer, keep only the new item
 * - `drop-new`: discard the incoming item
 * - `fail`: terminate the stream with a {@link BufferOverflowError}
 */
export type OverflowStrategy = 'drop-head' | 'drop-tail' | 'drop-buffer' | 'drop-new' | 'fail';

export const OVERFLOW_STRATEGIES: readonly OverflowStrategy[] = [
  'drop-head',
  'drop-tail',
  'drop-buffer',
  'drop-new',
  'fail',
];

/** Flow-control settings shared by live and bounded streams */
export interface FlowControlConfig {
  /** Maximum number of undelivered items held per stream. @default 1000 */
  bufferSize?: number;
  /** Policy applied when the buffer is full. @default 'drop-head' */
  overflowStrategy?: OverflowStrategy;
  /**
   * How long to wait for the subscription token (live queries) or for consumer
   * demand (backpressured fetches) before failing the stream.
   * @default 30000
   */
  timeoutMs?: number;
}

export type ResolvedFlowControlConfig = Required<FlowControlConfig>;

export const DEFAULT_FLOW_CONTROL: ResolvedFlowControlConfig = {
  bufferSize: 1000,
  overflowStrategy: 'drop-head',
  timeoutMs: 30_000,
};

/** Validation result */
export interface InputValidationResult {
  readonly valid: boolean;
  readonly errors: readonly FieldValidationError[];
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isOverflowStrategy(value: unknown): value is OverflowStrategy {
  return typeof value === 'string' && OVERFLOW_STRATEGIES.some((s) => s === value);
}

// ── Flow-Control Configuration ───────────────────────────────────────────────

/** Validate a partial flow-control configuration */
export function validateFlowControlConfig(config: unknown): InputValidationResult {
  if (config === null || typeof config !== 'object' || Array.isArray(config)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Configuration must be an object', value: config }],
    };
  }

  const errors: FieldValidationError[] = [];
  const bufferSize: unknown = Reflect.get(config, 'bufferSize');
  const overflowStrategy: unknown = Reflect.get(config, 'overflowStrategy');
  const timeoutMs: unknown = Reflect.get(config, 'timeoutMs');

  if (bufferSize !== undefined && !isPositiveInteger(bufferSize)) {
    errors.push({ path: 'bufferSize', message: 'must be a positive integer', value: bufferSize });
  }
  if (overflowStrategy !== undefined && !isOverflowStrategy(overflowStrategy)) {
    errors.push({
      path: 'overflowStrategy',
      message: `must be one of ${OVERFLOW_STRATEGIES.join(', ')}`,
      value: overflowStrategy,
    });
  }
  if (timeoutMs !== undefined && !isPositiveInteger(timeoutMs)) {
    errors.push({ path: 'timeoutMs', message: 'must be a positive integer', value: timeoutMs });
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Merge a partial configuration over a base (defaults unless given),
 * throwing ConfigValidationError if the result is invalid.
 */
export function resolveFlowControlConfig(
  config: FlowControlConfig = {},
  base: ResolvedFlowControlConfig = DEFAULT_FLOW_CONTROL
): ResolvedFlowControlConfig {
  const result = validateFlowControlConfig(config);
  if (!result.valid) {
    throw new ConfigValidationError([...result.errors]);
  }
  return {
    bufferSize: config.bufferSize ?? base.bufferSize,
    overflowStrategy: config.overflowStrategy ?? base.overflowStrategy,
    timeoutMs: config.timeoutMs ?? base.timeoutMs,
  };
}

// ── Demand ───────────────────────────────────────────────────────────────────

/** Upper bound of the demand counter; additions saturate here */
export const MAX_DEMAND = Number.MAX_SAFE_INTEGER;

/** Assert n is a valid request(n) argument: a positive integer or Infinity */
export function assertDemand(n: unknown): asserts n is number {
  if (n === Number.POSITIVE_INFINITY) return;
  if (!isPositiveInteger(n)) {
    throw new InvalidDemandError(n);
  }
}

/** Add to a demand counter without exceeding {@link MAX_DEMAND} */
export function addDemand(current: number, n: number): number {
  return Math.min(MAX_DEMAND, current + n);
}

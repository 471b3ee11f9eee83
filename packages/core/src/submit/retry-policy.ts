import type { UploaderConfig } from '../config.js';

export type RetryPolicyConfig = Pick<
  UploaderConfig,
  'initialRetryDelay' | 'minRetryDelay' | 'maxRetryDelay' | 'retryMultiplier'
>;

/**
 * Delay to wait after failed attempt number `attempt` (1-based) before the next
 * one: `initialRetryDelay * retryMultiplier^(attempt - 1)`, clamped to
 * `[minRetryDelay, maxRetryDelay]`.
 */
export function calculateRetryDelay(attempt: number, config: RetryPolicyConfig): number {
  const exponential = config.initialRetryDelay * config.retryMultiplier ** Math.max(attempt - 1, 0);
  return Math.min(Math.max(exponential, config.minRetryDelay), config.maxRetryDelay);
}

/**
 * Retry Policy
 * Bounded retry with exponential backoff and jitter for provider calls.
 * Only transport failures are retryable; budget refusals never reach here.
 */

export type FailureClass = 'timeout' | 'upstream';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitterMs: number;
}

export type RetryOverrides = Partial<Record<FailureClass, Partial<RetryConfig>>>;

export interface RetryStats {
  attempts: number;
  successes: number;
  failures: number;
  successRate: number;
}

/**
 * One retry for each failure class; timeouts retry immediately
 */
export const DEFAULT_RETRY_CONFIGS: Record<FailureClass, RetryConfig> = {
  timeout: {
    maxAttempts: 2,
    initialDelayMs: 0,
    maxDelayMs: 0,
    backoffMultiplier: 1,
    jitterMs: 0
  },
  upstream: {
    maxAttempts: 2,
    initialDelayMs: 1000,
    maxDelayMs: 4000,
    backoffMultiplier: 2,
    jitterMs: 250
  }
};

export class RetryPolicy {
  private configs: Record<FailureClass, RetryConfig>;
  private retryStats: Map<string, { attempts: number; successes: number; failures: number }> = new Map();

  constructor(overrides: RetryOverrides = {}, private readonly random: () => number = Math.random) {
    this.configs = {
      timeout: { ...DEFAULT_RETRY_CONFIGS.timeout, ...overrides.timeout },
      upstream: { ...DEFAULT_RETRY_CONFIGS.upstream, ...overrides.upstream }
    };
  }

  /**
   * `attempt` is the 1-based number of the attempt that just failed
   */
  shouldRetry(failure: FailureClass, attempt: number): boolean {
    return attempt < this.configs[failure].maxAttempts;
  }

  /**
   * Calculate delay with exponential backoff and jitter
   */
  delayFor(failure: FailureClass, attempt: number): number {
    const config = this.configs[failure];
    const baseDelay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1);
    const jitter = this.random() * config.jitterMs;
    return Math.floor(Math.min(baseDelay + jitter, config.maxDelayMs));
  }

  async wait(ms: number): Promise<void> {
    if (ms <= 0) {
      return;
    }
    await new Promise<void>(resolve => setTimeout(resolve, ms));
  }

  recordSuccess(operation: string, attempts: number): void {
    const stats = this.statsFor(operation);
    stats.attempts += attempts;
    stats.successes++;
  }

  recordFailure(operation: string, attempts: number): void {
    const stats = this.statsFor(operation);
    stats.attempts += attempts;
    stats.failures++;
  }

  getRetryStats(): Record<string, RetryStats> {
    const stats: Record<string, RetryStats> = {};

    for (const [key, data] of this.retryStats.entries()) {
      const total = data.successes + data.failures;
      stats[key] = {
        ...data,
        successRate: total > 0 ? data.successes / total : 0
      };
    }

    return stats;
  }

  private statsFor(operation: string): { attempts: number; successes: number; failures: number } {
    const existing = this.retryStats.get(operation);
    if (existing) {
      return existing;
    }
    const created = { attempts: 0, successes: 0, failures: 0 };
    this.retryStats.set(operation, created);
    return created;
  }
}

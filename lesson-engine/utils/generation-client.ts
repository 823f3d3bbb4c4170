/**
 * Generation Client
 *
 * Budgeted, timed and retried calls to the language-model provider:
 * - Per-request token ledger (hard budget)
 * - Client-side deadline on every attempt, enforced with an abort signal
 * - One retry for timeouts and upstream errors
 * - Stage-specific response parsing (a rejected payload counts as upstream)
 */

import { Err, Ok, Result } from '../shared/types.js';
import { Logger, silentLogger } from './logger.js';
import { FailureClass, RetryOverrides, RetryPolicy, RetryStats } from './retry-policy.js';
import { DEFAULT_MAX_TOKENS, LedgerEntry, TokenLedger, estimateTokens } from './token-ledger.js';

export const DEFAULT_TIMEOUT_SECONDS = 15;

/**
 * One model call as built by a generation stage
 */
export interface PromptPayload {
  label: string;
  system: string;
  user: string;
  /** Completion tokens the stage would like */
  completionTokens: number;
  /** Below this allowance the call is not worth dispatching */
  minCompletionTokens: number;
}

export interface ProviderRequest {
  prompt: PromptPayload;
  maxTokens: number;
  timeoutSeconds: number;
  signal: AbortSignal;
}

export interface ProviderResponse {
  text: string;
  /** Total tokens billed for the call, prompt included */
  tokensConsumed: number;
  finishReason: string;
}

/**
 * Adapter over a concrete model API. Implementations throw ProviderError.
 */
export interface GenerationProvider {
  readonly name: string;
  complete(request: ProviderRequest): Promise<ProviderResponse>;
}

export class ProviderError extends Error {
  constructor(
    message: string,
    readonly kind: FailureClass,
    readonly tokensConsumed: number = 0,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProviderError';
  }
}

export type ResponseParser<T> = (text: string) => Result<T, string>;

export interface Generated<T> {
  value: T;
  tokensConsumed: number;
  finishReason: string;
  attempts: number;
}

export type GenerationFailureKind = 'Timeout' | 'UpstreamError' | 'BudgetExceeded';

export interface GenerationFailure {
  kind: GenerationFailureKind;
  label: string;
  message: string;
  attempts: number;
}

function generationFailure(
  kind: GenerationFailureKind,
  label: string,
  message: string,
  attempts: number
): GenerationFailure {
  return { kind, label, message, attempts };
}

export interface GenerationClientOptions {
  maxTokens?: number;
  timeoutSeconds?: number;
  retry?: RetryOverrides;
  logger?: Logger;
  /** Jitter source, injectable for deterministic tests */
  random?: () => number;
}

/**
 * Calls sharing one token budget. One session per lesson request.
 */
export class GenerationSession {
  private readonly ledger: TokenLedger;

  constructor(
    private readonly provider: GenerationProvider,
    private readonly retryPolicy: RetryPolicy,
    private readonly timeoutSeconds: number,
    maxTokens: number,
    readonly correlationId: string,
    private readonly logger: Logger
  ) {
    this.ledger = new TokenLedger(maxTokens);
  }

  get tokensUsed(): number {
    return this.ledger.used;
  }

  get maxTokens(): number {
    return this.ledger.maxTokens;
  }

  ledgerEntries(): readonly LedgerEntry[] {
    return this.ledger.snapshot();
  }

  async generate<T>(prompt: PromptPayload, parse: ResponseParser<T>): Promise<Result<Generated<T>, GenerationFailure>> {
    const promptEstimate = estimateTokens(`${prompt.system}\n${prompt.user}`);

    for (let attempt = 1; ; attempt++) {
      if (!this.ledger.canAfford(promptEstimate + prompt.minCompletionTokens)) {
        this.logger('warn', 'Token budget refuses dispatch', {
          correlationId: this.correlationId,
          label: prompt.label,
          promptEstimate,
          remaining: this.ledger.remaining
        });
        this.retryPolicy.recordFailure(prompt.label, attempt - 1);
        return Err(generationFailure(
          'BudgetExceeded',
          prompt.label,
          `Remaining budget (${this.ledger.remaining} tokens) cannot cover ${prompt.label} ` +
            `(prompt ≈${promptEstimate}, minimum completion ${prompt.minCompletionTokens})`,
          attempt - 1
        ));
      }

      const allowance = Math.min(prompt.completionTokens, this.ledger.remaining - promptEstimate);
      this.logger('debug', 'Dispatching generation call', {
        correlationId: this.correlationId,
        label: prompt.label,
        attempt,
        maxTokens: allowance,
        provider: this.provider.name
      });

      const outcome = await this.dispatch(prompt, allowance);
      let failure: ProviderError;

      if (outcome.ok) {
        const response = outcome.value;
        this.ledger.record(prompt.label, response.tokensConsumed, 'completed');

        if (this.ledger.exceeded) {
          this.retryPolicy.recordFailure(prompt.label, attempt);
          return Err(generationFailure(
            'BudgetExceeded',
            prompt.label,
            `Token budget exceeded after ${prompt.label}: ${this.ledger.used}/${this.ledger.maxTokens}`,
            attempt
          ));
        }

        const parsed = parse(response.text);
        if (parsed.ok) {
          this.retryPolicy.recordSuccess(prompt.label, attempt);
          this.logger('debug', 'Generation call completed', {
            correlationId: this.correlationId,
            label: prompt.label,
            attempt,
            tokensConsumed: response.tokensConsumed,
            tokensUsed: this.ledger.used
          });
          return Ok({
            value: parsed.value,
            tokensConsumed: response.tokensConsumed,
            finishReason: response.finishReason,
            attempts: attempt
          });
        }
        failure = new ProviderError(`Unusable ${prompt.label} response: ${parsed.error}`, 'upstream');
      } else {
        failure = outcome.error;
        this.ledger.record(prompt.label, failure.tokensConsumed, failure.kind);

        if (this.ledger.exceeded) {
          this.retryPolicy.recordFailure(prompt.label, attempt);
          return Err(generationFailure(
            'BudgetExceeded',
            prompt.label,
            `Token budget exceeded after failed ${prompt.label}: ${this.ledger.used}/${this.ledger.maxTokens}`,
            attempt
          ));
        }
      }

      if (!this.retryPolicy.shouldRetry(failure.kind, attempt)) {
        this.retryPolicy.recordFailure(prompt.label, attempt);
        this.logger('error', 'Generation call failed', {
          correlationId: this.correlationId,
          label: prompt.label,
          attempts: attempt,
          failure: failure.kind,
          error: failure.message
        });
        return Err(generationFailure(
          failure.kind === 'timeout' ? 'Timeout' : 'UpstreamError',
          prompt.label,
          failure.message,
          attempt
        ));
      }

      const delay = this.retryPolicy.delayFor(failure.kind, attempt);
      this.logger('warn', `Retrying ${prompt.label} in ${delay}ms`, {
        correlationId: this.correlationId,
        attempt,
        failure: failure.kind,
        error: failure.message
      });
      await this.retryPolicy.wait(delay);
    }
  }

  /**
   * One attempt under a hard deadline
   */
  private async dispatch(prompt: PromptPayload, maxTokens: number): Promise<Result<ProviderResponse, ProviderError>> {
    const controller = new AbortController();
    const timeoutMs = this.timeoutSeconds * 1000;
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ProviderError(`${prompt.label} timed out after ${this.timeoutSeconds}s`, 'timeout'));
      }, timeoutMs);
    });

    const call = this.provider.complete({
      prompt,
      maxTokens,
      timeoutSeconds: this.timeoutSeconds,
      signal: controller.signal
    });
    // The losing side of the race may still settle later
    call.catch(() => undefined);

    try {
      const response = await Promise.race([call, deadline]);
      return this.checkResponse(prompt, response);
    } catch (error) {
      if (error instanceof ProviderError) {
        return Err(error);
      }
      if (controller.signal.aborted) {
        return Err(new ProviderError(`${prompt.label} timed out after ${this.timeoutSeconds}s`, 'timeout', 0, { cause: error }));
      }
      const message = error instanceof Error ? error.message : String(error);
      return Err(new ProviderError(`${this.provider.name} failed: ${message}`, 'upstream', 0, { cause: error }));
    } finally {
      clearTimeout(timer);
    }
  }

  private checkResponse(prompt: PromptPayload, response: ProviderResponse): Result<ProviderResponse, ProviderError> {
    if (!Number.isInteger(response.tokensConsumed) || response.tokensConsumed < 0) {
      return Err(new ProviderError(`${prompt.label} reported invalid usage: ${response.tokensConsumed}`, 'upstream'));
    }
    if (response.text.trim().length === 0) {
      return Err(new ProviderError(`${prompt.label} returned an empty response`, 'upstream', response.tokensConsumed));
    }
    return Ok(response);
  }
}

export class GenerationClient {
  readonly maxTokens: number;
  readonly timeoutSeconds: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: Logger;

  constructor(private readonly provider: GenerationProvider, options: GenerationClientOptions = {}) {
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    if (!(this.timeoutSeconds > 0)) {
      throw new RangeError(`Timeout must be positive, got ${this.timeoutSeconds}`);
    }
    this.retryPolicy = new RetryPolicy(options.retry, options.random);
    this.logger = options.logger ?? silentLogger;
  }

  get providerName(): string {
    return this.provider.name;
  }

  createSession(correlationId: string): GenerationSession {
    return new GenerationSession(
      this.provider,
      this.retryPolicy,
      this.timeoutSeconds,
      this.maxTokens,
      correlationId,
      this.logger
    );
  }

  retryStats(): Record<string, RetryStats> {
    return this.retryPolicy.getRetryStats();
  }
}

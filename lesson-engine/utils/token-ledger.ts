/**
 * Token budget ledger, one per lesson request.
 * Every provider attempt is charged, including failed ones that report usage.
 */

export const DEFAULT_MAX_TOKENS = 2000;

export type LedgerOutcome = 'completed' | 'timeout' | 'upstream';

export interface LedgerEntry {
  label: string;
  tokens: number;
  outcome: LedgerOutcome;
}

/**
 * Rough token estimate: 4 characters per token plus a 20% margin
 */
export function estimateTokens(text: string): number {
  const cleaned = text.trim().replace(/\s+/g, ' ');
  if (cleaned.length === 0) {
    return 0;
  }
  return Math.floor(Math.floor(cleaned.length / 4) * 1.2);
}

export class TokenLedger {
  private consumed = 0;
  private entries: LedgerEntry[] = [];

  constructor(readonly maxTokens: number = DEFAULT_MAX_TOKENS) {
    if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
      throw new RangeError(`Token budget must be a positive integer, got ${maxTokens}`);
    }
  }

  get used(): number {
    return this.consumed;
  }

  get remaining(): number {
    return Math.max(0, this.maxTokens - this.consumed);
  }

  get exceeded(): boolean {
    return this.consumed > this.maxTokens;
  }

  canAfford(tokens: number): boolean {
    return this.consumed + tokens <= this.maxTokens;
  }

  record(label: string, tokens: number, outcome: LedgerOutcome): void {
    this.consumed += tokens;
    this.entries.push({ label, tokens, outcome });
  }

  snapshot(): readonly LedgerEntry[] {
    return [...this.entries];
  }
}

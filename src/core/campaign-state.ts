/**
 * Campaign State - the process-wide ledger
 *
 * Capital and counters are private; `applyResult` is the only capital
 * mutation and runs once per resolved strike. Every mutator is synchronous,
 * so under the event loop each call is an atomic read-modify-write, and a
 * concurrent driver would still funnel results through this single writer.
 */

export interface CampaignLimits {
  targetCapitalCents: number;
  campaignDurationMs: number;
  maxConsecutiveMisses: number;
  /** 0 disables the configurable drawdown check */
  maxDrawdownPct: number;
  maxConsecutiveFailures: number;
}

export interface CampaignSnapshot {
  initialCapitalCents: number;
  capitalCents: number;
  peakCapitalCents: number;
  totalPnlCents: number;
  totalStrikes: number;
  successfulStrikes: number;
  failedStrikes: number;
  consecutiveMisses: number;
  consecutiveFailures: number;
  executionFailures: number;
  tradesCompleted: number;
  startedAt: number;
  limits: Readonly<CampaignLimits>;
}

export class CampaignState {
  private readonly initialCapitalCents: number;
  private readonly startedAt: number;
  private readonly limits: Readonly<CampaignLimits>;

  private capitalCents: number;
  private peakCapitalCents: number;
  private totalPnlCents = 0;
  private totalStrikes = 0;
  private successfulStrikes = 0;
  private failedStrikes = 0;
  private consecutiveMisses = 0;
  private consecutiveFailures = 0;
  private executionFailures = 0;
  private tradesCompleted = 0;

  constructor(initialCapitalCents: number, limits: CampaignLimits, startedAt: number) {
    if (!Number.isSafeInteger(initialCapitalCents) || initialCapitalCents <= 0) {
      throw new RangeError(`Initial capital must be a positive integer (cents), got ${initialCapitalCents}`);
    }
    this.initialCapitalCents = initialCapitalCents;
    this.capitalCents = initialCapitalCents;
    this.peakCapitalCents = initialCapitalCents;
    this.limits = { ...limits };
    this.startedAt = startedAt;
  }

  /**
   * Apply one resolved strike. `pnlCents` must already be an integer.
   */
  applyResult(result: { pnlCents: number; hit: boolean }): void {
    if (!Number.isSafeInteger(result.pnlCents)) {
      throw new RangeError(`P&L must be integer cents, got ${result.pnlCents}`);
    }

    this.capitalCents += result.pnlCents;
    this.totalPnlCents += result.pnlCents;
    this.totalStrikes += 1;
    this.tradesCompleted += 1;
    this.consecutiveFailures = 0;

    if (result.hit) {
      this.successfulStrikes += 1;
      this.consecutiveMisses = 0;
    } else {
      this.failedStrikes += 1;
      this.consecutiveMisses += 1;
    }

    if (this.capitalCents > this.peakCapitalCents) {
      this.peakCapitalCents = this.capitalCents;
    }
  }

  /**
   * An aborted strike: no capital change, not a completed trade
   */
  recordExecutionFailure(): void {
    this.executionFailures += 1;
    this.consecutiveFailures += 1;
  }

  get capital(): number {
    return this.capitalCents;
  }

  elapsedMs(now: number): number {
    return now - this.startedAt;
  }

  snapshot(): CampaignSnapshot {
    return {
      initialCapitalCents: this.initialCapitalCents,
      capitalCents: this.capitalCents,
      peakCapitalCents: this.peakCapitalCents,
      totalPnlCents: this.totalPnlCents,
      totalStrikes: this.totalStrikes,
      successfulStrikes: this.successfulStrikes,
      failedStrikes: this.failedStrikes,
      consecutiveMisses: this.consecutiveMisses,
      consecutiveFailures: this.consecutiveFailures,
      executionFailures: this.executionFailures,
      tradesCompleted: this.tradesCompleted,
      startedAt: this.startedAt,
      limits: this.limits,
    };
  }
}

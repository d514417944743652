/**
 * Strike Model - One candidate or placed trade and its lifecycle
 *
 * TARGETING -> STRIKING -> HIT | MISS | ABORTED
 *
 * A strike is created by the generator, advanced only by the execution
 * engine, and frozen once it reaches a terminal state.
 */

import { InvalidTransitionError } from "../errors/app.errors";

/**
 * Strike category, drives expected return and leverage
 */
export type StrikeCategory =
  | "Arbitrage"
  | "Momentum"
  | "Volatility"
  | "Liquidity"
  | "Funding"
  | "Flash";

export const STRIKE_CATEGORIES: readonly StrikeCategory[] = [
  "Arbitrage",
  "Momentum",
  "Volatility",
  "Liquidity",
  "Funding",
  "Flash",
];

/**
 * Strategy label passed to the analysis oracle for a category
 */
export function strategyLabel(category: StrikeCategory): string {
  return `Macro${category}`;
}

export type StrikeStatus = "TARGETING" | "STRIKING" | "HIT" | "MISS" | "ABORTED";

export type TerminalStatus = Extract<StrikeStatus, "HIT" | "MISS" | "ABORTED">;

export function isTerminal(status: StrikeStatus): status is TerminalStatus {
  return status === "HIT" || status === "MISS" || status === "ABORTED";
}

export interface Strike {
  id: number;
  symbol: string;
  category: StrikeCategory;
  entryPrice: number;
  targetPrice: number;
  stopLossPrice: number;
  /** 0-1 */
  confidence: number;
  /** Fractional, e.g. 0.022 = 2.2% */
  expectedReturn: number;
  maxExposureMs: number;
  /** Assigned when the strike is sized; 0 until then */
  leverage: number;
  createdAt: number;
  status: StrikeStatus;

  /** Notional committed, set on entering STRIKING */
  strikeSizeUsd?: number;
  exitPrice?: number;
  pnlUsd?: number;
  abortReason?: string;
  resolvedAt?: number;
}

/**
 * Fields the generator supplies; lifecycle fields are filled in here
 */
export type StrikeDraft = Omit<
  Strike,
  | "id"
  | "status"
  | "leverage"
  | "strikeSizeUsd"
  | "exitPrice"
  | "pnlUsd"
  | "abortReason"
  | "resolvedAt"
>;

/**
 * Process-wide strike IDs, starting at 1
 */
export class StrikeIdSequence {
  private last = 0;

  next(): number {
    this.last += 1;
    return this.last;
  }
}

export function createStrike(id: number, draft: StrikeDraft): Strike {
  return { ...draft, id, leverage: 0, status: "TARGETING" };
}

const assertStatus = (strike: Strike, expected: StrikeStatus[], action: string): void => {
  if (!expected.includes(strike.status)) {
    throw new InvalidTransitionError(
      `Cannot ${action} strike #${strike.id} in state ${strike.status}`,
      strike.id,
    );
  }
};

/**
 * TARGETING -> STRIKING once sizing is known and an order is about to go out
 */
export function beginStrike(strike: Strike, leverage: number, sizeUsd: number): void {
  assertStatus(strike, ["TARGETING"], "begin");
  strike.leverage = leverage;
  strike.strikeSizeUsd = sizeUsd;
  strike.status = "STRIKING";
}

/**
 * STRIKING -> HIT | MISS
 */
export function resolveStrike(
  strike: Strike,
  outcome: { hit: boolean; exitPrice: number; pnlUsd: number },
  at: number,
): void {
  assertStatus(strike, ["STRIKING"], "resolve");
  strike.exitPrice = outcome.exitPrice;
  strike.pnlUsd = outcome.pnlUsd;
  strike.resolvedAt = at;
  strike.status = outcome.hit ? "HIT" : "MISS";
}

/**
 * Any non-terminal state -> ABORTED. Capital is never touched for an
 * aborted strike.
 */
export function abortStrike(strike: Strike, reason: string, at: number): void {
  assertStatus(strike, ["TARGETING", "STRIKING"], "abort");
  strike.abortReason = reason;
  strike.resolvedAt = at;
  strike.status = "ABORTED";
}

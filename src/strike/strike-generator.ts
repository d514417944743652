/**
 * Strike Generator
 *
 * Candidate n trades SYMBOLS[n mod 8] under CATEGORIES[n mod 6]. Every call
 * consumes an ID, including calls that end in a skip.
 *
 * - SimulatedStrikeGenerator: fixed base prices, random confidence in
 *   [0.80, 0.95). Throughput/regression runs only.
 * - AnalysisStrikeGenerator: requires an accepted gateway decision.
 */

import type { AnalysisGateway, SkipReason } from "../analysis/analysis-gateway";
import {
  STRIKE_CATEGORIES,
  StrikeIdSequence,
  createStrike,
  type Strike,
  type StrikeCategory,
} from "../models/strike";
import type { Clock } from "../utils/clock";
import marketTable from "./market-table.json";

export interface MarketSymbol {
  symbol: string;
  basePrice: number;
}

export const MARKET_SYMBOLS: readonly MarketSymbol[] = marketTable.symbols;

export const EXPECTED_RETURNS: Readonly<Record<StrikeCategory, number>> =
  marketTable.expectedReturns;

export const MAX_EXPOSURE_MS = 30000;
export const DEFAULT_STOP_LOSS_PCT = 0.02;

const SIM_CONFIDENCE_MIN = 0.8;
const SIM_CONFIDENCE_SPAN = 0.15;

export type GenerateResult =
  | { kind: "strike"; strike: Strike }
  | { kind: "skip"; reason: SkipReason; detail: string };

export interface StrikeGenerator {
  next(): Promise<GenerateResult>;
}

/**
 * Symbol and category for candidate `id`
 */
export function pickCandidate(id: number): {
  market: MarketSymbol;
  category: StrikeCategory;
} {
  return {
    market: MARKET_SYMBOLS[id % MARKET_SYMBOLS.length],
    category: STRIKE_CATEGORIES[id % STRIKE_CATEGORIES.length],
  };
}

export type GeneratorOptions = {
  clock: Clock;
  ids?: StrikeIdSequence;
  stopLossPct?: number;
};

export class SimulatedStrikeGenerator implements StrikeGenerator {
  private readonly ids: StrikeIdSequence;
  private readonly stopLossPct: number;

  constructor(
    private readonly options: GeneratorOptions,
    private readonly random: () => number = Math.random,
  ) {
    this.ids = options.ids ?? new StrikeIdSequence();
    this.stopLossPct = options.stopLossPct ?? DEFAULT_STOP_LOSS_PCT;
  }

  async next(): Promise<GenerateResult> {
    const id = this.ids.next();
    const { market, category } = pickCandidate(id);
    const entryPrice = market.basePrice;
    const expectedReturn = EXPECTED_RETURNS[category];

    const strike = createStrike(id, {
      symbol: market.symbol,
      category,
      entryPrice,
      targetPrice: entryPrice * (1 + expectedReturn),
      stopLossPrice: entryPrice * (1 - this.stopLossPct),
      confidence: SIM_CONFIDENCE_MIN + this.random() * SIM_CONFIDENCE_SPAN,
      expectedReturn,
      maxExposureMs: MAX_EXPOSURE_MS,
      createdAt: this.options.clock.now(),
    });

    return { kind: "strike", strike };
  }
}

export class AnalysisStrikeGenerator implements StrikeGenerator {
  private readonly ids: StrikeIdSequence;
  private readonly stopLossPct: number;

  constructor(
    private readonly gateway: AnalysisGateway,
    private readonly options: GeneratorOptions,
  ) {
    this.ids = options.ids ?? new StrikeIdSequence();
    this.stopLossPct = options.stopLossPct ?? DEFAULT_STOP_LOSS_PCT;
  }

  async next(): Promise<GenerateResult> {
    const id = this.ids.next();
    const { market, category } = pickCandidate(id);

    const decision = await this.gateway.evaluate(market.symbol, category);
    if (decision.kind === "skip") {
      return decision;
    }

    const { analysis, adjustedConfidence } = decision;
    const entryPrice = analysis.price;

    const strike = createStrike(id, {
      symbol: market.symbol,
      category,
      entryPrice,
      targetPrice: entryPrice * (1 + analysis.expectedReturn),
      stopLossPrice: entryPrice * (1 - this.stopLossPct),
      confidence: adjustedConfidence,
      expectedReturn: analysis.expectedReturn,
      maxExposureMs: MAX_EXPOSURE_MS,
      createdAt: this.options.clock.now(),
    });

    return { kind: "strike", strike };
  }
}

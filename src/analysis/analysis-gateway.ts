/**
 * Analysis Gateway - go/no-go decision for a candidate strike
 *
 * Wraps an Evaluator and turns its verdict into either an accepted analysis
 * or a typed skip. Skips are routine: logged at debug, never thrown.
 */

import { AnalysisUnavailableError } from "../errors/app.errors";
import type { StrikeCategory } from "../models/strike";
import { strategyLabel } from "../models/strike";
import type { Logger } from "../utils/logger.util";
import type { AnalysisResult, Evaluator } from "./evaluator";

export type SkipReason = "ANALYSIS_UNAVAILABLE" | "BELOW_THRESHOLD";

export type GatewayDecision =
  | { kind: "accept"; analysis: AnalysisResult; adjustedConfidence: number }
  | { kind: "skip"; reason: SkipReason; detail: string };

export const DEFAULT_MIN_CONFIDENCE = 0.8;

export class AnalysisGateway {
  constructor(
    private readonly evaluator: Evaluator,
    private readonly logger: Logger,
    private readonly minConfidence: number = DEFAULT_MIN_CONFIDENCE,
  ) {}

  async evaluate(symbol: string, category: StrikeCategory): Promise<GatewayDecision> {
    const label = strategyLabel(category);

    let analysis: AnalysisResult;
    try {
      analysis = await this.evaluator.evaluate(symbol, label);
    } catch (err) {
      // Anything other than an unavailable oracle is a bug; let it surface
      if (!(err instanceof AnalysisUnavailableError)) throw err;
      return this.skip("ANALYSIS_UNAVAILABLE", err.message);
    }

    const adjustedConfidence = analysis.confidence * analysis.precisionScore;

    if (analysis.recommendation !== "EXECUTE") {
      return this.skip(
        "BELOW_THRESHOLD",
        `${symbol} ${label}: oracle recommends ${analysis.recommendation}`,
      );
    }

    if (adjustedConfidence < this.minConfidence) {
      return this.skip(
        "BELOW_THRESHOLD",
        `${symbol} ${label}: confidence ${(adjustedConfidence * 100).toFixed(1)}% < ${(this.minConfidence * 100).toFixed(1)}%`,
      );
    }

    return { kind: "accept", analysis, adjustedConfidence };
  }

  private skip(reason: SkipReason, detail: string): GatewayDecision {
    this.logger.debug(`[Gateway] skip ${reason}: ${detail}`);
    return { kind: "skip", reason, detail };
  }
}

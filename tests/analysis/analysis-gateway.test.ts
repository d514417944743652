/**
 * Tests for the analysis gateway go/no-go decision
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { AnalysisGateway } from "../../src/analysis/analysis-gateway";
import type { AnalysisResult, Evaluator } from "../../src/analysis/evaluator";
import { AnalysisUnavailableError } from "../../src/errors/app.errors";
import { createMockLogger } from "../helpers/fakes";

const analysis = (overrides: Partial<AnalysisResult> = {}): AnalysisResult => ({
  symbol: "WETH/USDC",
  price: 3000,
  confidence: 0.9,
  expectedReturn: 0.02,
  volatility: 0.03,
  momentum: 0.5,
  liquidity: 0.9,
  precisionScore: 1,
  recommendation: "EXECUTE",
  timestamp: 1700000000,
  ...overrides,
});

class StubEvaluator implements Evaluator {
  readonly calls: Array<[string, string]> = [];
  constructor(private readonly respond: () => AnalysisResult) {}
  async evaluate(symbol: string, label: string): Promise<AnalysisResult> {
    this.calls.push([symbol, label]);
    return this.respond();
  }
}

describe("AnalysisGateway", () => {
  it("accepts EXECUTE above the threshold and passes the strategy label", async () => {
    const evaluator = new StubEvaluator(() => analysis({ confidence: 0.9, precisionScore: 0.95 }));
    const gateway = new AnalysisGateway(evaluator, createMockLogger());

    const decision = await gateway.evaluate("WETH/USDC", "Momentum");

    assert.equal(decision.kind, "accept");
    if (decision.kind !== "accept") return;
    assert.ok(Math.abs(decision.adjustedConfidence - 0.855) < 1e-12);
    assert.deepEqual(evaluator.calls, [["WETH/USDC", "MacroMomentum"]]);
  });

  it("skips when precision pulls confidence below the threshold", async () => {
    const logger = createMockLogger();
    const gateway = new AnalysisGateway(
      new StubEvaluator(() => analysis({ confidence: 0.9, precisionScore: 0.85 })),
      logger,
    );

    const decision = await gateway.evaluate("WETH/USDC", "Arbitrage");

    assert.equal(decision.kind, "skip");
    if (decision.kind !== "skip") return;
    assert.equal(decision.reason, "BELOW_THRESHOLD");
    assert.equal(logger.debug.mock.callCount(), 1);
    assert.equal(logger.error.mock.callCount(), 0);
  });

  it("accepts exactly at the threshold", async () => {
    const gateway = new AnalysisGateway(
      new StubEvaluator(() => analysis({ confidence: 0.8, precisionScore: 1 })),
      createMockLogger(),
    );
    assert.equal((await gateway.evaluate("WETH/USDC", "Flash")).kind, "accept");
  });

  it("skips a WAIT recommendation regardless of confidence", async () => {
    const gateway = new AnalysisGateway(
      new StubEvaluator(() => analysis({ recommendation: "WAIT", confidence: 0.99 })),
      createMockLogger(),
    );
    const decision = await gateway.evaluate("WETH/USDC", "Funding");
    assert.deepEqual(
      decision.kind === "skip" ? decision.reason : decision.kind,
      "BELOW_THRESHOLD",
    );
  });

  it("turns an unavailable oracle into a skip", async () => {
    const evaluator: Evaluator = {
      evaluate: async (symbol) => {
        throw new AnalysisUnavailableError("oracle timed out", symbol);
      },
    };
    const logger = createMockLogger();
    const gateway = new AnalysisGateway(evaluator, logger);

    const decision = await gateway.evaluate("CRV/USDC", "Liquidity");

    assert.deepEqual(decision, {
      kind: "skip",
      reason: "ANALYSIS_UNAVAILABLE",
      detail: "oracle timed out",
    });
    assert.equal(logger.debug.mock.callCount(), 1);
  });

  it("lets unexpected errors propagate", async () => {
    const evaluator: Evaluator = {
      evaluate: async () => {
        throw new TypeError("bug");
      },
    };
    const gateway = new AnalysisGateway(evaluator, createMockLogger());
    await assert.rejects(gateway.evaluate("WETH/USDC", "Momentum"), TypeError);
  });

  it("uses a configured threshold", async () => {
    const gateway = new AnalysisGateway(
      new StubEvaluator(() => analysis({ confidence: 0.7, precisionScore: 1 })),
      createMockLogger(),
      0.6,
    );
    assert.equal((await gateway.evaluate("WETH/USDC", "Momentum")).kind, "accept");
  });
});

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { CampaignController } from "../../src/core/campaign-controller";
import { CampaignState, type CampaignLimits } from "../../src/core/campaign-state";
import type { StrikeExecutor, StrikeOutcome } from "../../src/core/execution-engine";
import { TRADING_MODES, type TradingMode } from "../../src/core/modes";
import { ExecutionFailedError } from "../../src/errors/app.errors";
import { createStrike, type Strike } from "../../src/models/strike";
import type { GenerateResult, StrikeGenerator } from "../../src/strike/strike-generator";
import { FakeClock, createMockLogger } from "../helpers/fakes";

const INITIAL = 10_000_000;

class ScriptedGenerator implements StrikeGenerator {
  calls = 0;

  constructor(private readonly leading: GenerateResult[] = []) {}

  async next(): Promise<GenerateResult> {
    this.calls += 1;
    const scripted = this.leading.shift();
    if (scripted) return scripted;
    return {
      kind: "strike",
      strike: createStrike(this.calls, {
        symbol: "WETH/USDC",
        category: "Arbitrage",
        entryPrice: 3000,
        targetPrice: 3015,
        stopLossPrice: 2940,
        confidence: 0.9,
        expectedReturn: 0.005,
        maxExposureMs: 30000,
        createdAt: 0,
      }),
    };
  }
}

type Step = StrikeOutcome | Error;

const hit = (pnlCents: number): StrikeOutcome => ({
  hit: true,
  pnlCents,
  pnlUsd: pnlCents / 100,
  exitPrice: 3000,
});

const miss = (pnlCents: number): StrikeOutcome => ({
  hit: false,
  pnlCents,
  pnlUsd: pnlCents / 100,
  exitPrice: 3000,
});

const failure = (id = 1): ExecutionFailedError =>
  new ExecutionFailedError(`Strike #${id} aborted`, id, new Error("no fill"));

/**
 * Plays the scripted steps, then repeats `fallback`
 */
class ScriptedExecutor implements StrikeExecutor {
  readonly seen: Array<{ strike: Strike; capitalCents: number }> = [];
  onExecute?: () => void;

  constructor(
    private readonly steps: Step[] = [],
    private readonly fallback: Step = hit(100),
  ) {}

  async execute(strike: Strike, capitalCents: number): Promise<StrikeOutcome> {
    this.seen.push({ strike, capitalCents });
    this.onExecute?.();
    const step = this.steps.shift() ?? this.fallback;
    if (step instanceof Error) throw step;
    return step;
  }
}

function setup(options: {
  mode?: TradingMode;
  limits?: Partial<CampaignLimits>;
  totalTrades?: number;
  generator?: ScriptedGenerator;
  executor?: ScriptedExecutor;
}) {
  const clock = new FakeClock(0);
  const logger = createMockLogger();
  const state = new CampaignState(
    INITIAL,
    {
      targetCapitalCents: 11_850_000,
      campaignDurationMs: 5 * 24 * 60 * 60 * 1000,
      maxConsecutiveMisses: 20,
      maxDrawdownPct: 10,
      maxConsecutiveFailures: 5,
      ...options.limits,
    },
    clock.now(),
  );
  const generator = options.generator ?? new ScriptedGenerator();
  const executor = options.executor ?? new ScriptedExecutor();
  const controller = new CampaignController(
    {
      state,
      generator,
      executor,
      mode: TRADING_MODES[options.mode ?? "simulation"],
      clock,
      logger,
    },
    { totalTrades: options.totalTrades ?? 3, cooldownMs: 1, progressEvery: 100 },
  );
  return { clock, logger, state, generator, executor, controller };
}

const skip = (): GenerateResult => ({
  kind: "skip",
  reason: "BELOW_THRESHOLD",
  detail: "confidence 0.5 < 0.8",
});

describe("CampaignController", () => {
  it("runs the configured number of trades", async () => {
    const { controller, executor } = setup({ totalTrades: 3 });

    const report = await controller.run();

    assert.equal(report.stopReason, "TRADES_COMPLETED");
    assert.equal(report.tradesCompleted, 3);
    assert.equal(report.totalStrikes, 3);
    assert.equal(report.successfulStrikes, 3);
    assert.equal(report.finalCapitalCents, INITIAL + 300);
    assert.equal(report.totalPnlCents, 300);
    assert.equal(report.emergency, undefined);
    assert.deepEqual(
      executor.seen.map((s) => s.capitalCents),
      [INITIAL, INITIAL + 100, INITIAL + 200],
    );
  });

  it("does not count skips as trades", async () => {
    const generator = new ScriptedGenerator([skip(), skip(), skip()]);
    const { controller, executor, clock } = setup({ totalTrades: 1, generator });

    const report = await controller.run();

    assert.equal(report.tradesCompleted, 1);
    assert.equal(report.totalStrikes, 1);
    assert.equal(generator.calls, 4);
    assert.equal(executor.seen.length, 1);
    // three skip cooldowns and one after the strike
    assert.deepEqual(clock.sleeps, [1, 1, 1, 1]);
  });

  it("reports the return on initial capital", async () => {
    const executor = new ScriptedExecutor([], hit(100_000));
    const { controller } = setup({ totalTrades: 3, executor });

    const report = await controller.run();

    assert.equal(report.finalCapitalCents, 10_300_000);
    assert.ok(Math.abs(report.returnPct - 3) < 1e-9);
  });

  it("halts on an emergency stop after the strike that caused it", async () => {
    const executor = new ScriptedExecutor([miss(-1_600_000)]);
    const { controller, logger } = setup({ totalTrades: 10, executor });

    const report = await controller.run();

    assert.equal(report.stopReason, "EMERGENCY_STOP");
    assert.equal(report.emergency?.reason, "PEAK_FLOOR");
    assert.equal(report.tradesCompleted, 1);
    assert.equal(report.finalCapitalCents, 8_400_000);
    assert.equal(executor.seen.length, 1);
    assert.equal(logger.error.mock.callCount(), 1);
  });

  it("stops at the target capital where the mode enforces it", async () => {
    const { controller } = setup({
      mode: "paper",
      totalTrades: 10,
      limits: { targetCapitalCents: INITIAL + 200 },
    });

    const report = await controller.run();

    assert.equal(report.stopReason, "TARGET_REACHED");
    assert.equal(report.tradesCompleted, 2);
  });

  it("ignores the target in simulation mode", async () => {
    const { controller } = setup({
      mode: "simulation",
      totalTrades: 10,
      limits: { targetCapitalCents: INITIAL + 200 },
    });

    const report = await controller.run();

    assert.equal(report.stopReason, "TRADES_COMPLETED");
    assert.equal(report.tradesCompleted, 10);
  });

  it("stops once the campaign window has elapsed", async () => {
    // each iteration sleeps the 1ms cooldown; iteration k starts at k-1 ms
    const { controller } = setup({
      mode: "paper",
      totalTrades: 100,
      limits: { campaignDurationMs: 5 },
    });

    const report = await controller.run();

    assert.equal(report.stopReason, "CAMPAIGN_WINDOW_ELAPSED");
    assert.equal(report.tradesCompleted, 6);
    assert.equal(report.elapsedMs, 6);
  });

  it("finishes the in-flight strike when stopped", async () => {
    const executor = new ScriptedExecutor();
    const { controller } = setup({ totalTrades: 10, executor });
    executor.onExecute = () => controller.stop();

    const report = await controller.run();

    assert.equal(report.stopReason, "STOPPED");
    assert.equal(report.tradesCompleted, 1);
    assert.equal(report.finalCapitalCents, INITIAL + 100);
  });

  it("records execution failures without counting them as trades", async () => {
    const executor = new ScriptedExecutor([failure(1), failure(2)]);
    const { controller, logger } = setup({ totalTrades: 1, executor });

    const report = await controller.run();

    assert.equal(report.tradesCompleted, 1);
    assert.equal(report.totalStrikes, 1);
    assert.equal(report.executionFailures, 2);
    assert.equal(report.finalCapitalCents, INITIAL + 100);
    assert.equal(executor.seen.length, 3);
    assert.equal(logger.error.mock.callCount(), 2);
  });

  it("halts after too many consecutive execution failures", async () => {
    const executor = new ScriptedExecutor([], failure());
    const { controller } = setup({
      totalTrades: 10,
      executor,
      limits: { maxConsecutiveFailures: 2 },
    });

    const report = await controller.run();

    assert.equal(report.stopReason, "EMERGENCY_STOP");
    assert.equal(report.emergency?.reason, "EXECUTION_FAILURES");
    assert.equal(report.tradesCompleted, 0);
    assert.equal(report.finalCapitalCents, INITIAL);
  });

  it("propagates errors that are not execution failures", async () => {
    const executor = new ScriptedExecutor([new Error("ledger bug")]);
    const { controller, state } = setup({ executor });

    await assert.rejects(controller.run(), /ledger bug/);
    assert.equal(state.snapshot().executionFailures, 0);
  });
});

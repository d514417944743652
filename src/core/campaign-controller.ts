/**
 * Campaign Controller
 *
 * generate -> (skip: cooldown, loop) | (execute -> apply -> emergency check)
 *
 * Stops on: trade count, target capital and campaign window (only where the
 * mode enforces campaign stops), an emergency stop, or stop().
 */

import { ExecutionFailedError, toError } from "../errors/app.errors";
import type { StrikeGenerator } from "../strike/strike-generator";
import type { Clock } from "../utils/clock";
import type { Logger } from "../utils/logger.util";
import type { CampaignState } from "./campaign-state";
import { checkEmergencyStop, type EmergencyStop } from "./emergency";
import type { StrikeExecutor } from "./execution-engine";
import type { ModeProfile } from "./modes";

export type StopReason =
  | "TRADES_COMPLETED"
  | "TARGET_REACHED"
  | "CAMPAIGN_WINDOW_ELAPSED"
  | "EMERGENCY_STOP"
  | "STOPPED";

export interface CampaignReport {
  initialCapitalCents: number;
  finalCapitalCents: number;
  totalPnlCents: number;
  totalStrikes: number;
  successfulStrikes: number;
  failedStrikes: number;
  executionFailures: number;
  tradesCompleted: number;
  elapsedMs: number;
  returnPct: number;
  stopReason: StopReason;
  emergency?: EmergencyStop;
}

export interface ControllerConfig {
  totalTrades: number;
  cooldownMs: number;
  progressEvery: number;
}

export const DEFAULT_CONTROLLER_CONFIG: Readonly<ControllerConfig> = {
  totalTrades: 2500,
  cooldownMs: 1,
  progressEvery: 100,
};

const usd = (cents: number): string => `$${(cents / 100).toFixed(2)}`;

export class CampaignController {
  private readonly config: ControllerConfig;
  private stopRequested = false;

  constructor(
    private readonly deps: {
      state: CampaignState;
      generator: StrikeGenerator;
      executor: StrikeExecutor;
      mode: ModeProfile;
      clock: Clock;
      logger: Logger;
    },
    config: Partial<ControllerConfig> = {},
  ) {
    this.config = { ...DEFAULT_CONTROLLER_CONFIG, ...config };
  }

  /**
   * Ask the loop to finish after the current iteration. An in-flight strike
   * still runs to completion.
   */
  stop(): void {
    this.stopRequested = true;
  }

  async run(): Promise<CampaignReport> {
    const { state, generator, executor, mode, clock, logger } = this.deps;
    const { totalTrades, cooldownMs, progressEvery } = this.config;
    const { limits } = state.snapshot();

    logger.info(`🎯 Strike campaign started - mode=${mode.name}, ${totalTrades} trades`);
    if (mode.enforcesCampaignStops) {
      logger.info(`Target: ${usd(limits.targetCapitalCents)}`);
    }

    let stopReason: StopReason = "TRADES_COMPLETED";
    let emergency: EmergencyStop | undefined;

    while (state.snapshot().tradesCompleted < totalTrades) {
      if (this.stopRequested) {
        stopReason = "STOPPED";
        break;
      }

      if (mode.enforcesCampaignStops) {
        if (state.elapsedMs(clock.now()) > limits.campaignDurationMs) {
          logger.info(`⏱️ Campaign window ended`);
          stopReason = "CAMPAIGN_WINDOW_ELAPSED";
          break;
        }
        if (state.capital >= limits.targetCapitalCents) {
          logger.info(`🎉 Target capital reached: ${usd(limits.targetCapitalCents)}`);
          stopReason = "TARGET_REACHED";
          break;
        }
      }

      const generated = await generator.next();
      if (generated.kind === "skip") {
        await clock.sleep(cooldownMs);
        continue;
      }

      const { strike } = generated;
      try {
        const outcome = await executor.execute(strike, state.capital);
        state.applyResult({ pnlCents: outcome.pnlCents, hit: outcome.hit });

        const snap = state.snapshot();
        logger.info(
          `${outcome.hit ? "✅ HIT" : "❌ MISS"}: ${strike.symbol} | PnL=$${outcome.pnlUsd.toFixed(2)} | Capital=${usd(snap.capitalCents)} | Trades: ${snap.tradesCompleted}/${totalTrades}`,
        );

        if (progressEvery > 0 && snap.tradesCompleted % progressEvery === 0) {
          this.logProgress(snap.tradesCompleted, snap.capitalCents, snap.initialCapitalCents);
        }
      } catch (err) {
        if (!(err instanceof ExecutionFailedError)) throw err;
        state.recordExecutionFailure();
        logger.error(`Strike execution failed: ${err.message}`, err.cause ?? toError(err));
      }

      emergency = checkEmergencyStop(state.snapshot()) ?? undefined;
      if (emergency) {
        logger.error(`🚨 EMERGENCY STOP (${emergency.reason}): ${emergency.detail}`);
        stopReason = "EMERGENCY_STOP";
        break;
      }

      await clock.sleep(cooldownMs);
    }

    const report = this.buildReport(stopReason, emergency);
    logger.info(
      `🏁 CAMPAIGN COMPLETE: ${report.returnPct.toFixed(1)}% return | Trades: ${report.tradesCompleted}/${totalTrades} | Time: ${(report.elapsedMs / 1000).toFixed(2)}s | ${report.stopReason}`,
    );
    return report;
  }

  private logProgress(trades: number, capitalCents: number, initialCents: number): void {
    const { clock, state, logger } = this.deps;
    const progress = ((capitalCents - initialCents) / initialCents) * 100;
    const elapsedSec = state.elapsedMs(clock.now()) / 1000;
    const rate = elapsedSec > 0 ? trades / elapsedSec : 0;
    logger.info(
      `Progress: ${trades}/${this.config.totalTrades} trades | Capital: ${usd(capitalCents)} | Progress: ${progress.toFixed(1)}% | Rate: ${rate.toFixed(1)} trades/sec`,
    );
  }

  private buildReport(stopReason: StopReason, emergency?: EmergencyStop): CampaignReport {
    const { state, clock } = this.deps;
    const snap = state.snapshot();
    return {
      initialCapitalCents: snap.initialCapitalCents,
      finalCapitalCents: snap.capitalCents,
      totalPnlCents: snap.totalPnlCents,
      totalStrikes: snap.totalStrikes,
      successfulStrikes: snap.successfulStrikes,
      failedStrikes: snap.failedStrikes,
      executionFailures: snap.executionFailures,
      tradesCompleted: snap.tradesCompleted,
      elapsedMs: state.elapsedMs(clock.now()),
      returnPct:
        ((snap.capitalCents - snap.initialCapitalCents) / snap.initialCapitalCents) * 100,
      stopReason,
      emergency,
    };
  }
}

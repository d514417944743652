/**
 * Execution Engine
 *
 * Sizes a strike and resolves it to a realized P&L, either against the
 * exchange (place -> poll fill -> hold -> exit -> poll exit) or through the
 * probabilistic simulator.
 *
 * Any failure aborts the strike and surfaces as ExecutionFailedError;
 * capital is never touched here. The caller applies the returned outcome.
 */

import {
  ExecutionFailedError,
  NoFillError,
  toError,
} from "../errors/app.errors";
import {
  abortStrike,
  beginStrike,
  isTerminal,
  resolveStrike,
  type Strike,
  type StrikeCategory,
} from "../models/strike";
import { toExchangePair } from "../services/exchange/pairs";
import type { ExchangeClient } from "../services/exchange/types";
import { pollUntil, type Clock } from "../utils/clock";
import type { Logger } from "../utils/logger.util";

// ═══════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════

export interface LeverageBand {
  min: number;
  max: number;
}

export interface RiskCap {
  /** Fraction of capital risked per trade (0.01 = 1%) */
  riskPerTradePct: number;
  /** Stop distance as a fraction of entry */
  stopDistancePct: number;
}

/**
 * Resolved strike result, applied once to the campaign ledger
 */
export interface StrikeOutcome {
  hit: boolean;
  pnlUsd: number;
  pnlCents: number;
  exitPrice: number;
}

export interface StrikeExecutor {
  /**
   * Drive `strike` to HIT or MISS.
   * @throws ExecutionFailedError with the strike left ABORTED
   */
  execute(strike: Strike, capitalCents: number): Promise<StrikeOutcome>;
}

// ═══════════════════════════════════════════════════════════════════════════
// Sizing
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_LEVERAGE_BAND: Readonly<LeverageBand> = { min: 3, max: 5 };

/**
 * Momentum and Volatility strikes take the top of the band, the rest the bottom
 */
export function leverageFor(category: StrikeCategory, band: LeverageBand): number {
  return category === "Momentum" || category === "Volatility" ? band.max : band.min;
}

/**
 * Position notional in USD:
 *   capital × force × confidence × leverage
 * capped, when a risk budget is given, so that a stop-out loses at most
 *   capital × riskPerTradePct
 */
export function computeStrikeSize(params: {
  capitalCents: number;
  strikeForcePct: number;
  confidence: number;
  leverage: number;
  riskCap?: RiskCap;
}): number {
  const capitalUsd = params.capitalCents / 100;
  const size =
    capitalUsd * params.strikeForcePct * params.confidence * params.leverage;

  const cap = params.riskCap;
  if (!cap || cap.riskPerTradePct <= 0 || cap.stopDistancePct <= 0) {
    return size;
  }

  const maxByRisk =
    (capitalUsd * cap.riskPerTradePct) / (cap.stopDistancePct * params.leverage);
  return Math.min(size, maxByRisk);
}

export const toCents = (usd: number): number => Math.round(usd * 100);

// ═══════════════════════════════════════════════════════════════════════════
// Simulated execution
// ═══════════════════════════════════════════════════════════════════════════

export interface SimulatedExecutorConfig {
  strikeForcePct: number;
  leverage: LeverageBand;
  roundTripFeePct: number;
  stopLossPct: number;
  /** Fixed take-profit; when absent the strike's expected return is used */
  takeProfitPct?: number;
  /** Per-trade risk budget; when absent or 0 the size is uncapped */
  riskPerTradePct?: number;
}

export const DEFAULT_SIMULATED_EXECUTOR_CONFIG: Readonly<SimulatedExecutorConfig> = {
  strikeForcePct: 0.15,
  leverage: DEFAULT_LEVERAGE_BAND,
  roundTripFeePct: 0.0016,
  stopLossPct: 0.0025,
};

/** Fixed take-profit used by the offline simulation mode */
export const SIM_TAKE_PROFIT_PCT = 0.003;

/**
 * Hit iff random() < confidence. Non-blocking; for throughput and regression
 * runs, never evidence of live performance.
 */
export class SimulatedStrikeExecutor implements StrikeExecutor {
  private readonly config: SimulatedExecutorConfig;

  constructor(
    config: Partial<SimulatedExecutorConfig>,
    private readonly clock: Clock,
    private readonly random: () => number = Math.random,
  ) {
    this.config = { ...DEFAULT_SIMULATED_EXECUTOR_CONFIG, ...config };
  }

  async execute(strike: Strike, capitalCents: number): Promise<StrikeOutcome> {
    const { config } = this;
    const leverage = leverageFor(strike.category, config.leverage);
    const size = computeStrikeSize({
      capitalCents,
      strikeForcePct: config.strikeForcePct,
      confidence: strike.confidence,
      leverage,
      riskCap:
        config.riskPerTradePct !== undefined
          ? { riskPerTradePct: config.riskPerTradePct, stopDistancePct: config.stopLossPct }
          : undefined,
    });

    beginStrike(strike, leverage, size);

    const hit = this.random() < strike.confidence;
    const fees = size * config.roundTripFeePct;
    const takeProfit = config.takeProfitPct ?? strike.expectedReturn;

    const pnlUsd = hit
      ? size * takeProfit * leverage - fees
      : -size * config.stopLossPct * leverage - fees;
    const exitPrice = hit
      ? strike.entryPrice * (1 + takeProfit)
      : strike.entryPrice * (1 - config.stopLossPct);

    resolveStrike(strike, { hit, exitPrice, pnlUsd }, this.clock.now());

    return { hit, pnlUsd, pnlCents: toCents(pnlUsd), exitPrice };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Live execution
// ═══════════════════════════════════════════════════════════════════════════

export interface LiveExecutorConfig {
  /** USD notional of every entry order */
  orderUsdSize: number;
  strikeForcePct: number;
  leverage: LeverageBand;
  pollIntervalMs: number;
  fillTimeoutMs: number;
  holdMs: number;
}

export const DEFAULT_LIVE_EXECUTOR_CONFIG: Readonly<LiveExecutorConfig> = {
  orderUsdSize: 25,
  strikeForcePct: 0.15,
  leverage: DEFAULT_LEVERAGE_BAND,
  pollIntervalMs: 2000,
  fillTimeoutMs: 30000,
  holdMs: 20000,
};

type Fill = { volume: number; price: number };

export class LiveStrikeExecutor implements StrikeExecutor {
  private readonly config: LiveExecutorConfig;

  constructor(
    private readonly exchange: ExchangeClient,
    private readonly clock: Clock,
    private readonly logger: Logger,
    config: Partial<LiveExecutorConfig> = {},
  ) {
    this.config = { ...DEFAULT_LIVE_EXECUTOR_CONFIG, ...config };
  }

  async execute(strike: Strike, capitalCents: number): Promise<StrikeOutcome> {
    try {
      return await this.run(strike, capitalCents);
    } catch (err) {
      const cause = toError(err);
      if (!isTerminal(strike.status)) {
        abortStrike(strike, cause.message, this.clock.now());
      }
      throw new ExecutionFailedError(
        `Strike #${strike.id} ${strike.symbol} aborted: ${cause.message}`,
        strike.id,
        cause,
      );
    }
  }

  private async run(strike: Strike, capitalCents: number): Promise<StrikeOutcome> {
    const { config } = this;

    const pair = toExchangePair(strike.symbol);
    if (!pair) {
      throw new Error(`No exchange pair for ${strike.symbol}`);
    }

    const leverage = leverageFor(strike.category, config.leverage);
    const size = computeStrikeSize({
      capitalCents,
      strikeForcePct: config.strikeForcePct,
      confidence: strike.confidence,
      leverage,
    });
    beginStrike(strike, leverage, size);

    // 1. Entry
    const entryId = await this.exchange.placeOrder(
      pair,
      "buy",
      config.orderUsdSize,
      strike.entryPrice,
    );
    this.logger.info(
      `[LIVE] ${pair} buy $${config.orderUsdSize.toFixed(2)} @ ~${strike.entryPrice.toFixed(2)} (txid=${entryId})`,
    );

    // 2. Wait for a fill
    const fill = await pollUntil<Fill>(
      async () => {
        const status = await this.exchange.queryOrder(entryId);
        if (!status.volumeExecuted) return null;
        return {
          volume: status.volumeExecuted,
          price: status.averagePrice ?? strike.entryPrice,
        };
      },
      this.pollOptions(entryId),
    );

    if (!fill) {
      await this.cancelQuietly(entryId);
      throw new NoFillError(
        `No fill for ${entryId} in ${config.fillTimeoutMs}ms`,
        entryId,
        config.fillTimeoutMs,
      );
    }

    // 3. Hold
    await this.clock.sleep(config.holdMs);

    // 4. Exit, falling back to the entry price if the exit never reports one
    const exitId = await this.exchange.placeExit(pair, fill.volume);
    const exitPrice =
      (await pollUntil<number>(
        async () => {
          const status = await this.exchange.queryOrder(exitId);
          if (!status.found) return null;
          return status.averagePrice ?? fill.price;
        },
        this.pollOptions(exitId),
      )) ?? fill.price;

    // 5. Realize
    const pnlUsd = (exitPrice - fill.price) * fill.volume;
    const hit = pnlUsd >= 0;
    resolveStrike(strike, { hit, exitPrice, pnlUsd }, this.clock.now());

    this.logger.info(
      `[LIVE] EXIT ${pair} filled=${fill.volume.toFixed(8)} buy=${fill.price.toFixed(2)} sell=${exitPrice.toFixed(2)} PnL=$${pnlUsd.toFixed(2)} (buyTx=${entryId}, sellTx=${exitId})`,
    );

    return { hit, pnlUsd, pnlCents: toCents(pnlUsd), exitPrice };
  }

  private pollOptions(orderId: string) {
    return {
      clock: this.clock,
      intervalMs: this.config.pollIntervalMs,
      timeoutMs: this.config.fillTimeoutMs,
      onProbeError: (err: unknown) => {
        this.logger.debug(`[LIVE] poll ${orderId} failed: ${toError(err).message}`);
      },
    };
  }

  /**
   * Best effort: the strike is aborted either way
   */
  private async cancelQuietly(orderId: string): Promise<void> {
    try {
      await this.exchange.cancelOrder(orderId);
    } catch (err) {
      this.logger.warn(
        `[LIVE] Cancel of unfilled order ${orderId} failed, handle it manually: ${toError(err).message}`,
      );
    }
  }
}

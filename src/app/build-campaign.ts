import { AnalysisGateway } from "../analysis/analysis-gateway";
import { SubprocessEvaluator, type Evaluator } from "../analysis/evaluator";
import { toCampaignLimits } from "../config/loadConfig";
import type { AppConfig } from "../config/schema";
import { CampaignController } from "../core/campaign-controller";
import { CampaignState } from "../core/campaign-state";
import {
  LiveStrikeExecutor,
  SIM_TAKE_PROFIT_PCT,
  SimulatedStrikeExecutor,
  type StrikeExecutor,
} from "../core/execution-engine";
import { TRADING_MODES } from "../core/modes";
import { ConfigurationError } from "../errors/app.errors";
import { KrakenClient } from "../services/exchange/kraken-client";
import { RequestSigner } from "../services/exchange/signer";
import type { ExchangeClient } from "../services/exchange/types";
import {
  AnalysisStrikeGenerator,
  SimulatedStrikeGenerator,
  type StrikeGenerator,
} from "../strike/strike-generator";
import type { Clock } from "../utils/clock";
import type { Logger } from "../utils/logger.util";

export type CampaignDeps = {
  clock: Clock;
  logger: Logger;
  random?: () => number;
  /** Overrides the subprocess oracle */
  evaluator?: Evaluator;
  /** Overrides the exchange client built from the credentials */
  exchange?: ExchangeClient;
};

function buildExchange(config: AppConfig, logger: Logger): ExchangeClient {
  const { apiKey, apiSecret, apiUrl } = config.exchange;
  if (!apiKey || !apiSecret) {
    throw new ConfigurationError(
      "KRAKEN_API_KEY and KRAKEN_API_SECRET are required for live trading",
      "KRAKEN_API_KEY",
    );
  }
  return new KrakenClient({
    signer: new RequestSigner(apiKey, apiSecret),
    logger,
    baseUrl: apiUrl,
  });
}

/**
 * Wire generator, executor and ledger for the configured mode
 */
export function buildCampaign(config: AppConfig, deps: CampaignDeps): CampaignController {
  const { clock, logger } = deps;
  const random = deps.random ?? Math.random;
  const mode = TRADING_MODES[config.mode];
  const { sizing, campaign, live } = config;
  const leverage = { min: sizing.minLeverage, max: sizing.maxLeverage };

  let generator: StrikeGenerator;
  if (mode.usesAnalysis) {
    const evaluator = deps.evaluator ?? new SubprocessEvaluator(config.oracle);
    const gateway = new AnalysisGateway(evaluator, logger, sizing.minConfidence);
    generator = new AnalysisStrikeGenerator(gateway, { clock });
  } else {
    generator = new SimulatedStrikeGenerator({ clock }, random);
  }

  let executor: StrikeExecutor;
  if (mode.placesOrders) {
    executor = new LiveStrikeExecutor(
      deps.exchange ?? buildExchange(config, logger),
      clock,
      logger,
      {
        orderUsdSize: live.orderUsdSize,
        strikeForcePct: sizing.strikeForcePct,
        leverage,
        pollIntervalMs: live.pollIntervalMs,
        fillTimeoutMs: live.fillTimeoutMs,
        holdMs: live.holdMs,
      },
    );
  } else {
    const simulation = config.mode === "simulation";
    executor = new SimulatedStrikeExecutor(
      {
        strikeForcePct: sizing.strikeForcePct,
        leverage,
        // simulation: fixed TP and risk cap; paper: the strike's expected return
        takeProfitPct: simulation ? SIM_TAKE_PROFIT_PCT : undefined,
        riskPerTradePct: simulation ? sizing.orderRiskPct : undefined,
      },
      clock,
      random,
    );
  }

  const state = new CampaignState(
    campaign.initialCapitalCents,
    toCampaignLimits(campaign),
    clock.now(),
  );

  return new CampaignController(
    { state, generator, executor, mode, clock, logger },
    { totalTrades: campaign.totalTrades, cooldownMs: campaign.cooldownMs },
  );
}

import { ConfigurationError } from "../errors/app.errors";
import { TRADING_MODES, type TradingMode } from "../core/modes";
import { DEFAULT_ORACLE_OPTIONS } from "../analysis/evaluator";
import { KRAKEN_API_URL } from "../services/exchange/kraken-client";
import { decodeSecret } from "../services/exchange/signer";
import type { LogLevel } from "../utils/logger.util";
import {
  createReader,
  envEnum,
  envFlag,
  envList,
  envNum,
  envRequired,
  envStr,
  type EnvReader,
  type EnvSource,
} from "./env";
import type { CampaignLimits } from "../core/campaign-state";
import type { AppConfig, CampaignConfig } from "./schema";

const DEFAULTS = {
  INITIAL_CAPITAL_CENTS: 10_000_000,
  TARGET_CAPITAL_CENTS: 11_850_000,
  TOTAL_TRADES: 2500,
  STRIKE_FORCE_PCT: 0.15,
  MIN_CONFIDENCE: 0.8,
  MIN_LEVERAGE: 3,
  MAX_LEVERAGE: 5,
  ORDER_USD_SIZE: 25,
  ORDER_RISK_PCT: 1,
  CAMPAIGN_DAYS: 5,
  MAX_DRAWDOWN_PCT: 10,
  MAX_CONSECUTIVE_MISSES: 20,
  MAX_CONSECUTIVE_FAILURES: 5,
  HOLD_SECONDS: 20,
  FILL_TIMEOUT_SECONDS: 30,
  POLL_INTERVAL_SECONDS: 2,
  STRIKE_COOLDOWN_MS: 1,
} as const;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const MODES: readonly TradingMode[] = ["simulation", "paper", "live"];
const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

/**
 * TRADING_MODE wins; otherwise the legacy flags. SIM_MODE beats
 * LIVE_TRADING when both are set, so a stray flag never places orders.
 */
function resolveMode(read: EnvReader): TradingMode {
  if (read("TRADING_MODE") !== undefined) {
    return envEnum(read, "TRADING_MODE", MODES, "paper");
  }
  if (envFlag(read, "SIM_MODE")) return "simulation";
  if (envFlag(read, "LIVE_TRADING")) return "live";
  return "paper";
}

/**
 * DEBUG=1 wins; LOG_LEVEL=trace is read as debug, as the logger does
 */
function resolveLogLevel(read: EnvReader): LogLevel {
  if (envFlag(read, "DEBUG")) return "debug";
  if (read("LOG_LEVEL")?.toLowerCase() === "trace") return "debug";
  return envEnum(read, "LOG_LEVEL", LOG_LEVELS, "info");
}

export function loadConfig(env: EnvSource = process.env): AppConfig {
  const read = createReader(env);
  const mode = resolveMode(read);

  const minLeverage = envNum(read, "MIN_LEVERAGE", DEFAULTS.MIN_LEVERAGE, { min: 1, integer: true });
  const maxLeverage = envNum(read, "MAX_LEVERAGE", DEFAULTS.MAX_LEVERAGE, { min: 1, integer: true });
  if (minLeverage > maxLeverage) {
    throw new ConfigurationError("MIN_LEVERAGE must not exceed MAX_LEVERAGE", "MIN_LEVERAGE");
  }

  const initialCapitalCents = envNum(read, "INITIAL_CAPITAL_CENTS", DEFAULTS.INITIAL_CAPITAL_CENTS, {
    min: 1,
    integer: true,
  });

  let apiKey = read("KRAKEN_API_KEY");
  let apiSecret = read("KRAKEN_API_SECRET");
  if (TRADING_MODES[mode].placesOrders) {
    apiKey = envRequired(read, "KRAKEN_API_KEY");
    apiSecret = envRequired(read, "KRAKEN_API_SECRET");
    // Fail at startup, not on the first order
    decodeSecret(apiSecret);
  }

  return {
    mode,
    campaign: {
      initialCapitalCents,
      targetCapitalCents: envNum(read, "TARGET_CAPITAL_CENTS", DEFAULTS.TARGET_CAPITAL_CENTS, {
        min: 1,
        integer: true,
      }),
      totalTrades: envNum(read, "TOTAL_TRADES", DEFAULTS.TOTAL_TRADES, { min: 1, integer: true }),
      campaignDays: envNum(read, "CAMPAIGN_DAYS", DEFAULTS.CAMPAIGN_DAYS, { min: 1 }),
      maxDrawdownPct: envNum(read, "MAX_DRAWDOWN_PCT", DEFAULTS.MAX_DRAWDOWN_PCT, { min: 0, max: 100 }),
      maxConsecutiveMisses: envNum(read, "MAX_CONSECUTIVE_MISSES", DEFAULTS.MAX_CONSECUTIVE_MISSES, {
        min: 1,
        integer: true,
      }),
      maxConsecutiveFailures: envNum(
        read,
        "MAX_CONSECUTIVE_FAILURES",
        DEFAULTS.MAX_CONSECUTIVE_FAILURES,
        { min: 0, integer: true },
      ),
      cooldownMs: envNum(read, "STRIKE_COOLDOWN_MS", DEFAULTS.STRIKE_COOLDOWN_MS, { min: 0 }),
    },
    sizing: {
      strikeForcePct: envNum(read, "STRIKE_FORCE_PCT", DEFAULTS.STRIKE_FORCE_PCT, { min: 0, max: 1 }),
      minLeverage,
      maxLeverage,
      orderRiskPct: envNum(read, "ORDER_RISK_PCT", DEFAULTS.ORDER_RISK_PCT, { min: 0, max: 100 }) / 100,
      minConfidence: envNum(read, "MIN_CONFIDENCE", DEFAULTS.MIN_CONFIDENCE, { min: 0, max: 1 }),
    },
    live: {
      orderUsdSize: envNum(read, "ORDER_USD_SIZE", DEFAULTS.ORDER_USD_SIZE, { min: 0.01 }),
      holdMs: envNum(read, "HOLD_SECONDS", DEFAULTS.HOLD_SECONDS, { min: 0 }) * 1000,
      fillTimeoutMs:
        envNum(read, "FILL_TIMEOUT_SECONDS", DEFAULTS.FILL_TIMEOUT_SECONDS, { min: 1 }) * 1000,
      pollIntervalMs:
        envNum(read, "POLL_INTERVAL_SECONDS", DEFAULTS.POLL_INTERVAL_SECONDS, { min: 0.1 }) * 1000,
    },
    oracle: {
      command: envStr(read, "ORACLE_COMMAND", DEFAULT_ORACLE_OPTIONS.command),
      args: envList(read, "ORACLE_ARGS", [...DEFAULT_ORACLE_OPTIONS.args]),
      timeoutMs: envNum(read, "ORACLE_TIMEOUT_MS", DEFAULT_ORACLE_OPTIONS.timeoutMs, {
        min: 1,
        integer: true,
      }),
    },
    exchange: {
      apiUrl: envStr(read, "KRAKEN_API_URL", KRAKEN_API_URL),
      apiKey,
      apiSecret,
    },
    logLevel: resolveLogLevel(read),
  };
}

export function toCampaignLimits(campaign: CampaignConfig): CampaignLimits {
  return {
    targetCapitalCents: campaign.targetCapitalCents,
    campaignDurationMs: campaign.campaignDays * MS_PER_DAY,
    maxConsecutiveMisses: campaign.maxConsecutiveMisses,
    maxDrawdownPct: campaign.maxDrawdownPct,
    maxConsecutiveFailures: campaign.maxConsecutiveFailures,
  };
}

/**
 * Startup summary; credentials are reduced to presence flags
 */
export function describeConfig(config: AppConfig): string[] {
  const { campaign, sizing, live, oracle, exchange } = config;
  const lines = [
    `Mode: ${config.mode} - ${TRADING_MODES[config.mode].description}`,
    `Capital: $${(campaign.initialCapitalCents / 100).toFixed(2)} -> target $${(campaign.targetCapitalCents / 100).toFixed(2)} over ${campaign.campaignDays} days`,
    `Trades: ${campaign.totalTrades} | Strike force: ${(sizing.strikeForcePct * 100).toFixed(1)}% | Leverage: ${sizing.minLeverage}x-${sizing.maxLeverage}x`,
    `Risk: ${(sizing.orderRiskPct * 100).toFixed(2)}% per trade | Max drawdown: ${campaign.maxDrawdownPct}% | Max misses: ${campaign.maxConsecutiveMisses} | Max failures: ${campaign.maxConsecutiveFailures}`,
    `Min confidence: ${(sizing.minConfidence * 100).toFixed(0)}%`,
  ];

  if (TRADING_MODES[config.mode].usesAnalysis) {
    lines.push(
      `Oracle: ${[oracle.command, ...oracle.args].join(" ")} (timeout ${oracle.timeoutMs}ms)`,
    );
  }

  if (TRADING_MODES[config.mode].placesOrders) {
    lines.push(
      `Orders: $${live.orderUsdSize.toFixed(2)} | hold ${live.holdMs / 1000}s | fill timeout ${live.fillTimeoutMs / 1000}s`,
      `Exchange: ${exchange.apiUrl} | API key: ${exchange.apiKey ? "set" : "missing"} | API secret: ${exchange.apiSecret ? "set" : "missing"}`,
    );
  }

  return lines;
}

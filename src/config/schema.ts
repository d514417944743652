/**
 * Configuration Schema
 *
 * Type definitions for the application configuration.
 * This provides a single source of truth for all configuration options.
 */

import type { TradingMode } from "../core/modes";
import type { LogLevel } from "../utils/logger.util";

/**
 * Campaign limits and pacing
 */
export interface CampaignConfig {
  /** Starting capital in cents */
  initialCapitalCents: number;

  /** Stop once capital reaches this (cents); ignored in simulation */
  targetCapitalCents: number;

  /** Completed trades after which the campaign ends */
  totalTrades: number;

  /** Campaign window in days; ignored in simulation */
  campaignDays: number;

  /** Configurable drawdown from peak (percent, 0 disables) */
  maxDrawdownPct: number;

  maxConsecutiveMisses: number;

  /** Consecutive aborted strikes before halting (0 disables) */
  maxConsecutiveFailures: number;

  /** Delay between iterations (ms) */
  cooldownMs: number;
}

/**
 * Position sizing
 */
export interface SizingConfig {
  /** Fraction of capital per strike before leverage (0-1) */
  strikeForcePct: number;

  minLeverage: number;
  maxLeverage: number;

  /** Per-trade risk budget as a fraction (ORDER_RISK_PCT is given in percent) */
  orderRiskPct: number;

  /** Minimum precision-adjusted confidence to act on (0-1) */
  minConfidence: number;
}

/**
 * Live order sequence
 */
export interface LiveExecutionConfig {
  /** USD notional of every entry order */
  orderUsdSize: number;
  holdMs: number;
  fillTimeoutMs: number;
  pollIntervalMs: number;
}

export interface OracleConfig {
  command: string;
  args: string[];
  timeoutMs: number;
}

export interface ExchangeConfig {
  apiUrl: string;
  apiKey?: string;
  apiSecret?: string;
}

export interface AppConfig {
  mode: TradingMode;
  campaign: CampaignConfig;
  sizing: SizingConfig;
  live: LiveExecutionConfig;
  oracle: OracleConfig;
  exchange: ExchangeConfig;
  logLevel: LogLevel;
}

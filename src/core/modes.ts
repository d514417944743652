/**
 * Trading Modes
 *
 * THREE MODES: simulation, paper, live
 * One-line configuration: TRADING_MODE=paper
 */

export type TradingMode = "simulation" | "paper" | "live";

export interface ModeProfile {
  name: TradingMode;
  /** Candidates come from the analysis oracle rather than the fixed table */
  usesAnalysis: boolean;
  /** Orders go to the exchange */
  placesOrders: boolean;
  /** Target-capital and campaign-window stops apply */
  enforcesCampaignStops: boolean;
  description: string;
}

export const TRADING_MODES: Record<TradingMode, ModeProfile> = {
  simulation: {
    name: "simulation",
    usesAnalysis: false,
    placesOrders: false,
    enforcesCampaignStops: false,
    description: "Offline throughput run - fixed table, fixed TP/SL, risk-capped sizing",
  },
  paper: {
    name: "paper",
    usesAnalysis: true,
    placesOrders: false,
    enforcesCampaignStops: true,
    description: "Oracle-driven candidates, simulated fills",
  },
  live: {
    name: "live",
    usesAnalysis: true,
    placesOrders: true,
    enforcesCampaignStops: true,
    description: "Oracle-driven candidates, real exchange orders",
  },
};


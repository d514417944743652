#!/usr/bin/env node
import "dotenv/config";
import { describeConfig, loadConfig } from "../config";
import type { AppConfig } from "../config";
import type { CampaignController } from "../core/campaign-controller";
import { ConfigurationError } from "../errors/app.errors";
import { systemClock } from "../utils/clock";
import { ConsoleLogger } from "../utils/logger.util";
import { buildCampaign } from "./build-campaign";

// Global reference for graceful shutdown
let controller: CampaignController | undefined;

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`[Config] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  const logger = new ConsoleLogger({
    level: config.logLevel,
    secrets: [config.exchange.apiKey, config.exchange.apiSecret],
  });

  logger.info("🚀 Starting strike campaign");
  for (const line of describeConfig(config)) {
    logger.info(`   ${line}`);
  }
  if (config.mode === "simulation") {
    logger.warn("Simulation results say nothing about live performance");
  }

  controller = buildCampaign(config, { clock: systemClock, logger });
  const report = await controller.run();

  logger.info(
    `Final capital: $${(report.finalCapitalCents / 100).toFixed(2)} | P&L: $${(report.totalPnlCents / 100).toFixed(2)}`,
  );
  logger.info(
    `Strikes: ${report.totalStrikes} (hit ${report.successfulStrikes}, miss ${report.failedStrikes}, aborted ${report.executionFailures}) | Stop: ${report.stopReason}`,
  );
}

/**
 * Graceful shutdown handler - finish the current strike, then stop
 */
function gracefulShutdown(signal: string): void {
  console.log(`\n[Shutdown] Received ${signal}, finishing current strike...`);
  if (controller) {
    controller.stop();
    return;
  }
  process.exit(0);
}

process.on("SIGINT", () => gracefulShutdown("SIGINT"));
process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));

main().catch((err) => {
  console.error("Fatal error in main():", err);
  process.exit(1);
});

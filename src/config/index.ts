/**
 * Configuration Index
 *
 * - env.ts: Environment variable parsing helpers
 * - schema.ts: Configuration type definitions
 * - loadConfig.ts: Environment -> AppConfig
 *
 * Usage:
 *   import { loadConfig, describeConfig } from './config';
 *   import type { AppConfig } from './config';
 */

export { loadConfig, describeConfig, toCampaignLimits } from "./loadConfig";

export type { AppConfig } from "./schema";

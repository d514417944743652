/**
 * Environment variable parsing helpers
 *
 * Keys are read upper-case first, then lower-case. Invalid values raise
 * ConfigurationError naming the key; values are never echoed.
 */

import { ConfigurationError } from "../errors/app.errors";

export type EnvSource = Record<string, string | undefined>;

export type EnvReader = (key: string) => string | undefined;

export function createReader(env: EnvSource): EnvReader {
  return (key) => {
    const raw = env[key] ?? env[key.toLowerCase()];
    const trimmed = raw?.trim();
    return trimmed ? trimmed : undefined;
  };
}

export function envStr(read: EnvReader, key: string, defaultValue: string): string {
  return read(key) ?? defaultValue;
}

export function envNum(
  read: EnvReader,
  key: string,
  defaultValue: number,
  bounds: { min?: number; max?: number; integer?: boolean } = {},
): number {
  const raw = read(key);
  if (raw === undefined) return defaultValue;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${key} must be a number`, key);
  }
  if (bounds.integer && !Number.isInteger(parsed)) {
    throw new ConfigurationError(`${key} must be an integer`, key);
  }
  if (bounds.min !== undefined && parsed < bounds.min) {
    throw new ConfigurationError(`${key} must be >= ${bounds.min}`, key);
  }
  if (bounds.max !== undefined && parsed > bounds.max) {
    throw new ConfigurationError(`${key} must be <= ${bounds.max}`, key);
  }
  return parsed;
}

export function envEnum<T extends string>(
  read: EnvReader,
  key: string,
  allowed: readonly T[],
  defaultValue: T,
): T {
  const raw = read(key);
  if (raw === undefined) return defaultValue;

  const normalized = raw.toLowerCase();
  const match = allowed.find((value) => value === normalized);
  if (!match) {
    throw new ConfigurationError(
      `${key} must be one of: ${allowed.join(", ")}`,
      key,
    );
  }
  return match;
}

/**
 * JSON array or comma-separated list
 */
export function envList(read: EnvReader, key: string, defaultValue: string[]): string[] {
  const raw = read(key);
  if (raw === undefined) return defaultValue;

  if (raw.startsWith("[")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new ConfigurationError(`${key} is not a valid JSON array`, key);
    }
    if (!Array.isArray(parsed)) {
      throw new ConfigurationError(`${key} is not a valid JSON array`, key);
    }
    return parsed.map(String);
  }

  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function envFlag(read: EnvReader, key: string): boolean {
  const raw = read(key)?.toLowerCase();
  return raw === "1" || raw === "true";
}

export function envRequired(read: EnvReader, key: string): string {
  const value = read(key);
  if (!value) {
    throw new ConfigurationError(`Missing required env var: ${key}`, key);
  }
  return value;
}

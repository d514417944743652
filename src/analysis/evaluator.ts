import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { AnalysisUnavailableError, toError } from "../errors/app.errors";

const execFileAsync = promisify(execFile);

export type Recommendation = "EXECUTE" | "WAIT";

/**
 * One oracle verdict for a (symbol, strategy) pair
 */
export interface AnalysisResult {
  symbol: string;
  price: number;
  confidence: number;
  expectedReturn: number;
  volatility: number;
  momentum: number;
  liquidity: number;
  precisionScore: number;
  recommendation: Recommendation;
  timestamp: number;
}

/**
 * Anything that can score a candidate. Implementations throw
 * AnalysisUnavailableError when no usable verdict is available.
 */
export interface Evaluator {
  evaluate(symbol: string, strategyLabel: string): Promise<AnalysisResult>;
}

// ============================================================================
// Output parsing
// ============================================================================

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readNumber = (
  raw: Record<string, unknown>,
  key: string,
  symbol: string,
): number => {
  const value = raw[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new AnalysisUnavailableError(
      `Oracle output for ${symbol} has missing or non-numeric "${key}"`,
      symbol,
    );
  }
  return value;
};

/**
 * Validate the oracle's stdout (a single JSON object) and map it to
 * AnalysisResult.
 * @throws AnalysisUnavailableError on invalid JSON or missing/invalid fields
 */
export function parseAnalysisOutput(text: string, symbol: string): AnalysisResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text.trim());
  } catch (err) {
    throw new AnalysisUnavailableError(
      `Oracle output for ${symbol} is not valid JSON`,
      symbol,
      toError(err),
    );
  }

  if (!isRecord(raw)) {
    throw new AnalysisUnavailableError(
      `Oracle output for ${symbol} is not a JSON object`,
      symbol,
    );
  }

  if (typeof raw.symbol !== "string") {
    throw new AnalysisUnavailableError(
      `Oracle output for ${symbol} is missing "symbol"`,
      symbol,
    );
  }

  const recommendation = raw.recommendation;
  if (recommendation !== "EXECUTE" && recommendation !== "WAIT") {
    throw new AnalysisUnavailableError(
      `Oracle output for ${symbol} has invalid "recommendation"`,
      symbol,
    );
  }

  const confidence = readNumber(raw, "confidence", symbol);
  if (confidence < 0 || confidence > 1) {
    throw new AnalysisUnavailableError(
      `Oracle confidence for ${symbol} is outside [0, 1]`,
      symbol,
    );
  }

  const precisionScore = readNumber(raw, "precision_score", symbol);
  if (precisionScore < 0 || precisionScore > 1) {
    throw new AnalysisUnavailableError(
      `Oracle precision_score for ${symbol} is outside [0, 1]`,
      symbol,
    );
  }

  const price = readNumber(raw, "price", symbol);
  if (price <= 0) {
    throw new AnalysisUnavailableError(
      `Oracle price for ${symbol} is not positive`,
      symbol,
    );
  }

  return {
    symbol: raw.symbol,
    price,
    confidence,
    expectedReturn: readNumber(raw, "expected_return", symbol),
    volatility: readNumber(raw, "volatility", symbol),
    momentum: readNumber(raw, "momentum", symbol),
    liquidity: readNumber(raw, "liquidity", symbol),
    precisionScore,
    recommendation,
    timestamp: readNumber(raw, "timestamp", symbol),
  };
}

// ============================================================================
// Subprocess oracle
// ============================================================================

export type ExecFn = (
  file: string,
  args: string[],
  options: { timeout: number },
) => Promise<{ stdout: string }>;

const defaultExec: ExecFn = async (file, args, options) => {
  const { stdout } = await execFileAsync(file, args, {
    timeout: options.timeout,
    encoding: "utf8",
  });
  return { stdout };
};

export type SubprocessEvaluatorOptions = {
  command: string;
  /** Arguments placed before the symbol and strategy label */
  args: string[];
  timeoutMs: number;
  exec?: ExecFn;
};

export const DEFAULT_ORACLE_OPTIONS: Readonly<
  Omit<SubprocessEvaluatorOptions, "exec">
> = {
  command: "market-analysis",
  args: [],
  timeoutMs: 5000,
};

/**
 * Runs the external analysis oracle once per candidate:
 *   <command> ...args <symbol> <strategyLabel>
 */
export class SubprocessEvaluator implements Evaluator {
  private readonly options: SubprocessEvaluatorOptions;
  private readonly exec: ExecFn;

  constructor(options: Partial<SubprocessEvaluatorOptions> = {}) {
    this.options = { ...DEFAULT_ORACLE_OPTIONS, ...options };
    this.exec = options.exec ?? defaultExec;
  }

  async evaluate(symbol: string, strategyLabel: string): Promise<AnalysisResult> {
    const { command, args, timeoutMs } = this.options;

    let stdout: string;
    try {
      ({ stdout } = await this.exec(command, [...args, symbol, strategyLabel], {
        timeout: timeoutMs,
      }));
    } catch (err) {
      // spawn failure, non-zero exit and timeout all land here
      throw new AnalysisUnavailableError(
        `Oracle failed for ${symbol}/${strategyLabel}: ${toError(err).message}`,
        symbol,
        toError(err),
      );
    }

    return parseAnalysisOutput(stdout, symbol);
  }
}

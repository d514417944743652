/**
 * Kraken private REST client
 *
 * Form-encoded POST bodies, JSON responses. Every request carries a fresh
 * nonce and API-Sign header; a non-empty `error` array is a terminal
 * rejection, while socket errors and non-2xx statuses are retried.
 */

import axios, { type AxiosInstance } from "axios";
import {
  ExchangeRejectedError,
  InvalidSizeError,
  TransportError,
} from "../../errors/app.errors";
import type { Logger } from "../../utils/logger.util";
import {
  RateLimiter,
  withRateLimitAndRetry,
  type RetryConfig,
} from "./rate-limit";
import { NonceSource, type RequestSigner } from "./signer";
import type { ExchangeClient, OrderFillStatus, OrderSide } from "./types";

export const KRAKEN_API_URL = "https://api.kraken.com";
const DEFAULT_TIMEOUT_MS = 10000;
const VOLUME_DECIMALS = 8;

export type KrakenClientOptions = {
  signer: RequestSigner;
  logger: Logger;
  baseUrl?: string;
  timeoutMs?: number;
  /** Pre-built axios instance (tests inject one with an in-process adapter) */
  http?: AxiosInstance;
  nonces?: NonceSource;
  limiter?: RateLimiter;
  retry?: Partial<RetryConfig>;
  sleep?: (ms: number) => Promise<void>;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parsePositive = (raw: unknown): number | undefined => {
  if (typeof raw !== "string" && typeof raw !== "number") return undefined;
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
};

export class KrakenClient implements ExchangeClient {
  private readonly http: AxiosInstance;
  private readonly signer: RequestSigner;
  private readonly logger: Logger;
  private readonly nonces: NonceSource;
  private readonly limiter: RateLimiter;
  private readonly retry: Partial<RetryConfig>;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(options: KrakenClientOptions) {
    this.signer = options.signer;
    this.logger = options.logger;
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl ?? KRAKEN_API_URL,
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      });
    this.nonces = options.nonces ?? new NonceSource();
    this.limiter = options.limiter ?? new RateLimiter();
    this.retry = options.retry ?? {};
    this.sleep = options.sleep;
  }

  // ==================== ORDERS ====================

  async placeOrder(
    pair: string,
    side: OrderSide,
    notionalUsd: number,
    referencePrice: number,
  ): Promise<string> {
    if (
      !Number.isFinite(notionalUsd) ||
      !Number.isFinite(referencePrice) ||
      notionalUsd <= 0 ||
      referencePrice <= 0
    ) {
      throw new InvalidSizeError(
        `Invalid order size: notional=${notionalUsd} price=${referencePrice}`,
        notionalUsd,
        referencePrice,
      );
    }

    const volume = notionalUsd / referencePrice;
    return this.addMarketOrder(pair, side, volume);
  }

  async placeExit(pair: string, volume: number): Promise<string> {
    if (!Number.isFinite(volume) || volume <= 0) {
      throw new InvalidSizeError(`Invalid exit volume: ${volume}`, 0, 0);
    }
    return this.addMarketOrder(pair, "sell", volume);
  }

  async queryOrder(orderId: string): Promise<OrderFillStatus> {
    const result = await this.privateRequest("QueryOrders", { txid: orderId });
    const info = isRecord(result) ? result[orderId] : undefined;

    if (!isRecord(info)) {
      return { orderId, found: false };
    }

    return {
      orderId,
      found: true,
      status: typeof info.status === "string" ? info.status : undefined,
      volumeExecuted: parsePositive(info.vol_exec),
      averagePrice: parsePositive(info.price),
    };
  }

  async cancelOrder(orderId: string): Promise<void> {
    await this.privateRequest("CancelOrder", { txid: orderId });
    this.logger.info(`[KRAKEN] Cancelled order ${orderId}`);
  }

  private async addMarketOrder(
    pair: string,
    side: OrderSide,
    volume: number,
  ): Promise<string> {
    const result = await this.privateRequest("AddOrder", {
      pair,
      type: side,
      ordertype: "market",
      volume: volume.toFixed(VOLUME_DECIMALS),
    });

    const txid = isRecord(result) ? result.txid : undefined;
    const orderId = Array.isArray(txid) ? txid[0] : undefined;
    if (typeof orderId !== "string" || orderId.length === 0) {
      throw new ExchangeRejectedError(
        "Unexpected AddOrder response: missing txid",
        "AddOrder",
      );
    }

    this.logger.debug(
      `[KRAKEN] ${side.toUpperCase()} ${pair} vol=${volume.toFixed(VOLUME_DECIMALS)} txid=${orderId}`,
    );
    return orderId;
  }

  // ==================== TRANSPORT ====================

  /**
   * Signed POST to /0/private/<endpoint>; resolves with the `result` field
   */
  private async privateRequest(
    endpoint: string,
    params: Record<string, string>,
  ): Promise<unknown> {
    const path = `/0/private/${endpoint}`;

    const attempt = async (): Promise<unknown> => {
      const nonce = this.nonces.next();
      const body = new URLSearchParams({
        ...params,
        nonce: String(nonce),
      }).toString();

      let data: unknown;
      try {
        const response = await this.http.post<unknown>(path, body, {
          headers: {
            ...this.signer.buildAuthHeaders(path, nonce, body),
            "Content-Type": "application/x-www-form-urlencoded; charset=utf-8",
          },
        });
        data = response.data;
      } catch (err) {
        throw this.toTransportError(endpoint, err);
      }

      return this.unwrap(endpoint, data);
    };

    return withRateLimitAndRetry(attempt, this.limiter, this.retry, {
      sleep: this.sleep,
      onRetry: (n, error, delayMs) => {
        this.logger.warn(
          `[KRAKEN] ${endpoint} attempt ${n} failed (${error.message}); retrying in ${delayMs}ms`,
        );
      },
    });
  }

  private unwrap(endpoint: string, data: unknown): unknown {
    if (!isRecord(data)) {
      throw new TransportError(
        `Malformed ${endpoint} response body`,
        endpoint,
      );
    }

    const errors = data.error;
    if (Array.isArray(errors) && errors.length > 0) {
      const messages = errors.map(String);
      throw new ExchangeRejectedError(
        `Kraken ${endpoint} rejected: ${messages.join(", ")}`,
        endpoint,
        messages,
      );
    }

    return data.result;
  }

  private toTransportError(endpoint: string, err: unknown): TransportError {
    if (axios.isAxiosError(err)) {
      const status = err.response?.status;
      const detail = status ? `HTTP ${status}` : (err.code ?? err.message);
      return new TransportError(
        `Kraken ${endpoint} request failed: ${detail}`,
        endpoint,
        status,
        err,
      );
    }
    const cause = err instanceof Error ? err : undefined;
    return new TransportError(
      `Kraken ${endpoint} request failed: ${String(err)}`,
      endpoint,
      undefined,
      cause,
    );
  }
}

/**
 * Kraken-style private API request signing
 *
 * API-Sign = base64( HMAC-SHA512( base64decode(secret), path + SHA256(nonce + postData) ) )
 *
 * The nonce is part of the signed body and must strictly increase per API key.
 */

import crypto from "node:crypto";
import { ConfigurationError } from "../../errors/app.errors";

const STRICT_BASE64 =
  /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Normalize base64url characters to standard base64 ('-' -> '+', '_' -> '/')
 */
export function normalizeBase64Secret(secret: string): string {
  return secret.replace(/-/g, "+").replace(/_/g, "/");
}

/**
 * Decode the account secret into MAC key bytes.
 * @throws ConfigurationError when the secret is empty or not valid base64
 */
export function decodeSecret(secret: string | undefined): Buffer {
  if (!secret) {
    throw new ConfigurationError(
      "KRAKEN_API_SECRET is empty or undefined",
      "KRAKEN_API_SECRET",
    );
  }

  const normalized = normalizeBase64Secret(secret.trim());
  if (!STRICT_BASE64.test(normalized)) {
    throw new ConfigurationError(
      "KRAKEN_API_SECRET is not valid base64",
      "KRAKEN_API_SECRET",
    );
  }

  return Buffer.from(normalized, "base64");
}

/**
 * Strictly increasing millisecond nonce.
 * Two calls within the same millisecond still get distinct values.
 */
export class NonceSource {
  private last = 0;

  constructor(private readonly now: () => number = Date.now) {}

  next(): number {
    const candidate = this.now();
    this.last = candidate > this.last ? candidate : this.last + 1;
    return this.last;
  }
}

export type AuthHeaders = {
  "API-Key": string;
  "API-Sign": string;
};

export class RequestSigner {
  private readonly key: Buffer;

  constructor(
    private readonly apiKey: string,
    apiSecret: string,
  ) {
    if (!apiKey) {
      throw new ConfigurationError(
        "KRAKEN_API_KEY is empty or undefined",
        "KRAKEN_API_KEY",
      );
    }
    this.key = decodeSecret(apiSecret);
  }

  sign(path: string, nonce: number, postData: string): string {
    const digest = crypto
      .createHash("sha256")
      .update(`${nonce}${postData}`)
      .digest();

    return crypto
      .createHmac("sha512", this.key)
      .update(Buffer.concat([Buffer.from(path), digest]))
      .digest("base64");
  }

  buildAuthHeaders(path: string, nonce: number, postData: string): AuthHeaders {
    return {
      "API-Key": this.apiKey,
      "API-Sign": this.sign(path, nonce, postData),
    };
  }
}

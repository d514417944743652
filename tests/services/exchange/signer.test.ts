/**
 * Tests for private API request signing
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import crypto from "node:crypto";
import {
  NonceSource,
  RequestSigner,
  decodeSecret,
  normalizeBase64Secret,
} from "../../../src/services/exchange/signer";
import { ConfigurationError } from "../../../src/errors/app.errors";

const TEST_KEY = "test-key";
// base64("test-secret")
const TEST_SECRET = Buffer.from("test-secret").toString("base64");

/**
 * Reference signature built straight from the documented formula
 */
function referenceSignature(secretB64: string, path: string, nonce: number, body: string): string {
  const inner = crypto.createHash("sha256").update(String(nonce) + body).digest();
  const mac = crypto.createHmac("sha512", Buffer.from(secretB64, "base64"));
  mac.update(path);
  mac.update(inner);
  return mac.digest("base64");
}

describe("RequestSigner", () => {
  const path = "/0/private/AddOrder";
  const nonce = 1700000000000;
  const body = `pair=ETHUSD&type=buy&ordertype=market&volume=0.00833333&nonce=${nonce}`;

  it("matches the reference HMAC-SHA512 construction", () => {
    const signer = new RequestSigner(TEST_KEY, TEST_SECRET);
    assert.equal(signer.sign(path, nonce, body), referenceSignature(TEST_SECRET, path, nonce, body));
  });

  it("is deterministic for identical inputs", () => {
    const signer = new RequestSigner(TEST_KEY, TEST_SECRET);
    assert.equal(signer.sign(path, nonce, body), signer.sign(path, nonce, body));
  });

  it("produces a 64-byte base64 MAC", () => {
    const signer = new RequestSigner(TEST_KEY, TEST_SECRET);
    assert.equal(Buffer.from(signer.sign(path, nonce, body), "base64").length, 64);
  });

  it("changes when any input changes", () => {
    const signer = new RequestSigner(TEST_KEY, TEST_SECRET);
    const base = signer.sign(path, nonce, body);
    assert.notEqual(signer.sign("/0/private/QueryOrders", nonce, body), base);
    assert.notEqual(signer.sign(path, nonce + 1, body), base);
    assert.notEqual(signer.sign(path, nonce, `${body}&x=1`), base);
  });

  it("gives 10k distinct random requests 10k distinct, stable signatures", () => {
    const signer = new RequestSigner(TEST_KEY, TEST_SECRET);
    const paths = ["/0/private/AddOrder", "/0/private/QueryOrders", "/0/private/CancelOrder"];
    const signatures = new Set<string>();

    for (let i = 0; i < 10_000; i++) {
      const p = paths[crypto.randomInt(paths.length)];
      const n = nonce + crypto.randomInt(1_000_000_000);
      const b = `userref=${i}&volume=${crypto.randomBytes(6).toString("hex")}&nonce=${n}`;
      const signature = signer.sign(p, n, b);
      assert.equal(signer.sign(p, n, b), signature);
      signatures.add(signature);
    }

    assert.equal(signatures.size, 10_000);
  });

  it("builds API-Key and API-Sign headers", () => {
    const signer = new RequestSigner(TEST_KEY, TEST_SECRET);
    const headers = signer.buildAuthHeaders(path, nonce, body);
    assert.deepEqual(headers, {
      "API-Key": TEST_KEY,
      "API-Sign": referenceSignature(TEST_SECRET, path, nonce, body),
    });
  });

  it("rejects an empty API key", () => {
    assert.throws(() => new RequestSigner("", TEST_SECRET), ConfigurationError);
  });

  it("rejects a malformed secret without echoing it", () => {
    const badSecret = "not*base64!";
    assert.throws(
      () => new RequestSigner(TEST_KEY, badSecret),
      (err: unknown) => {
        assert.ok(err instanceof ConfigurationError);
        assert.equal(err.setting, "KRAKEN_API_SECRET");
        assert.ok(!err.message.includes(badSecret));
        return true;
      },
    );
  });
});

describe("decodeSecret", () => {
  it("accepts base64url characters", () => {
    const raw = Buffer.from([0xfb, 0xff, 0xfe]);
    const urlSafe = raw.toString("base64").replace(/\+/g, "-").replace(/\//g, "_");
    assert.deepEqual(decodeSecret(urlSafe), raw);
  });

  it("rejects an empty secret", () => {
    assert.throws(() => decodeSecret(""), ConfigurationError);
    assert.throws(() => decodeSecret(undefined), ConfigurationError);
  });

  it("rejects a secret with bad padding", () => {
    assert.throws(() => decodeSecret("abc"), ConfigurationError);
  });

  it("normalizes '-' and '_'", () => {
    assert.equal(normalizeBase64Secret("a-b_c"), "a+b/c");
  });
});

describe("NonceSource", () => {
  it("uses the clock when it advances", () => {
    let t = 1000;
    const nonces = new NonceSource(() => t);
    assert.equal(nonces.next(), 1000);
    t = 1005;
    assert.equal(nonces.next(), 1005);
  });

  it("bumps by one when the clock stands still or goes back", () => {
    let t = 1000;
    const nonces = new NonceSource(() => t);
    assert.equal(nonces.next(), 1000);
    assert.equal(nonces.next(), 1001);
    t = 900;
    assert.equal(nonces.next(), 1002);
  });

  it("never repeats across 10k rapid calls", () => {
    const nonces = new NonceSource();
    const seen = new Set<number>();
    let last = 0;
    for (let i = 0; i < 10_000; i++) {
      const n = nonces.next();
      assert.ok(n > last);
      seen.add(n);
      last = n;
    }
    assert.equal(seen.size, 10_000);
  });
});

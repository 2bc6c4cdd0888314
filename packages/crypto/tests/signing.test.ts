/**
 * Tests for canonical serialization, hashing and signatures.
 */

import { describe, it, expect } from "vitest";
import { canonicalBytes, hashValue, sign, verifySignature } from "../src/signing.js";
import { generateKeyPair } from "../src/keys.js";

describe("canonicalBytes", () => {
  it("sorts object keys", () => {
    expect(canonicalBytes({ b: 1, a: [true, null] }).toString("utf8")).toBe(
      '{"a":[true,null],"b":1}',
    );
  });

  it("is independent of insertion order", () => {
    const x = canonicalBytes({ color: 0, amount: 5 });
    const y = canonicalBytes({ amount: 5, color: 0 });
    expect(x.equals(y)).toBe(true);
  });
});

describe("hashValue", () => {
  it("produces a SHA-256 hex digest", () => {
    // SHA-256 of the two bytes "{}"
    expect(hashValue({})).toBe(
      "44136fa355b3678a1146ad16f7e8649e94fb4fc21fe77e8310c060f61caaff8a",
    );
  });

  it("is deterministic across key order", () => {
    expect(hashValue({ a: 1, b: 2 })).toBe(hashValue({ b: 2, a: 1 }));
  });

  it("differs for different values", () => {
    expect(hashValue({ a: 1 })).not.toBe(hashValue({ a: 2 }));
  });
});

describe("sign / verifySignature", () => {
  const alice = generateKeyPair();
  const bob = generateKeyPair();

  it("verifies a signature made with the matching key", () => {
    const value = { periodId: 4, note: "close" };
    const signature = sign(alice.secretKey, value);
    expect(signature).toMatch(/^[0-9a-f]{128}$/);
    expect(verifySignature(alice.publicKey, value, signature)).toBe(true);
  });

  it("rejects a signature checked against another key", () => {
    const signature = sign(alice.secretKey, [1, 2, 3]);
    expect(verifySignature(bob.publicKey, [1, 2, 3], signature)).toBe(false);
  });

  it("rejects a signature over a different value", () => {
    const signature = sign(alice.secretKey, { amount: 10 });
    expect(verifySignature(alice.publicKey, { amount: 11 }, signature)).toBe(false);
  });

  it("accepts the same value with reordered keys", () => {
    const signature = sign(alice.secretKey, { a: 1, b: 2 });
    expect(verifySignature(alice.publicKey, { b: 2, a: 1 }, signature)).toBe(true);
  });

  it("returns false for malformed signatures and keys", () => {
    const signature = sign(alice.secretKey, "x");
    expect(verifySignature(alice.publicKey, "x", "deadbeef")).toBe(false);
    expect(verifySignature("not-a-key", "x", signature)).toBe(false);
    expect(verifySignature(alice.publicKey.toUpperCase(), "x", signature)).toBe(false);
  });
});

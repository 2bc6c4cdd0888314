/**
 * Either and AddrId key helpers for @mintwire/types
 */
import { describe, it, expect } from "vitest";
import { left, right, isLeft, isRight, assertNever } from "../src/either.js";
import type { Either } from "../src/either.js";
import { addrIdKey } from "../src/ledger.js";

describe("Either", () => {
  it("builds left values", () => {
    const e: Either<string, number> = left("double spent");
    expect(e).toEqual({ kind: "left", value: "double spent" });
    expect(isLeft(e)).toBe(true);
    expect(isRight(e)).toBe(false);
  });

  it("builds right values", () => {
    const e: Either<string, number> = right(7);
    expect(e).toEqual({ kind: "right", value: 7 });
    expect(isRight(e)).toBe(true);
    expect(isLeft(e)).toBe(false);
  });

  it("narrows on isLeft", () => {
    const e: Either<string, number> = left("nope");
    if (isLeft(e)) {
      expect(e.value.toUpperCase()).toBe("NOPE");
    } else {
      expect.unreachable();
    }
  });
});

describe("assertNever", () => {
  it("throws with the unhandled value", () => {
    expect(() => assertNever({ kind: "mystery" } as never)).toThrow(
      'Unhandled variant: {"kind":"mystery"}',
    );
  });
});

describe("addrIdKey", () => {
  it("joins transaction id and output index", () => {
    expect(
      addrIdKey({ txId: "ab01", index: 3, coin: { color: 0, amount: 10 } }),
    ).toBe("ab01:3");
  });

  it("ignores the coin", () => {
    const a = addrIdKey({ txId: "ab01", index: 0, coin: { color: 0, amount: 10 } });
    const b = addrIdKey({ txId: "ab01", index: 0, coin: { color: 1, amount: 99 } });
    expect(a).toBe(b);
  });
});

/**
 * Tests for the LedgerClient facade and its HTTP wiring.
 */

import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import { ZodError } from "zod";
import { LedgerClient, createLedgerClient } from "../src/client.js";
import { BankClient } from "../src/clients/bank.js";
import { ExplorerClient } from "../src/clients/explorer.js";
import { MintetteClient } from "../src/clients/mintette.js";
import { NotaryClient } from "../src/clients/notary.js";
import { bankKeys, notaryKeys, setup, signedRight } from "./helpers/fixtures.js";

const env = {
  BANK_HOST: "bank.test",
  BANK_PUBLIC_KEY: bankKeys.publicKey,
  NOTARY_PUBLIC_KEY: notaryKeys.publicKey,
};

describe("LedgerClient", () => {
  it("groups the role clients", () => {
    const client = new LedgerClient(setup().ctx);

    expect(client.bank).toBeInstanceOf(BankClient);
    expect(client.mintette).toBeInstanceOf(MintetteClient);
    expect(client.notary).toBeInstanceOf(NotaryClient);
    expect(client.explorer).toBeInstanceOf(ExplorerClient);
  });
});

describe("createLedgerClient", () => {
  it("calls the configured bank over HTTP and verifies its signature", async () => {
    const fetchFn = vi.fn(
      async (_url: string, _init: RequestInit) =>
        new Response(JSON.stringify({ result: signedRight(bankKeys.secretKey, 3) }), {
          status: 200,
        }),
    );
    const client = createLedgerClient(env, { fetchFn, logger: pino({ level: "silent" }) });

    const result = await client.bank.getBlockchainHeight();

    expect(result).toEqual({ ok: true, value: 3 });
    expect(fetchFn.mock.calls[0]?.[0]).toBe("http://bank.test:8123/rpc");
  });

  it("rejects an environment without authority keys", () => {
    expect(() => createLedgerClient({ BANK_HOST: "bank.test" })).toThrow(ZodError);
  });
});

/**
 * Notary Client Tests
 *
 * Verifies:
 * - Notary-signed read methods and bad_signature("notary")
 * - Request parameters of allocation, publication and removal
 * - Bank-signed period announcements
 */

import { describe, it, expect } from "vitest";
import { verifyWithSignature } from "@mintwire/crypto";
import { left, right } from "@mintwire/types";
import { NotaryClient } from "../src/clients/notary.js";
import { SignedEnvelopeSchema } from "../src/schemas.js";
import {
  ALICE,
  BOB,
  LEVEL,
  SIG,
  bankKeys,
  block,
  node,
  notaryKeys,
  setup,
  signedRight,
  tx,
} from "./helpers/fixtures.js";

// =============================================================================
// Signed Reads
// =============================================================================

describe("NotaryClient signed reads", () => {
  it("returns the verified notary period", async () => {
    const { transport, ctx, entries } = setup();
    transport.reply("notary", "getNotaryPeriod", signedRight(notaryKeys.secretKey, 8));

    const result = await new NotaryClient(ctx).getNotaryPeriod();

    expect(result).toEqual({ ok: true, value: 8 });
    expect(transport.calls[0]?.endpoint).toEqual(node.notaryEndpoint);
    expect(entries).toContainEqual({ level: LEVEL.debug, msg: "Notary's last period is 8" });
  });

  it("rejects an answer signed by the bank", async () => {
    const { transport, ctx, entries } = setup();
    transport.reply("notary", "getNotaryPeriod", signedRight(bankKeys.secretKey, 8));

    const result = await new NotaryClient(ctx).getNotaryPeriod();

    expect(result).toEqual({ ok: false, error: { kind: "bad_signature", signer: "notary" } });
    expect(entries).toContainEqual({ level: LEVEL.error, msg: "notary has provided a bad signature" });
  });

  it("returns collected signatures for a transaction", async () => {
    const { transport, ctx } = setup();
    const signatures = [{ address: ALICE, signature: SIG }];
    transport.reply("notary", "getSignatures", signedRight(notaryKeys.secretKey, signatures));

    const result = await new NotaryClient(ctx).getTxSignatures(tx, BOB);

    expect(result).toEqual({ ok: true, value: signatures });
    expect(transport.calls[0]?.params).toEqual([tx, BOB]);
  });

  it("polls pending transactions", async () => {
    const { transport, ctx } = setup();
    transport.reply("notary", "pollPendingTransactions", signedRight(notaryKeys.secretKey, [tx]));

    const result = await new NotaryClient(ctx).pollPendingTransactions([ALICE, BOB]);

    expect(result).toEqual({ ok: true, value: [tx] });
    expect(transport.calls[0]?.params).toEqual([[ALICE, BOB]]);
  });

  it("publishes a signature and returns all collected so far", async () => {
    const { transport, ctx } = setup();
    const mine = { address: ALICE, signature: SIG };
    const all = [mine, { address: BOB, signature: SIG }];
    transport.reply("notary", "publishTransaction", signedRight(notaryKeys.secretKey, all));

    const result = await new NotaryClient(ctx).publishTxToNotary(tx, BOB, mine);

    expect(result).toEqual({ ok: true, value: all });
    expect(transport.calls[0]?.params).toEqual([tx, BOB, mine]);
  });

  it("decodes complete multisignature addresses with normalized strategies", async () => {
    const { transport, ctx } = setup();
    transport.reply(
      "notary",
      "queryCompleteMS",
      signedRight(notaryKeys.secretKey, [
        { address: ALICE, strategy: { kind: "m_of_n", m: 2, addresses: [BOB, ALICE, BOB] } },
      ]),
    );

    const result = await new NotaryClient(ctx).queryNotaryCompleteMSAddresses();

    expect(result).toEqual({
      ok: true,
      value: [{ address: ALICE, strategy: { kind: "m_of_n", m: 2, addresses: [ALICE, BOB] } }],
    });
  });

  it("decodes my pending allocations", async () => {
    const { transport, ctx } = setup();
    const entry = {
      msAddress: BOB,
      info: {
        allocationStrategy: { sigNumber: 1, allParties: [{ kind: "user", address: ALICE }] },
        currentConfirmations: [],
      },
    };
    transport.reply("notary", "queryMyAllocMS", signedRight(notaryKeys.secretKey, [entry]));

    const result = await new NotaryClient(ctx).queryNotaryMyMSAllocations({
      kind: "user",
      address: ALICE,
    });

    expect(result).toEqual({ ok: true, value: [entry] });
  });

  it("rejects an allocation whose sigNumber exceeds its parties", async () => {
    const { transport, ctx } = setup();
    const entry = {
      msAddress: BOB,
      info: {
        allocationStrategy: { sigNumber: 3, allParties: [{ kind: "user", address: ALICE }] },
        currentConfirmations: [],
      },
    };
    transport.reply("notary", "queryMyAllocMS", signedRight(notaryKeys.secretKey, [entry]));

    const result = await new NotaryClient(ctx).queryNotaryMyMSAllocations({
      kind: "user",
      address: ALICE,
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("protocol_error");
    }
  });
});

// =============================================================================
// Requests
// =============================================================================

describe("NotaryClient requests", () => {
  it("allocates a multisignature address without a certificate", async () => {
    const { transport, ctx } = setup();
    transport.reply("notary", "allocateMultisig", right(null));
    const party = { kind: "user", partyAddress: ALICE } as const;
    const strategy = { sigNumber: 1, allParties: [{ kind: "user", address: ALICE }] } as const;

    const result = await new NotaryClient(ctx).allocateMultisignatureAddress(
      BOB,
      party,
      strategy,
      SIG,
      null,
    );

    expect(result).toEqual({ ok: true, value: null });
    expect(transport.calls[0]?.params).toEqual([BOB, party, strategy, SIG, null]);
  });

  it("surfaces a refused allocation as a method error", async () => {
    const { transport, ctx } = setup();
    transport.reply("notary", "allocateMultisig", left("party already confirmed"));

    const result = await new NotaryClient(ctx).allocateMultisignatureAddress(
      BOB,
      { kind: "trust", partyAddress: ALICE, hotTrustKey: BOB },
      { sigNumber: 1, allParties: [{ kind: "trust", address: ALICE }] },
      SIG,
      { masterKey: BOB, signature: SIG },
    );

    expect(result).toEqual({
      ok: false,
      error: { kind: "method_error", message: "Error on caller side has occurred: party already confirmed" },
    });
  });

  it("announces new periods signed with the bank key", async () => {
    const { transport, ctx } = setup();
    transport.reply("notary", "announceNewPeriodsToNotary", right(null));

    const result = await new NotaryClient(ctx).announceNewPeriodsToNotary(bankKeys.secretKey, 4, [
      block,
    ]);

    expect(result).toEqual({ ok: true, value: null });
    const envelope = SignedEnvelopeSchema.parse(transport.calls[0]?.params[0]);
    expect(envelope.value).toEqual({ periodId: 4, blocks: [block] });
    expect(
      verifyWithSignature(bankKeys.publicKey, { value: envelope.value, signature: envelope.signature }),
    ).toBe(true);
  });

  it("removes complete addresses with the caller's signature", async () => {
    const { transport, ctx } = setup();
    transport.reply("notary", "removeCompleteMS", right(null));

    const result = await new NotaryClient(ctx).removeNotaryCompleteMSAddresses([ALICE], SIG);

    expect(result).toEqual({ ok: true, value: null });
    expect(transport.calls[0]?.params).toEqual([[ALICE], SIG]);
  });
});

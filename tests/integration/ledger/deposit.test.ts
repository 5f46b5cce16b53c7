import { beforeEach, describe, expect, it } from "vitest";
import { LedgerEngine } from "../../../src/ledger/engine";
import { assertAccount, assertRejected } from "../../helpers/assertions";
import { deposit } from "../../helpers/factories";
import { verifyConservation } from "../../helpers/god-check";

let engine: LedgerEngine;

beforeEach(() => {
  engine = new LedgerEngine();
});

describe("deposit", () => {
  it("credits available and total on a new account", () => {
    const result = engine.apply(deposit(1, 1, 10));

    expect(result).toEqual({ ok: true });
    assertAccount(engine, 1, { available: "10.0000", held: "0.0000", total: "10.0000", locked: false });
    verifyConservation(engine);
  });

  it("records a clean history entry", () => {
    engine.apply(deposit(1, 1, 10));

    expect(engine.history.get(1)).toEqual({
      txId: 1,
      clientId: 1,
      amount: 100000n,
      kind: "deposit",
      disputeState: "clean",
    });
  });

  it("multiple deposits with different tx ids accumulate", () => {
    engine.apply(deposit(1, 1, 3));
    engine.apply(deposit(1, 2, 2));

    assertAccount(engine, 1, { available: "5.0000", held: "0.0000", total: "5.0000", locked: false });
  });

  it("deposits for different clients stay separate", () => {
    engine.apply(deposit(1, 3, 3));
    engine.apply(deposit(2, 4, 2));

    assertAccount(engine, 1, { available: "3.0000", held: "0.0000", total: "3.0000", locked: false });
    assertAccount(engine, 2, { available: "2.0000", held: "0.0000", total: "2.0000", locked: false });
  });

  it("fractional amounts keep four decimals exactly", () => {
    engine.apply(deposit(1, 1, 0.0001));
    engine.apply(deposit(1, 2, 1.9999));

    assertAccount(engine, 1, { available: "2.0000", held: "0.0000", total: "2.0000", locked: false });
  });

  it("a zero deposit is accepted and opens the account", () => {
    expect(engine.apply(deposit(7, 1, 0)).ok).toBe(true);
    assertAccount(engine, 7, { available: "0.0000", held: "0.0000", total: "0.0000", locked: false });
  });
});

describe("deposit — duplicate transaction ids", () => {
  it("a repeated tx id is rejected and the first deposit stands", () => {
    engine.apply(deposit(1, 1, 10));
    const result = engine.apply(deposit(1, 1, 5));

    assertRejected(result, "duplicate_transaction");
    assertAccount(engine, 1, { available: "10.0000", held: "0.0000", total: "10.0000", locked: false });
    expect(engine.history.get(1)?.amount).toBe(100000n);
  });

  it("a tx id taken by another client is rejected without opening an account", () => {
    engine.apply(deposit(1, 1, 10));
    const result = engine.apply(deposit(2, 1, 5));

    assertRejected(result, "duplicate_transaction");
    expect(engine.finalize().map((s) => s.clientId)).toEqual([1]);
  });

  it("rejection details name the transaction and client", () => {
    engine.apply(deposit(1, 9, 1));
    const result = engine.apply(deposit(3, 9, 1));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.details).toEqual({ tx_id: 9, client_id: 3 });
    }
  });
});

import { describe, expect, it } from "vitest";
import { LedgerEngine } from "../../../src/ledger/engine";
import { AmountOverflowError } from "../../../src/shared/errors";
import { MAX_AMOUNT } from "../../../src/shared/money";
import { assertAccount } from "../../helpers/assertions";

describe("fixed-precision overflow", () => {
  it("is thrown, not returned as a rejection", () => {
    const engine = new LedgerEngine();
    engine.apply({ kind: "deposit", clientId: 1, txId: 1, amount: MAX_AMOUNT });

    expect(() => engine.apply({ kind: "deposit", clientId: 1, txId: 2, amount: 1n })).toThrow(
      AmountOverflowError,
    );
  });

  it("leaves the account and history untouched", () => {
    const engine = new LedgerEngine();
    engine.apply({ kind: "deposit", clientId: 1, txId: 1, amount: MAX_AMOUNT });

    expect(() => engine.apply({ kind: "deposit", clientId: 1, txId: 2, amount: 1n })).toThrow();

    assertAccount(engine, 1, {
      available: "922337203685477.5807",
      held: "0.0000",
      total: "922337203685477.5807",
      locked: false,
    });
    expect(engine.history.has(2)).toBe(false);
  });

  it("does not reach the rejection sink", () => {
    const sink: string[] = [];
    const engine = new LedgerEngine({ onRejected: (_record, error) => sink.push(error.type) });
    engine.apply({ kind: "deposit", clientId: 1, txId: 1, amount: MAX_AMOUNT });

    expect(() => engine.apply({ kind: "deposit", clientId: 1, txId: 2, amount: 1n })).toThrow();
    expect(sink).toEqual([]);
  });
});

import {
  AccountLockedError,
  type ApplyError,
  DuplicateTransactionError,
  InsufficientFundsError,
  InvalidStateError,
  UnknownTransactionError,
} from "../shared/errors";
import { addAmounts, formatAmount, subtractAmounts } from "../shared/money";
import { nextDisputeState } from "./dispute-lifecycle";
import { AccountStore, HistoryIndex } from "./store";
import type {
  Account,
  AccountSnapshot,
  ApplyResult,
  DisputeAction,
  FundsMovement,
  LedgerSummary,
  TransactionRecord,
} from "./types";

export type RejectionSink = (record: TransactionRecord, error: ApplyError) => void;

export interface LedgerEngineOptions {
  store?: AccountStore;
  history?: HistoryIndex;
  /** Allow disputes against withdrawal history entries. Off by default. */
  disputeWithdrawals?: boolean;
  /** Called once for every rejected record. */
  onRejected?: RejectionSink;
}

type BalanceChange = { ok: true; available: bigint; held: bigint; total: bigint };

const OK: ApplyResult = { ok: true };

function reject(error: ApplyError): ApplyResult {
  return { ok: false, error };
}

function isFundsMovement(record: TransactionRecord): record is FundsMovement {
  return record.kind === "deposit" || record.kind === "withdrawal";
}

/**
 * Applies transaction records to the account store, one at a time.
 *
 * `apply` is synchronous and never yields, so each call is atomic with
 * respect to any other caller on the event loop. Rejections are returned,
 * never thrown; the only exception that escapes is AmountOverflowError, and
 * it is raised before any state is written.
 */
export class LedgerEngine {
  readonly store: AccountStore;
  readonly history: HistoryIndex;
  private readonly disputeWithdrawals: boolean;
  private readonly onRejected?: RejectionSink;

  private seen = 0;
  private accepted = 0;
  private readonly rejectedByType: LedgerSummary["rejectedByType"] = {};

  constructor(options: LedgerEngineOptions = {}) {
    this.store = options.store ?? new AccountStore();
    this.history = options.history ?? new HistoryIndex();
    this.disputeWithdrawals = options.disputeWithdrawals ?? false;
    this.onRejected = options.onRejected;
  }

  apply(record: TransactionRecord): ApplyResult {
    const result = isFundsMovement(record)
      ? this.applyFundsMovement(record)
      : this.applyDisputeAction(record);

    this.seen++;
    if (result.ok) {
      this.accepted++;
    } else {
      const type = result.error.type;
      this.rejectedByType[type] = (this.rejectedByType[type] ?? 0) + 1;
      this.onRejected?.(record, result.error);
    }
    return result;
  }

  /** Final state of every client seen, ascending by client id. */
  finalize(): AccountSnapshot[] {
    return this.store.list().map((account) => ({
      clientId: account.clientId,
      available: formatAmount(account.available),
      held: formatAmount(account.held),
      total: formatAmount(account.total),
      locked: account.locked,
    }));
  }

  summary(): LedgerSummary {
    const rejected = Object.values(this.rejectedByType).reduce((a: number, b) => a + (b ?? 0), 0);
    return {
      seen: this.seen,
      accepted: this.accepted,
      rejected,
      rejectedByType: { ...this.rejectedByType },
    };
  }

  private applyFundsMovement(record: FundsMovement): ApplyResult {
    const { kind, clientId, txId, amount } = record;

    if (this.history.has(txId)) {
      return reject(new DuplicateTransactionError(txId, clientId));
    }

    const existing = this.store.get(clientId);
    if (existing?.locked) {
      return reject(new AccountLockedError(clientId, txId));
    }

    const available = existing?.available ?? 0n;
    const total = existing?.total ?? 0n;
    let nextAvailable: bigint;
    let nextTotal: bigint;

    if (kind === "deposit") {
      nextAvailable = addAmounts(available, amount);
      nextTotal = addAmounts(total, amount);
    } else {
      if (amount > available) {
        return reject(
          new InsufficientFundsError(
            `Withdrawal ${txId} of ${formatAmount(amount)} ` +
              `exceeds available ${formatAmount(available)}`,
            {
              tx_id: txId,
              client_id: clientId,
              requested: formatAmount(amount),
              available: formatAmount(available),
            },
          ),
        );
      }
      nextAvailable = subtractAmounts(available, amount);
      nextTotal = subtractAmounts(total, amount);
    }

    const account = existing ?? this.store.getOrCreate(clientId);
    account.available = nextAvailable;
    account.total = nextTotal;
    this.history.insert({ txId, clientId, amount, kind, disputeState: "clean" });
    return OK;
  }

  private applyDisputeAction(record: DisputeAction): ApplyResult {
    const { kind, clientId, txId } = record;

    const entry = this.history.getForClient(txId, clientId);
    const account = this.store.get(clientId);
    if (!entry || !account) {
      return reject(new UnknownTransactionError(txId, clientId));
    }

    const nextState = nextDisputeState(entry.disputeState, kind);
    if (!nextState) {
      return reject(new InvalidStateError(txId, entry.disputeState, kind));
    }
    if (kind === "dispute" && entry.kind === "withdrawal" && !this.disputeWithdrawals) {
      return reject(
        new InvalidStateError(txId, entry.disputeState, kind, "withdrawals are not disputable"),
      );
    }

    if (account.locked) {
      return reject(new AccountLockedError(clientId, txId));
    }

    const changes = this.disputeChanges(kind, account, entry.amount, txId);
    if (!changes.ok) return changes;

    account.available = changes.available;
    account.held = changes.held;
    account.total = changes.total;
    if (kind === "chargeback") account.locked = true;
    entry.disputeState = nextState;
    return OK;
  }

  private disputeChanges(
    kind: DisputeAction["kind"],
    account: Account,
    amount: bigint,
    txId: number,
  ): BalanceChange | { ok: false; error: ApplyError } {
    const { available, held, total } = account;

    switch (kind) {
      case "dispute":
        if (amount > available) {
          return {
            ok: false,
            error: new InsufficientFundsError(
              `Dispute of transaction ${txId} needs ${formatAmount(amount)} ` +
                `but only ${formatAmount(available)} is available`,
              {
                tx_id: txId,
                client_id: account.clientId,
                requested: formatAmount(amount),
                available: formatAmount(available),
              },
            ),
          };
        }
        return {
          ok: true,
          available: subtractAmounts(available, amount),
          held: addAmounts(held, amount),
          total,
        };
      case "resolve":
        return {
          ok: true,
          available: addAmounts(available, amount),
          held: subtractAmounts(held, amount),
          total,
        };
      case "chargeback":
        return {
          ok: true,
          available,
          held: subtractAmounts(held, amount),
          total: subtractAmounts(total, amount),
        };
    }
  }
}

import type { ApplyError } from "../shared/errors";
import type { DisputeState } from "./dispute-lifecycle";

export type FundsMovementKind = "deposit" | "withdrawal";
export type DisputeActionKind = "dispute" | "resolve" | "chargeback";

export interface FundsMovement {
  kind: FundsMovementKind;
  clientId: number;
  txId: number;
  amount: bigint;
}

export interface DisputeAction {
  kind: DisputeActionKind;
  clientId: number;
  txId: number;
}

export type TransactionRecord = FundsMovement | DisputeAction;

export interface Account {
  clientId: number;
  available: bigint;
  held: bigint;
  total: bigint;
  locked: boolean;
}

export interface HistoryEntry {
  txId: number;
  clientId: number;
  amount: bigint;
  kind: FundsMovementKind;
  disputeState: DisputeState;
}

export type ApplyResult = { ok: true } | { ok: false; error: ApplyError };

/** One report row. Amounts rendered with 4 decimals. */
export interface AccountSnapshot {
  clientId: number;
  available: string;
  held: string;
  total: string;
  locked: boolean;
}

export interface LedgerSummary {
  seen: number;
  accepted: number;
  rejected: number;
  rejectedByType: Partial<Record<ApplyError["type"], number>>;
}

import type { Account, HistoryEntry } from "./types";

/**
 * Per-client account state. Owned by a single LedgerEngine; nothing else
 * mutates the accounts it hands out.
 */
export class AccountStore {
  private readonly accounts = new Map<number, Account>();

  get(clientId: number): Account | undefined {
    return this.accounts.get(clientId);
  }

  /** Account for `clientId`, created with zero balances on first reference. */
  getOrCreate(clientId: number): Account {
    let account = this.accounts.get(clientId);
    if (!account) {
      account = { clientId, available: 0n, held: 0n, total: 0n, locked: false };
      this.accounts.set(clientId, account);
    }
    return account;
  }

  get size(): number {
    return this.accounts.size;
  }

  /** Accounts ordered by ascending client id. */
  list(): Account[] {
    return [...this.accounts.values()].sort((a, b) => a.clientId - b.clientId);
  }
}

/** Append-only index of accepted deposits and withdrawals, keyed by transaction id. */
export class HistoryIndex {
  private readonly entries = new Map<number, HistoryEntry>();

  has(txId: number): boolean {
    return this.entries.has(txId);
  }

  get(txId: number): HistoryEntry | undefined {
    return this.entries.get(txId);
  }

  /** Entry for `txId` only when it belongs to `clientId`. */
  getForClient(txId: number, clientId: number): HistoryEntry | undefined {
    const entry = this.entries.get(txId);
    return entry?.clientId === clientId ? entry : undefined;
  }

  insert(entry: HistoryEntry): void {
    if (this.entries.has(entry.txId)) {
      throw new Error(`History entry ${entry.txId} already exists`);
    }
    this.entries.set(entry.txId, entry);
  }

  get size(): number {
    return this.entries.size;
  }
}

export class AppError extends Error {
  readonly type: string;
  readonly details?: Record<string, unknown>;

  constructor(type: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "AppError";
    this.type = type;
    this.details = details;
  }

  toJSON() {
    return {
      error: {
        type: this.type,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
      },
    };
  }
}

export class DuplicateTransactionError extends AppError {
  readonly type = "duplicate_transaction";

  constructor(txId: number, clientId: number) {
    super("duplicate_transaction", `Transaction ${txId} has already been recorded`, {
      tx_id: txId,
      client_id: clientId,
    });
    this.name = "DuplicateTransactionError";
  }
}

export class AccountLockedError extends AppError {
  readonly type = "account_locked";

  constructor(clientId: number, txId: number) {
    super("account_locked", `Account ${clientId} is locked`, {
      client_id: clientId,
      tx_id: txId,
    });
    this.name = "AccountLockedError";
  }
}

export class InsufficientFundsError extends AppError {
  readonly type = "insufficient_funds";

  constructor(message: string, details?: Record<string, unknown>) {
    super("insufficient_funds", message, details);
    this.name = "InsufficientFundsError";
  }
}

export class UnknownTransactionError extends AppError {
  readonly type = "unknown_transaction";

  constructor(txId: number, clientId: number) {
    super("unknown_transaction", `Transaction ${txId} not found for client ${clientId}`, {
      tx_id: txId,
      client_id: clientId,
    });
    this.name = "UnknownTransactionError";
  }
}

export class InvalidStateError extends AppError {
  readonly type = "invalid_state";

  constructor(txId: number, currentState: string, attemptedAction: string, reason?: string) {
    super(
      "invalid_state",
      `Cannot ${attemptedAction} transaction ${txId} in state '${currentState}'` +
        (reason ? `: ${reason}` : ""),
      {
        tx_id: txId,
        current_state: currentState,
        attempted_action: attemptedAction,
        ...(reason ? { reason } : {}),
      },
    );
    this.name = "InvalidStateError";
  }
}

export class MalformedRecordError extends AppError {
  readonly type = "malformed_record";

  constructor(line: number, message: string, details?: Record<string, unknown>) {
    super("malformed_record", `Line ${line}: ${message}`, { line, ...details });
    this.name = "MalformedRecordError";
  }
}

/** Fixed-precision arithmetic left the representable range. Fatal: never returned from apply. */
export class AmountOverflowError extends AppError {
  readonly type = "amount_overflow";

  constructor(operation: string, a: bigint, b: bigint) {
    super("amount_overflow", `Amount overflow in ${operation}: ${a}, ${b}`, {
      operation,
      left: a.toString(),
      right: b.toString(),
    });
    this.name = "AmountOverflowError";
  }
}

export type ApplyError =
  | DuplicateTransactionError
  | AccountLockedError
  | InsufficientFundsError
  | UnknownTransactionError
  | InvalidStateError;

/** Fields for a log entry describing `error`. Keeps `message` free for the log line itself. */
export function errorLogFields(error: unknown): Record<string, unknown> {
  if (error instanceof AppError) {
    return {
      error_type: error.type,
      error: error.message,
      ...(error.details ? { details: error.details } : {}),
    };
  }
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
}

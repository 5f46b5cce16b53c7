import type { ParsedLine } from "./io/csv-reader";
import { PartitionedDispatcher } from "./dispatch/partitioned-dispatcher";
import { LedgerEngine } from "./ledger/engine";
import type { AccountSnapshot, LedgerSummary, TransactionRecord } from "./ledger/types";
import { config } from "./shared/config";
import { errorLogFields } from "./shared/errors";
import { generateId } from "./shared/id";
import { type Logger, logger as rootLogger } from "./shared/logger";

export type RejectionPolicy = "log" | "silent";

export interface ProcessOptions {
  partitions?: number;
  queueCapacity?: number;
  disputeWithdrawals?: boolean;
  rejectionPolicy?: RejectionPolicy;
  logger?: Logger;
}

export interface RunSummary extends LedgerSummary {
  runId: string;
  malformed: number;
}

export interface ProcessResult {
  report: AccountSnapshot[];
  summary: RunSummary;
}

/**
 * Feed parsed lines through the partitioned dispatcher into a ledger engine
 * and return the final report. Malformed lines are reported and skipped;
 * rejected records are counted and, unless the policy is silent, logged.
 * An AmountOverflowError from the engine rejects the returned promise.
 */
export async function processTransactions(
  lines: AsyncIterable<ParsedLine> | Iterable<ParsedLine>,
  options: ProcessOptions = {},
): Promise<ProcessResult> {
  const runId = generateId("run");
  const log = (options.logger ?? rootLogger).child({ run_id: runId });
  const policy = options.rejectionPolicy ?? config.REJECTION_POLICY;
  const partitions = options.partitions ?? config.WORKER_PARTITIONS;

  const engine = new LedgerEngine({
    disputeWithdrawals: options.disputeWithdrawals ?? config.DISPUTE_WITHDRAWALS,
    onRejected:
      policy === "log"
        ? (record, error) =>
            log.warn({ kind: record.kind, ...errorLogFields(error) }, "Transaction rejected")
        : undefined,
  });

  const dispatcher = new PartitionedDispatcher<TransactionRecord>({
    partitions,
    capacity: options.queueCapacity ?? config.QUEUE_CAPACITY,
    partitionKey: (record) => record.clientId,
    handler: (record) => {
      engine.apply(record);
    },
    logger: log,
  });

  log.info({ partitions }, "Processing started");

  let malformed = 0;
  for await (const parsed of lines) {
    if (!parsed.ok) {
      malformed++;
      if (policy === "log") log.warn(errorLogFields(parsed.error), "Malformed record skipped");
      continue;
    }
    await dispatcher.submit(parsed.record);
  }
  await dispatcher.drain();

  const summary: RunSummary = { runId, malformed, ...engine.summary() };
  log.info(
    {
      seen: summary.seen,
      accepted: summary.accepted,
      rejected: summary.rejected,
      rejected_by_type: summary.rejectedByType,
      malformed,
      clients: engine.store.size,
    },
    "Processing finished",
  );

  return { report: engine.finalize(), summary };
}

import { z } from "zod";
import { parseAmount } from "../shared/money";
import type { TransactionRecord } from "../ledger/types";

export const MAX_CLIENT_ID = 65_535;
export const MAX_TX_ID = 4_294_967_295;

const TransactionKindEnum = z.enum(["deposit", "withdrawal", "dispute", "resolve", "chargeback"]);

const unsignedId = (max: number) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, { message: "must be an unsigned integer" })
    .transform(Number)
    .pipe(z.number().int().max(max));

/**
 * One CSV row (header-keyed, all cells still text) into a TransactionRecord.
 * Amounts on dispute, resolve and chargeback rows are ignored.
 */
export const TransactionRowSchema = z
  .object({
    type: z.string().trim().pipe(TransactionKindEnum),
    client: unsignedId(MAX_CLIENT_ID),
    tx: unsignedId(MAX_TX_ID),
    amount: z.string().trim().optional(),
  })
  .transform((row, ctx): TransactionRecord => {
    if (row.type !== "deposit" && row.type !== "withdrawal") {
      return { kind: row.type, clientId: row.client, txId: row.tx };
    }

    if (!row.amount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["amount"],
        message: `${row.type} requires an amount`,
      });
      return z.NEVER;
    }

    const amount = parseAmount(row.amount);
    if (amount === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["amount"],
        message: "must be a non-negative decimal with at most 4 fractional digits",
      });
      return z.NEVER;
    }

    return { kind: row.type, clientId: row.client, txId: row.tx, amount };
  });

export type TransactionRow = z.input<typeof TransactionRowSchema>;

import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import type { ZodError } from "zod";
import type { TransactionRecord } from "../ledger/types";
import { MalformedRecordError } from "../shared/errors";
import { TransactionRowSchema } from "./record-schema";

export type ParsedLine =
  | { ok: true; line: number; record: TransactionRecord }
  | { ok: false; line: number; error: MalformedRecordError };

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    .join("; ");
}

/**
 * Split a CSV line on commas and trim every cell. Double-quoted cells may
 * contain commas, and `""` inside quotes is a literal quote.
 */
export function splitLine(text: string): string[] {
  const cells: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);

    if (inQuotes) {
      if (char === '"') {
        if (text.charAt(i + 1) === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ",") {
      cells.push(current.trim());
      current = "";
    } else {
      current += char;
    }
  }

  cells.push(current.trim());
  return cells;
}

/** Map cells onto header names. Missing trailing cells are left out. */
export function toRow(headers: string[], cells: string[]): Record<string, string> {
  const row: Record<string, string> = {};
  headers.forEach((header, i) => {
    const cell = cells[i];
    if (header && cell !== undefined) row[header] = cell;
  });
  return row;
}

export function parseRow(row: Record<string, string>, line: number): ParsedLine {
  const result = TransactionRowSchema.safeParse(row);
  if (result.success) {
    return { ok: true, line, record: result.data };
  }
  return {
    ok: false,
    line,
    error: new MalformedRecordError(line, describeIssues(result.error), { row }),
  };
}

/**
 * Lazily parse transaction records from a CSV stream with a
 * `type, client, tx, amount` header. Blank lines are skipped; every other
 * line yields either a record or a MalformedRecordError. Line numbers are
 * 1-based and count the header.
 */
export async function* readTransactions(input: Readable): AsyncGenerator<ParsedLine> {
  const lines = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY });

  let headers: string[] | null = null;
  let lineNumber = 0;

  try {
    for await (const text of lines) {
      lineNumber++;
      if (text.trim().length === 0) continue;

      const cells = splitLine(text);
      if (!headers) {
        headers = cells.map((cell) => cell.toLowerCase());
        continue;
      }

      yield parseRow(toRow(headers, cells), lineNumber);
    }
  } finally {
    lines.close();
    input.destroy();
  }
}

export function readTransactionsFromFile(path: string): AsyncGenerator<ParsedLine> {
  return readTransactions(createReadStream(path, { encoding: "utf8" }));
}

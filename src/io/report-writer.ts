import type { Writable } from "node:stream";
import type { AccountSnapshot } from "../ledger/types";

export const REPORT_HEADER = "client,available,held,total,locked";

export function formatReportRow(snapshot: AccountSnapshot): string {
  return [
    snapshot.clientId,
    snapshot.available,
    snapshot.held,
    snapshot.total,
    snapshot.locked ? "true" : "false",
  ].join(",");
}

/** Whole report as CSV text, header first, newline-terminated. */
export function formatReport(snapshots: AccountSnapshot[]): string {
  return [REPORT_HEADER, ...snapshots.map(formatReportRow)].map((line) => `${line}\n`).join("");
}

export function writeReport(snapshots: AccountSnapshot[], output: Writable): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(formatReport(snapshots), (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

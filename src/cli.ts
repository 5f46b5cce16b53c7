#!/usr/bin/env tsx
import { realpathSync } from "node:fs";
import { access } from "node:fs/promises";
import type { Writable } from "node:stream";
import { pathToFileURL } from "node:url";
import { Command, InvalidArgumentError } from "commander";
import { z } from "zod";
import { readTransactionsFromFile } from "./io/csv-reader";
import { writeReport } from "./io/report-writer";
import { processTransactions } from "./processor";
import { config } from "./shared/config";
import { errorLogFields } from "./shared/errors";
import { type Logger, logger as rootLogger } from "./shared/logger";

interface CliOptions {
  partitions?: number;
  queueCapacity?: number;
  silent?: boolean;
  disputeWithdrawals?: boolean;
}

function positiveInt(max: number) {
  const schema = z.coerce.number().int().min(1).max(max);
  return (value: string): number => {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new InvalidArgumentError(`Expected an integer between 1 and ${max}.`);
    }
    return result.data;
  };
}

export function createProgram(stdout: Writable, log: Logger = rootLogger): Command {
  return new Command()
    .name("client-ledger")
    .description("Apply a CSV stream of client transactions and print the final account balances")
    .version(config.APP_VERSION, "-v, --version")
    .configureOutput({
      writeOut: (text) => stdout.write(text),
      writeErr: (text) => log.error({ error: text.trim() }, "Invalid command line"),
    })
    .argument("<file>", "CSV file with type, client, tx, amount columns")
    .option("-p, --partitions <count>", "number of client partitions", positiveInt(64))
    .option("-q, --queue-capacity <count>", "bound of each partition queue", positiveInt(100_000))
    .option("-s, --silent", "do not log rejected or malformed records")
    .option("--dispute-withdrawals", "allow disputes against withdrawals")
    .action(async (file: string, options: CliOptions) => {
      await access(file);
      const { report } = await processTransactions(readTransactionsFromFile(file), {
        partitions: options.partitions,
        queueCapacity: options.queueCapacity,
        rejectionPolicy: options.silent ? "silent" : undefined,
        disputeWithdrawals: options.disputeWithdrawals,
        logger: log,
      });
      await writeReport(report, stdout);
    });
}

/** Run the CLI and resolve with the process exit code. */
export async function runCli(
  argv: string[],
  stdout: Writable = process.stdout,
  log: Logger = rootLogger,
): Promise<number> {
  const program = createProgram(stdout, log).exitOverride();

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof Error && "code" in error && typeof error.code === "string") {
      if (error.code === "commander.helpDisplayed" || error.code === "commander.version") return 0;
      if (error.code.startsWith("commander.")) return 1;
    }
    log.fatal(errorLogFields(error), "Run aborted");
    return 1;
  }
}

/** True when `scriptPath` (argv[1]) resolves to the module at `moduleUrl`, following symlinks. */
export function isEntryPoint(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath) return false;
  return moduleUrl === pathToFileURL(realpathSync(scriptPath)).href;
}

if (isEntryPoint(import.meta.url, process.argv[1])) {
  runCli(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      rootLogger.fatal(errorLogFields(err), "Unexpected failure");
      process.exitCode = 1;
    },
  );
}

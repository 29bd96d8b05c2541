/**
 * @tally/cli — Command-line application.
 *
 * Wires reader → processor → writer:
 *   tally <transactions.csv> > accounts.csv
 *
 * stdout carries only the CSV report; diagnostics go to the logger
 * (stderr) and usage errors to stderr.
 */

import { open } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import type { Writable } from "node:stream";
import chalk from "chalk";
import type { DestinationStream, Logger } from "pino";
import { ZodError } from "zod";
import type { TransactionEvent } from "@tally/types";
import { Processor, computeLedgerTotals, formatMoney } from "@tally/ledger";
import type { ProcessResult } from "@tally/ledger";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { createLogger, logRejection } from "./logger.js";
import { readTransactions } from "./reader.js";
import { CliError, EXIT_CODES } from "./types.js";
import { writeAccounts } from "./writer.js";

export const USAGE = "Usage: tally <transactions.csv>";

/**
 * Process streams and environment the CLI runs against.
 */
export interface CliIo {
  readonly stdout: Writable;
  readonly stderr: Writable;
  readonly env: Record<string, string | undefined>;
  /** Log sink override; defaults to stderr. */
  readonly logDestination?: DestinationStream | undefined;
}

function readConfig(env: Record<string, string | undefined>): AppConfig {
  try {
    return loadConfig(env);
  } catch (err: unknown) {
    if (err instanceof ZodError) {
      const detail = err.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new CliError("INVALID_CONFIG", `Invalid configuration: ${detail}`, { cause: err });
    }
    throw err;
  }
}

async function openInput(path: string): Promise<FileHandle> {
  try {
    return await open(path, "r");
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CliError("INPUT_UNREADABLE", `Failed to open input file: ${reason}`, { cause: err });
  }
}

/**
 * Yield well-formed events; log and count malformed rows.
 */
async function* validEvents(
  lines: AsyncIterable<string>,
  logger: Logger,
  malformed: { count: number },
): AsyncGenerator<TransactionEvent> {
  for await (const row of readTransactions(lines)) {
    if (row.ok) {
      yield row.event;
    } else {
      malformed.count++;
      logger.warn({ line: row.line, error: row.error }, "Skipping malformed row");
    }
  }
}

/**
 * Feed every line of the file through the processor, then close it.
 */
async function processFile(
  handle: FileHandle,
  processor: Processor,
  logger: Logger,
  malformed: { count: number },
): Promise<ProcessResult> {
  try {
    return await processor.processAsync(validEvents(handle.readLines(), logger, malformed));
  } finally {
    await handle.close();
  }
}

/**
 * Run the CLI. Resolves with the process exit code.
 */
export async function runCli(args: readonly string[], io: CliIo): Promise<number> {
  try {
    const config = readConfig(io.env);
    const logger = createLogger(config, io.logDestination);

    const inputPath = args[0];
    if (inputPath === undefined || inputPath === "") {
      throw new CliError("MISSING_ARGUMENT", "missing input csv path");
    }

    const handle = await openInput(inputPath);
    const malformed = { count: 0 };
    const processor = new Processor({
      lockPolicy: config.LOCKED_ACCOUNT_POLICY,
      onRejection: (rejection) => logRejection(logger, rejection),
    });

    const result = await processFile(handle, processor, logger, malformed);

    await writeAccounts(io.stdout, result.accounts);

    const totals = computeLedgerTotals(result.accounts);
    logger.info(
      {
        ...result.stats,
        malformed: malformed.count,
        accounts: totals.accountCount,
        locked: totals.lockedCount,
        total: formatMoney(totals.total),
      },
      "Run complete",
    );

    return EXIT_CODES.OK;
  } catch (err: unknown) {
    if (!(err instanceof CliError)) {
      throw err;
    }

    io.stderr.write(`${chalk.red("error:")} ${err.message}\n`);
    if (err.code === "MISSING_ARGUMENT") {
      io.stderr.write(`${USAGE}\n`);
    }
    return EXIT_CODES[err.code];
  }
}

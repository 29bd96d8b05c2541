/**
 * @tally/cli — CSV transaction reader.
 *
 * Turns `type,client,tx,amount` rows into TransactionEvents.
 * Malformed rows are reported, never passed to the ledger.
 *
 * Format rules:
 * - The first non-blank line is the header and is skipped
 * - Whitespace around every field is ignored
 * - `type` is case-insensitive
 * - The amount column may be absent for dispute/resolve/chargeback
 * - deposit/withdrawal amounts must be non-negative decimals
 */

import { z } from "zod";
import type { ZodError } from "zod";
import type { Money, TransactionEvent } from "@tally/types";
import { MAX_CLIENT_ID, MAX_TRANSACTION_ID } from "@tally/types";
import { LedgerError, isNegative, parseMoney } from "@tally/ledger";

// =============================================================================
// Types
// =============================================================================

/** One input line, parsed. */
export type ParsedRow =
  | { readonly ok: true; readonly line: number; readonly event: TransactionEvent }
  | { readonly ok: false; readonly line: number; readonly error: string };

/** Column order of the input file. */
export const INPUT_COLUMNS = ["type", "client", "tx", "amount"] as const;

// =============================================================================
// Schema
// =============================================================================

function idField(max: number) {
  return z
    .string()
    .regex(/^\d+$/, "must be a non-negative integer")
    .transform(Number)
    .pipe(z.number().int().max(max, `must be at most ${String(max)}`));
}

export const TransactionRowSchema = z.object({
  type: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(["deposit", "withdrawal", "dispute", "resolve", "chargeback"])),
  client: idField(MAX_CLIENT_ID),
  tx: idField(MAX_TRANSACTION_ID),
  amount: z.string().optional(),
});

export type TransactionRow = z.infer<typeof TransactionRowSchema>;

function formatZodErrors(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
}

// =============================================================================
// Row → Event
// =============================================================================

function toEvent(row: TransactionRow): TransactionEvent | string {
  const { client, tx } = row;

  switch (row.type) {
    case "dispute":
    case "resolve":
    case "chargeback":
      return { kind: row.type, client, tx };
    case "deposit":
    case "withdrawal": {
      if (row.amount === undefined || row.amount === "") {
        return `${row.type} missing amount for client ${String(client)} tx ${String(tx)}`;
      }

      let amount: Money;
      try {
        amount = parseMoney(row.amount);
      } catch (err: unknown) {
        if (err instanceof LedgerError) {
          return `amount: ${err.message}`;
        }
        throw err;
      }

      if (isNegative(amount)) {
        return `amount: must not be negative, got "${row.amount}"`;
      }
      return { kind: row.type, client, tx, amount };
    }
  }
}

/**
 * Parse one CSV data line.
 */
export function parseTransactionRow(text: string, line: number): ParsedRow {
  const fields = text.split(",").map((field) => field.trim());

  if (fields.length < 3 || fields.length > INPUT_COLUMNS.length) {
    return {
      ok: false,
      line,
      error: `expected 3 or 4 fields, got ${String(fields.length)}`,
    };
  }

  const result = TransactionRowSchema.safeParse({
    type: fields[0],
    client: fields[1],
    tx: fields[2],
    amount: fields[3],
  });
  if (!result.success) {
    return { ok: false, line, error: formatZodErrors(result.error) };
  }

  const event = toEvent(result.data);
  if (typeof event === "string") {
    return { ok: false, line, error: event };
  }
  return { ok: true, line, event };
}

/**
 * Parse a stream of lines, skipping the header and blank lines.
 * Line numbers are 1-based and count the header.
 */
export async function* readTransactions(
  lines: AsyncIterable<string>,
): AsyncGenerator<ParsedRow> {
  let line = 0;
  let sawHeader = false;

  for await (const text of lines) {
    line++;
    if (text.trim() === "") {
      continue;
    }
    if (!sawHeader) {
      sawHeader = true;
      continue;
    }
    yield parseTransactionRow(text, line);
  }
}

/**
 * @tally/cli — CSV account report writer.
 *
 * Header: `client,available,held,total,locked`. Rows follow the order
 * they are given in (the ledger yields client id ascending). Money is
 * rendered with exactly four fractional digits.
 */

import type { Writable } from "node:stream";
import type { AccountSnapshot } from "@tally/ledger";
import { formatMoney } from "@tally/ledger";

/** Column order of the report. */
export const OUTPUT_COLUMNS = ["client", "available", "held", "total", "locked"] as const;

/**
 * Render one snapshot as a CSV row (no trailing newline).
 */
export function formatAccountRow(snapshot: AccountSnapshot): string {
  return [
    String(snapshot.clientId),
    formatMoney(snapshot.available),
    formatMoney(snapshot.held),
    formatMoney(snapshot.total),
    String(snapshot.locked),
  ].join(",");
}

/**
 * Render the full report, header included, `\n`-terminated.
 */
export function formatAccountsCsv(snapshots: readonly AccountSnapshot[]): string {
  const lines = [OUTPUT_COLUMNS.join(","), ...snapshots.map(formatAccountRow)];
  return `${lines.join("\n")}\n`;
}

/**
 * Write the report to a stream, resolving once it has been handed off.
 */
export function writeAccounts(
  stream: Writable,
  snapshots: readonly AccountSnapshot[],
): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(formatAccountsCsv(snapshots), (err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}

/**
 * @tally/cli — Boundary collaborators for the ledger.
 *
 * - CSV reader (input rows → TransactionEvents)
 * - CSV writer (AccountSnapshots → report)
 * - Configuration, logging and the `tally` command
 */

export { runCli, USAGE } from "./app.js";
export type { CliIo } from "./app.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger, logRejection } from "./logger.js";
export {
  parseTransactionRow,
  readTransactions,
  TransactionRowSchema,
  INPUT_COLUMNS,
} from "./reader.js";
export type { ParsedRow, TransactionRow } from "./reader.js";
export {
  formatAccountRow,
  formatAccountsCsv,
  writeAccounts,
  OUTPUT_COLUMNS,
} from "./writer.js";
export { CliError, EXIT_CODES } from "./types.js";
export type { CliErrorCode } from "./types.js";

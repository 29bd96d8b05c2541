/**
 * @tally/cli — Error types.
 */

/** Error codes for command-line failures. */
export type CliErrorCode = "MISSING_ARGUMENT" | "INVALID_CONFIG" | "INPUT_UNREADABLE";

/**
 * Structured error from the command-line layer.
 */
export class CliError extends Error {
  public readonly code: CliErrorCode;

  constructor(code: CliErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CliError";
    this.code = code;
  }
}

/** Process exit codes. */
export const EXIT_CODES: Readonly<Record<CliErrorCode | "OK", number>> = {
  OK: 0,
  INPUT_UNREADABLE: 1,
  MISSING_ARGUMENT: 2,
  INVALID_CONFIG: 78,
} as const;

/**
 * @tally/cli — Structured logging.
 *
 * pino writes JSON lines to stderr so stdout carries only the report.
 * Development runs pretty-print through pino-pretty.
 */

import { destination as pinoDestination, pino } from "pino";
import type { DestinationStream, Logger } from "pino";
import type { Rejection } from "@tally/ledger";
import type { AppConfig } from "./config.js";

/**
 * Create the process logger.
 *
 * Pass `destination` to capture output (tests); otherwise logs go to fd 2.
 */
export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: DestinationStream,
): Logger {
  if (destination !== undefined) {
    return pino({ level: config.LOG_LEVEL }, destination);
  }

  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }

  return pino({ level: config.LOG_LEVEL }, pinoDestination(2));
}

/**
 * Log a rejected event: structural failures at error, business
 * no-ops at debug.
 */
export function logRejection(logger: Logger, rejection: Rejection): void {
  const context = {
    index: rejection.index,
    kind: rejection.kind,
    client: rejection.client,
    tx: rejection.tx,
  };

  if (rejection.outcome.status === "failed") {
    logger.error(
      { ...context, code: rejection.outcome.code },
      `Event rejected: ${rejection.outcome.message}`,
    );
  } else {
    logger.debug(
      { ...context, reason: rejection.outcome.reason },
      "Event ignored",
    );
  }
}

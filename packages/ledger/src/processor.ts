/**
 * @tally/ledger — Event processor.
 *
 * Routes each TransactionEvent to its handler after applying the
 * locked-account admission rule. Events are applied strictly in
 * input order; one failed event never stops the run.
 *
 * Outcomes:
 * - applied: the handler changed the ledger
 * - ignored: a business no-op (locked account, insufficient funds,
 *   unknown or ineligible transaction); state is unchanged
 * - failed: a structural LedgerError (duplicate id, overflow);
 *   state is unchanged
 */

import type { TransactionEvent } from "@tally/types";
import { handleChargeback, handleDispute, handleResolve } from "./handlers/dispute.js";
import { handleDeposit, handleWithdrawal } from "./handlers/funds.js";
import { Ledger } from "./ledger.js";
import type {
  EventOutcome,
  HandlerResult,
  LockPolicy,
  ProcessorOptions,
  ProcessResult,
  Rejection,
} from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Stateless router from events to handlers.
 * The Ledger it acts on is passed in on every call.
 */
export class Processor {
  private readonly _lockPolicy: LockPolicy;
  private readonly _onRejection: ((rejection: Rejection) => void) | undefined;

  constructor(options?: ProcessorOptions) {
    this._lockPolicy = options?.lockPolicy ?? "freeze-all";
    this._onRejection = options?.onRejection;
  }

  get lockPolicy(): LockPolicy {
    return this._lockPolicy;
  }

  /**
   * Apply one event to the ledger.
   *
   * LedgerErrors are converted to a `failed` outcome; anything else
   * is a programming fault and propagates.
   */
  apply(ledger: Ledger, event: TransactionEvent): EventOutcome {
    const account = ledger.getOrCreateAccount(event.client);
    if (account.locked && !this._admitsLocked(event)) {
      return { status: "ignored", reason: "ACCOUNT_LOCKED" };
    }

    try {
      return this._dispatch(ledger, event);
    } catch (err: unknown) {
      if (err instanceof LedgerError) {
        return { status: "failed", code: err.code, message: err.message };
      }
      throw err;
    }
  }

  /**
   * Apply every event in order and report the final account state.
   */
  process(events: Iterable<TransactionEvent>, ledger: Ledger = new Ledger()): ProcessResult {
    const run = new ProcessRun(this, ledger, this._onRejection);
    for (const event of events) {
      run.step(event);
    }
    return run.finish();
  }

  /**
   * Same as process(), for events produced asynchronously (e.g. read
   * line by line from a file). Each event is fully applied before the
   * next one is pulled.
   */
  async processAsync(
    events: AsyncIterable<TransactionEvent>,
    ledger: Ledger = new Ledger(),
  ): Promise<ProcessResult> {
    const run = new ProcessRun(this, ledger, this._onRejection);
    for await (const event of events) {
      run.step(event);
    }
    return run.finish();
  }

  private _admitsLocked(event: TransactionEvent): boolean {
    switch (this._lockPolicy) {
      case "freeze-all":
        return false;
      case "allow-dispute-lifecycle":
        return event.kind !== "deposit" && event.kind !== "withdrawal";
    }
  }

  private _dispatch(ledger: Ledger, event: TransactionEvent): HandlerResult {
    switch (event.kind) {
      case "deposit":
        return handleDeposit(ledger, event);
      case "withdrawal":
        return handleWithdrawal(ledger, event);
      case "dispute":
        return handleDispute(ledger, event);
      case "resolve":
        return handleResolve(ledger, event);
      case "chargeback":
        return handleChargeback(ledger, event);
    }
  }
}

/**
 * Counters and rejections for a single process() call.
 */
class ProcessRun {
  private readonly _rejections: Rejection[] = [];
  private _received = 0;
  private _applied = 0;
  private _ignored = 0;
  private _failed = 0;

  constructor(
    private readonly _processor: Processor,
    private readonly _ledger: Ledger,
    private readonly _onRejection: ((rejection: Rejection) => void) | undefined,
  ) {}

  step(event: TransactionEvent): void {
    const index = this._received++;
    const outcome = this._processor.apply(this._ledger, event);

    if (outcome.status === "applied") {
      this._applied++;
      return;
    }

    if (outcome.status === "ignored") {
      this._ignored++;
    } else {
      this._failed++;
    }

    const rejection: Rejection = {
      index,
      kind: event.kind,
      client: event.client,
      tx: event.tx,
      outcome,
    };
    this._rejections.push(rejection);
    this._onRejection?.(rejection);
  }

  finish(): ProcessResult {
    return {
      accounts: this._ledger.snapshots(),
      rejections: [...this._rejections],
      stats: {
        received: this._received,
        applied: this._applied,
        ignored: this._ignored,
        failed: this._failed,
      },
    };
  }
}

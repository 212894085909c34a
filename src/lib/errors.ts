/**
 * Error taxonomy for the collection pipeline.
 *
 * Only `SystemicBlock` and `CheckpointCorruption` abort a run. The others are
 * recovered where they occur and surface as structured log lines.
 */

export type FetchFailureReason =
  | "network"
  | "timeout"
  | "http_status"
  | "malformed_response";

export class FetchError extends Error {
  readonly date: string;
  readonly reason: FetchFailureReason;
  readonly attempts: number;
  readonly status: number | null;

  constructor(
    date: string,
    reason: FetchFailureReason,
    attempts: number,
    message: string,
    status: number | null = null,
  ) {
    super(message);
    this.name = "FetchError";
    this.date = date;
    this.reason = reason;
    this.attempts = attempts;
    this.status = status;
  }
}

export type ParseRejectReason = "missing_title" | "missing_gross" | "invalid_gross";

/** Row-level rejection; the row is dropped and the rest of the page is kept. */
export class ParseError extends Error {
  readonly reason: ParseRejectReason;
  readonly rowIndex: number;
  readonly title: string | null;

  constructor(reason: ParseRejectReason, rowIndex: number, title: string | null) {
    super(`Row ${rowIndex} dropped: ${reason}`);
    this.name = "ParseError";
    this.reason = reason;
    this.rowIndex = rowIndex;
    this.title = title;
  }
}

/** Circuit breaker tripped: the source is blocking us, not flaking. */
export class SystemicBlock extends Error {
  readonly consecutiveFailures: number;
  readonly threshold: number;
  readonly lastDate: string;

  constructor(consecutiveFailures: number, threshold: number, lastDate: string) {
    super(
      `Halting after ${consecutiveFailures} consecutive failed dates (threshold ${threshold}, last ${lastDate})`,
    );
    this.name = "SystemicBlock";
    this.consecutiveFailures = consecutiveFailures;
    this.threshold = threshold;
    this.lastDate = lastDate;
  }
}

/** Stored checkpoint is unreadable; the operator must pass an explicit resume date. */
export class CheckpointCorruption extends Error {
  readonly detail: string;

  constructor(detail: string) {
    super(`Checkpoint is corrupt: ${detail}. Re-run with an explicit resume date.`);
    this.name = "CheckpointCorruption";
    this.detail = detail;
  }
}

export function isFatalPipelineError(
  err: unknown,
): err is SystemicBlock | CheckpointCorruption {
  return err instanceof SystemicBlock || err instanceof CheckpointCorruption;
}

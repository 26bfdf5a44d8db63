export class SevenTimerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised before any network I/O when request parameters or client options
 * are missing or out of range.
 */
export class ValidationError extends SevenTimerError {
  constructor(
    message: string,
    readonly field: string | null = null
  ) {
    super(message);
  }
}

/**
 * The API answered with a non-success status. The message is the status
 * line, e.g. `503 Service Unavailable`.
 */
export class RequestFailedError extends SevenTimerError {
  constructor(
    readonly status: number,
    readonly statusLine: string,
    readonly url: string
  ) {
    super(statusLine);
  }
}

export type ReportFormat = "json" | "xml";

export class ReportDecodeError extends SevenTimerError {
  constructor(
    readonly format: ReportFormat,
    message: string,
    cause?: unknown
  ) {
    super(`Could not decode ${format} report: ${message}`, { cause });
  }
}

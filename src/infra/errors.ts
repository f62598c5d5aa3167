export type TrackerErrorCode =
  | "INVALID_ADDRESS"
  | "MALFORMED_FRAME"
  | "INCOMPLETE_ATTRIBUTES"
  | "SOCKET_ERROR"
  | "PERSISTENCE_FAILURE"
  | "SCAN_IN_PROGRESS"
  | "NOT_FOUND"
  | "INVALID_CONFIG";

export class TrackerError extends Error {
  readonly code: TrackerErrorCode;

  constructor(code: TrackerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TrackerError";
    this.code = code;
  }

  toJSON(): { code: TrackerErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

export function isTrackerError(err: unknown, code?: TrackerErrorCode): err is TrackerError {
  if (!(err instanceof TrackerError)) {
    return false;
  }
  return code === undefined || err.code === code;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Sync error taxonomy
 *
 * ProviderError, SyncTimeoutError and SyncCancelledError end a run; RecordWriteError is
 * recovered per record; AlreadyRunningError is a rejected trigger.
 */

export class ProviderError extends Error {
  readonly provider: string;
  readonly cursor: number;

  constructor(
    provider: string,
    cursor: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ProviderError";
    this.provider = provider;
    this.cursor = cursor;
  }
}

export class RecordWriteError extends Error {
  readonly externalId: string;

  constructor(externalId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RecordWriteError";
    this.externalId = externalId;
  }
}

export class AlreadyRunningError extends Error {
  readonly runId: string;

  constructor(runId: string) {
    super(`A sync run is already in progress (${runId})`);
    this.name = "AlreadyRunningError";
    this.runId = runId;
  }
}

export class SyncTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Sync run exceeded ${String(timeoutMs)}ms`);
    this.name = "SyncTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class SyncCancelledError extends Error {
  readonly reason: string;

  constructor(reason: string) {
    super(`Sync run cancelled: ${reason}`);
    this.name = "SyncCancelledError";
    this.reason = reason;
  }
}

export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
  }
}

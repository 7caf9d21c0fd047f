export abstract class StoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class JobNotFoundError extends StoreError {
  readonly code = "JOB_NOT_FOUND";

  constructor(readonly jobId: string) {
    super(`No such job: ${jobId}`);
  }
}

export class StoreConnectionError extends StoreError {
  readonly code = "STORE_UNAVAILABLE";
}

export class LeaseLostError extends StoreError {
  readonly code = "LEASE_LOST";

  constructor(readonly jobId: string) {
    super(`Lease for job ${jobId} is no longer held`);
  }
}

/** Recorded on a job whose lease ran out with no attempts left. */
export const LEASE_EXPIRED_ERROR = "Lease expired before the test run finished";

const CONNECTIVITY_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "57P01"]);

export function isConnectivityError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = "code" in error ? error.code : undefined;
  if (typeof code === "string" && (code.startsWith("08") || CONNECTIVITY_CODES.has(code))) {
    return true;
  }
  return /connection terminated/i.test(error.message);
}

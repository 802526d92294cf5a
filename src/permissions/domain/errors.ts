/**
 * Raised when a permission lookup could not be completed. Callers must treat
 * this as "could not check", never as allowed.
 */
export class PermissionLookupError extends Error {
  readonly operation: string;
  readonly reason: unknown;

  constructor(operation: string, reason: unknown) {
    super(
      `Permission lookup failed during ${operation}: ${reason instanceof Error ? reason.message : String(reason)}`,
    );
    this.name = 'PermissionLookupError';
    this.operation = operation;
    this.reason = reason;
    Object.setPrototypeOf(this, PermissionLookupError.prototype);
  }
}

/**
 * Raised when the inbound request was cancelled while a check was running.
 */
export class RequestAbortedError extends Error {
  constructor() {
    super('Request aborted');
    this.name = 'RequestAbortedError';
    Object.setPrototypeOf(this, RequestAbortedError.prototype);
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RequestAbortedError();
  }
}

export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

export class CancellationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CancellationError";
  }
}

export function throwIfCancelled(signal: AbortSignal | undefined, what: string): void {
  if (signal?.aborted) {
    throw new CancellationError(`${what} cancelled`, { cause: signal.reason });
  }
}

/** Replaces whatever a request rejected with by a CancellationError once `signal` has fired. */
export function asCancellation(error: unknown, signal: AbortSignal | undefined, what: string): unknown {
  if (signal?.aborted && !(error instanceof CancellationError)) {
    return new CancellationError(`${what} cancelled`, { cause: signal.reason });
  }
  return error;
}

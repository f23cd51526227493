/**
 * Errors surfaced by a render. Sink failure is the only one.
 */

export class SinkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SinkError';
  }
}

/** Thrown by BoundedSink when a write would exceed its capacity. */
export class SinkOverflowError extends SinkError {
  constructor(
    readonly capacity: number,
    readonly attempted: number,
  ) {
    super(`Sink capacity exceeded: ${String(attempted)} > ${String(capacity)}`);
    this.name = 'SinkOverflowError';
  }
}

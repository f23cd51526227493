/**
 * Output sinks.
 *
 * All sinks are synchronous. A sink signals failure by throwing; the
 * renderer stops at that point.
 */

import { constants as bufferConstants } from 'node:buffer';
import { writeSync } from 'node:fs';
import { getErrorMessage } from '../shared/utils/error.js';
import { SinkError, SinkOverflowError } from './errors.js';
import type { Sink } from './types.js';

/**
 * Growable in-memory sink.
 *
 * Capped at `maxLength` code units (by default the longest string the
 * engine can build), so toString() cannot fail; the write that would
 * pass the cap throws SinkOverflowError.
 */
export class StringSink implements Sink {
  private readonly chunks: string[] = [];
  private size = 0;

  constructor(readonly maxLength: number = bufferConstants.MAX_STRING_LENGTH) {}

  write(chunk: string): void {
    if (chunk === '') return;
    const next = this.size + chunk.length;
    if (next > this.maxLength) {
      throw new SinkOverflowError(this.maxLength, next);
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  get length(): number {
    return this.size;
  }

  toString(): string {
    return this.chunks.join('');
  }

  clear(): void {
    this.chunks.length = 0;
    this.size = 0;
  }
}

/**
 * Fixed-capacity sink, measured in UTF-16 code units.
 *
 * A write that would overflow throws SinkOverflowError and stores
 * nothing of that chunk.
 */
export class BoundedSink implements Sink {
  private buffer = '';

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`BoundedSink capacity must be a non-negative integer, got ${String(capacity)}`);
    }
  }

  write(chunk: string): void {
    const next = this.buffer.length + chunk.length;
    if (next > this.capacity) {
      throw new SinkOverflowError(this.capacity, next);
    }
    this.buffer += chunk;
  }

  get length(): number {
    return this.buffer.length;
  }

  get remaining(): number {
    return this.capacity - this.buffer.length;
  }

  toString(): string {
    return this.buffer;
  }
}

/** Adapts a plain function to the Sink interface. */
export class CallbackSink implements Sink {
  constructor(private readonly onChunk: (chunk: string) => void) {}

  write(chunk: string): void {
    this.onChunk(chunk);
  }
}

/**
 * Writes synchronously to an open file descriptor (e.g. 1 for stdout).
 * I/O errors surface as SinkError with the original error as cause.
 */
export class FileDescriptorSink implements Sink {
  constructor(private readonly fd: number) {}

  write(chunk: string): void {
    if (chunk === '') return;
    try {
      writeSync(this.fd, chunk);
    } catch (err: unknown) {
      throw new SinkError(`Write to fd ${String(this.fd)} failed: ${getErrorMessage(err)}`, { cause: err });
    }
  }
}

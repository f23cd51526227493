/**
 * Writes literal spans and resolved placeholders to a sink, in order.
 */

import { createLogger } from '../shared/utils/debug.js';
import { getErrorMessage } from '../shared/utils/error.js';
import { SinkError } from './errors.js';
import type { FillChar, ResolvedDirective, Sink } from './types.js';
import { layoutArg } from './values.js';

const log = createLogger('renderer');

/** Padding longer than this is written in chunks of this size. */
export const PAD_CHUNK_SIZE = 1024;

const PAD_CHUNKS: Record<FillChar, string> = {
  ' ': ' '.repeat(PAD_CHUNK_SIZE),
  '0': '0'.repeat(PAD_CHUNK_SIZE),
};

export class Renderer {
  constructor(private readonly sink: Sink) {}

  literal(text: string): void {
    this.emit(text);
  }

  /** Unresolved placeholders write nothing. */
  placeholder(directive: ResolvedDirective): void {
    if (!directive.found) return;
    const { sign, fill, padding, body } = layoutArg(directive.value, directive);
    if (padding <= PAD_CHUNK_SIZE) {
      this.emit(`${sign}${PAD_CHUNKS[fill].slice(0, padding)}${body}`);
      return;
    }
    this.emit(sign);
    let left = padding;
    while (left > 0) {
      const size = Math.min(left, PAD_CHUNK_SIZE);
      this.emit(size === PAD_CHUNK_SIZE ? PAD_CHUNKS[fill] : PAD_CHUNKS[fill].slice(0, size));
      left -= size;
    }
    this.emit(body);
  }

  private emit(text: string): void {
    if (text === '') return;
    try {
      this.sink.write(text);
    } catch (err: unknown) {
      log.error('Sink write failed', { error: getErrorMessage(err) });
      if (err instanceof SinkError) throw err;
      throw new SinkError(getErrorMessage(err), { cause: err });
    }
  }
}

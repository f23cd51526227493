/**
 * Single-pass template tokenizer.
 *
 * Walks the template once, left to right, and reports literal spans and
 * closed placeholders to a handler as they are found. Nothing is
 * buffered beyond the field boundaries of the placeholder being read.
 *
 * This module has ZERO dependencies on other runfmt modules.
 */

import type { PlaceholderSpec } from './types.js';

export type TokenizerState = 'literal' | 'position' | 'width' | 'precision';

export interface TokenHandler {
  literal(text: string): void;
  placeholder(spec: PlaceholderSpec): void;
  /** Raw text of a placeholder still open at end of input, starting at its `{`. */
  unterminated(text: string): void;
}

interface FieldRange {
  start: number;
  end: number;
}

function emptyRange(at: number): FieldRange {
  return { start: at, end: at };
}

/**
 * Tokenize `template`, invoking `handler` in template order.
 *
 * Escapes: `{{` and `}}` each produce a single literal brace. A lone
 * `{` at the very end is dropped.
 */
export function tokenize(template: string, handler: TokenHandler): void {
  const length = template.length;
  let state: TokenizerState = 'literal';
  let spanStart = 0;
  let specStart = 0;
  let position = emptyRange(0);
  let width = emptyRange(0);
  let precision = emptyRange(0);
  let i = 0;

  const activeField = (): FieldRange => {
    if (state === 'width') return width;
    if (state === 'precision') return precision;
    return position;
  };

  while (i < length) {
    const ch = template.charAt(i);

    if (state === 'literal') {
      if (ch !== '{' && ch !== '}') {
        i += 1;
        continue;
      }
      if (i > spanStart) handler.literal(template.slice(spanStart, i));
      specStart = i;
      i += 1;
      if (ch === '}') {
        // The next character opens the new span without being inspected.
        spanStart = i;
        i += 1;
        continue;
      }
      spanStart = i;
      if (i >= length) break;
      state = 'position';
      position = emptyRange(i);
      width = emptyRange(i);
      precision = emptyRange(i);
      continue;
    }

    switch (ch) {
      case '}':
        handler.placeholder({
          position: template.slice(position.start, position.end),
          width: template.slice(width.start, width.end),
          precision: template.slice(precision.start, precision.end),
        });
        i += 1;
        spanStart = i;
        state = 'literal';
        break;
      case '{':
        // Abandon the spec; this brace becomes the first literal character.
        spanStart = i;
        i += 1;
        state = 'literal';
        break;
      case ':':
        if (state === 'position') {
          i += 1;
          width = emptyRange(i);
          state = 'width';
        } else {
          i += 1;
          activeField().end = i;
        }
        break;
      case '.':
        if (state === 'width') {
          i += 1;
          precision = emptyRange(i);
          state = 'precision';
        } else {
          i += 1;
          activeField().end = i;
        }
        break;
      default:
        i += 1;
        activeField().end = i;
    }
  }

  if (state !== 'literal') {
    handler.unterminated(template.slice(specStart));
    return;
  }
  if (spanStart < length) handler.literal(template.slice(spanStart));
}

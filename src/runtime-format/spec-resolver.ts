/**
 * Placeholder spec resolution.
 *
 * Turns the raw position/width/precision text of a placeholder into a
 * directive and looks the target value up in the argument list.
 * Malformed fields never throw; they degrade to "no constraint" or
 * "unresolved".
 */

import { createLogger } from '../shared/utils/debug.js';
import type {
  FillChar,
  FormatArg,
  FormatDirective,
  PlaceholderSpec,
  ResolvedDirective,
} from './types.js';

const log = createLogger('spec-resolver');

const UNSIGNED = /^\+?[0-9]+$/;

/**
 * Parse a non-negative decimal integer: ASCII digits with an optional
 * leading `+`. Returns undefined for anything else, including values
 * past Number.MAX_SAFE_INTEGER.
 */
export function parseCount(text: string): number | undefined {
  if (!UNSIGNED.test(text)) return undefined;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Parse the width and precision fields.
 *
 * Zero fill is chosen only when the width parses and starts with `0`.
 */
export function parseDirective(width: string, precision: string): FormatDirective {
  let fill: FillChar = ' ';
  let minWidth: number | undefined;
  if (width !== '') {
    minWidth = parseCount(width);
    if (minWidth === undefined) {
      log.debug('Ignoring unparsable width', { width });
    } else if (width.startsWith('0')) {
      fill = '0';
    }
  }

  let digits: number | undefined;
  if (precision !== '') {
    digits = parseCount(precision);
    if (digits === undefined) {
      log.debug('Ignoring unparsable precision', { precision });
    }
  }

  return { fill, width: minWidth, precision: digits };
}

/**
 * Resolves placeholders against one argument list.
 *
 * Owns the sequential cursor for a single render. Explicit indexes
 * neither read nor move the cursor.
 */
export class SpecResolver {
  private cursor = 0;

  constructor(private readonly args: readonly FormatArg[]) {}

  /** Index the next sequential placeholder will take. */
  get sequentialCursor(): number {
    return this.cursor;
  }

  resolve(spec: PlaceholderSpec): ResolvedDirective {
    const directive = parseDirective(spec.width, spec.precision);
    const index = this.resolveIndex(spec.position);
    if (index === undefined || index >= this.args.length) {
      log.debug('Unresolved placeholder', { position: spec.position, index, argCount: this.args.length });
      return { ...directive, found: false };
    }
    return { ...directive, found: true, value: this.args[index] };
  }

  private resolveIndex(positionText: string): number | undefined {
    const position = positionText.trim();
    if (position === '') {
      const index = this.cursor;
      this.cursor += 1;
      return index;
    }
    return parseCount(position);
  }
}

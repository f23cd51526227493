/**
 * Value-to-text conversion for arguments.
 *
 * Conversion itself is left to the host: String() for most values and
 * Number.prototype.toFixed() for fractional numbers with a precision.
 * This module only decides which one applies and lays out padding.
 */

import type { Displayable, FillChar, FormatArg, FormatDirective } from './types.js';

/** toFixed() rejects digit counts above this. */
const MAX_FIXED_DIGITS = 100;

/**
 * A number pinned to integer or fractional rendering, regardless of
 * whether its current value happens to be integral.
 */
export class NumericValue implements Displayable {
  constructor(
    readonly value: number,
    readonly kind: 'integer' | 'float',
  ) {}

  toDisplay(precision?: number): string {
    if (this.kind === 'integer') return String(Math.trunc(this.value));
    return renderFraction(this.value, precision);
  }
}

/** Render `value` as an integer; precision is ignored. */
export function integer(value: number): NumericValue {
  return new NumericValue(value, 'integer');
}

/** Render `value` as a fractional number; precision fixes the digit count. */
export function float(value: number): NumericValue {
  return new NumericValue(value, 'float');
}

function renderFraction(value: number, precision: number | undefined): string {
  const text = precision === undefined || !Number.isFinite(value)
    ? String(value)
    : value.toFixed(Math.min(precision, MAX_FIXED_DIGITS));
  // String() and toFixed() both drop the sign of negative zero.
  return Object.is(value, -0) ? `-${text}` : text;
}

export function isDisplayable(arg: FormatArg): arg is Displayable {
  return typeof arg === 'object' && arg !== null && typeof arg.toDisplay === 'function';
}

function isNumeric(arg: FormatArg): boolean {
  return typeof arg === 'number' || typeof arg === 'bigint' || arg instanceof NumericValue;
}

/**
 * Native text of an argument with precision applied.
 *
 * Plain numbers with an integral value render as integers; others honor
 * the precision. Negative zero counts as fractional. Strings are cut to
 * `precision` code points. bigint and other primitives ignore it.
 */
export function toText(arg: FormatArg, precision?: number): string {
  if (typeof arg === 'number') {
    return Number.isInteger(arg) && !Object.is(arg, -0) ? String(arg) : renderFraction(arg, precision);
  }
  if (typeof arg === 'string') {
    return precision === undefined ? arg : Array.from(arg).slice(0, precision).join('');
  }
  if (isDisplayable(arg)) return arg.toDisplay(precision);
  return String(arg);
}

function codePointLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Text split around its padding. The padding is a count, not a string,
 * so widths far past the engine's string limit can still be streamed.
 */
export interface PaddedLayout {
  /** Leading sign moved in front of zero fill, or ''. */
  readonly sign: string;
  readonly fill: FillChar;
  readonly padding: number;
  readonly body: string;
}

/**
 * Lay out `text` left-padded to `width` code points with `fill`.
 *
 * With `signAware`, zero fill goes between a leading sign and the digits.
 */
export function layout(text: string, width: number | undefined, fill: FillChar, signAware = false): PaddedLayout {
  const missing = width === undefined ? 0 : width - codePointLength(text);
  if (missing <= 0) return { sign: '', fill, padding: 0, body: text };
  if (fill === '0' && signAware && (text.startsWith('-') || text.startsWith('+'))) {
    return { sign: text.charAt(0), fill, padding: missing, body: text.slice(1) };
  }
  return { sign: '', fill, padding: missing, body: text };
}

function joinLayout(parts: PaddedLayout): string {
  return `${parts.sign}${parts.fill.repeat(parts.padding)}${parts.body}`;
}

/** layout() joined into one string. */
export function pad(text: string, width: number | undefined, fill: FillChar, signAware = false): string {
  return joinLayout(layout(text, width, fill, signAware));
}

/** Layout of one resolved argument: native text, then width. */
export function layoutArg(arg: FormatArg, directive: FormatDirective): PaddedLayout {
  return layout(toText(arg, directive.precision), directive.width, directive.fill, isNumeric(arg));
}

/**
 * Full rendering of one resolved argument as a single string.
 * The renderer streams layoutArg() instead.
 */
export function displayText(arg: FormatArg, directive: FormatDirective): string {
  return joinLayout(layoutArg(arg, directive));
}

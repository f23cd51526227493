/**
 * Core type definitions for the runtime formatter.
 *
 * This module has ZERO dependencies on other runfmt modules.
 */

/**
 * A value that knows how to render itself as text.
 *
 * `precision` is the placeholder's precision field, if any. Values
 * without a notion of precision ignore it.
 */
export interface Displayable {
  toDisplay(precision?: number): string;
}

/** Values rendered through their native string conversion. */
export type Primitive = string | number | bigint | boolean | null | undefined;

/** A single entry of the argument list. */
export type FormatArg = Displayable | Primitive;

/** Raw field text captured for one placeholder occurrence. */
export interface PlaceholderSpec {
  readonly position: string;
  readonly width: string;
  readonly precision: string;
}

export type FillChar = ' ' | '0';

/** Width and precision constraints parsed from a placeholder. */
export interface FormatDirective {
  readonly fill: FillChar;
  /** Minimum rendered length in code points. */
  readonly width?: number;
  readonly precision?: number;
}

/**
 * A placeholder after lookup. `found` is false when the position was
 * unparsable or pointed past the end of the argument list.
 */
export type ResolvedDirective =
  | (FormatDirective & { readonly found: true; readonly value: FormatArg })
  | (FormatDirective & { readonly found: false });

/**
 * Append-only output destination.
 *
 * write() throws to signal failure; a render stops at the first failure
 * and output already written is not retracted.
 */
export interface Sink {
  write(chunk: string): void;
}

/** What to do with a placeholder that is still open at end of input. */
export type UnterminatedPolicy = 'literal' | 'drop';

export interface RenderOptions {
  /** Defaults to 'literal': the raw text from `{` onward is written as-is. */
  readonly unterminated?: UnterminatedPolicy;
}

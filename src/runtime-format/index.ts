/**
 * runtime-format — Public API
 *
 * Consumers should import from this module only.
 */

// Types
export type {
  Displayable,
  FillChar,
  FormatArg,
  FormatDirective,
  PlaceholderSpec,
  Primitive,
  RenderOptions,
  ResolvedDirective,
  Sink,
  UnterminatedPolicy,
} from './types.js';

// Core
export { render, formatString, Arguments } from './render.js';

// Pieces of the pipeline
export type { TokenHandler, TokenizerState } from './tokenizer.js';
export { tokenize } from './tokenizer.js';
export { SpecResolver, parseCount, parseDirective } from './spec-resolver.js';
export { Renderer, PAD_CHUNK_SIZE } from './renderer.js';

// Values
export type { PaddedLayout } from './values.js';
export { NumericValue, integer, float, isDisplayable, toText, layout, layoutArg, pad, displayText } from './values.js';

// Sinks
export { StringSink, BoundedSink, CallbackSink, FileDescriptorSink } from './sinks.js';
export { SinkError, SinkOverflowError } from './errors.js';

// Escape
export { escapeBraces } from './escape.js';

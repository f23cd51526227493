/**
 * render() — the core operation, and the Arguments binding built on it.
 *
 * The tokenizer drives the pass; each closed placeholder is resolved
 * and rendered immediately, so output streams to the sink in template
 * order with no intermediate parse tree.
 */

import { createLogger } from '../shared/utils/debug.js';
import { Renderer } from './renderer.js';
import { StringSink } from './sinks.js';
import { SpecResolver } from './spec-resolver.js';
import { tokenize } from './tokenizer.js';
import type { Displayable, FormatArg, RenderOptions, Sink } from './types.js';

const log = createLogger('render');

/**
 * Render `template` with `args` into `sink`.
 *
 * Extra arguments are ignored; missing or unparsable references render
 * as empty text. Throws SinkError if the sink fails; output written
 * before the failure stays in the sink.
 */
export function render(
  template: string,
  args: readonly FormatArg[],
  sink: Sink,
  options: RenderOptions = {},
): void {
  const resolver = new SpecResolver(args);
  const renderer = new Renderer(sink);
  const unterminated = options.unterminated ?? 'literal';

  tokenize(template, {
    literal: (text) => renderer.literal(text),
    placeholder: (spec) => renderer.placeholder(resolver.resolve(spec)),
    unterminated: (text) => {
      log.debug('Unterminated placeholder at end of template', { text, policy: unterminated });
      if (unterminated === 'literal') renderer.literal(text);
    },
  });
}

/**
 * Render `template` with `args` into a new string.
 */
export function formatString(
  template: string,
  args: readonly FormatArg[],
  options?: RenderOptions,
): string {
  const sink = new StringSink();
  render(template, args, sink, options);
  return sink.toString();
}

/**
 * A template bound to its arguments.
 *
 * Rendering is deferred until writeTo() or toString(). Being
 * Displayable itself, an Arguments instance can be passed as an
 * argument to another template.
 */
export class Arguments implements Displayable {
  constructor(
    readonly template: string,
    readonly args: readonly FormatArg[],
    private readonly options: RenderOptions = {},
  ) {}

  writeTo(sink: Sink): void {
    render(this.template, this.args, sink, this.options);
  }

  toString(): string {
    return formatString(this.template, this.args, this.options);
  }

  toDisplay(): string {
    return this.toString();
  }
}

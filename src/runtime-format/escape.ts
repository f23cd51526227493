/**
 * Template injection prevention.
 *
 * Doubles curly braces in dynamic content so that, once spliced into a
 * template, it renders verbatim instead of being read as placeholders.
 */

export function escapeBraces(str: string): string {
  return str.replace(/\{/g, '{{').replace(/\}/g, '}}');
}

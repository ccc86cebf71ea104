import type { TextWriter } from './sink.js';

/**
 * Output mode of a manipulator.
 * - `encode`: replace unsafe code units with safe equivalents
 * - `filter`: drop every code unit that would need a replacement
 */
export type TransformMode = 'encode' | 'filter';

/**
 * Names of the built-in output contexts.
 */
export type ContextName =
  | 'CDATAContent'
  | 'HtmlContent'
  | 'HtmlInSingleQuoteAttribute'
  | 'HtmlInDoubleQuoteAttribute'
  | 'HtmlUnquotedAttribute'
  | 'JavaScriptInHTML'
  | 'JavaScriptInAttribute'
  | 'JavaScriptInBlock'
  | 'JavaScriptInSource'
  | 'JSONValue'
  | 'UriComponent'
  | 'UriComponentStrict'
  | 'XmlContent'
  | 'XmlInSingleQuoteAttribute'
  | 'XmlInDoubleQuoteAttribute'
  | 'XmlCommentContent';

/**
 * Encode or filter function bound to one output context.
 * - `(input)` returns the result (`null` for absent input)
 * - `(input, writer)` writes the result to the writer
 */
export interface ContextFunction {
  (input: string): string;
  (input: string | null | undefined): string | null;
  (input: string | null | undefined, writer: TextWriter | null | undefined): void;
}

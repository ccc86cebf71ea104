import {
  builtinContexts,
  requireEncoderContext,
} from './context-registry.js';
import type { Manipulator } from './manipulator.js';
import type { TextWriter } from './sink.js';
import type { ContextFunction } from './types.js';

/**
 * Bind the filter operation of a manipulator to a callable with a string form
 * and a writer form.
 *
 * @param manipulator - Manipulator of the output context.
 * @returns Filter function for the context.
 */
export const bindFilter = (manipulator: Manipulator): ContextFunction => {
  function filter (input: string): string;
  function filter (input: string | null | undefined): string | null;
  function filter (input: string | null | undefined, writer: TextWriter | null | undefined): void;
  function filter (input: string | null | undefined, ...target: [] | [TextWriter | null | undefined]): string | null | void {
    if (target.length === 0) return manipulator.filter(input);
    manipulator.filterTo(input, target[0]);
    return undefined;
  }
  return filter;
};

/**
 * Filter untrusted input for the named context (built-in or registered).
 * Characters are only removed, never added or reordered.
 *
 * @param context - Context name, e.g. `XmlContent`.
 * @param input - Untrusted input.
 * @returns Filtered string, or `null` for absent input.
 * @throws {ArgumentError} If the context is not known.
 */
export function filterFor (context: string, input: string): string;
export function filterFor (context: string, input: string | null | undefined): string | null;
export function filterFor (context: string, input: string | null | undefined, writer: TextWriter | null | undefined): void;
export function filterFor (context: string, input: string | null | undefined, ...target: [] | [TextWriter | null | undefined]): string | null | void {
  const manipulator = requireEncoderContext(context);
  if (target.length === 0) return manipulator.filter(input);
  manipulator.filterTo(input, target[0]);
  return undefined;
}

/**
 * Filter content of a CDATA section.
 *
 * Allows alphanumerics, special characters and Unicode, removes control
 * characters and every `]]>` terminator.
 *
 * @example
 * ```ts
 * const xml = '<![CDATA[' + filterCDATAContent(untrusted) + ']]>';
 * ```
 */
export const filterCDATAContent = bindFilter(builtinContexts.CDATAContent);

/**
 * Filter for HTML text content.
 *
 * Keeps alphanumerics, whitespace, some special characters and Unicode above 0x9F.
 * Removes quotes, `& < >` and control characters.
 *
 * @example
 * ```ts
 * const html = `<div>${filterHtmlContent(untrusted)}</div>`;
 * ```
 */
export const filterHtmlContent = bindFilter(builtinContexts.HtmlContent);

/** Filter for a single quoted HTML attribute value. */
export const filterHtmlInSingleQuoteAttribute = bindFilter(builtinContexts.HtmlInSingleQuoteAttribute);

/** Filter for a double quoted HTML attribute value. */
export const filterHtmlInDoubleQuoteAttribute = bindFilter(builtinContexts.HtmlInDoubleQuoteAttribute);

/** Filter for an unquoted HTML attribute value. Whitespace is removed as well. */
export const filterHtmlUnquotedAttribute = bindFilter(builtinContexts.HtmlUnquotedAttribute);

/** Filter for a JavaScript string literal inside an inline `<script>`. */
export const filterJavaScriptInHTML = bindFilter(builtinContexts.JavaScriptInHTML);

/** Filter for a JavaScript string literal inside an HTML event handler attribute. */
export const filterJavaScriptInAttribute = bindFilter(builtinContexts.JavaScriptInAttribute);

/** Filter for a JavaScript string literal inside a `<script>` block. */
export const filterJavaScriptInBlock = bindFilter(builtinContexts.JavaScriptInBlock);

/** Filter for a JavaScript string literal in a standalone source file. */
export const filterJavaScriptInSource = bindFilter(builtinContexts.JavaScriptInSource);

/**
 * Filter for a JSON string value: keeps alphanumerics and characters above 0x9F only.
 */
export const filterJSONValue = bindFilter(builtinContexts.JSONValue);

export const filterUriComponent = bindFilter(builtinContexts.UriComponent);

export const filterUriComponentStrict = bindFilter(builtinContexts.UriComponentStrict);

/** Filter for XML text content. */
export const filterXmlContent = bindFilter(builtinContexts.XmlContent);

export const filterXmlInSingleQuoteAttribute = bindFilter(builtinContexts.XmlInSingleQuoteAttribute);

export const filterXmlInDoubleQuoteAttribute = bindFilter(builtinContexts.XmlInDoubleQuoteAttribute);

/** Filter for the content of an XML comment. Removes `-`, so `--` cannot appear. */
export const filterXmlCommentContent = bindFilter(builtinContexts.XmlCommentContent);

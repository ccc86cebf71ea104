import {
  builtinContexts,
  requireEncoderContext,
} from './context-registry.js';
import type { Manipulator } from './manipulator.js';
import type { TextWriter } from './sink.js';
import type { ContextFunction } from './types.js';

/**
 * Bind the encode operation of a manipulator to a callable with a string form
 * and a writer form.
 *
 * @param manipulator - Manipulator of the output context.
 * @returns Encode function for the context.
 */
export const bindEncoder = (manipulator: Manipulator): ContextFunction => {
  function encode (input: string): string;
  function encode (input: string | null | undefined): string | null;
  function encode (input: string | null | undefined, writer: TextWriter | null | undefined): void;
  function encode (input: string | null | undefined, ...target: [] | [TextWriter | null | undefined]): string | null | void {
    if (target.length === 0) return manipulator.encode(input);
    manipulator.encodeTo(input, target[0]);
    return undefined;
  }
  return encode;
};

/**
 * Encode untrusted input for the named context (built-in or registered).
 *
 * @param context - Context name, e.g. `HtmlContent`.
 * @param input - Untrusted input.
 * @returns Encoded string, or `null` for absent input.
 * @throws {ArgumentError} If the context is not known.
 */
export function encodeFor (context: string, input: string): string;
export function encodeFor (context: string, input: string | null | undefined): string | null;
export function encodeFor (context: string, input: string | null | undefined, writer: TextWriter | null | undefined): void;
export function encodeFor (context: string, input: string | null | undefined, ...target: [] | [TextWriter | null | undefined]): string | null | void {
  const manipulator = requireEncoderContext(context);
  if (target.length === 0) return manipulator.encode(input);
  manipulator.encodeTo(input, target[0]);
  return undefined;
}

/**
 * Encode content of a CDATA section. Every `]]>` is split into
 * `]]>]]<![CDATA[>` so no terminator of the untrusted input survives.
 *
 * @example
 * ```ts
 * const xml = '<![CDATA[' + encodeCDATAContent(untrusted) + ']]>';
 * ```
 */
export const encodeCDATAContent = bindEncoder(builtinContexts.CDATAContent);

/**
 * Encode for HTML text content, e.g. `<div>${encodeHtmlContent(untrusted)}</div>`.
 *
 * - `" & < >` and the no-break space become named entities
 * - control characters become `&#xfffd;`
 * - other special characters become hex entities, e.g. `'` -> `&#x27;`
 */
export const encodeHtmlContent = bindEncoder(builtinContexts.HtmlContent);

/** Encode for a single quoted HTML attribute value. `"` and whitespace stay as-is. */
export const encodeHtmlInSingleQuoteAttribute = bindEncoder(builtinContexts.HtmlInSingleQuoteAttribute);

/** Encode for a double quoted HTML attribute value. `'` and whitespace stay as-is. */
export const encodeHtmlInDoubleQuoteAttribute = bindEncoder(builtinContexts.HtmlInDoubleQuoteAttribute);

/** Encode for an unquoted HTML attribute value. Whitespace and both quotes are encoded. */
export const encodeHtmlUnquotedAttribute = bindEncoder(builtinContexts.HtmlUnquotedAttribute);

/**
 * Encode for a JavaScript string literal inside an inline `<script>`.
 * Also escapes `-` and `/` so that `-->` and `</script>` cannot appear.
 */
export const encodeJavaScriptInHTML = bindEncoder(builtinContexts.JavaScriptInHTML);

/** Encode for a JavaScript string literal inside an HTML event handler attribute. */
export const encodeJavaScriptInAttribute = bindEncoder(builtinContexts.JavaScriptInAttribute);

/** Encode for a JavaScript string literal inside a `<script>` block. Quotes are backslash-escaped. */
export const encodeJavaScriptInBlock = bindEncoder(builtinContexts.JavaScriptInBlock);

/** Encode for a JavaScript string literal in a standalone source file. */
export const encodeJavaScriptInSource = bindEncoder(builtinContexts.JavaScriptInSource);

/**
 * Encode for a JSON string value. Only alphanumerics and characters above 0x9F stay as-is.
 *
 * @example
 * ```ts
 * const json = '{"name":"' + encodeJSONValue(untrusted) + '"}';
 * ```
 */
export const encodeJSONValue = bindEncoder(builtinContexts.JSONValue);

/** Percent-encode for a URI component, leaving `- _ . ~ ! * ' ( )` as-is. */
export const encodeUriComponent = bindEncoder(builtinContexts.UriComponent);

/** Percent-encode for a URI component, leaving only the unreserved `- _ . ~` as-is. */
export const encodeUriComponentStrict = bindEncoder(builtinContexts.UriComponentStrict);

/** Encode for XML text content. Control characters not allowed in XML are removed. */
export const encodeXmlContent = bindEncoder(builtinContexts.XmlContent);

/** Encode for a single quoted XML attribute value. */
export const encodeXmlInSingleQuoteAttribute = bindEncoder(builtinContexts.XmlInSingleQuoteAttribute);

/** Encode for a double quoted XML attribute value. */
export const encodeXmlInDoubleQuoteAttribute = bindEncoder(builtinContexts.XmlInDoubleQuoteAttribute);

/** Encode for the content of an XML comment. `-` is encoded, so `--` cannot appear. */
export const encodeXmlCommentContent = bindEncoder(builtinContexts.XmlCommentContent);

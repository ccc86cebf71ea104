import {
  HTML_CONTENT,
  HTML_DOUBLE_QUOTE_ATTRIBUTE,
  HTML_SINGLE_QUOTE_ATTRIBUTE,
  HTML_UNQUOTED_ATTRIBUTE,
} from './contexts/html.js';
import {
  JAVASCRIPT_IN_ATTRIBUTE,
  JAVASCRIPT_IN_BLOCK,
  JAVASCRIPT_IN_HTML,
  JAVASCRIPT_IN_SOURCE,
} from './contexts/javascript.js';
import { JSON_VALUE } from './contexts/json.js';
import {
  URI_COMPONENT,
  URI_COMPONENT_STRICT,
} from './contexts/uri.js';
import {
  XML_COMMENT_CONTENT,
  XML_CONTENT,
  XML_DOUBLE_QUOTE_ATTRIBUTE,
  XML_SINGLE_QUOTE_ATTRIBUTE,
} from './contexts/xml.js';
import { ArgumentError } from './errors.js';
import {
  Manipulator,
  cdataManipulator,
  characterManipulator,
} from './manipulator.js';
import type { ContextName } from './types.js';

/**
 * Manipulators of the built-in output contexts. Created once and shared.
 */
export const builtinContexts: Readonly<Record<ContextName, Manipulator>> = Object.freeze({
  CDATAContent: cdataManipulator('CDATAContent'),
  HtmlContent: characterManipulator(HTML_CONTENT),
  HtmlInSingleQuoteAttribute: characterManipulator(HTML_SINGLE_QUOTE_ATTRIBUTE),
  HtmlInDoubleQuoteAttribute: characterManipulator(HTML_DOUBLE_QUOTE_ATTRIBUTE),
  HtmlUnquotedAttribute: characterManipulator(HTML_UNQUOTED_ATTRIBUTE),
  JavaScriptInHTML: characterManipulator(JAVASCRIPT_IN_HTML),
  JavaScriptInAttribute: characterManipulator(JAVASCRIPT_IN_ATTRIBUTE),
  JavaScriptInBlock: characterManipulator(JAVASCRIPT_IN_BLOCK),
  JavaScriptInSource: characterManipulator(JAVASCRIPT_IN_SOURCE),
  JSONValue: characterManipulator(JSON_VALUE),
  UriComponent: characterManipulator(URI_COMPONENT),
  UriComponentStrict: characterManipulator(URI_COMPONENT_STRICT),
  XmlContent: characterManipulator(XML_CONTENT),
  XmlInSingleQuoteAttribute: characterManipulator(XML_SINGLE_QUOTE_ATTRIBUTE),
  XmlInDoubleQuoteAttribute: characterManipulator(XML_DOUBLE_QUOTE_ATTRIBUTE),
  XmlCommentContent: characterManipulator(XML_COMMENT_CONTENT),
});

/**
 * Internal registry for custom contexts.
 */
const customContextRegistry = new Map<string, Manipulator>();

/**
 * Whether the name is one of the built-in context names.
 *
 * @param name - Context name.
 */
export const isBuiltinContext = (name: string): name is ContextName => {
  return Object.prototype.hasOwnProperty.call(builtinContexts, name);
};

/**
 * Register (or override) a custom output context.
 *
 * Built-in contexts cannot be overridden.
 *
 * @param name - Context name (must match `/^[A-Za-z][\w-]*$/`).
 * @param manipulator - Manipulator, e.g. from `characterManipulator(defineRuleSet(...))`.
 *
 * @example
 * ```ts
 * registerEncoderContext('CssString', characterManipulator(defineRuleSet({
 *   name: 'CssString',
 *   fallback: 'html-hex',
 * })));
 * ```
 */
export const registerEncoderContext = (name: string, manipulator: Manipulator): void => {
  if (!/^[A-Za-z][\w-]*$/.test(name)) {
    throw new ArgumentError(`Invalid context name: ${name}`);
  }
  if (isBuiltinContext(name)) {
    throw new ArgumentError(`Built-in context cannot be overridden: ${name}`);
  }
  if (!(manipulator instanceof Manipulator)) {
    throw new ArgumentError('Context manipulator must be a Manipulator instance');
  }
  customContextRegistry.set(name, manipulator);
};

/**
 * Remove a custom output context.
 *
 * @param name - Context name.
 * @returns True if a custom context was removed.
 */
export const unregisterEncoderContext = (name: string): boolean => {
  return customContextRegistry.delete(name);
};

/**
 * Look up the manipulator of a built-in or registered context.
 *
 * @param name - Context name.
 * @returns The manipulator, or undefined if the context is not known.
 */
export const getEncoderContext = (name: string): Manipulator | undefined => {
  if (isBuiltinContext(name)) return builtinContexts[name];
  return customContextRegistry.get(name);
};

/**
 * Like {@link getEncoderContext}, but throws for unknown contexts.
 *
 * @param name - Context name.
 * @returns The manipulator.
 * @throws {ArgumentError} If the context is not known.
 */
export const requireEncoderContext = (name: string): Manipulator => {
  const manipulator = getEncoderContext(name);
  if (!manipulator) {
    throw new ArgumentError(`Unknown context: ${name}`);
  }
  return manipulator;
};

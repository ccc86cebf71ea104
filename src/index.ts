/*!
 * context-encoder
 *
 * Context-aware encoding and filtering of untrusted strings with zero dependencies.
 *
 * Every output context (HTML content and attributes, XML, CDATA, JavaScript,
 * JSON and URI components) has an encoder replacing unsafe characters and a
 * filter removing them.
 *
 * Licensed under the MIT License.
 */

export {
  encodeFor,
  encodeCDATAContent,
  encodeHtmlContent,
  encodeHtmlInSingleQuoteAttribute,
  encodeHtmlInDoubleQuoteAttribute,
  encodeHtmlUnquotedAttribute,
  encodeJavaScriptInHTML,
  encodeJavaScriptInAttribute,
  encodeJavaScriptInBlock,
  encodeJavaScriptInSource,
  encodeJSONValue,
  encodeUriComponent,
  encodeUriComponentStrict,
  encodeXmlContent,
  encodeXmlInSingleQuoteAttribute,
  encodeXmlInDoubleQuoteAttribute,
  encodeXmlCommentContent,
} from './secure-encoder.js';

export {
  filterFor,
  filterCDATAContent,
  filterHtmlContent,
  filterHtmlInSingleQuoteAttribute,
  filterHtmlInDoubleQuoteAttribute,
  filterHtmlUnquotedAttribute,
  filterJavaScriptInHTML,
  filterJavaScriptInAttribute,
  filterJavaScriptInBlock,
  filterJavaScriptInSource,
  filterJSONValue,
  filterUriComponent,
  filterUriComponentStrict,
  filterXmlContent,
  filterXmlInSingleQuoteAttribute,
  filterXmlInDoubleQuoteAttribute,
  filterXmlCommentContent,
} from './secure-filter.js';

export {
  getEncoderContext,
  registerEncoderContext,
  unregisterEncoderContext,
} from './context-registry.js';

export {
  Manipulator,
  cdataManipulator,
  characterManipulator,
} from './manipulator.js';

export {
  defineRuleSet,
  extendRuleSet,
} from './rule-set.js';

export { classifyCodeUnit } from './classify.js';

export {
  ArgumentError,
  SinkWriteError,
} from './errors.js';

export type {
  ControlPolicy,
  FallbackEncoding,
  RuleSet,
  RuleSetExtension,
  RuleSetOptions,
} from './rule-set.js';

export type { TextWriter } from './sink.js';

export type {
  ContextFunction,
  ContextName,
  TransformMode,
} from './types.js';

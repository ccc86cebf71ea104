import { defineRuleSet } from '../rule-set.js';

/**
 * Value inside a JSON string literal.
 * Only alphanumerics are immune, everything up to 0x9F is escaped.
 */
export const JSON_VALUE = defineRuleSet({
  name: 'JSONValue',
  escape: '\b\t\n\f\r"\\/',
  passthroughAbove: 0x9f,
  fallback: 'json-unicode',
});

import {
  defineRuleSet,
  extendRuleSet,
} from '../rule-set.js';

const HTML_WHITESPACE = '\t\n\r ';

/**
 * Base rule set shared by all HTML contexts. On its own it is the
 * most restrictive one: whitespace and both quotes are encoded.
 */
const htmlBase = defineRuleSet({
  name: 'HtmlBase',
  immune: '!#$%^()*+,-./:;=?@[\\]_{|}~',
  entities: {
    '"': '&quot;',
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '\u00a0': '&nbsp;',
  },
  control: 'html-replace',
  passthroughAbove: 0x9f,
  fallback: 'html-hex',
});

/** HTML text content, e.g. `<div>${value}</div>`. */
export const HTML_CONTENT = extendRuleSet(htmlBase, {
  name: 'HtmlContent',
  immune: HTML_WHITESPACE,
});

/** Attribute value inside double quotes, e.g. `<input value="${value}">`. */
export const HTML_DOUBLE_QUOTE_ATTRIBUTE = extendRuleSet(htmlBase, {
  name: 'HtmlInDoubleQuoteAttribute',
  immune: HTML_WHITESPACE + '\'',
});

/** Attribute value inside single quotes, e.g. `<input value='${value}'>`. */
export const HTML_SINGLE_QUOTE_ATTRIBUTE = extendRuleSet(htmlBase, {
  name: 'HtmlInSingleQuoteAttribute',
  immune: HTML_WHITESPACE + '"',
});

/** Unquoted attribute value, e.g. `<input value=${value}>`. */
export const HTML_UNQUOTED_ATTRIBUTE = extendRuleSet(htmlBase, {
  name: 'HtmlUnquotedAttribute',
});

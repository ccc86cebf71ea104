import {
  defineRuleSet,
  extendRuleSet,
} from '../rule-set.js';

/**
 * Base rule set shared by all XML contexts.
 *
 * Control characters are dropped instead of replaced, as most of them are
 * not allowed in XML documents at all.
 */
const xmlBase = defineRuleSet({
  name: 'XmlBase',
  immune: ',;:._ ()\t\n\r',
  entities: {
    '"': '&quot;',
    '&': '&amp;',
    '\'': '&apos;',
    '<': '&lt;',
    '>': '&gt;',
  },
  control: 'xml-drop',
  passthroughAbove: 0x9f,
  fallback: 'html-hex',
});

/** XML text content. */
export const XML_CONTENT = extendRuleSet(xmlBase, {
  name: 'XmlContent',
  immune: '-',
});

/** Attribute value inside double quotes. */
export const XML_DOUBLE_QUOTE_ATTRIBUTE = extendRuleSet(XML_CONTENT, {
  name: 'XmlInDoubleQuoteAttribute',
  immune: '\'',
});

/** Attribute value inside single quotes. */
export const XML_SINGLE_QUOTE_ATTRIBUTE = extendRuleSet(XML_CONTENT, {
  name: 'XmlInSingleQuoteAttribute',
  immune: '"',
});

/**
 * Content of an XML comment. Markup characters are harmless here,
 * but `-` is encoded so that `--` cannot appear.
 */
export const XML_COMMENT_CONTENT = extendRuleSet(xmlBase, {
  name: 'XmlCommentContent',
  immune: '"\'<!>#$%^*+/=?@[\\]{|}~',
});

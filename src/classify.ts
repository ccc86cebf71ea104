import {
  isAlphaNum,
  slashEscape,
  toHex,
} from './char-utils.js';

import type {
  ControlPolicy,
  FallbackEncoding,
  RuleSet,
} from './rule-set.js';

// for HTML control characters, use the Replacement Character (? symbol in a diamond)
const HTML_REPLACEMENT = '&#xfffd;';

const utf8 = new TextEncoder();

/**
 * Whether the code unit falls into the illegal control ranges of the policy.
 *
 * @param unit - UTF-16 code unit.
 * @param policy - Control policy of the rule set.
 * @returns True if the control rule applies.
 */
export const isIllegalControl = (unit: number, policy: ControlPolicy): boolean => {
  switch (policy) {
    case 'html-replace':
      return unit <= 0x1f || (unit >= 0x7f && unit <= 0x9f);
    case 'xml-drop':
      return unit <= 0x1f ||
        (unit >= 0x7f && unit <= 0x84) ||
        // NEL (0x85) is not dropped, it takes the fallback encoding
        (unit >= 0x86 && unit <= 0x9f) ||
        (unit >= 0xfdd0 && unit <= 0xfddf);
    case 'none':
      return false;
  }
};

/**
 * Percent-encode the UTF-8 bytes of a single code unit.
 * A lone surrogate half has no UTF-8 form and is written as U+FFFD.
 */
const percentEncode = (unit: number): string => {
  let out = '';
  for (const byte of utf8.encode(String.fromCharCode(unit))) {
    out += '%' + toHex(byte, 2).toUpperCase();
  }
  return out;
};

const fallbackEncode = (unit: number, fallback: FallbackEncoding): string => {
  switch (fallback) {
    case 'html-hex':
      return '&#x' + toHex(unit) + ';';
    case 'js-hex':
      // above ASCII is allowed as-is instead of the \u form
      return unit < 0x80 ? '\\x' + toHex(unit, 2) : String.fromCharCode(unit);
    case 'json-unicode':
      return '\\u' + toHex(unit, 4);
    case 'percent-utf8':
      return percentEncode(unit);
  }
};

/**
 * Classify one UTF-16 code unit under a rule set and return its replacement.
 *
 * Precedence (changing the order changes which characters are considered safe):
 * 1. ASCII alphanumerics pass
 * 2. immune code units pass
 * 3. escape set: backslash escape
 * 4. entity table
 * 5. illegal control characters: replacement entity or dropped
 * 6. above the passthrough threshold: pass
 * 7. fallback encoding
 *
 * Total over 0x0000-0xFFFF: every code unit yields a string, possibly empty.
 *
 * @param unit - UTF-16 code unit.
 * @param rules - Rule set of the output context.
 * @returns Replacement string; the unchanged character if the code unit is safe.
 */
export function classifyCodeUnit (unit: number, rules: RuleSet): string {
  if (isAlphaNum(unit) || rules.immune.has(unit)) {
    return String.fromCharCode(unit);
  }

  if (rules.escape.has(unit)) {
    return slashEscape(unit);
  }

  const entity = rules.entities.get(unit);
  if (entity !== undefined) {
    return entity;
  }

  if (isIllegalControl(unit, rules.control)) {
    return rules.control === 'html-replace' ? HTML_REPLACEMENT : '';
  }

  if (rules.passthroughAbove !== null && unit > rules.passthroughAbove) {
    return String.fromCharCode(unit);
  }

  return fallbackEncode(unit, rules.fallback);
}

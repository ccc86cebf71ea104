/**
 * Code unit helpers shared by the classification engine and the CDATA scanner.
 */

/**
 * Whether the code unit is an ASCII letter or digit.
 *
 * @param unit - UTF-16 code unit.
 * @returns True for `0-9`, `A-Z` and `a-z`.
 */
export const isAlphaNum = (unit: number): boolean => {
  return (unit >= 0x30 && unit <= 0x39) ||
    (unit >= 0x41 && unit <= 0x5a) ||
    (unit >= 0x61 && unit <= 0x7a);
};

/**
 * Lowercase hex representation of a code unit, without prefix and left-padded to `width`.
 *
 * @param unit - UTF-16 code unit.
 * @param width - Minimum number of digits.
 * @returns Hex digits, e.g. `toHex(0x2f)` is `2f`, `toHex(0x7d, 4)` is `007d`.
 */
export const toHex = (unit: number, width = 1): string => {
  return unit.toString(16).padStart(width, '0');
};

/**
 * Backslash-escape a code unit: short forms for `\b \t \n \f \r`,
 * a backslash followed by the character for everything else.
 *
 * @param unit - UTF-16 code unit.
 * @returns Escaped representation.
 */
export const slashEscape = (unit: number): string => {
  switch (unit) {
    case 0x08: return '\\b';
    case 0x09: return '\\t';
    case 0x0a: return '\\n';
    case 0x0c: return '\\f';
    case 0x0d: return '\\r';
    default: return '\\' + String.fromCharCode(unit);
  }
};

/**
 * Whether a replacement describes the code unit exactly (single unit, same value).
 * This is the only test the filter mode uses to decide whether to keep a code unit.
 *
 * @param unit - Original code unit.
 * @param replacement - Replacement computed by the encoder.
 * @returns True if the replacement is the unchanged code unit.
 */
export const isSame = (unit: number, replacement: string): boolean => {
  // the length check keeps '&' -> '&amp;' from matching on its first character
  return replacement.length === 1 && replacement.charCodeAt(0) === unit;
};

/**
 * Build a set of code units from the characters of the given strings.
 *
 * @param chars - Strings whose code units should end up in the set.
 * @returns Set of code units.
 */
export const codeUnits = (...chars: string[]): Set<number> => {
  const set = new Set<number>();
  for (const str of chars) {
    for (let i = 0; i < str.length; i++) set.add(str.charCodeAt(i));
  }
  return set;
};

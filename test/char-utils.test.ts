import { assert } from 'chai';

import {
  codeUnits,
  isAlphaNum,
  isSame,
  slashEscape,
  toHex,
} from '../src/char-utils.js';

describe('char utils', function () {
  describe('isAlphaNum', function () {
    it('accepts ASCII letters and digits', function () {
      for (const ch of 'azAZ09mM5') {
        assert.isTrue(isAlphaNum(ch.charCodeAt(0)), ch);
      }
    });

    it('rejects neighbours of the ASCII ranges and non-ASCII letters', function () {
      for (const ch of '/:@[`{ _-') {
        assert.isFalse(isAlphaNum(ch.charCodeAt(0)), ch);
      }
      // latin small letter a with diaeresis, cyrillic capital A, fullwidth digit 6
      assert.isFalse(isAlphaNum(0xe4));
      assert.isFalse(isAlphaNum(0x410));
      assert.isFalse(isAlphaNum(0xff16));
    });
  });

  describe('toHex', function () {
    it('writes lowercase hex and pads to the given width', function () {
      assert.strictEqual(toHex(0x2f), '2f');
      assert.strictEqual(toHex(0x9), '9');
      assert.strictEqual(toHex(0x9, 2), '09');
      assert.strictEqual(toHex(0x7d, 4), '007d');
      assert.strictEqual(toHex(0xfffd, 2), 'fffd');
    });
  });

  describe('slashEscape', function () {
    it('uses short forms for backspace, tab, newline, form feed and carriage return', function () {
      assert.strictEqual(slashEscape(0x08), '\\b');
      assert.strictEqual(slashEscape(0x09), '\\t');
      assert.strictEqual(slashEscape(0x0a), '\\n');
      assert.strictEqual(slashEscape(0x0c), '\\f');
      assert.strictEqual(slashEscape(0x0d), '\\r');
    });

    it('prefixes all other characters with a backslash', function () {
      assert.strictEqual(slashEscape('\\'.charCodeAt(0)), '\\\\');
      assert.strictEqual(slashEscape('/'.charCodeAt(0)), '\\/');
      assert.strictEqual(slashEscape('"'.charCodeAt(0)), '\\"');
      assert.strictEqual(slashEscape('-'.charCodeAt(0)), '\\-');
    });
  });

  describe('isSame', function () {
    it('is true only for the unchanged single code unit', function () {
      assert.isTrue(isSame(0x61, 'a'));
      assert.isFalse(isSame(0x26, '&amp;'));
      assert.isFalse(isSame(0x61, 'b'));
      assert.isFalse(isSame(0x61, ''));
    });
  });

  describe('codeUnits', function () {
    it('collects the code units of all given strings', function () {
      const set = codeUnits('ab', '', 'b-');
      assert.sameMembers([ ...set ], [ 0x61, 0x62, 0x2d ]);
    });
  });
});

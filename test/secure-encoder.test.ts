import { once } from 'node:events';
import { PassThrough } from 'node:stream';

import { assert } from 'chai';

import {
  ArgumentError,
  SinkWriteError,
} from '../src/errors.js';
import {
  encodeCDATAContent,
  encodeFor,
  encodeHtmlContent,
  encodeHtmlInDoubleQuoteAttribute,
  encodeHtmlInSingleQuoteAttribute,
  encodeHtmlUnquotedAttribute,
  encodeJavaScriptInAttribute,
  encodeJavaScriptInBlock,
  encodeJavaScriptInHTML,
  encodeJavaScriptInSource,
  encodeJSONValue,
  encodeUriComponent,
  encodeUriComponentStrict,
  encodeXmlCommentContent,
  encodeXmlContent,
  encodeXmlInDoubleQuoteAttribute,
  encodeXmlInSingleQuoteAttribute,
} from '../src/secure-encoder.js';
import { CollectingWriter } from './test-utils/writer.js';

const MARKUP = '<!--this! is/ a; comment: --><foo attribute=value>text</foo><bar attribute="doublevalue">text2</bar><baz attribute=\'singlevalue\'>)(*#$!@#?</baz>';
const SCRIPT = 'console.log("Log Message!");\r\n $(ajax).postMessage(\'foo.com\');\nvar x = 123+14*82/12-6;';
const JSON_INPUT = '"}{"CustomData":["foo bar"]}';
const URI_INPUT = '?foo=bar&test=^42@314*(&SF&Ts=+~' + String.fromCharCode(0x732);

const thrown = (fn: () => void): unknown => {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
};

const backslashU = (hex: string): string => '\\' + 'u' + hex;

describe('secure encoder', function () {
  describe('HTML', function () {
    it('encodes markup for text content', function () {
      assert.strictEqual(
        encodeHtmlContent(MARKUP),
        '&lt;!--this! is/ a; comment: --&gt;&lt;foo attribute=value&gt;text&lt;/foo&gt;&lt;bar attribute=&quot;doublevalue&quot;&gt;text2&lt;/bar&gt;&lt;baz attribute=&#x27;singlevalue&#x27;&gt;)(*#$!@#?&lt;/baz&gt;',
      );
    });

    it('keeps single quotes in double quoted attributes', function () {
      assert.strictEqual(
        encodeHtmlInDoubleQuoteAttribute(MARKUP),
        '&lt;!--this! is/ a; comment: --&gt;&lt;foo attribute=value&gt;text&lt;/foo&gt;&lt;bar attribute=&quot;doublevalue&quot;&gt;text2&lt;/bar&gt;&lt;baz attribute=\'singlevalue\'&gt;)(*#$!@#?&lt;/baz&gt;',
      );
    });

    it('keeps double quotes in single quoted attributes', function () {
      assert.strictEqual(
        encodeHtmlInSingleQuoteAttribute(MARKUP),
        '&lt;!--this! is/ a; comment: --&gt;&lt;foo attribute=value&gt;text&lt;/foo&gt;&lt;bar attribute="doublevalue"&gt;text2&lt;/bar&gt;&lt;baz attribute=&#x27;singlevalue&#x27;&gt;)(*#$!@#?&lt;/baz&gt;',
      );
    });

    it('encodes whitespace in unquoted attributes', function () {
      assert.strictEqual(
        encodeHtmlUnquotedAttribute(MARKUP),
        '&lt;!--this!&#x20;is/&#x20;a;&#x20;comment:&#x20;--&gt;&lt;foo&#x20;attribute=value&gt;text&lt;/foo&gt;&lt;bar&#x20;attribute=&quot;doublevalue&quot;&gt;text2&lt;/bar&gt;&lt;baz&#x20;attribute=&#x27;singlevalue&#x27;&gt;)(*#$!@#?&lt;/baz&gt;',
      );
    });

    it('replaces control characters', function () {
      assert.strictEqual(encodeHtmlContent('a' + String.fromCharCode(0x01) + 'b'), 'a&#xfffd;b');
      assert.strictEqual(encodeHtmlContent('x' + String.fromCharCode(0x85) + 'y'), 'x&#xfffd;y');
    });

    it('passes non-ASCII text', function () {
      const text = 'caf' + String.fromCharCode(0xe9) + ' ' + String.fromCharCode(0x2022);
      assert.strictEqual(encodeHtmlContent(text), text);
    });
  });

  describe('XML', function () {
    it('encodes markup for text content', function () {
      assert.strictEqual(
        encodeXmlContent(MARKUP),
        '&lt;&#x21;--this&#x21; is&#x2f; a; comment: --&gt;&lt;foo attribute&#x3d;value&gt;text&lt;&#x2f;foo&gt;&lt;bar attribute&#x3d;&quot;doublevalue&quot;&gt;text2&lt;&#x2f;bar&gt;&lt;baz attribute&#x3d;&apos;singlevalue&apos;&gt;)(&#x2a;&#x23;&#x24;&#x21;&#x40;&#x23;&#x3f;&lt;&#x2f;baz&gt;',
      );
    });

    it('keeps single quotes in double quoted attributes', function () {
      assert.strictEqual(
        encodeXmlInDoubleQuoteAttribute(MARKUP),
        '&lt;&#x21;--this&#x21; is&#x2f; a; comment: --&gt;&lt;foo attribute&#x3d;value&gt;text&lt;&#x2f;foo&gt;&lt;bar attribute&#x3d;&quot;doublevalue&quot;&gt;text2&lt;&#x2f;bar&gt;&lt;baz attribute&#x3d;\'singlevalue\'&gt;)(&#x2a;&#x23;&#x24;&#x21;&#x40;&#x23;&#x3f;&lt;&#x2f;baz&gt;',
      );
    });

    it('keeps double quotes in single quoted attributes', function () {
      assert.strictEqual(
        encodeXmlInSingleQuoteAttribute(MARKUP),
        '&lt;&#x21;--this&#x21; is&#x2f; a; comment: --&gt;&lt;foo attribute&#x3d;value&gt;text&lt;&#x2f;foo&gt;&lt;bar attribute&#x3d;"doublevalue"&gt;text2&lt;&#x2f;bar&gt;&lt;baz attribute&#x3d;&apos;singlevalue&apos;&gt;)(&#x2a;&#x23;&#x24;&#x21;&#x40;&#x23;&#x3f;&lt;&#x2f;baz&gt;',
      );
    });

    it('encodes only the dash in comments', function () {
      assert.strictEqual(
        encodeXmlCommentContent(MARKUP),
        '<!&#x2d;&#x2d;this! is/ a; comment: &#x2d;&#x2d;><foo attribute=value>text</foo><bar attribute="doublevalue">text2</bar><baz attribute=\'singlevalue\'>)(*#$!@#?</baz>',
      );
    });

    it('removes control characters not allowed in XML', function () {
      const input = 'a' + String.fromCharCode(0x01) + 'b' + String.fromCharCode(0x9f) + 'c' + String.fromCharCode(0xfdd0) + 'd';
      assert.strictEqual(encodeXmlContent(input), 'abcd');
    });
  });

  describe('CDATA', function () {
    it('leaves markup unchanged', function () {
      assert.strictEqual(encodeCDATAContent(MARKUP), MARKUP);
    });

    it('splits the section terminator', function () {
      assert.strictEqual(encodeCDATAContent(']]>'), ']]>]]<![CDATA[>');
      assert.strictEqual(encodeCDATAContent('foo]]]]>]]'), 'foo]]]]>]]<![CDATA[>]]');
    });
  });

  describe('JavaScript', function () {
    it('encodes for inline script in HTML', function () {
      assert.strictEqual(
        encodeJavaScriptInHTML(SCRIPT),
        String.raw`console.log(\x22Log Message!\x22);\r\n \x24(ajax).postMessage(\x27foo.com\x27);\nvar x = 123+14*82\/12\-6;`,
      );
    });

    it('encodes for event handler attributes', function () {
      assert.strictEqual(
        encodeJavaScriptInAttribute(SCRIPT),
        String.raw`console.log(\x22Log Message!\x22);\r\n \x24(ajax).postMessage(\x27foo.com\x27);\nvar x = 123+14*82/12-6;`,
      );
    });

    it('encodes for script blocks', function () {
      assert.strictEqual(
        encodeJavaScriptInBlock(SCRIPT),
        String.raw`console.log(\"Log Message!\");\r\n \x24(ajax).postMessage(\'foo.com\');\nvar x = 123+14*82\/12\-6;`,
      );
    });

    it('encodes for standalone source', function () {
      assert.strictEqual(
        encodeJavaScriptInSource(SCRIPT),
        String.raw`console.log(\"Log Message!\");\r\n \x24(ajax).postMessage(\'foo.com\');\nvar x = 123+14*82/12-6;`,
      );
    });

    it('cannot close the surrounding script element', function () {
      assert.strictEqual(encodeJavaScriptInHTML('</script>'), String.raw`<\/script>`);
      assert.strictEqual(encodeJavaScriptInBlock('-->'), String.raw`\-\->`);
    });
  });

  describe('JSON', function () {
    it('escapes structure characters', function () {
      const expected = '\\"' + backslashU('007d') + backslashU('007b') + '\\"CustomData\\"' +
        backslashU('003a') + backslashU('005b') + '\\"foo' + backslashU('0020') + 'bar\\"' +
        backslashU('005d') + backslashU('007d');
      assert.strictEqual(encodeJSONValue(JSON_INPUT), expected);
    });

    it('escapes the solidus', function () {
      assert.strictEqual(encodeJSONValue('</'), backslashU('003c') + '\\/');
    });
  });

  describe('URI', function () {
    it('percent-encodes components', function () {
      assert.strictEqual(encodeUriComponent(URI_INPUT), '%3Ffoo%3Dbar%26test%3D%5E42%40314*(%26SF%26Ts%3D%2B~%DC%B2');
    });

    it('percent-encodes sub-delimiters in strict mode', function () {
      assert.strictEqual(encodeUriComponentStrict(URI_INPUT), '%3Ffoo%3Dbar%26test%3D%5E42%40314%2A%28%26SF%26Ts%3D%2B~%DC%B2');
    });
  });

  describe('absent input', function () {
    it('returns null for null and undefined', function () {
      assert.isNull(encodeHtmlContent(null));
      assert.isNull(encodeCDATAContent(undefined));
      assert.isNull(encodeUriComponentStrict(null));
    });

    it('returns an empty string for empty input', function () {
      assert.strictEqual(encodeJSONValue(''), '');
      assert.strictEqual(encodeCDATAContent(''), '');
    });

    it('writes nothing for absent input, even without a writer', function () {
      const writer = new CollectingWriter();
      encodeXmlContent(null, writer);
      encodeXmlContent(undefined, null);
      assert.deepEqual(writer.chunks, []);
    });
  });

  describe('writer form', function () {
    it('writes the same text as the string form', function () {
      const writer = new CollectingWriter();
      const result: void = encodeHtmlContent('<a href="x">', writer);
      assert.isUndefined(result);
      assert.strictEqual(writer.toString(), '&lt;a href=&quot;x&quot;&gt;');
    });

    it('throws for a missing writer', function () {
      assert.throws(() => encodeHtmlContent('', null), ArgumentError, 'Writer cannot be null');
      assert.throws(() => encodeCDATAContent('x', undefined), ArgumentError);
    });

    it('writes to a Node.js stream', async function () {
      const stream = new PassThrough();
      stream.setEncoding('utf8');
      let out = '';
      stream.on('data', (chunk: string) => {
        out += chunk;
      });

      encodeHtmlContent('<a href="x">', stream);
      stream.end();
      await once(stream, 'end');

      assert.strictEqual(out, '&lt;a href=&quot;x&quot;&gt;');
    });

    it('reports an ended stream instead of emitting an error event', async function () {
      const stream = new PassThrough();
      const events: unknown[] = [];
      stream.on('error', (err) => {
        events.push(err);
      });
      stream.end();

      const err = thrown(() => encodeHtmlContent('<x>', stream));
      await new Promise((resolve) => setImmediate(resolve));

      if (!(err instanceof SinkWriteError)) {
        assert.fail(`expected a SinkWriteError, got ${String(err)}`);
      }
      assert.instanceOf(err.cause, Error);
      assert.deepEqual(events, []);
    });

    it('reports an errored stream with its error as cause', function () {
      const stream = new PassThrough();
      const failure = new Error('disk full');
      const events: unknown[] = [];
      stream.on('error', (err) => {
        events.push(err);
      });
      stream.destroy(failure);

      const err = thrown(() => encodeXmlContent('a', stream));
      if (!(err instanceof SinkWriteError)) {
        assert.fail(`expected a SinkWriteError, got ${String(err)}`);
      }
      assert.strictEqual(err.cause, failure);
    });
  });

  describe('encodeFor', function () {
    it('routes to the named context', function () {
      assert.strictEqual(encodeFor('HtmlContent', '<b>'), '&lt;b&gt;');
      assert.strictEqual(encodeFor('UriComponentStrict', '!'), '%21');
      assert.isNull(encodeFor('JSONValue', null));
    });

    it('writes to a writer', function () {
      const writer = new CollectingWriter();
      encodeFor('XmlCommentContent', 'a--b', writer);
      assert.strictEqual(writer.toString(), 'a&#x2d;&#x2d;b');
    });

    it('throws for unknown contexts', function () {
      assert.throws(() => encodeFor('CssString', 'x'), ArgumentError, 'Unknown context: CssString');
    });
  });
});

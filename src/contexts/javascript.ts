import {
  defineRuleSet,
  type RuleSet,
} from '../rule-set.js';

// must always be slash escaped
const BASE_ESCAPE = '\b\t\n\f\r\\';

// always allowed
const BASE_IMMUNE = '~!@#%^*()_+=|[]:;<>?,.-/ ';

// `-` and `/` escaped to prevent `-->` and `</script>` from closing the surrounding markup
const MARKUP_ESCAPE = '-/';
const MARKUP_IMMUNE = BASE_IMMUNE.replace(/[-/]/g, '');

const QUOTE_ESCAPE = '"\'';

const defineJavaScript = (name: string, immune: string, escape: string): RuleSet => defineRuleSet({
  name,
  immune,
  escape,
  passthroughAbove: 0x7f,
  fallback: 'js-hex',
});

/** String literal inside an inline `<script>` of an HTML page. */
export const JAVASCRIPT_IN_HTML = defineJavaScript('JavaScriptInHTML', MARKUP_IMMUNE, BASE_ESCAPE + MARKUP_ESCAPE);

/** String literal inside an event handler attribute, e.g. `onclick="f('${value}')"`. */
export const JAVASCRIPT_IN_ATTRIBUTE = defineJavaScript('JavaScriptInAttribute', BASE_IMMUNE, BASE_ESCAPE);

/** String literal inside a `<script>` block. */
export const JAVASCRIPT_IN_BLOCK = defineJavaScript('JavaScriptInBlock', MARKUP_IMMUNE, BASE_ESCAPE + MARKUP_ESCAPE + QUOTE_ESCAPE);

/** String literal inside a standalone JavaScript source file. */
export const JAVASCRIPT_IN_SOURCE = defineJavaScript('JavaScriptInSource', BASE_IMMUNE, BASE_ESCAPE + QUOTE_ESCAPE);

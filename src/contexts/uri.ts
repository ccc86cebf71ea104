import { defineRuleSet } from '../rule-set.js';

// RFC 3986 unreserved characters
const UNRESERVED = '-_.~';

/** URI component, additionally leaving the sub-delimiters `! * ' ( )` as-is. */
export const URI_COMPONENT = defineRuleSet({
  name: 'UriComponent',
  immune: UNRESERVED + '!*\'()',
  fallback: 'percent-utf8',
});

/** URI component with only the unreserved characters left as-is. */
export const URI_COMPONENT_STRICT = defineRuleSet({
  name: 'UriComponentStrict',
  immune: UNRESERVED,
  fallback: 'percent-utf8',
});

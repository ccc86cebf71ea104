import { codeUnits } from './char-utils.js';
import { ArgumentError } from './errors.js';

/**
 * How code units in the context's illegal control ranges are treated.
 * - `none`: no special handling, they continue to the passthrough/fallback steps
 * - `html-replace`: 0x00-0x1F and 0x7F-0x9F become the replacement entity `&#xfffd;`
 * - `xml-drop`: 0x00-0x1F, 0x7F-0x84, 0x86-0x9F and 0xFDD0-0xFDDF are dropped
 */
export type ControlPolicy = 'none' | 'html-replace' | 'xml-drop';

/**
 * Encoding used for code units no earlier rule handled.
 * - `html-hex`: `&#x2f;`
 * - `js-hex`: `\x2f` below 0x80, unchanged above
 * - `json-unicode`: `\u002f`
 * - `percent-utf8`: `%2F`, UTF-8 byte-wise
 */
export type FallbackEncoding = 'html-hex' | 'js-hex' | 'json-unicode' | 'percent-utf8';

/**
 * Immutable configuration of the classification engine for one output context.
 */
export interface RuleSet {
  readonly name: string;
  /** Code units always passed through unchanged. */
  readonly immune: ReadonlySet<number>;
  /** Code units always backslash-escaped. */
  readonly escape: ReadonlySet<number>;
  /** Exact replacements, checked before the control and fallback rules. */
  readonly entities: ReadonlyMap<number, string>;
  readonly control: ControlPolicy;
  /** Code units strictly above this value pass unchanged; `null` disables the rule. */
  readonly passthroughAbove: number | null;
  readonly fallback: FallbackEncoding;
}

/**
 * Options for {@link defineRuleSet}. Character sets are given as strings,
 * every code unit of the string is a member.
 */
export interface RuleSetOptions {
  name: string;
  immune?: string;
  escape?: string;
  /** Map of single characters to their replacement. */
  entities?: Readonly<Record<string, string>>;
  control?: ControlPolicy;
  passthroughAbove?: number | null;
  fallback: FallbackEncoding;
}

/**
 * Additions for {@link extendRuleSet}.
 */
export interface RuleSetExtension {
  name: string;
  immune?: string;
  escape?: string;
  entities?: Readonly<Record<string, string>>;
}

const controlPolicies: readonly ControlPolicy[] = [ 'none', 'html-replace', 'xml-drop' ];
const fallbackEncodings: readonly FallbackEncoding[] = [ 'html-hex', 'js-hex', 'json-unicode', 'percent-utf8' ];

const toEntityMap = (entities: Readonly<Record<string, string>>, target = new Map<number, string>()): Map<number, string> => {
  for (const [ char, replacement ] of Object.entries(entities)) {
    if (char.length !== 1) {
      throw new ArgumentError(`Entity keys must be a single code unit: ${JSON.stringify(char)}`);
    }
    if (typeof replacement !== 'string') {
      throw new ArgumentError(`Entity replacement for ${JSON.stringify(char)} must be a string`);
    }
    target.set(char.charCodeAt(0), replacement);
  }
  return target;
};

const freezeRuleSet = (ruleSet: RuleSet): RuleSet => Object.freeze(ruleSet);

/**
 * Create a frozen rule set.
 *
 * @param options - Rule set configuration.
 * @returns Rule set to pass to `classifyCodeUnit` or `characterManipulator`.
 *
 * @example
 * ```ts
 * const dashSafeUri = defineRuleSet({
 *   name: 'UriDashSafe',
 *   immune: '-',
 *   fallback: 'percent-utf8',
 * });
 * ```
 */
export function defineRuleSet (options: RuleSetOptions): RuleSet {
  const control = options.control ?? 'none';
  const passthroughAbove = options.passthroughAbove ?? null;

  if (!controlPolicies.includes(control)) {
    throw new ArgumentError(`Invalid control policy: ${String(control)}`);
  }
  if (!fallbackEncodings.includes(options.fallback)) {
    throw new ArgumentError(`Invalid fallback encoding: ${String(options.fallback)}`);
  }
  if (passthroughAbove !== null && (!Number.isInteger(passthroughAbove) || passthroughAbove < 0 || passthroughAbove > 0xffff)) {
    throw new ArgumentError(`Invalid passthrough threshold: ${passthroughAbove}`);
  }

  return freezeRuleSet({
    name: options.name,
    immune: codeUnits(options.immune ?? ''),
    escape: codeUnits(options.escape ?? ''),
    entities: toEntityMap(options.entities ?? {}),
    control,
    passthroughAbove,
    fallback: options.fallback,
  });
}

/**
 * Derive a rule set from an existing one, adding immune characters,
 * escape characters or entities. The base rule set is left untouched.
 *
 * @param base - Rule set to start from.
 * @param extension - Additions and the name of the new rule set.
 * @returns New frozen rule set.
 */
export function extendRuleSet (base: RuleSet, extension: RuleSetExtension): RuleSet {
  const immune = new Set(base.immune);
  const escape = new Set(base.escape);
  for (const unit of codeUnits(extension.immune ?? '')) immune.add(unit);
  for (const unit of codeUnits(extension.escape ?? '')) escape.add(unit);

  return freezeRuleSet({
    name: extension.name,
    immune,
    escape,
    entities: toEntityMap(extension.entities ?? {}, new Map(base.entities)),
    control: base.control,
    passthroughAbove: base.passthroughAbove,
    fallback: base.fallback,
  });
}

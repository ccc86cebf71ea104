import { scanCdata } from './cdata.js';
import { isSame } from './char-utils.js';
import { classifyCodeUnit } from './classify.js';
import { ArgumentError } from './errors.js';
import type { RuleSet } from './rule-set.js';
import {
  StringSink,
  WriterSink,
  type OutputSink,
  type TextWriter,
} from './sink.js';
import type { TransformMode } from './types.js';

/**
 * Algorithm behind a manipulator, written once against the sink abstraction.
 */
export type SinkTransform = (input: string, sink: OutputSink, mode: TransformMode) => void;

/**
 * Encoder/filter for one output context.
 *
 * All methods are total on the transformation path: absent input yields `null`
 * (string form) or writes nothing (writer form).
 */
export class Manipulator {
  /**
   * @param name - Name of the output context.
   * @param transform - Algorithm writing encoded or filtered output to a sink.
   */
  constructor (
    readonly name: string,
    private readonly transform: SinkTransform,
  ) {}

  /**
   * Replace unsafe code units with their safe equivalents.
   *
   * @param input - Untrusted input.
   * @returns Encoded string, or `null` if the input is absent.
   */
  encode (input: string): string;
  encode (input: string | null | undefined): string | null;
  encode (input: string | null | undefined): string | null {
    return this.transformToString(input, 'encode');
  }

  /**
   * Like {@link encode}, but writes the result to the given writer.
   *
   * @throws {ArgumentError} If the writer is absent while input is present.
   * @throws {SinkWriteError} If the writer throws.
   */
  encodeTo (input: string | null | undefined, writer: TextWriter | null | undefined): void {
    this.transformToWriter(input, writer, 'encode');
  }

  /**
   * Remove every code unit that would need a replacement.
   * The result is always a subsequence of the input.
   *
   * @param input - Untrusted input.
   * @returns Filtered string, or `null` if the input is absent.
   */
  filter (input: string): string;
  filter (input: string | null | undefined): string | null;
  filter (input: string | null | undefined): string | null {
    return this.transformToString(input, 'filter');
  }

  /**
   * Like {@link filter}, but writes the result to the given writer.
   *
   * @throws {ArgumentError} If the writer is absent while input is present.
   * @throws {SinkWriteError} If the writer throws.
   */
  filterTo (input: string | null | undefined, writer: TextWriter | null | undefined): void {
    this.transformToWriter(input, writer, 'filter');
  }

  private transformToString (input: string | null | undefined, mode: TransformMode): string | null {
    if (input === null || input === undefined) return null;

    const sink = new StringSink();
    this.transform(input, sink, mode);
    return sink.toString();
  }

  private transformToWriter (input: string | null | undefined, writer: TextWriter | null | undefined, mode: TransformMode): void {
    if (input === null || input === undefined) return;
    if (!writer || typeof writer.write !== 'function') {
      throw new ArgumentError('Writer cannot be null');
    }

    const sink = new WriterSink(writer);
    this.transform(input, sink, mode);
    sink.flush();
  }
}

/**
 * Create a manipulator that classifies each code unit on its own.
 *
 * Filtering keeps a code unit only if its encoded replacement is the unchanged
 * code unit, so both modes share the same decision function.
 *
 * @param ruleSet - Rule set of the output context.
 * @param name - Context name; defaults to the rule set name.
 * @returns Manipulator for the context.
 */
export const characterManipulator = (ruleSet: RuleSet, name: string = ruleSet.name): Manipulator => {
  return new Manipulator(name, (input, sink, mode) => {
    for (let i = 0; i < input.length; i++) {
      const unit = input.charCodeAt(i);
      const replacement = classifyCodeUnit(unit, ruleSet);
      if (mode === 'encode' || isSame(unit, replacement)) {
        sink.append(replacement);
      }
    }
  });
};

/**
 * Create the manipulator for CDATA section content.
 *
 * @param name - Context name.
 * @returns Manipulator neutralizing `]]>` terminators.
 */
export const cdataManipulator = (name = 'CDATAContent'): Manipulator => {
  return new Manipulator(name, scanCdata);
};

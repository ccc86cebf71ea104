import { isIllegalControl } from './classify.js';
import type { OutputSink } from './sink.js';
import type { TransformMode } from './types.js';

const CDATA_CONTROL_CHAR = 0x5d; // ]
const CDATA_CONTROL_FINISH = 0x3e; // >

/**
 * Replacement for `]]>` when encoding: closes the current section after `]]`
 * and opens a new one for the `>`.
 */
export const CDATA_ENCODED_END = ']]>]]<![CDATA[>';

/**
 * Control characters not allowed in CDATA content.
 * Same ranges as in XML content, but tab, LF and CR are kept.
 *
 * @param unit - UTF-16 code unit.
 * @returns True if the code unit is removed from CDATA content.
 */
export const isCdataControl = (unit: number): boolean => {
  if (unit === 0x09 || unit === 0x0a || unit === 0x0d) return false;
  return isIllegalControl(unit, 'xml-drop');
};

/**
 * Scan CDATA content and neutralize every `]]>` terminator.
 *
 * Consecutive `]` are only counted, not buffered, and written once the next
 * character shows whether the run ends in a terminator. Only the last two `]`
 * of a run followed by `>` belong to the terminator.
 *
 * - encode: each terminator becomes `]]>]]<![CDATA[>`
 * - filter: each terminator is removed; the `]` left in front of it stay pending,
 *   so `]]]]>>` is removed completely and the output never contains `]]>`
 *
 * Dropped control characters are skipped without ending a run, so removing
 * them cannot join `]]` and `>`. Linear in the input length.
 *
 * @param input - Untrusted CDATA content.
 * @param sink - Output sink.
 * @param mode - Output mode.
 */
export function scanCdata (input: string, sink: OutputSink, mode: TransformMode): void {
  let pending = 0;

  for (let i = 0; i < input.length; i++) {
    const unit = input.charCodeAt(i);

    if (unit === CDATA_CONTROL_CHAR) {
      pending++;
      continue;
    }

    if (isCdataControl(unit)) continue;

    if (unit === CDATA_CONTROL_FINISH && pending >= 2) {
      if (mode === 'encode') {
        sink.append(']'.repeat(pending - 2) + CDATA_ENCODED_END);
        pending = 0;
      } else {
        pending -= 2;
      }
      continue;
    }

    sink.append(']'.repeat(pending) + input.charAt(i));
    pending = 0;
  }

  if (pending > 0) {
    sink.append(']'.repeat(pending));
  }
}

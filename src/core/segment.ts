/**
 * Text segmentation.
 *
 * Raw string values from the tree may span several lines, while a compound
 * never does. Segmentation cuts a value at every line break and feeds the
 * pieces to a {@link LineSink}, asking it to start a new line in between.
 *
 * @module core/segment
 */
import type { Compound } from '../types.js';
import type { CompoundFlags } from './types.js';

/** Receiver of segmented text, implemented by the emitter. */
export interface LineSink {
  /** Append a compound to the line being built. */
  appendCompound(compound: Compound): void;
  /** Finish the line being built and start another with the same style. */
  breakLine(): void;
}

export const PLAIN: CompoundFlags = {
  bold: false,
  italic: false,
  code: false,
  strikeout: false,
};

/**
 * Create a {@link Compound} with the given content and flags.
 */
export function makeCompound(src: string, flags: CompoundFlags): Compound {
  return {
    src,
    bold: flags.bold,
    italic: flags.italic,
    code: flags.code,
    strikeout: flags.strikeout,
  };
}

/**
 * Split a value on `\r\n` or `\n`.
 *
 * Empty fragments are kept, so `"a\n\nb"` yields `["a", "", "b"]`.
 */
export function splitLines(raw: string): string[] {
  return raw.split(/\r?\n/);
}

/**
 * Feed `raw` to `sink`, one compound per line fragment.
 *
 * Empty fragments add no compound but still end their line.
 */
export function segmentText(sink: LineSink, raw: string, flags: CompoundFlags): void {
  const fragments = splitLines(raw);
  fragments.forEach((fragment, i) => {
    if (i > 0) {
      sink.breakLine();
    }
    if (fragment.length > 0) {
      sink.appendCompound(makeCompound(fragment, flags));
    }
  });
}

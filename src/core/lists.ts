/**
 * List item reshaping.
 *
 * Each list item is converted on its own into a small document; this module
 * turns that document into the lines of a bullet. The first paragraph becomes
 * the bullet line and everything after it is indented one level.
 *
 * Kept apart from the emitter so the emitter can depend on it without a cycle.
 *
 * @module core/lists
 */
import type { Line } from '../types.js';
import { MAX_LIST_INDENT } from '../types.js';
import { ListTooMuchNestedError, UnsupportedLineError } from './errors.js';
import { makeCompound, PLAIN } from './segment.js';

/** Prefix given to non-bullet blocks nested in a list item. */
export const NESTED_BLOCK_INDENT = '  ';

/**
 * Rewrite the lines of a converted list item into bullet lines.
 *
 * The input array is consumed and must not be reused by the caller.
 *
 * @throws {ListTooMuchNestedError} when a nested bullet would exceed
 *   {@link MAX_LIST_INDENT}.
 * @throws {UnsupportedLineError} for code fence and table lines.
 */
export function rewriteListItem(lines: Line[]): Line[] {
  const first = lines[0];
  if (first?.type === 'normal' && first.composite.style.kind === 'paragraph') {
    first.composite.style = { kind: 'listItem', indent: 0 };
  } else {
    lines.unshift({
      type: 'normal',
      composite: { style: { kind: 'listItem', indent: 0 }, compounds: [] },
    });
  }

  for (let i = 1; i < lines.length; i++) {
    lines[i] = indentLine(lines[i]);
  }
  return lines;
}

/**
 * Push a line one nesting level deeper.
 */
export function indentLine(line: Line): Line {
  switch (line.type) {
    case 'normal': {
      const { style, compounds } = line.composite;
      if (style.kind === 'listItem') {
        if (style.indent >= MAX_LIST_INDENT) {
          throw new ListTooMuchNestedError();
        }
        return {
          type: 'normal',
          composite: { style: { kind: 'listItem', indent: style.indent + 1 }, compounds },
        };
      }
      return {
        type: 'normal',
        composite: { style, compounds: [makeCompound(NESTED_BLOCK_INDENT, PLAIN), ...compounds] },
      };
    }
    case 'horizontalRule':
      return line;
    case 'codeFence':
    case 'tableRow':
    case 'tableRule':
      throw new UnsupportedLineError(line.type);
  }
}

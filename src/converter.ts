import type { Nodes } from 'mdast';
import type { StyledText } from './types.js';
import type { ConversionOptions, ParserOptions } from './core/types.js';
import { Emitter } from './core/emitter.js';
import { ConversionError } from './core/errors.js';
import { resolveOptions } from './core/options.js';
import { parseMarkdown } from './core/parser.js';

/**
 * Outcome of {@link tryConvert}.
 */
export type ConvertResult =
  | { ok: true; text: StyledText }
  | { ok: false; error: ConversionError };

/**
 * Options for {@link markdownToStyledText}.
 */
export interface MarkdownConvertOptions {
  /** Options forwarded to the markdown lexer. */
  parser?: ParserOptions;
  /** Options for the conversion engine. */
  conversion?: Partial<ConversionOptions>;
}

/**
 * Convert an mdast tree into a styled-text document.
 *
 * A fresh emitter walks the tree once; nothing is shared between calls. The
 * tree is only read.
 *
 * @param root - Tree to convert, usually a `root` node.
 * @param options - Overrides for the default conversion options.
 * @returns The converted document.
 * @throws {ConversionError} when the tree holds a node the styled-text model
 *   cannot represent. The error is wrapped once per ancestor of the failing
 *   node; see {@link formatErrorChain}.
 *
 * @example
 * ```ts
 * const text = convert(parseMarkdown('# Hi\n\nbody'));
 * console.log(text.lines.length); // 3 (header, blank spacer, paragraph)
 * ```
 */
export function convert(root: Nodes, options?: Partial<ConversionOptions>): StyledText {
  const emitter = new Emitter(resolveOptions(options));
  emitter.node(root);
  return emitter.finish();
}

/**
 * Like {@link convert}, but reports failure as a value.
 *
 * Errors that are not conversion errors are still thrown.
 */
export function tryConvert(root: Nodes, options?: Partial<ConversionOptions>): ConvertResult {
  try {
    return { ok: true, text: convert(root, options) };
  } catch (err) {
    if (err instanceof ConversionError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

/**
 * Parse markdown source and convert it in one step.
 *
 * @throws {ConversionError} see {@link convert}.
 */
export function markdownToStyledText(
  markdown: string,
  options: MarkdownConvertOptions = {},
): StyledText {
  return convert(parseMarkdown(markdown, options.parser), options.conversion);
}

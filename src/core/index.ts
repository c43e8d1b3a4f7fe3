/**
 * Core module barrel exports.
 *
 * @module core
 */

// Parser
export { parseMarkdown } from './parser.js';

// Engine
export { Emitter } from './emitter.js';
export { classifyNode } from './classifier.js';
export type { NodeKind } from './classifier.js';
export { rewriteListItem, indentLine, NESTED_BLOCK_INDENT } from './lists.js';
export { segmentText, splitLines, makeCompound, PLAIN } from './segment.js';
export type { LineSink } from './segment.js';

// Errors
export {
  ConversionError,
  UnsupportedNodeError,
  UnsupportedChildNodeError,
  UnsupportedNumberedListsError,
  ListTooMuchNestedError,
  UnsupportedLineError,
  WhileEmittingError,
  errorChain,
  rootCause,
  formatErrorChain,
} from './errors.js';

// Options
export { DEFAULT_CONVERSION_OPTIONS, DEFAULT_HEADER_SPACING, resolveOptions } from './options.js';

// Types
export type {
  ParserOptions,
  ConversionOptions,
  HeaderSpacing,
  LinksStyle,
  InlineStyle,
  CompoundFlags,
  ContentModel,
} from './types.js';

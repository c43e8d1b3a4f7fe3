/**
 * md2term - mdast to styled terminal text converter
 */

// High-level conversion API
export { convert, tryConvert, markdownToStyledText } from './converter.js';
export type { ConvertResult, MarkdownConvertOptions } from './converter.js';

// Output model
export { MAX_LIST_INDENT } from './types.js';
export type {
  StyledText,
  Line,
  Composite,
  CompositeStyle,
  Compound,
  HeaderLevel,
  Alignment,
  TableRow,
  TableRule,
} from './types.js';

// Core module re-exports
export {
  parseMarkdown,
  classifyNode,
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
  DEFAULT_CONVERSION_OPTIONS,
  resolveOptions,
} from './core/index.js';

export type {
  NodeKind,
  ParserOptions,
  ConversionOptions,
  HeaderSpacing,
  LinksStyle,
} from './core/index.js';

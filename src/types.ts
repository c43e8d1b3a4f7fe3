/**
 * Styled-text document model produced by the converter.
 *
 * The model is deliberately narrow: a flat list of lines, each holding a
 * styled composite of inline compounds. Layout (wrapping, widths) is left
 * to whatever renders it.
 */

/** Block-level style of a composite. */
export type CompositeStyle =
  | { kind: 'paragraph' }
  | { kind: 'header'; level: HeaderLevel }
  | { kind: 'code' }
  | { kind: 'quote' }
  /** `indent` ranges over 0..=255 (see {@link MAX_LIST_INDENT}). */
  | { kind: 'listItem'; indent: number };

export type HeaderLevel = 1 | 2 | 3 | 4 | 5 | 6;

/** Deepest list indentation the model can represent. */
export const MAX_LIST_INDENT = 255;

/**
 * A run of text sharing one set of inline flags.
 *
 * `src` never contains a line break.
 */
export interface Compound {
  src: string;
  bold: boolean;
  italic: boolean;
  code: boolean;
  strikeout: boolean;
}

/** A styled block: one output line worth of compounds. */
export interface Composite {
  style: CompositeStyle;
  compounds: Compound[];
}

/** Column alignment of a table rule. */
export type Alignment = 'unspecified' | 'left' | 'center' | 'right';

export interface TableRow {
  cells: Composite[];
}

export interface TableRule {
  cells: Alignment[];
}

/** One line of the output document. */
export type Line =
  | { type: 'normal'; composite: Composite }
  | { type: 'codeFence'; composite: Composite }
  | { type: 'horizontalRule' }
  | { type: 'tableRow'; row: TableRow }
  | { type: 'tableRule'; rule: TableRule };

/** The converted document. */
export interface StyledText {
  lines: Line[];
}

/**
 * Core type definitions shared by the parser and the conversion engine.
 */
import type { CompositeStyle, Compound } from '../types.js';

/**
 * Options that control how Markdown source is parsed.
 */
export interface ParserOptions {
  /**
   * Enable GitHub Flavored Markdown extensions (tables, strikethrough, etc.).
   * @default true
   */
  gfm?: boolean;

  /**
   * Enable GFM line breaks. Requires `gfm` to be `true`.
   * @default false
   */
  breaks?: boolean;
}

/**
 * Per-flag style override applied to link contents.
 *
 * A set flag forces that style on or off inside the link; an unset flag
 * inherits the surrounding style.
 */
export interface LinksStyle {
  bold?: boolean;
  italic?: boolean;
  strikeout?: boolean;
}

/** Header spacing flags, indexed by heading depth minus one. */
export type HeaderSpacing = readonly [boolean, boolean, boolean, boolean, boolean, boolean];

/**
 * Options consulted by the conversion engine.
 */
export interface ConversionOptions {
  /**
   * Whether a blank line separates a heading of each depth from the next block.
   * @default [true, false, false, false, false, false]
   */
  headerSpacing: HeaderSpacing;

  /**
   * Style overrides for link contents.
   * @default {}
   */
  linksStyle: LinksStyle;
}

/** Emphasis flags inherited by text while walking inline content. */
export interface InlineStyle {
  readonly bold: boolean;
  readonly italic: boolean;
  readonly strikeout: boolean;
}

/** Flags stamped onto a single compound. */
export interface CompoundFlags extends InlineStyle {
  readonly code: boolean;
}

/**
 * What the emitter is currently building.
 *
 * `flow` sits between blocks, `spacing` records whether the next block must be
 * preceded by a blank line. `phrasing` accumulates the compounds of one line.
 */
export type ContentModel =
  | { kind: 'flow'; spacing: boolean }
  | { kind: 'phrasing'; style: CompositeStyle; compounds: Compound[] };

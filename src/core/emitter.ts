/**
 * Conversion engine.
 *
 * Walks an mdast tree depth-first and emits styled-text lines. Two pieces of
 * state travel with the walk: the content model (between blocks, or filling
 * one line with compounds) and the inline style passed down as a value.
 *
 * @module core/emitter
 */
import type { List, Nodes, Parent, RootContent } from 'mdast';
import type { CompositeStyle, Compound, HeaderLevel, Line, StyledText } from '../types.js';
import { classifyNode } from './classifier.js';
import {
  ConversionError,
  UnsupportedChildNodeError,
  UnsupportedNodeError,
  UnsupportedNumberedListsError,
  WhileEmittingError,
} from './errors.js';
import { rewriteListItem } from './lists.js';
import { PLAIN, segmentText, type LineSink } from './segment.js';
import type { ContentModel, ConversionOptions, InlineStyle } from './types.js';

const NO_EMPHASIS: InlineStyle = { bold: false, italic: false, strikeout: false };

const PARAGRAPH: CompositeStyle = { kind: 'paragraph' };

const HEADER_LEVELS = [1, 2, 3, 4, 5, 6] as const;

/**
 * Single-use emitter: construct, feed one tree with {@link node}, then
 * {@link finish}.
 */
export class Emitter implements LineSink {
  private readonly lines: Line[] = [];
  private model: ContentModel | undefined;

  constructor(private readonly options: ConversionOptions) {}

  /**
   * Emit a node and its subtree.
   *
   * @throws {ConversionError} when the subtree holds a node the model
   *   cannot represent.
   */
  node(node: Nodes, style: InlineStyle = NO_EMPHASIS): void {
    switch (node.type) {
      case 'root':
        this.children(node, style);
        return;

      case 'heading': {
        const level = headerLevel(node.depth);
        this.phrasing(
          { kind: 'header', level },
          this.options.headerSpacing[level - 1] ?? false,
          () => this.children(node, style),
        );
        return;
      }

      case 'paragraph':
        this.phrasing(PARAGRAPH, true, () => this.children(node, style));
        return;

      case 'code':
        this.phrasing({ kind: 'code' }, true, () => segmentText(this, node.value, PLAIN));
        return;

      case 'text':
        segmentText(this, node.value, { ...style, code: false });
        return;

      case 'inlineCode':
        segmentText(this, node.value, { ...style, code: true });
        return;

      case 'strong':
        this.children(node, { ...style, bold: true });
        return;

      case 'emphasis':
        this.children(node, { ...style, italic: true });
        return;

      case 'delete':
        this.children(node, { ...style, strikeout: true });
        return;

      case 'link': {
        const { linksStyle } = this.options;
        this.children(node, {
          bold: linksStyle.bold ?? style.bold,
          italic: linksStyle.italic ?? style.italic,
          strikeout: linksStyle.strikeout ?? style.strikeout,
        });
        return;
      }

      case 'list':
        this.list(node);
        return;

      case 'listItem':
        throw new UnsupportedChildNodeError('ListItem');

      default:
        throw new UnsupportedNodeError(classifyNode(node));
    }
  }

  /**
   * Complete the emission, flushing any line still being built.
   */
  finish(): StyledText {
    const model = this.model;
    this.model = undefined;
    if (model?.kind === 'phrasing' && model.compounds.length > 0) {
      this.pushLine(model.style, model.compounds);
    }
    return { lines: this.lines };
  }

  appendCompound(compound: Compound): void {
    this.ensurePhrasing().compounds.push(compound);
  }

  breakLine(): void {
    const current = this.ensurePhrasing();
    this.pushLine(current.style, current.compounds);
    this.model = { kind: 'phrasing', style: current.style, compounds: [] };
  }

  /**
   * Visit children in order, wrapping any failure with the parent's kind.
   */
  private children(parent: Nodes & Parent, style: InlineStyle): void {
    for (const child of parent.children) {
      try {
        this.node(child, style);
      } catch (err) {
        throw wrapError(parent, err);
      }
    }
  }

  /**
   * Run `body` inside a phrasing scope of the given style.
   *
   * On every exit path, error included, the enclosing flow model is restored
   * with `spacing` and whatever the scope still buffers is flushed.
   */
  private phrasing(style: CompositeStyle, spacing: boolean, body: () => void): void {
    let outer: ContentModel = this.model ?? { kind: 'flow', spacing: false };
    if (outer.kind === 'phrasing') {
      // Only reachable on malformed trees (a block inside inline content).
      this.pushLine(outer.style, outer.compounds);
      outer = { kind: 'flow', spacing: false };
    }
    if (outer.spacing) {
      this.pushLine(PARAGRAPH, []);
    }

    this.model = { kind: 'phrasing', style, compounds: [] };
    try {
      body();
    } finally {
      const inner = this.model;
      this.model = { kind: 'flow', spacing };
      if (inner?.kind === 'phrasing' && inner.compounds.length > 0) {
        this.pushLine(inner.style, inner.compounds);
      }
    }
  }

  /**
   * Emit an unordered list, one independently converted document per item.
   */
  private list(list: List): void {
    if (list.ordered) {
      throw new UnsupportedNumberedListsError();
    }
    this.phrasing(PARAGRAPH, true, () => {
      for (const item of list.children) {
        try {
          for (const line of this.listItem(item)) {
            this.lines.push(line);
          }
        } catch (err) {
          throw wrapError(list, err);
        }
      }
    });
  }

  private listItem(item: RootContent): Line[] {
    if (item.type !== 'listItem') {
      throw new UnsupportedChildNodeError(classifyNode(item), 'List');
    }
    const sub = new Emitter(this.options);
    sub.children(item, NO_EMPHASIS);
    return rewriteListItem(sub.finish().lines);
  }

  /**
   * Return the phrasing model, opening a paragraph one when text shows up
   * outside any block.
   */
  private ensurePhrasing(): Extract<ContentModel, { kind: 'phrasing' }> {
    if (this.model?.kind === 'phrasing') {
      return this.model;
    }
    const opened: Extract<ContentModel, { kind: 'phrasing' }> = {
      kind: 'phrasing',
      style: PARAGRAPH,
      compounds: [],
    };
    this.model = opened;
    return opened;
  }

  private pushLine(style: CompositeStyle, compounds: Compound[]): void {
    this.lines.push({ type: 'normal', composite: { style, compounds } });
  }
}

/** Heading depths outside 1..6 (malformed trees) are clamped into range. */
function headerLevel(depth: number): HeaderLevel {
  return HEADER_LEVELS[Math.min(Math.max(Math.trunc(depth) || 1, 1), 6) - 1];
}

function wrapError(parent: Nodes, err: unknown): unknown {
  return err instanceof ConversionError ? new WhileEmittingError(classifyNode(parent), err) : err;
}

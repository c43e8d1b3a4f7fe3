/**
 * Stable symbolic names for mdast nodes, used to build diagnostics.
 *
 * @module core/classifier
 */
import type { Nodes } from 'mdast';

/** Symbolic name of an mdast node kind. */
export type NodeKind =
  | 'Root'
  | 'Blockquote'
  | 'Break'
  | 'Code'
  | 'Definition'
  | 'Delete'
  | 'Emphasis'
  | 'FootnoteDefinition'
  | 'FootnoteReference'
  | 'Heading'
  | 'Html'
  | 'Image'
  | 'ImageReference'
  | 'InlineCode'
  | 'Link'
  | 'LinkReference'
  | 'List'
  | 'ListItem'
  | 'Paragraph'
  | 'Strong'
  | 'Table'
  | 'TableCell'
  | 'TableRow'
  | 'Text'
  | 'ThematicBreak'
  | 'Yaml';

/**
 * Classify a node.
 *
 * The switch is exhaustive over the mdast node union: a kind added to the
 * union without a case here fails to compile.
 */
export function classifyNode(node: Nodes): NodeKind {
  switch (node.type) {
    case 'root':
      return 'Root';
    case 'blockquote':
      return 'Blockquote';
    case 'break':
      return 'Break';
    case 'code':
      return 'Code';
    case 'definition':
      return 'Definition';
    case 'delete':
      return 'Delete';
    case 'emphasis':
      return 'Emphasis';
    case 'footnoteDefinition':
      return 'FootnoteDefinition';
    case 'footnoteReference':
      return 'FootnoteReference';
    case 'heading':
      return 'Heading';
    case 'html':
      return 'Html';
    case 'image':
      return 'Image';
    case 'imageReference':
      return 'ImageReference';
    case 'inlineCode':
      return 'InlineCode';
    case 'link':
      return 'Link';
    case 'linkReference':
      return 'LinkReference';
    case 'list':
      return 'List';
    case 'listItem':
      return 'ListItem';
    case 'paragraph':
      return 'Paragraph';
    case 'strong':
      return 'Strong';
    case 'table':
      return 'Table';
    case 'tableCell':
      return 'TableCell';
    case 'tableRow':
      return 'TableRow';
    case 'text':
      return 'Text';
    case 'thematicBreak':
      return 'ThematicBreak';
    case 'yaml':
      return 'Yaml';
    default: {
      const unreachable: never = node;
      return unreachable;
    }
  }
}

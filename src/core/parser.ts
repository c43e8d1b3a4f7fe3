/**
 * Markdown parser module.
 *
 * Tokenizes Markdown source with the `marked` lexer and reshapes the token
 * tree into mdast, the tree the conversion engine walks.
 *
 * @module core/parser
 */
import { decodeHTMLStrict } from 'entities';
import { marked } from 'marked';
import type { Token, Tokens } from 'marked';
import type {
  AlignType,
  BlockContent,
  DefinitionContent,
  ListItem,
  PhrasingContent,
  Root,
  RootContent,
  TableCell,
  TableRow,
} from 'mdast';
import type { ParserOptions } from './types.js';

const HEADING_DEPTHS = [1, 2, 3, 4, 5, 6] as const;

/**
 * Convert block-level tokens into mdast flow content.
 *
 * `space` tokens carry no content and are dropped.
 */
function convertBlockTokens(tokens: Token[]): RootContent[] {
  const nodes: RootContent[] = [];
  for (const token of tokens) {
    const node = convertBlockToken(token);
    if (node) {
      nodes.push(node);
    }
  }
  return nodes;
}

function convertBlockToken(token: Token): RootContent | null {
  switch (token.type) {
    case 'heading': {
      const t = token as Tokens.Heading;
      const depth = HEADING_DEPTHS[Math.min(Math.max(t.depth, 1), 6) - 1];
      return { type: 'heading', depth, children: convertInlineTokens(t.tokens) };
    }

    case 'paragraph': {
      const t = token as Tokens.Paragraph;
      return { type: 'paragraph', children: convertInlineTokens(t.tokens) };
    }

    case 'text': {
      // Block-level `text` tokens appear in tight list items, where mdast
      // still wraps the content in a paragraph.
      const t = token as Tokens.Text;
      const children = t.tokens && t.tokens.length > 0
        ? convertInlineTokens(t.tokens)
        : mergeText([{ type: 'text', value: decodeHTMLStrict(t.text) }]);
      return { type: 'paragraph', children };
    }

    case 'code': {
      const t = token as Tokens.Code;
      return { type: 'code', lang: t.lang || null, meta: null, value: t.text };
    }

    case 'blockquote': {
      const t = token as Tokens.Blockquote;
      return { type: 'blockquote', children: asFlow(convertBlockTokens(t.tokens)) };
    }

    case 'list': {
      const t = token as Tokens.List;
      return {
        type: 'list',
        ordered: t.ordered,
        start: t.ordered && typeof t.start === 'number' ? t.start : null,
        spread: t.loose,
        children: t.items.map(convertListItem),
      };
    }

    case 'hr':
      return { type: 'thematicBreak' };

    case 'html': {
      const t = token as Tokens.HTML;
      return { type: 'html', value: t.text.replace(/\n+$/, '') };
    }

    case 'table':
      return convertTable(token as Tokens.Table);

    case 'def': {
      const t = token as Tokens.Def;
      return {
        type: 'definition',
        identifier: t.tag,
        label: t.tag,
        url: decodeHTMLStrict(t.href),
        title: decodeTitle(t.title),
      };
    }

    case 'space':
      return null;

    default: {
      // Tokens from lexer extensions: keep their text as a paragraph.
      const raw = (token as { raw?: string }).raw ?? '';
      return raw.trim()
        ? { type: 'paragraph', children: [{ type: 'text', value: raw.trim() }] }
        : null;
    }
  }
}

function convertListItem(item: Tokens.ListItem): ListItem {
  return {
    type: 'listItem',
    spread: item.loose,
    checked: item.task ? Boolean(item.checked) : null,
    children: asFlow(convertBlockTokens(item.tokens)),
  };
}

function convertTable(table: Tokens.Table): RootContent {
  const align: AlignType[] = table.align.map((a) => a ?? null);
  const row = (cells: Tokens.TableCell[]): TableRow => ({
    type: 'tableRow',
    children: cells.map((cell): TableCell => ({
      type: 'tableCell',
      children: convertInlineTokens(cell.tokens),
    })),
  });
  return {
    type: 'table',
    align,
    children: [row(table.header), ...table.rows.map(row)],
  };
}

/**
 * Convert inline tokens into mdast phrasing content.
 *
 * Adjacent text runs are merged and character references in text are
 * decoded, as an mdast parser would produce them. Code spans stay verbatim.
 */
function convertInlineTokens(tokens: Token[]): PhrasingContent[] {
  const nodes: PhrasingContent[] = [];
  for (const token of tokens) {
    nodes.push(...convertInlineToken(token));
  }
  return mergeText(nodes);
}

function convertInlineToken(token: Token): PhrasingContent[] {
  switch (token.type) {
    case 'text': {
      const t = token as Tokens.Text;
      if (t.tokens && t.tokens.length > 0) {
        return convertInlineTokens(t.tokens);
      }
      return [{ type: 'text', value: decodeHTMLStrict(t.text) }];
    }

    // Escaped characters are already literal and are not decoded again.
    case 'escape': {
      const t = token as Tokens.Escape;
      return [{ type: 'text', value: t.text }];
    }

    case 'strong': {
      const t = token as Tokens.Strong;
      return [{ type: 'strong', children: convertInlineTokens(t.tokens) }];
    }

    case 'em': {
      const t = token as Tokens.Em;
      return [{ type: 'emphasis', children: convertInlineTokens(t.tokens) }];
    }

    case 'del': {
      const t = token as Tokens.Del;
      return [{ type: 'delete', children: convertInlineTokens(t.tokens) }];
    }

    case 'codespan': {
      const t = token as Tokens.Codespan;
      return [{ type: 'inlineCode', value: t.text }];
    }

    case 'link': {
      const t = token as Tokens.Link;
      return [{
        type: 'link',
        url: decodeHTMLStrict(t.href),
        title: decodeTitle(t.title),
        children: convertInlineTokens(t.tokens),
      }];
    }

    case 'image': {
      const t = token as Tokens.Image;
      return [{
        type: 'image',
        url: decodeHTMLStrict(t.href),
        title: decodeTitle(t.title),
        alt: decodeHTMLStrict(t.text),
      }];
    }

    case 'br':
      return [{ type: 'break' }];

    case 'html': {
      const t = token as Tokens.Tag;
      return [{ type: 'html', value: t.text }];
    }

    default: {
      // Fallback: keep unknown inline tokens as their raw text.
      const raw = (token as { raw?: string }).raw ?? '';
      return raw ? [{ type: 'text', value: raw }] : [];
    }
  }
}

function decodeTitle(title: string | null | undefined): string | null {
  return title ? decodeHTMLStrict(title) : null;
}

function mergeText(nodes: PhrasingContent[]): PhrasingContent[] {
  const merged: PhrasingContent[] = [];
  for (const node of nodes) {
    const last = merged[merged.length - 1];
    if (node.type === 'text' && last?.type === 'text') {
      merged[merged.length - 1] = { type: 'text', value: last.value + node.value };
    } else {
      merged.push(node);
    }
  }
  return merged;
}

/**
 * Narrow converted block content to what block containers may hold.
 *
 * The converters above only ever build flow content for these positions, so
 * anything else is dropped rather than producing an invalid tree.
 */
function asFlow(nodes: RootContent[]): Array<BlockContent | DefinitionContent> {
  return nodes.filter(isFlowContent);
}

function isFlowContent(node: RootContent): node is BlockContent | DefinitionContent {
  switch (node.type) {
    case 'blockquote':
    case 'code':
    case 'heading':
    case 'html':
    case 'list':
    case 'paragraph':
    case 'table':
    case 'thematicBreak':
    case 'definition':
    case 'footnoteDefinition':
      return true;
    default:
      return false;
  }
}

/**
 * Parse a Markdown string into an mdast {@link Root}.
 *
 * @param markdown - Raw Markdown source. Non-string input is treated as empty.
 * @param options - Parser options (GFM, line breaks).
 *
 * @example
 * ```ts
 * const root = parseMarkdown('# Hello');
 * console.log(root.children[0].type); // 'heading'
 * ```
 */
export function parseMarkdown(markdown: string, options?: ParserOptions): Root {
  // Normalise falsy / non-string inputs to the empty string so the lexer
  // never receives `undefined` or `null`.
  const source: string = typeof markdown === 'string' ? markdown : '';

  if (source.trim().length === 0) {
    return { type: 'root', children: [] };
  }

  const gfm = options?.gfm ?? true;
  const breaks = options?.breaks ?? false;

  const tokens = marked.lexer(source, { gfm, breaks });
  return { type: 'root', children: convertBlockTokens(tokens) };
}

/**
 * mdast node builders for tests.
 */
import type {
  BlockContent,
  Code,
  Delete,
  DefinitionContent,
  Emphasis,
  Heading,
  InlineCode,
  Link,
  List,
  ListItem,
  Paragraph,
  PhrasingContent,
  Root,
  RootContent,
  Strong,
  Text,
} from 'mdast';
import type { Compound, Line } from '../../src/types.js';

export function root(...children: RootContent[]): Root {
  return { type: 'root', children };
}

export function h(depth: Heading['depth'], ...children: PhrasingContent[]): Heading {
  return { type: 'heading', depth, children };
}

export function p(...children: PhrasingContent[]): Paragraph {
  return { type: 'paragraph', children };
}

export function t(value: string): Text {
  return { type: 'text', value };
}

export function strong(...children: PhrasingContent[]): Strong {
  return { type: 'strong', children };
}

export function em(...children: PhrasingContent[]): Emphasis {
  return { type: 'emphasis', children };
}

export function del(...children: PhrasingContent[]): Delete {
  return { type: 'delete', children };
}

export function inlineCode(value: string): InlineCode {
  return { type: 'inlineCode', value };
}

export function link(url: string, ...children: PhrasingContent[]): Link {
  return { type: 'link', url, children };
}

export function code(value: string, lang: string | null = null): Code {
  return { type: 'code', lang, value };
}

export function ul(...items: ListItem[]): List {
  return { type: 'list', ordered: false, spread: false, children: items };
}

export function ol(...items: ListItem[]): List {
  return { type: 'list', ordered: true, start: 1, spread: false, children: items };
}

export function li(...children: Array<BlockContent | DefinitionContent>): ListItem {
  return { type: 'listItem', spread: false, children };
}

/** Compound with every flag off unless overridden. */
export function c(src: string, flags: Partial<Omit<Compound, 'src'>> = {}): Compound {
  return { src, bold: false, italic: false, code: false, strikeout: false, ...flags };
}

export function paragraphLine(...compounds: Compound[]): Line {
  return { type: 'normal', composite: { style: { kind: 'paragraph' }, compounds } };
}

export function headerLine(level: Heading['depth'], ...compounds: Compound[]): Line {
  return { type: 'normal', composite: { style: { kind: 'header', level }, compounds } };
}

export function codeLine(...compounds: Compound[]): Line {
  return { type: 'normal', composite: { style: { kind: 'code' }, compounds } };
}

export function bulletLine(indent: number, ...compounds: Compound[]): Line {
  return { type: 'normal', composite: { style: { kind: 'listItem', indent }, compounds } };
}

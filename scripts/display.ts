/**
 * Print a markdown file through the converter.
 *
 * Each output line is printed with a prefix for its style and inline markers
 * around styled compounds. This is a dump of the model, not a renderer: no
 * colours, no wrapping.
 *
 * Usage:
 *   npx tsx scripts/display.ts <input.md> [--ast] [flags]
 *
 *   --ast   also print the mdast tree and the converted document as JSON
 */

import * as fs from 'node:fs';
import { convert } from '../src/converter.js';
import { parseMarkdown } from '../src/core/parser.js';
import { ConversionError, formatErrorChain } from '../src/core/errors.js';
import type { Composite, Compound, Line } from '../src/types.js';
import { parseDriverArgs } from './cli-options.js';

function markCompound(compound: Compound): string {
  let text = compound.src;
  if (compound.code) text = `\`${text}\``;
  if (compound.italic) text = `*${text}*`;
  if (compound.bold) text = `**${text}**`;
  if (compound.strikeout) text = `~~${text}~~`;
  return text;
}

function compositePrefix(composite: Composite): string {
  const { style } = composite;
  switch (style.kind) {
    case 'paragraph':
      return '';
    case 'header':
      return `${'#'.repeat(style.level)} `;
    case 'code':
      return '    ';
    case 'quote':
      return '> ';
    case 'listItem':
      return `${'  '.repeat(style.indent)}- `;
  }
}

function formatLine(line: Line): string {
  switch (line.type) {
    case 'normal':
    case 'codeFence':
      return compositePrefix(line.composite) + line.composite.compounds.map(markCompound).join('');
    case 'horizontalRule':
      return '---';
    case 'tableRow':
      return `| ${line.row.cells.map((c) => c.compounds.map(markCompound).join('')).join(' | ')} |`;
    case 'tableRule':
      return `|${line.rule.cells.map(() => '---').join('|')}|`;
  }
}

function main(): void {
  const { positional, flags, options } = parseDriverArgs(process.argv);
  const [input] = positional;

  if (!input) {
    console.error('Usage: display.ts <input.md> [--ast]');
    process.exit(1);
  }

  const printAst = flags.has('--ast') || flags.has('-a');
  const tree = parseMarkdown(fs.readFileSync(input, 'utf8'), options.parser);
  if (printAst) {
    console.log(JSON.stringify(tree, null, 2));
  }

  try {
    const text = convert(tree, options.conversion);
    if (printAst) {
      console.log(JSON.stringify(text, null, 2));
    }
    for (const line of text.lines) {
      console.log(formatLine(line));
    }
  } catch (err) {
    if (err instanceof ConversionError) {
      console.error('Error during ast conversion:');
      console.error(formatErrorChain(err));
      process.exit(1);
    }
    throw err;
  }
}

try {
  main();
} catch (err) {
  console.error('Fatal error in display:', err);
  process.exit(1);
}

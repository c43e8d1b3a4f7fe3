/**
 * Dump both trees of a conversion for inspection.
 *
 * Parses a markdown file, writes the mdast tree and the converted styled-text
 * document as JSON, and reports whether the conversion succeeded.
 *
 * Usage:
 *   npx tsx scripts/compare-asts.ts <input.md> [parsed.json] [converted.json] [flags]
 *
 * Output paths default to `<input>.mdast.json` and `<input>.converted.json`.
 * See cli-options.ts for the conversion flags.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { convert } from '../src/converter.js';
import { parseMarkdown } from '../src/core/parser.js';
import { ConversionError, formatErrorChain } from '../src/core/errors.js';
import { parseDriverArgs } from './cli-options.js';

function withSuffix(file: string, suffix: string): string {
  const parsed = path.parse(file);
  return path.join(parsed.dir, `${parsed.name}${suffix}`);
}

function main(): void {
  const { positional, options } = parseDriverArgs(process.argv);
  const [input, parsedOut, convertedOut] = positional;

  if (!input) {
    console.error('Usage: compare-asts.ts <input.md> [parsed.json] [converted.json]');
    process.exit(1);
  }

  const parsedFile = parsedOut ?? withSuffix(input, '.mdast.json');
  const convertedFile = convertedOut ?? withSuffix(input, '.converted.json');

  const markdown = fs.readFileSync(input, 'utf8');
  const tree = parseMarkdown(markdown, options.parser);
  fs.writeFileSync(parsedFile, JSON.stringify(tree, null, 2));
  console.log(`  Wrote: ${parsedFile}`);

  try {
    const text = convert(tree, options.conversion);
    fs.writeFileSync(convertedFile, JSON.stringify(text, null, 2));
    console.log(`  Wrote: ${convertedFile}`);
    console.log(`\nConverted ${tree.children.length} top-level nodes into ${text.lines.length} lines.`);
  } catch (err) {
    if (err instanceof ConversionError) {
      console.error('Cannot convert the markdown:');
      console.error(formatErrorChain(err));
      process.exit(1);
    }
    throw err;
  }
}

try {
  main();
} catch (err) {
  console.error('Fatal error in compare-asts:', err);
  process.exit(1);
}

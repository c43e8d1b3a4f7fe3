/**
 * Command-line flag handling shared by the driver scripts.
 *
 * Flags:
 *   --spacing=<depths>   comma separated heading depths followed by a blank line
 *                        (default: 1)
 *   --links-bold         force bold inside links
 *   --links-italic       force italic inside links
 *   --links-strikeout    force strikeout inside links
 *   --no-gfm             disable GitHub Flavored Markdown
 *   --breaks             treat single newlines as hard breaks
 */

import type { ConversionOptions, HeaderSpacing, LinksStyle } from '../src/core/types.js';
import type { MarkdownConvertOptions } from '../src/converter.js';

export interface DriverArgs {
  /** Positional arguments, in order. */
  positional: string[];
  /** Bare boolean flags other than the conversion ones (e.g. `--ast`). */
  flags: Set<string>;
  options: MarkdownConvertOptions;
}

function parseSpacing(value: string): HeaderSpacing {
  const depths = new Set(
    value
      .split(',')
      .map((d) => parseInt(d.trim(), 10))
      .filter((d) => !isNaN(d)),
  );
  for (const depth of depths) {
    if (depth < 1 || depth > 6) {
      console.error('Error: Invalid heading depth in --spacing:', depth);
      process.exit(1);
    }
  }
  const has = (depth: number): boolean => depths.has(depth);
  return [has(1), has(2), has(3), has(4), has(5), has(6)];
}

export function parseDriverArgs(argv: string[]): DriverArgs {
  // argv[0] = node, argv[1] = script path, argv[2+] = user args
  const args = argv.slice(2);
  const positional: string[] = [];
  const flags = new Set<string>();
  const linksStyle: LinksStyle = {};
  const conversion: Partial<ConversionOptions> = { linksStyle };
  let gfm = true;
  let breaks = false;

  for (const arg of args) {
    if (arg.startsWith('--spacing=')) {
      conversion.headerSpacing = parseSpacing(arg.slice('--spacing='.length));
    } else if (arg === '--links-bold') {
      linksStyle.bold = true;
    } else if (arg === '--links-italic') {
      linksStyle.italic = true;
    } else if (arg === '--links-strikeout') {
      linksStyle.strikeout = true;
    } else if (arg === '--no-gfm') {
      gfm = false;
    } else if (arg === '--breaks') {
      breaks = true;
    } else if (arg.startsWith('-')) {
      flags.add(arg);
    } else {
      positional.push(arg);
    }
  }

  return {
    positional,
    flags,
    options: { parser: { gfm, breaks }, conversion },
  };
}

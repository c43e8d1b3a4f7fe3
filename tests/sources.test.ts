/**
 * Every sample document under tests/sources must parse and convert.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { markdownToStyledText } from '../src/converter.js';
import { formatErrorChain, ConversionError } from '../src/core/errors.js';

const SOURCES_DIR = path.join(__dirname, 'sources');

function findSources(dir: string): string[] {
  return fs.readdirSync(dir, { withFileTypes: true }).flatMap((entry) => {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) return findSources(full);
    return entry.name.endsWith('.md') ? [full] : [];
  });
}

describe('sample sources', () => {
  const sources = findSources(SOURCES_DIR);

  it('finds the sample documents', () => {
    expect(sources.length).toBeGreaterThanOrEqual(3);
  });

  it.each(sources.map((file) => [path.relative(SOURCES_DIR, file), file]))(
    'converts %s',
    (_name, file) => {
      const markdown = fs.readFileSync(file, 'utf8');
      try {
        const text = markdownToStyledText(markdown);
        expect(text.lines.length).toBeGreaterThan(0);
      } catch (err) {
        if (err instanceof ConversionError) {
          throw new Error(`Cannot convert: ${formatErrorChain(err)}`);
        }
        throw err;
      }
    },
  );
});

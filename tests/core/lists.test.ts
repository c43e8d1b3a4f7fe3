import { ListTooMuchNestedError, UnsupportedLineError } from '../../src/core/errors.js';
import { indentLine, rewriteListItem } from '../../src/core/lists.js';
import type { Line } from '../../src/types.js';
import { bulletLine, c, codeLine, headerLine, paragraphLine } from '../helpers/mdast.js';

describe('rewriteListItem', () => {
  it('turns the leading paragraph into the bullet line', () => {
    expect(rewriteListItem([paragraphLine(c('x'))])).toEqual([bulletLine(0, c('x'))]);
  });

  it('inserts an empty bullet line when the item does not start with a paragraph', () => {
    expect(rewriteListItem([headerLine(2, c('h'))])).toEqual([
      bulletLine(0),
      headerLine(2, c('  '), c('h')),
    ]);
  });

  it('inserts an empty bullet line for an empty item', () => {
    expect(rewriteListItem([])).toEqual([bulletLine(0)]);
  });

  it('indents every line after the first', () => {
    expect(
      rewriteListItem([
        paragraphLine(c('a')),
        paragraphLine(),
        bulletLine(0, c('b')),
        bulletLine(1, c('c')),
        codeLine(c('d')),
        { type: 'horizontalRule' },
      ]),
    ).toEqual([
      bulletLine(0, c('a')),
      paragraphLine(c('  ')),
      bulletLine(1, c('b')),
      bulletLine(2, c('c')),
      codeLine(c('  '), c('d')),
      { type: 'horizontalRule' },
    ]);
  });

  it('fails when a bullet would go past the deepest indentation', () => {
    expect(() => rewriteListItem([paragraphLine(c('a')), bulletLine(255, c('b'))])).toThrow(
      ListTooMuchNestedError,
    );
  });
});

describe('indentLine', () => {
  it('prefixes quote lines with the nested block indent', () => {
    const quote: Line = {
      type: 'normal',
      composite: { style: { kind: 'quote' }, compounds: [c('q')] },
    };
    expect(indentLine(quote)).toEqual({
      type: 'normal',
      composite: { style: { kind: 'quote' }, compounds: [c('  '), c('q')] },
    });
  });

  it('raises a bullet at 254 to the deepest indentation', () => {
    expect(indentLine(bulletLine(254))).toEqual(bulletLine(255));
  });

  it.each<Line>([
    { type: 'codeFence', composite: { style: { kind: 'code' }, compounds: [] } },
    { type: 'tableRow', row: { cells: [] } },
    { type: 'tableRule', rule: { cells: ['left'] } },
  ])('fails fast on $type lines', (line) => {
    expect(() => indentLine(line)).toThrow(UnsupportedLineError);
  });
});

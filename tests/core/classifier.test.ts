import { classifyNode } from '../../src/core/classifier.js';
import { code, h, inlineCode, li, p, root, strong, t, ul } from '../helpers/mdast.js';

describe('classifyNode', () => {
  it('names block nodes', () => {
    expect(classifyNode(root())).toBe('Root');
    expect(classifyNode(h(2, t('x')))).toBe('Heading');
    expect(classifyNode(p())).toBe('Paragraph');
    expect(classifyNode(code('x'))).toBe('Code');
    expect(classifyNode(ul())).toBe('List');
    expect(classifyNode(li())).toBe('ListItem');
  });

  it('names inline nodes', () => {
    expect(classifyNode(t('x'))).toBe('Text');
    expect(classifyNode(strong())).toBe('Strong');
    expect(classifyNode(inlineCode('x'))).toBe('InlineCode');
    expect(classifyNode({ type: 'break' })).toBe('Break');
  });

  it('names node kinds the converter rejects', () => {
    expect(classifyNode({ type: 'blockquote', children: [] })).toBe('Blockquote');
    expect(classifyNode({ type: 'table', children: [] })).toBe('Table');
    expect(classifyNode({ type: 'image', url: 'x.png' })).toBe('Image');
    expect(classifyNode({ type: 'footnoteReference', identifier: '1' })).toBe('FootnoteReference');
    expect(classifyNode({ type: 'yaml', value: 'a: 1' })).toBe('Yaml');
    expect(classifyNode({ type: 'thematicBreak' })).toBe('ThematicBreak');
  });
});

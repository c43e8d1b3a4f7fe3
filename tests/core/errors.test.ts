import {
  ConversionError,
  ListTooMuchNestedError,
  UnsupportedChildNodeError,
  UnsupportedLineError,
  UnsupportedNodeError,
  UnsupportedNumberedListsError,
  WhileEmittingError,
  errorChain,
  formatErrorChain,
  rootCause,
} from '../../src/core/errors.js';

function sampleChain(): WhileEmittingError {
  const leaf = new UnsupportedNodeError('Image');
  return new WhileEmittingError('Root', new WhileEmittingError('Paragraph', leaf));
}

describe('errors', () => {
  describe('messages', () => {
    it('describes each leaf error', () => {
      expect(new UnsupportedNodeError('Table').message).toBe('`Table` node is not supported');
      expect(new UnsupportedChildNodeError('ListItem').message).toBe(
        '`ListItem` node is not supported in this position',
      );
      expect(new UnsupportedChildNodeError('Code', 'List').message).toBe(
        '`Code` node is not supported as a child of `List`',
      );
      expect(new UnsupportedNumberedListsError().message).toBe('Numbered lists are not supported');
      expect(new ListTooMuchNestedError().message).toBe(
        'Lists cannot be nested more than 255 levels deep',
      );
      expect(new UnsupportedLineError('tableRow').message).toBe(
        '`tableRow` lines cannot be nested inside a list item',
      );
    });

    it('sets the error name', () => {
      expect(new UnsupportedNumberedListsError().name).toBe('UnsupportedNumberedListsError');
      expect(sampleChain().name).toBe('WhileEmittingError');
    });

    it('derives every error from ConversionError and Error', () => {
      const err = new ListTooMuchNestedError();
      expect(err).toBeInstanceOf(ConversionError);
      expect(err).toBeInstanceOf(Error);
    });
  });

  describe('chains', () => {
    it('links each frame to its cause', () => {
      const err = sampleChain();
      expect(err.kind).toBe('Root');
      expect(err.cause).toBeInstanceOf(WhileEmittingError);
    });

    it('lists the chain outermost first', () => {
      expect(errorChain(sampleChain()).map((e) => e.message)).toEqual([
        'While emitting `Root`',
        'While emitting `Paragraph`',
        '`Image` node is not supported',
      ]);
    });

    it('recovers the leaf error and its kind', () => {
      const cause = rootCause(sampleChain());
      expect(cause).toBeInstanceOf(UnsupportedNodeError);
      expect(cause).toMatchObject({ kind: 'Image' });
    });

    it('treats a leaf error as its own root cause', () => {
      const leaf = new UnsupportedNumberedListsError();
      expect(rootCause(leaf)).toBe(leaf);
      expect(errorChain(leaf)).toEqual([leaf]);
    });

    it('formats the chain in either order', () => {
      expect(formatErrorChain(sampleChain())).toBe(
        'While emitting `Root`\nWhile emitting `Paragraph`\n`Image` node is not supported',
      );
      expect(formatErrorChain(sampleChain(), 'cause-first')).toBe(
        '`Image` node is not supported\nWhile emitting `Paragraph`\nWhile emitting `Root`',
      );
    });
  });
});

/**
 * Conversion error taxonomy.
 *
 * Leaf errors describe why a node was rejected. As the failure unwinds through
 * the tree walk each ancestor wraps it in a {@link WhileEmittingError}, so the
 * outermost error names the root and `cause` leads down to the leaf.
 *
 * @module core/errors
 */
import type { Line } from '../types.js';
import { MAX_LIST_INDENT } from '../types.js';
import type { NodeKind } from './classifier.js';

/** Base class for every error raised by the converter. */
export class ConversionError extends Error {
  constructor(message: string, options?: { cause: ConversionError }) {
    super(message, options);
    this.name = 'ConversionError';
  }
}

/** A node kind the styled-text model has no representation for. */
export class UnsupportedNodeError extends ConversionError {
  constructor(public readonly kind: NodeKind) {
    super(`\`${kind}\` node is not supported`);
    this.name = 'UnsupportedNodeError';
  }
}

/** A node that is valid in general but not where it was found. */
export class UnsupportedChildNodeError extends ConversionError {
  constructor(
    public readonly kind: NodeKind,
    public readonly parent?: NodeKind,
  ) {
    super(
      parent
        ? `\`${kind}\` node is not supported as a child of \`${parent}\``
        : `\`${kind}\` node is not supported in this position`,
    );
    this.name = 'UnsupportedChildNodeError';
  }
}

export class UnsupportedNumberedListsError extends ConversionError {
  constructor() {
    super('Numbered lists are not supported');
    this.name = 'UnsupportedNumberedListsError';
  }
}

export class ListTooMuchNestedError extends ConversionError {
  constructor() {
    super(`Lists cannot be nested more than ${MAX_LIST_INDENT} levels deep`);
    this.name = 'ListTooMuchNestedError';
  }
}

/** A line kind that list indentation cannot be applied to. */
export class UnsupportedLineError extends ConversionError {
  constructor(public readonly line: Line['type']) {
    super(`\`${line}\` lines cannot be nested inside a list item`);
    this.name = 'UnsupportedLineError';
  }
}

/** Context frame added by every ancestor of a failing node. */
export class WhileEmittingError extends ConversionError {
  declare readonly cause: ConversionError;

  constructor(
    public readonly kind: NodeKind,
    cause: ConversionError,
  ) {
    super(`While emitting \`${kind}\``, { cause });
    this.name = 'WhileEmittingError';
  }
}

/**
 * List the errors of a chain, outermost context first, leaf last.
 */
export function errorChain(error: ConversionError): ConversionError[] {
  const chain: ConversionError[] = [error];
  let current = error;
  while (current instanceof WhileEmittingError) {
    current = current.cause;
    chain.push(current);
  }
  return chain;
}

/**
 * Follow the `cause` links down to the error that started the chain.
 */
export function rootCause(error: ConversionError): ConversionError {
  let current = error;
  while (current instanceof WhileEmittingError) {
    current = current.cause;
  }
  return current;
}

/**
 * Render a chain one frame per line.
 *
 * @param order - `'context-first'` prints from the root down,
 *   `'cause-first'` starts from the leaf.
 */
export function formatErrorChain(
  error: ConversionError,
  order: 'context-first' | 'cause-first' = 'context-first',
): string {
  const chain = errorChain(error);
  if (order === 'cause-first') {
    chain.reverse();
  }
  return chain.map((e) => e.message).join('\n');
}

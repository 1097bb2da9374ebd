// Document pipeline errors

import { HandledError } from '../utils/error-handler.js';

/**
 * The model output is not a document at all (empty, not JSON).
 * Callers deliver the raw text as a plain message instead.
 */
export class FormatError extends HandledError {
  readonly recoverable = true;

  constructor(message: string, originalError?: unknown) {
    super(message, 'document.parse', originalError);
    this.name = 'FormatError';
  }
}

/**
 * The JSON parsed but does not describe a document: wrong top-level shape
 * or a block type nobody renders. Aborts the current render attempt.
 */
export class SchemaError extends HandledError {
  readonly recoverable = false;

  constructor(message: string, public readonly path?: string) {
    super(path ? `${message} (at ${path})` : message, 'document.schema');
    this.name = 'SchemaError';
  }
}

/**
 * A single block could not be rendered. Contained at the block boundary.
 */
export class RenderBackendError extends HandledError {
  constructor(message: string, public readonly blockIndex: number, originalError?: unknown) {
    super(message, 'document.render', originalError);
    this.name = 'RenderBackendError';
  }
}

import { BraceconfError, BraceconfErrorCode } from '@braceconf/types';
import type { BraceconfErrorOptions } from '@braceconf/types';

/** Where in the source an error was detected. */
export interface SourcePosition {
  line?: number;
  column?: number;
  filePath?: string;
}

function locate(reason: string, position: SourcePosition): string {
  let message = reason;
  if (position.line !== undefined) {
    message += ` at line ${position.line}`;
    if (position.column !== undefined) {
      message += `, column ${position.column}`;
    }
  }
  return position.filePath !== undefined ? `${position.filePath}: ${message}` : message;
}

/**
 * Base class of everything the lexer and parser throw. The first error
 * aborts the parse; there is never a partial tree.
 */
export abstract class ParseError extends BraceconfError {
  readonly line?: number;
  readonly column?: number;
  filePath?: string;
  /** The message without file path and position. */
  readonly reason: string;

  constructor(code: BraceconfErrorCode, reason: string, position: SourcePosition, options?: BraceconfErrorOptions) {
    super(code, locate(reason, position), {
      ...options,
      context: { ...options?.context, ...position },
    });
    this.reason = reason;
    this.line = position.line;
    this.column = position.column;
    this.filePath = position.filePath;
  }

  /**
   * Record the source path on an error raised by code that did not know
   * it, such as a typed wrapper. A path already set is kept.
   */
  attachFilePath(filePath: string): void {
    if (this.filePath !== undefined) {
      return;
    }
    this.filePath = filePath;
    this.message = locate(this.reason, { line: this.line, column: this.column, filePath });
  }
}

/** Malformed input at the character level (an unterminated string). */
export class LexicalError extends ParseError {
  constructor(code: BraceconfErrorCode, reason: string, position: SourcePosition, options?: BraceconfErrorOptions) {
    super(code, reason, position, options);
    this.name = 'LexicalError';
  }
}

/** A token where the grammar allows none of parameter, `;` or `{`. */
export class ConfSyntaxError extends ParseError {
  constructor(code: BraceconfErrorCode, reason: string, position: SourcePosition, options?: BraceconfErrorOptions) {
    super(code, reason, position, options);
    this.name = 'ConfSyntaxError';
  }
}

/** A well-formed directive whose shape a typed wrapper rejects. */
export class SemanticError extends ParseError {
  constructor(code: BraceconfErrorCode, reason: string, position: SourcePosition, options?: BraceconfErrorOptions) {
    super(code, reason, position, options);
    this.name = 'SemanticError';
  }
}

/** A configuration file could not be read. */
export class ConfigFileError extends BraceconfError {
  readonly filePath: string;

  constructor(filePath: string, cause: Error) {
    super(BraceconfErrorCode.FILE_READ_FAILED, `cannot read ${filePath}: ${cause.message}`, {
      cause,
      context: { filePath },
    });
    this.name = 'ConfigFileError';
    this.filePath = filePath;
  }
}

/**
 * Error code system shared by every braceconf package.
 *
 * Every error carries a unique code (BRACECONF_Exxx) that maps to one
 * failure mode, so callers can branch on the code instead of parsing
 * messages.
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All braceconf error codes. */
export enum BraceconfErrorCode {
  // Lexical (1xx)
  /** A quoted string reached end of input before its closing delimiter. */
  UNTERMINATED_STRING = 'BRACECONF_E100',

  // Syntax (2xx)
  /** A token appeared where the grammar allows no parameter, `;` or `{`. */
  UNEXPECTED_TOKEN = 'BRACECONF_E200',
  /** End of input was reached inside a block. */
  UNCLOSED_BLOCK = 'BRACECONF_E201',
  /** A `}` appeared at top level with no block to close. */
  UNEXPECTED_BLOCK_END = 'BRACECONF_E202',
  /** A non-keyword token appeared where a directive name belongs (strict mode). */
  EXPECTED_DIRECTIVE = 'BRACECONF_E203',

  // Semantic (3xx)
  /** `include` was given no path. */
  INCLUDE_MISSING_PATH = 'BRACECONF_E300',
  /** `include` was given more than one parameter. */
  INCLUDE_TOO_MANY_PARAMS = 'BRACECONF_E301',
  /** `include` was given a nested block. */
  INCLUDE_WITH_BLOCK = 'BRACECONF_E302',
  /** `location` was given no match pattern. */
  LOCATION_MISSING_MATCH = 'BRACECONF_E303',
  /** `location` was given more than a modifier and a pattern. */
  LOCATION_TOO_MANY_PARAMS = 'BRACECONF_E304',
  /** An upstream `server` entry has no address. */
  UPSTREAM_SERVER_MISSING_ADDRESS = 'BRACECONF_E305',

  // I/O (4xx)
  /** A configuration file could not be read. */
  FILE_READ_FAILED = 'BRACECONF_E400',
  /** A configuration file could not be written. */
  FILE_WRITE_FAILED = 'BRACECONF_E401',

  // CLI (5xx)
  /** A command-line argument was missing or malformed. */
  INVALID_ARGUMENT = 'BRACECONF_E500',
  /** The requested upstream does not exist in the document. */
  UPSTREAM_NOT_FOUND = 'BRACECONF_E501',
  /** The `braceconf.config.json` file is not valid. */
  INVALID_CONFIG_FILE = 'BRACECONF_E502',
}

// ─── Error class ────────────────────────────────────────────────────────────────

/** Options for constructing a BraceconfError. */
export interface BraceconfErrorOptions {
  /** Additional structured context for diagnostics and logging. */
  context?: Record<string, unknown>;
  /** A human-readable hint suggesting how to resolve the error. */
  hint?: string;
  /** The underlying cause of this error, for error chaining. */
  cause?: Error;
}

/**
 * Base error class for all braceconf errors.
 *
 * @example
 * ```typescript
 * throw new BraceconfError(
 *   BraceconfErrorCode.UPSTREAM_NOT_FOUND,
 *   'no upstream named "api"',
 *   { hint: 'Run `braceconf upstreams` to list the upstreams in the file' },
 * );
 * ```
 */
export class BraceconfError extends Error {
  readonly code: BraceconfErrorCode;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(code: BraceconfErrorCode, message: string, options?: BraceconfErrorOptions) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'BraceconfError';
    this.code = code;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /**
   * Return a structured JSON representation suitable for logging.
   */
  toJSON(): { code: string; message: string; hint?: string; context?: Record<string, unknown> } {
    const result: { code: string; message: string; hint?: string; context?: Record<string, unknown> } = {
      code: this.code,
      message: this.message,
    };
    if (this.hint !== undefined) {
      result.hint = this.hint;
    }
    if (this.context !== undefined) {
      result.context = this.context;
    }
    return result;
  }
}

// ─── Utility functions ──────────────────────────────────────────────────────────

/**
 * Check whether `value` is a braceconf error, optionally with a given code.
 */
export function isBraceconfError(value: unknown, code?: BraceconfErrorCode): value is BraceconfError {
  if (!(value instanceof BraceconfError)) {
    return false;
  }
  return code === undefined || value.code === code;
}

/**
 * Format an error for display.
 *
 * @returns A multi-line string for terminal or log output.
 *
 * @example
 * ```typescript
 * formatError(new BraceconfError(BraceconfErrorCode.UPSTREAM_NOT_FOUND, 'no upstream named "api"'));
 * // [BRACECONF_E501] no upstream named "api"
 * ```
 */
export function formatError(error: BraceconfError): string {
  const lines: string[] = [];
  lines.push(`[${error.code}] ${error.message}`);
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}

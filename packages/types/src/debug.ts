/**
 * Opt-in trace output for the lexer, parser and CLI.
 *
 * Controlled by the `DEBUG` environment variable, with namespace patterns
 * such as `braceconf`, `braceconf:*` or `braceconf:parser`. Several
 * patterns may be given separated by commas. A logger whose namespace is
 * not enabled is made of no-ops.
 *
 * @packageDocumentation
 */

/** Root namespace for every braceconf debug logger. */
export const DEBUG_NAMESPACE = 'braceconf';

// ─── Debug detection ────────────────────────────────────────────────────────────

/**
 * Check whether debug output is enabled for `namespace`.
 *
 * - `braceconf` and `braceconf:*` enable every braceconf namespace
 * - `braceconf:parser` enables exactly that namespace
 * - `braceconf:parser:*` enables that namespace and its children
 * - `*` enables everything
 *
 * Without a namespace, reports whether any braceconf output is enabled.
 */
export function isDebugEnabled(namespace?: string): boolean {
  const debugEnv = (typeof process !== 'undefined' && process.env?.DEBUG) || '';
  if (!debugEnv) {
    return false;
  }

  const patterns = debugEnv.split(',').map((p) => p.trim()).filter(Boolean);
  const inRoot = !namespace || namespace === DEBUG_NAMESPACE || namespace.startsWith(`${DEBUG_NAMESPACE}:`);

  for (const pattern of patterns) {
    if (pattern === '*') {
      return true;
    }

    if ((pattern === DEBUG_NAMESPACE || pattern === `${DEBUG_NAMESPACE}:*`) && inRoot) {
      return true;
    }

    if (namespace && pattern === namespace) {
      return true;
    }

    if (namespace && pattern.endsWith(':*')) {
      const prefix = pattern.slice(0, -2);
      if (namespace === prefix || namespace.startsWith(prefix + ':')) {
        return true;
      }
    }
  }

  return false;
}

// ─── Debug logger ───────────────────────────────────────────────────────────────

/** The shape of a debug logger returned by {@link createDebugLogger}. */
export interface DebugLogger {
  /** Whether this logger produces output at all. */
  readonly enabled: boolean;
  /** Log a general debug message. */
  log: (...args: unknown[]) => void;
  /** Log a warning-level debug message. */
  warn: (...args: unknown[]) => void;
  /** Start a timer. The returned function logs the elapsed milliseconds. */
  time: (label: string) => () => void;
}

const noop = (): void => {};

const noopTimer = (): (() => void) => noop;

/**
 * Create a debug logger for the given namespace.
 *
 * Output goes to stderr so it never mixes with rendered configuration on
 * stdout.
 *
 * @example
 * ```typescript
 * const dbg = createDebugLogger('braceconf:parser');
 * const stop = dbg.time('parse');
 * // ...
 * stop(); // [braceconf:parser] parse: 0.42ms
 * ```
 */
export function createDebugLogger(namespace: string): DebugLogger {
  if (!isDebugEnabled(namespace)) {
    return {
      enabled: false,
      log: noop,
      warn: noop,
      time: noopTimer,
    };
  }

  const prefix = `[${namespace}]`;

  return {
    enabled: true,
    log: (...args: unknown[]): void => {
      console.error(new Date().toISOString(), prefix, ...args);
    },
    warn: (...args: unknown[]): void => {
      console.error(new Date().toISOString(), prefix, 'WARN', ...args);
    },
    time: (label: string): (() => void) => {
      const start = performance.now();
      return (): void => {
        const elapsed = performance.now() - start;
        console.error(new Date().toISOString(), prefix, `${label}: ${elapsed.toFixed(2)}ms`);
      };
    },
  };
}

import { describe, it, expect } from 'vitest';
import {
  BraceconfErrorCode,
  BraceconfError,
  isBraceconfError,
  formatError,
} from './errors';

// ---------------------------------------------------------------------------
// BraceconfErrorCode enum
// ---------------------------------------------------------------------------
describe('BraceconfErrorCode', () => {
  it('has lexical codes (1xx)', () => {
    expect(BraceconfErrorCode.UNTERMINATED_STRING).toBe('BRACECONF_E100');
  });

  it('has syntax codes (2xx)', () => {
    expect(BraceconfErrorCode.UNEXPECTED_TOKEN).toBe('BRACECONF_E200');
    expect(BraceconfErrorCode.UNCLOSED_BLOCK).toBe('BRACECONF_E201');
    expect(BraceconfErrorCode.UNEXPECTED_BLOCK_END).toBe('BRACECONF_E202');
    expect(BraceconfErrorCode.EXPECTED_DIRECTIVE).toBe('BRACECONF_E203');
  });

  it('has semantic codes (3xx)', () => {
    expect(BraceconfErrorCode.INCLUDE_MISSING_PATH).toBe('BRACECONF_E300');
    expect(BraceconfErrorCode.INCLUDE_TOO_MANY_PARAMS).toBe('BRACECONF_E301');
    expect(BraceconfErrorCode.INCLUDE_WITH_BLOCK).toBe('BRACECONF_E302');
    expect(BraceconfErrorCode.LOCATION_MISSING_MATCH).toBe('BRACECONF_E303');
    expect(BraceconfErrorCode.LOCATION_TOO_MANY_PARAMS).toBe('BRACECONF_E304');
    expect(BraceconfErrorCode.UPSTREAM_SERVER_MISSING_ADDRESS).toBe('BRACECONF_E305');
  });

  it('every code value starts with BRACECONF_E', () => {
    for (const value of Object.values(BraceconfErrorCode)) {
      expect(value).toMatch(/^BRACECONF_E\d{3}$/);
    }
  });

  it('all code values are unique', () => {
    const values = Object.values(BraceconfErrorCode);
    expect(new Set(values).size).toBe(values.length);
  });
});

// ---------------------------------------------------------------------------
// BraceconfError
// ---------------------------------------------------------------------------
describe('BraceconfError', () => {
  it('carries code, message and name', () => {
    const e = new BraceconfError(BraceconfErrorCode.UNEXPECTED_TOKEN, 'boom');
    expect(e).toBeInstanceOf(Error);
    expect(e.name).toBe('BraceconfError');
    expect(e.code).toBe('BRACECONF_E200');
    expect(e.message).toBe('boom');
    expect(e.hint).toBeUndefined();
    expect(e.context).toBeUndefined();
  });

  it('keeps hint, context and cause', () => {
    const cause = new Error('ENOENT');
    const e = new BraceconfError(BraceconfErrorCode.FILE_READ_FAILED, 'cannot read', {
      hint: 'check the path',
      context: { path: '/etc/app.conf' },
      cause,
    });
    expect(e.hint).toBe('check the path');
    expect(e.context).toEqual({ path: '/etc/app.conf' });
    expect(e.cause).toBe(cause);
  });

  it('toJSON omits absent fields', () => {
    const e = new BraceconfError(BraceconfErrorCode.UNCLOSED_BLOCK, 'open block');
    expect(e.toJSON()).toEqual({ code: 'BRACECONF_E201', message: 'open block' });
  });

  it('toJSON includes hint and context when present', () => {
    const e = new BraceconfError(BraceconfErrorCode.UNCLOSED_BLOCK, 'open block', {
      hint: 'add }',
      context: { line: 3 },
    });
    expect(e.toJSON()).toEqual({
      code: 'BRACECONF_E201',
      message: 'open block',
      hint: 'add }',
      context: { line: 3 },
    });
  });
});

// ---------------------------------------------------------------------------
// isBraceconfError
// ---------------------------------------------------------------------------
describe('isBraceconfError', () => {
  it('recognizes braceconf errors', () => {
    const e = new BraceconfError(BraceconfErrorCode.INVALID_ARGUMENT, 'bad flag');
    expect(isBraceconfError(e)).toBe(true);
    expect(isBraceconfError(e, BraceconfErrorCode.INVALID_ARGUMENT)).toBe(true);
    expect(isBraceconfError(e, BraceconfErrorCode.UNCLOSED_BLOCK)).toBe(false);
  });

  it('rejects plain errors and non-errors', () => {
    expect(isBraceconfError(new Error('x'))).toBe(false);
    expect(isBraceconfError('BRACECONF_E100')).toBe(false);
    expect(isBraceconfError(undefined)).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// formatError
// ---------------------------------------------------------------------------
describe('formatError', () => {
  it('formats code and message', () => {
    const e = new BraceconfError(BraceconfErrorCode.UPSTREAM_NOT_FOUND, 'no upstream named "api"');
    expect(formatError(e)).toBe('[BRACECONF_E501] no upstream named "api"');
  });

  it('appends the hint on its own line', () => {
    const e = new BraceconfError(BraceconfErrorCode.UPSTREAM_NOT_FOUND, 'no upstream named "api"', {
      hint: 'list upstreams first',
    });
    expect(formatError(e)).toBe('[BRACECONF_E501] no upstream named "api"\nHint: list upstreams first');
  });
});

/**
 * Error Class Tests
 */

import { describe, expect, it } from 'vitest';
import {
  AetherError,
  CheckConfigError,
  ParseError,
} from '../../src/error-classes.js';
import { ERROR_REGISTRY } from '../../src/error-registry.js';

const AT = { line: 3, column: 7, offset: 20 };

describe('ERROR_REGISTRY', () => {
  it('defines parse and check errors', () => {
    expect(ERROR_REGISTRY.size).toBe(7);
    expect(ERROR_REGISTRY.get('AETHER-P001')).toEqual({
      errorId: 'AETHER-P001',
      category: 'parse',
      description: 'Unexpected token',
    });
    expect(ERROR_REGISTRY.get('AETHER-C001')?.category).toBe('check');
    expect(ERROR_REGISTRY.has('AETHER-X999')).toBe(false);
  });
});

describe('AetherError', () => {
  it('rejects unknown error ids', () => {
    expect(() => new AetherError({ errorId: 'AETHER-X999', message: 'boom' })).toThrow(
      'Unknown error ID: AETHER-X999'
    );
  });

  it('appends the location to the message and strips it from data', () => {
    const err = new AetherError({
      errorId: 'AETHER-P005',
      message: 'Invalid statement - oops',
      location: AT,
    });
    expect(err.message).toBe('Invalid statement - oops at 3:7');
    expect(err.toData()).toEqual({
      errorId: 'AETHER-P005',
      message: 'Invalid statement - oops',
      location: AT,
      context: undefined,
    });
    expect(err.format((data) => `[${data.errorId}] ${data.message}`)).toBe(
      '[AETHER-P005] Invalid statement - oops'
    );
  });
});

describe('ParseError', () => {
  it('builds each kind with its id and context', () => {
    const token = ParseError.unexpectedToken("')'", 'number 2', AT);
    expect(token.kind).toBe('unexpected-token');
    expect(token.errorId).toBe('AETHER-P001');
    expect(token.context).toEqual({ expected: "')'", found: 'number 2' });
    expect(token.name).toBe('ParseError');

    expect(ParseError.unexpectedEof(null, AT).toData().message).toBe(
      'Unexpected end of input'
    );
    expect(ParseError.invalidNumber('٣', AT).errorId).toBe('AETHER-P003');
    expect(ParseError.invalidExpression('bad', AT).errorId).toBe('AETHER-P004');
    expect(ParseError.invalidStatement('bad', AT).errorId).toBe('AETHER-P005');
    expect(ParseError.invalidIdentifier('x', 'bad', AT).context).toEqual({
      name: 'x',
      reason: 'bad',
    });
  });

  it('is an AetherError and an Error', () => {
    const err = ParseError.invalidNumber('٣', AT);
    expect(err).toBeInstanceOf(AetherError);
    expect(err).toBeInstanceOf(Error);
  });
});

describe('CheckConfigError', () => {
  it('prefixes the reason', () => {
    const err = new CheckConfigError('unknown rule NOPE', { code: 'NOPE' });
    expect(err.message).toBe('Invalid configuration: unknown rule NOPE');
    expect(err.errorId).toBe('AETHER-C001');
    expect(err.context).toEqual({ code: 'NOPE' });
  });
});

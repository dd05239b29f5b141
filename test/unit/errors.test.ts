import { describe, test, expect } from '@jest/globals';
import {
  createBadRequestError,
  createHostNotFoundError,
  createIncludeDepthError,
  createSyntaxError,
  errnoCode,
  wrapError
} from '../../src/errors.js';
import { ErrorCode, SSHConfigError } from '../../src/types.js';

describe('Error factories', () => {
  test('should prefix syntax errors with path and line', () => {
    const error = createSyntaxError('Unterminated quoted string', { path: '/etc/ssh/ssh_config', line: 7 });

    expect(error).toBeInstanceOf(SSHConfigError);
    expect(error.code).toBe(ErrorCode.ESYNTAX);
    expect(error.message).toBe('/etc/ssh/ssh_config:7: Unterminated quoted string');
    expect(error.details).toEqual({ path: '/etc/ssh/ssh_config', line: 7 });
  });

  test('should prefix syntax errors with the line alone for inline text', () => {
    expect(createSyntaxError('Missing argument', { line: 3 }).message).toBe('line 3: Missing argument');
    expect(createSyntaxError('ProxyJump has no hosts').message).toBe('ProxyJump has no hosts');
  });

  test('should name the depth limit', () => {
    const error = createIncludeDepthError(16, { path: '/tmp/loop.conf', line: 1 });

    expect(error.code).toBe(ErrorCode.EINCLUDEDEPTH);
    expect(error.message).toBe('Include nested deeper than 16 levels');
    expect(error.hint).toBeDefined();
  });

  test('should carry codes for host and request errors', () => {
    expect(createHostNotFoundError('db').code).toBe(ErrorCode.ENOHOST);
    expect(createHostNotFoundError('db').message).toBe('No Host or Match stanza applies to db');
    expect(createBadRequestError('bad port').code).toBe(ErrorCode.EBADREQ);
  });
});

describe('wrapError', () => {
  test('should keep existing SSHConfigErrors', () => {
    const original = createBadRequestError('bad');
    expect(wrapError(original, ErrorCode.ECONN)).toBe(original);
  });

  test('should wrap plain errors with a cause', () => {
    const cause = new Error('socket hang up');
    const wrapped = wrapError(cause, ErrorCode.ECONN, 'Check the network');

    expect(wrapped.code).toBe(ErrorCode.ECONN);
    expect(wrapped.message).toBe('socket hang up');
    expect(wrapped.hint).toBe('Check the network');
    expect(wrapped.details.cause).toBe(cause);
  });

  test('should stringify non-error values', () => {
    expect(wrapError('boom', ErrorCode.EIO).message).toBe('boom');
  });
});

describe('errnoCode', () => {
  test('should read string codes only', () => {
    expect(errnoCode(Object.assign(new Error('gone'), { code: 'ENOENT' }))).toBe('ENOENT');
    expect(errnoCode({ code: 7 })).toBeUndefined();
    expect(errnoCode(new Error('no code'))).toBeUndefined();
    expect(errnoCode(null)).toBeUndefined();
  });
});

import { describe, expect, test } from '@jest/globals';
import { IOError, PathTraversalError } from '../../src/errors/io-error';

describe('IOError', () => {
  test('defaults to IO_NOT_FOUND', () => {
    const error = new IOError('File not found: spec.json');
    expect(error.code).toBe('IO_NOT_FOUND');
    expect(error.category).toBe('io');
  });

  test('keeps an explicit code and context', () => {
    const error = new IOError('File too large', {
      code: 'IO_SIZE_LIMIT',
      context: { fileSize: 10, maxSize: 5 },
    });
    expect(error.code).toBe('IO_SIZE_LIMIT');
    expect(error.context).toEqual({ fileSize: 10, maxSize: 5 });
  });
});

describe('PathTraversalError', () => {
  test('records the attempted path', () => {
    const error = new PathTraversalError('../secret.json', { module: 'tests' });
    expect(error).toBeInstanceOf(IOError);
    expect(error.name).toBe('PathTraversalError');
    expect(error.message).toBe('Path traversal attempt detected: ../secret.json');
    expect(error.code).toBe('IO_PERMISSION_DENIED');
    expect(error.context).toEqual({ module: 'tests', attemptedPath: '../secret.json' });
  });
});

import { afterEach, beforeEach, describe, expect, jest, test } from '@jest/globals';
import { ErrorLogger, parseLogLevel } from '../../src/errors/logger';
import { CondSpecError } from '../../src/errors/condspec-error';
import type { ErrorContext } from '../../src/errors/types';

type SinkMock = jest.Mock<(message: string) => void>;

const createError = (context: ErrorContext = { module: 'tests' }) =>
  new CondSpecError({
    message: 'Failure',
    code: 'INTERNAL_UNEXPECTED',
    category: 'internal',
    context,
    cause: new Error('root cause'),
  });

describe('ErrorLogger', () => {
  let sink: { warn: SinkMock; error: SinkMock };

  beforeEach(() => {
    sink = {
      warn: jest.fn<(message: string) => void>(),
      error: jest.fn<(message: string) => void>(),
    };
  });

  test('ensureCorrelationId reuses a provided identifier', () => {
    const logger = new ErrorLogger(sink);
    expect(logger.ensureCorrelationId({ correlationId: 'reuse-me' })).toBe('reuse-me');
    expect(logger.ensureCorrelationId({})).not.toBe('');
  });

  test('logError emits the serialized error and writes the context back', () => {
    const logger = new ErrorLogger(sink, { level: 'warn' });
    const error = createError();

    const correlationId = logger.logError(error, { operation: 'test-op' });

    expect(sink.error).toHaveBeenCalledTimes(1);
    expect(sink.warn).not.toHaveBeenCalled();
    const payload = JSON.parse(sink.error.mock.calls[0][0]);
    expect(payload).toMatchObject({
      level: 'error',
      correlationId,
      name: 'CondSpecError',
      message: 'Failure',
      code: 'INTERNAL_UNEXPECTED',
      category: 'internal',
      cause: 'Error: root cause',
    });
    expect(payload.context).toEqual({ module: 'tests', operation: 'test-op', correlationId });
    expect(error.context?.correlationId).toBe(correlationId);
  });

  test('falls back to plain text when the payload cannot be serialized', () => {
    const logger = new ErrorLogger(sink, { level: 'warn' });
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    const correlationId = logger.logError(createError({ module: 'tests', circular }));

    const line = sink.error.mock.calls[0][0];
    expect(line).toContain('[ERROR] [INTERNAL_UNEXPECTED] Failure');
    expect(line).toContain(`(correlationId=${correlationId})`);
  });

  test('logWarning writes to the warn channel', () => {
    const logger = new ErrorLogger(sink, { level: 'warn' });
    const correlationId = logger.logWarning('careful', { module: 'tests' });

    expect(JSON.parse(sink.warn.mock.calls[0][0])).toMatchObject({
      level: 'warn',
      correlationId,
      message: 'careful',
      context: { module: 'tests' },
    });
  });

  test('drops entries below the configured level', () => {
    const logger = new ErrorLogger(sink, { level: 'error' });
    logger.logWarning('quiet');
    logger.logError(createError());

    expect(sink.warn).not.toHaveBeenCalled();
    expect(sink.error).toHaveBeenCalledTimes(1);
    expect(logger.isEnabled('warn')).toBe(false);
  });

  describe('CONDSPEC_LOG_LEVEL', () => {
    const original = process.env.CONDSPEC_LOG_LEVEL;

    afterEach(() => {
      if (original === undefined) {
        delete process.env.CONDSPEC_LOG_LEVEL;
      } else {
        process.env.CONDSPEC_LOG_LEVEL = original;
      }
    });

    test('sets the default level', () => {
      process.env.CONDSPEC_LOG_LEVEL = 'error';
      const logger = new ErrorLogger(sink);
      expect(logger.isEnabled('warn')).toBe(false);
      expect(logger.isEnabled('error')).toBe(true);
    });

    test('an unknown value falls back to warn', () => {
      process.env.CONDSPEC_LOG_LEVEL = 'verbose';
      expect(new ErrorLogger(sink).isEnabled('warn')).toBe(true);
    });
  });
});

describe('parseLogLevel', () => {
  const cases: Array<[string | undefined, string | null]> = [
    ['info', null],
    [' WARN ', 'warn'],
    ['warning', 'warn'],
    ['error', 'error'],
    ['debug', null],
    [undefined, null],
  ];

  test.each(cases)('%j → %j', (input, expected) => {
    expect(parseLogLevel(input)).toBe(expected);
  });
});

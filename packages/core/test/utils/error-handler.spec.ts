import { describe, expect, it, vi } from 'vitest';
import {
  notifyErrorHandler,
  PersistenceError,
  reportAndRethrow,
  ValidationError,
  withPersistenceErrors,
} from '../../src/index.js';

describe('notifyErrorHandler', () => {
  it('should do nothing without a handler', async () => {
    await expect(
      notifyErrorHandler(undefined, { phase: 'diff', entityId: '17', error: new Error('x') }),
    ).resolves.toBeUndefined();
  });

  it('should await async handlers', async () => {
    const seen: string[] = [];
    const handler = vi.fn(async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      seen.push('handled');
    });

    await notifyErrorHandler(handler, { phase: 'append', entityId: '17', error: new Error('x') });

    expect(seen).toEqual(['handled']);
  });

  it('should log a failing handler instead of throwing', async () => {
    const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    await notifyErrorHandler(
      () => {
        throw new Error('Handler error');
      },
      { phase: 'list', entityId: null, error: new Error('x') },
    );

    expect(consoleErrorSpy).toHaveBeenCalledWith('[revision-log] Error in custom error handler:', 'Handler error');
    consoleErrorSpy.mockRestore();
  });
});

describe('withPersistenceErrors', () => {
  it('should return the result of a successful call', async () => {
    await expect(withPersistenceErrors('list', async () => [1, 2])).resolves.toEqual([1, 2]);
  });

  it('should wrap driver errors with the operation and cause', async () => {
    const driverError = new Error('connection refused');

    const rejection = withPersistenceErrors('append', async () => {
      throw driverError;
    });

    await expect(rejection).rejects.toThrow('[append] connection refused');
    await expect(rejection).rejects.toMatchObject({ operation: 'append', cause: driverError });
  });

  it('should pass revision log errors through unchanged', async () => {
    const validation = ValidationError.forField('timestamp', 'timestamp must be a valid Date');

    await expect(
      withPersistenceErrors('append', async () => {
        throw validation;
      }),
    ).rejects.toBe(validation);
  });

  it('should wrap non-Error values', async () => {
    await expect(
      withPersistenceErrors('transaction', async () => {
        throw 'deadlock detected';
      }),
    ).rejects.toBeInstanceOf(PersistenceError);
  });
});

describe('reportAndRethrow', () => {
  it('should tell the handler and rethrow the same error', async () => {
    const handler = vi.fn();
    const error = new PersistenceError('list', 'timeout');

    await expect(reportAndRethrow(handler, 'list', '17', error)).rejects.toBe(error);
    expect(handler).toHaveBeenCalledWith({ phase: 'list', entityId: '17', error });
  });

  it('should normalize thrown strings', async () => {
    const handler = vi.fn();

    await expect(reportAndRethrow(handler, 'diff', null, 'bad input')).rejects.toThrow('bad input');
    expect(handler.mock.calls[0]?.[0].error).toBeInstanceOf(Error);
  });
});

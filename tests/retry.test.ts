import { withRetry, RetryExhaustedError, formatError } from '../src/utils/retry';

describe('withRetry', () => {
  let sleep: jest.Mock<Promise<void>, [number]>;

  beforeEach(() => {
    sleep = jest.fn().mockResolvedValue(undefined);
  });

  it('should return the value of a first successful attempt without waiting', async () => {
    const operation = jest.fn().mockResolvedValue('ok');

    const outcome = await withRetry(operation, 'load', { maxAttempts: 3, delayMs: 5000, sleep });

    expect(outcome).toEqual({ value: 'ok', attempts: 1 });
    expect(operation).toHaveBeenCalledWith(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should succeed on attempt N after N-1 waits', async () => {
    const operation = jest
      .fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('ok');
    const onRetry = jest.fn();

    const outcome = await withRetry(operation, 'load', {
      maxAttempts: 3,
      delayMs: 5000,
      onRetry,
      sleep,
    });

    expect(outcome).toEqual({ value: 'ok', attempts: 3 });
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenNthCalledWith(1, 5000);
    expect(sleep).toHaveBeenNthCalledWith(2, 5000);
    expect(onRetry).toHaveBeenNthCalledWith(1, 1, new Error('first'), 5000);
    expect(onRetry).toHaveBeenNthCalledWith(2, 2, new Error('second'), 5000);
  });

  it('should throw a RetryExhaustedError once attempts are exhausted', async () => {
    const lastError = new Error('boom');
    const operation = jest.fn().mockRejectedValue(lastError);

    const promise = withRetry(operation, 'load', { maxAttempts: 3, delayMs: 10, sleep });

    await expect(promise).rejects.toThrow(
      'Failed to load after 3 attempts. Last error: Error: boom'
    );
    await expect(promise).rejects.toMatchObject({
      name: 'RetryExhaustedError',
      operation: 'load',
      attempt: 3,
      maxAttempts: 3,
      cause: lastError,
    });
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('should stop immediately on a non-retryable error', async () => {
    const operation = jest.fn().mockRejectedValue(new Error('denied'));

    const promise = withRetry(operation, 'load', {
      maxAttempts: 5,
      delayMs: 10,
      isRetryable: () => false,
      sleep,
    });

    await expect(promise).rejects.toBeInstanceOf(RetryExhaustedError);
    await expect(promise).rejects.toMatchObject({ attempt: 1, maxAttempts: 5 });
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should make at least one attempt', async () => {
    const operation = jest.fn().mockRejectedValue(new Error('boom'));

    await expect(
      withRetry(operation, 'load', { maxAttempts: 0, delayMs: 10, sleep })
    ).rejects.toMatchObject({ attempt: 1, maxAttempts: 1 });
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('formatError', () => {
  it('should include the error name', () => {
    expect(formatError(new TypeError('bad'))).toBe('TypeError: bad');
  });

  it('should stringify non-errors', () => {
    expect(formatError('plain')).toBe('plain');
  });
});

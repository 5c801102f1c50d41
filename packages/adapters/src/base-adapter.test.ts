import { describe, it, expect } from 'vitest';
import { ConfigError, HttpError, RateLimitError, TimeoutError } from '@gamemind/shared';
import { BaseProviderAdapter, type APIErrorLike, type ErrorTypeConfig } from './base-adapter';

class StatusError extends Error implements APIErrorLike {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message);
  }
}

class TestAdapter extends BaseProviderAdapter {
  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIErrorLike => error instanceof StatusError,
    isTimeoutError: (error: unknown): boolean => error === 'timeout',
  };

  public map(error: unknown): Error {
    return this.mapError(error);
  }
}

describe('BaseProviderAdapter.mapError', () => {
  const adapter = new TestAdapter();

  it('maps 429 to RateLimitError', () => {
    expect(adapter.map(new StatusError('rate limited', 429))).toBeInstanceOf(RateLimitError);
  });

  it('maps 401 and 403 to ConfigError', () => {
    expect(adapter.map(new StatusError('unauthorized', 401))).toBeInstanceOf(ConfigError);
    expect(adapter.map(new StatusError('forbidden', 403))).toBeInstanceOf(ConfigError);
  });

  it('maps other statuses to HttpError and keeps the status', () => {
    const original = new StatusError('server', 500);
    const err = adapter.map(original);

    expect(err).toBeInstanceOf(HttpError);
    expect(err instanceof HttpError && err.status).toBe(500);
    expect(err instanceof HttpError && err.cause).toBe(original);
  });

  it('maps timeout errors to TimeoutError', () => {
    expect(adapter.map('timeout')).toBeInstanceOf(TimeoutError);
  });

  it('passes our own timeout and config errors through', () => {
    const timeout = new TimeoutError('slow');
    const config = new ConfigError('bad');
    expect(adapter.map(timeout)).toBe(timeout);
    expect(adapter.map(config)).toBe(config);
  });

  it('passes other errors through and wraps non-Error values', () => {
    const original = new Error('socket hang up');
    expect(adapter.map(original)).toBe(original);

    const err = adapter.map(123);
    expect(err).toBeInstanceOf(Error);
    expect(err.message).toBe('123');
  });
});

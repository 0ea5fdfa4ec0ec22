import { describe, expect, test } from 'vitest';
import {
  DriverError,
  NotFoundError,
  SandboxExpiredError,
  SessionNotReadyError,
  ShoalError,
  asDriverError,
} from './errors.ts';

describe('errors', () => {
  test('render a stable body', () => {
    const err = new SandboxExpiredError('sandbox-1', new Date('2026-01-01T00:00:00.000Z'));
    expect(err.statusCode).toBe(409);
    expect(err.name).toBe('SandboxExpiredError');
    expect(err.toJSON()).toEqual({
      error: {
        code: 'sandbox_expired',
        message: 'Sandbox sandbox-1 expired at 2026-01-01T00:00:00.000Z',
        details: { sandbox_id: 'sandbox-1', expires_at: '2026-01-01T00:00:00.000Z' },
      },
    });
  });

  test('omit empty details', () => {
    expect(new NotFoundError('gone').toJSON()).toEqual({
      error: { code: 'not_found', message: 'gone' },
    });
  });

  test('session_not_ready carries the retry hint', () => {
    const err = new SessionNotReadyError('sandbox-1', 1500);
    expect(err.retryAfterMs).toBe(1500);
    expect(err.statusCode).toBe(503);
    expect(err.details).toEqual({ sandbox_id: 'sandbox-1', retry_after_ms: 1500 });
  });

  test('asDriverError keeps typed errors and wraps the rest', () => {
    const typed = new NotFoundError('gone');
    expect(asDriverError(typed, 'start')).toBe(typed);

    const wrapped = asDriverError(new Error('socket hang up'), 'start');
    expect(wrapped).toBeInstanceOf(DriverError);
    expect(wrapped).toBeInstanceOf(ShoalError);
    expect(wrapped.message).toBe('Driver start failed: socket hang up');
  });
});

import { describe, expect, it } from 'vitest';
import { ConnectorError } from '../src/errors/index.js';
import { andThen, attempt, err, ok, settle } from '../src/result/index.js';

describe('attempt', () => {
  it('captures resolved values', async () => {
    expect(await attempt(async () => 3)).toEqual({ ok: true, value: 3 });
  });

  it('wraps thrown errors with the default code', async () => {
    const result = await attempt(async () => {
      throw new Error('socket closed');
    }, 'CONNECTION_FAILED');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ConnectorError);
      expect(result.error.code).toBe('CONNECTION_FAILED');
      expect(result.error.message).toBe('socket closed');
    }
  });

  it('keeps connector errors as they are', async () => {
    const original = new ConnectorError({ code: 'TIMEOUT', message: 'too slow' });

    const result = await attempt(async () => {
      throw original;
    }, 'CONNECTION_FAILED');

    expect(result).toEqual({ ok: false, error: original });
  });
});

describe('andThen', () => {
  it('runs the next step after success', async () => {
    const result = await andThen(ok(2), async (value) => ok(value * 5));

    expect(result).toEqual({ ok: true, value: 10 });
  });

  it('skips the next step after failure', async () => {
    const failure = new ConnectorError({ code: 'NOT_FOUND', message: 'gone' });
    let called = false;

    const result = await andThen(err<number>(failure), async (value) => {
      called = true;
      return ok(value);
    });

    expect(called).toBe(false);
    expect(result.ok).toBe(false);
  });
});

describe('settle', () => {
  it('builds the success or failure shape', () => {
    const success = settle(
      ok([1, 2]),
      (ids) => ({ ids, error: null }),
      (message) => ({ ids: null, error: message })
    );
    const failure = settle(
      err<number[]>(new ConnectorError({ code: 'REMOTE_ERROR', message: 'Odoo error: boom' })),
      (ids) => ({ ids, error: null }),
      (message) => ({ ids: null, error: message })
    );

    expect(success).toEqual({ ids: [1, 2], error: null });
    expect(failure).toEqual({ ids: null, error: 'Odoo error: boom' });
  });
});

/**
 * Hooks System Tests
 */
import { describe, test, expect, vi } from 'vitest';
import {
  callHook,
  callErrorHook,
  createHookContext,
  getDuration,
  type HookContext,
  type QueryHookContext,
  type ConnectionHookContext,
} from '../../src/hooks';
import { Logger, type LogEntry } from '../../src/utils/logger';

describe('createHookContext', () => {
  test('creates context with startTime', () => {
    const before = Date.now();
    const ctx = createHookContext<HookContext>({});
    const after = Date.now();

    expect(ctx.startTime).toBeGreaterThanOrEqual(before);
    expect(ctx.startTime).toBeLessThanOrEqual(after);
  });

  test('preserves additional data', () => {
    const ctx = createHookContext<QueryHookContext>({ command: ':DATA?', count: 16 });

    expect(ctx.command).toBe(':DATA?');
    expect(ctx.count).toBe(16);
    expect(ctx.response).toBeUndefined();
  });

  test('creates ConnectionHookContext correctly', () => {
    const error = new Error('refused');
    const ctx = createHookContext<ConnectionHookContext>({
      endpoint: '127.0.0.1:5555',
      event: 'error',
      error,
    });

    expect(ctx.event).toBe('error');
    expect(ctx.error).toBe(error);
  });
});

describe('getDuration', () => {
  test('measures time since the context was created', () => {
    const ctx: HookContext = { startTime: Date.now() - 50 };
    expect(getDuration(ctx)).toBeGreaterThanOrEqual(50);
  });
});

describe('callHook', () => {
  test('does nothing without a hook', async () => {
    await expect(callHook(undefined, createHookContext<HookContext>({}))).resolves.toBeUndefined();
  });

  test('awaits async hooks', async () => {
    const calls: string[] = [];
    const ctx = createHookContext<QueryHookContext>({ command: '*IDN?' });

    await callHook<QueryHookContext>(async (c) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      calls.push(c.command);
    }, ctx);

    expect(calls).toEqual(['*IDN?']);
  });

  test('lets hooks store data on the context', async () => {
    const ctx = createHookContext<QueryHookContext>({ command: '*OPC?' });

    await callHook<QueryHookContext>((c) => {
      c.span = 'span-1';
    }, ctx);

    expect(ctx.span).toBe('span-1');
  });

  test('swallows and logs hook errors', async () => {
    const entries: LogEntry[] = [];
    const logger = new Logger({ level: 'error', handler: (e) => entries.push(e) });
    const failure = new Error('exporter down');

    await expect(
      callHook(
        () => {
          throw failure;
        },
        createHookContext<HookContext>({}),
        logger
      )
    ).resolves.toBeUndefined();

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ message: 'Hook error', data: failure });
  });
});

describe('callErrorHook', () => {
  test('passes the error to the hook', async () => {
    const hook = vi.fn();
    const ctx = createHookContext<QueryHookContext>({ command: ':MEAS?' });
    const error = new Error('timeout');

    await callErrorHook(hook, ctx, error);

    expect(hook).toHaveBeenCalledWith(ctx, error);
  });

  test('swallows rejections from async error hooks', async () => {
    const ctx = createHookContext<HookContext>({});

    await expect(
      callErrorHook(() => Promise.reject(new Error('nested')), ctx, new Error('original'))
    ).resolves.toBeUndefined();
  });
});

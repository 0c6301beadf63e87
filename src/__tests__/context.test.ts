import { describe, it, expect, vi } from 'vitest';
import { BotContext } from '../context.js';
import { StateError } from '../errors.js';
import type { Logger } from '../types.js';

const quietLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn()
});

describe('BotContext', () => {
  it('should start the configured database', async () => {
    const context = await BotContext.create({ logger: quietLogger() });

    expect(() => context.database).toThrow(StateError);
    expect(await context.start()).toBe(true);
    expect(context.database.isLoaded()).toBe(true);
  });

  it('should notify shutdown listeners in registration order before closing', async () => {
    const context = await BotContext.create({ logger: quietLogger() });
    await context.start();
    const database = context.database;
    const calls: string[] = [];
    context.onShutdown(() => {
      calls.push(`first:${database.isClosed()}`);
    });
    context.onShutdown(async () => {
      calls.push(`second:${database.isClosed()}`);
    });

    await context.shutdown();

    expect(calls).toEqual(['first:false', 'second:false']);
    expect(database.isClosed()).toBe(true);
    expect(context.databases.isRunning()).toBe(false);
  });

  it('should log a failing listener and keep going', async () => {
    const logger = quietLogger();
    const context = await BotContext.create({ logger });
    const failure = new Error('boom');
    const after = vi.fn();
    context.onShutdown(() => {
      throw failure;
    });
    context.onShutdown(after);

    await context.shutdown();

    expect(logger.error).toHaveBeenCalledWith('Shutdown listener failed: boom', failure);
    expect(after).toHaveBeenCalledTimes(1);
  });

  it('should stop notifying a removed listener', async () => {
    const context = await BotContext.create({ logger: quietLogger() });
    const listener = vi.fn();
    context.onShutdown(listener);

    expect(context.offShutdown(listener)).toBe(true);
    expect(context.offShutdown(listener)).toBe(false);
    await context.shutdown();

    expect(listener).not.toHaveBeenCalled();
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN TESTS — Hook Ordering, Isolation, Timeouts, Signals
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  ShutdownHooks,
  HookTimeoutError,
  createRegistryCloseHook,
  createServerCloseHook,
  installSignalHandlers,
  performShutdown,
  EXIT_CODES,
} from '../index.js';
import { configureLogger, resetLogger } from '../../../observability/logging/index.js';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

beforeEach(() => {
  configureLogger({ sink: () => undefined });
});

afterEach(() => {
  resetLogger();
});

// ─────────────────────────────────────────────────────────────────────────────────
// HOOKS
// ─────────────────────────────────────────────────────────────────────────────────

describe('ShutdownHooks', () => {
  it('should run groups in priority order', async () => {
    const order: string[] = [];
    const hooks = new ShutdownHooks();
    hooks.register('cleanup', () => { order.push('cleanup'); }, { priority: 'low' });
    hooks.register('clients', () => { order.push('clients'); }, { priority: 'high' });
    hooks.register('listener', () => { order.push('listener'); }, { priority: 'critical' });
    hooks.register('misc', () => { order.push('misc'); });

    const result = await hooks.run();

    expect(order).toEqual(['listener', 'clients', 'misc', 'cleanup']);
    expect(result.success).toBe(true);
    expect(result.hooks.map(hook => hook.name)).toEqual(['listener', 'clients', 'misc', 'cleanup']);
  });

  it('should list hooks in execution order', () => {
    const hooks = new ShutdownHooks();
    hooks.register('b', () => undefined, { priority: 'normal' });
    hooks.register('a', () => undefined, { priority: 'critical' });

    expect(hooks.list().map(hook => hook.name)).toEqual(['a', 'b']);
    expect(hooks.size).toBe(2);
  });

  it('should keep running after a hook fails', async () => {
    const hooks = new ShutdownHooks();
    const later = vi.fn();
    hooks.register('broken', () => { throw new Error('cannot close'); }, { priority: 'critical' });
    hooks.register('later', later, { priority: 'low' });

    const result = await hooks.run();

    expect(later).toHaveBeenCalledTimes(1);
    expect(result.success).toBe(false);
    expect(result.failed).toEqual(['broken']);
    expect(result.hooks[0]?.error?.message).toBe('cannot close');
  });

  it('should time out a hanging hook', async () => {
    const hooks = new ShutdownHooks(5000);
    hooks.register('slow', () => delay(200), { timeoutMs: 10 });

    const result = await hooks.run();

    const [slow] = result.hooks;
    expect(slow?.timedOut).toBe(true);
    expect(slow?.error).toBeInstanceOf(HookTimeoutError);
    expect(slow?.error?.message).toBe('Shutdown hook "slow" timed out after 10ms');
  });

  it('should run only once', async () => {
    const hooks = new ShutdownHooks();
    const fn = vi.fn();
    hooks.register('once', fn);

    const [first, second] = await Promise.all([hooks.run(), hooks.run()]);

    expect(fn).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(hooks.inProgress).toBe(true);
  });

  it('should replace a hook registered under the same name', async () => {
    const hooks = new ShutdownHooks();
    const original = vi.fn();
    const replacement = vi.fn();
    hooks.register('clients', original);
    hooks.register('clients', replacement);

    await hooks.run();

    expect(original).not.toHaveBeenCalled();
    expect(replacement).toHaveBeenCalledTimes(1);
  });

  it('should drop an unregistered hook', () => {
    const hooks = new ShutdownHooks();
    hooks.register('temp', () => undefined);

    expect(hooks.unregister('temp')).toBe(true);
    expect(hooks.unregister('temp')).toBe(false);
    expect(hooks.size).toBe(0);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// COMMON HOOKS
// ─────────────────────────────────────────────────────────────────────────────────

describe('common hooks', () => {
  it('should close an HTTP listener', async () => {
    const server = { close: vi.fn((callback?: (err?: Error) => void) => callback?.()) };

    await createServerCloseHook(server)();

    expect(server.close).toHaveBeenCalledTimes(1);
  });

  it('should reject when the listener fails to close', async () => {
    const server = {
      close: (callback?: (err?: Error) => void) => callback?.(new Error('Server is not running.')),
    };

    await expect(createServerCloseHook(server)()).rejects.toThrow('Server is not running.');
  });

  it('should close the client registry', async () => {
    const registry = { closeAll: vi.fn().mockResolvedValue(undefined) };

    await createRegistryCloseHook(registry)();

    expect(registry.closeAll).toHaveBeenCalledTimes(1);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// HANDLER
// ─────────────────────────────────────────────────────────────────────────────────

describe('performShutdown', () => {
  it('should resolve 0 when every hook succeeds', async () => {
    const hooks = new ShutdownHooks();
    hooks.register('ok', () => undefined);
    const onShutdownComplete = vi.fn();

    const code = await performShutdown(hooks, 'test', { exitProcess: false, onShutdownComplete });

    expect(code).toBe(EXIT_CODES.success);
    expect(onShutdownComplete).toHaveBeenCalledWith(expect.objectContaining({ success: true }), 0);
  });

  it('should resolve 1 when a hook fails', async () => {
    const hooks = new ShutdownHooks();
    hooks.register('broken', () => Promise.reject(new Error('nope')));

    expect(await performShutdown(hooks, 'test', { exitProcess: false })).toBe(EXIT_CODES.failure);
  });

  it('should resolve 124 when the hooks outlast the global timeout', async () => {
    const hooks = new ShutdownHooks();
    hooks.register('slow', () => delay(100), { timeoutMs: 500 });
    const onShutdownComplete = vi.fn();

    const code = await performShutdown(hooks, 'test', {
      exitProcess: false,
      timeoutMs: 10,
      onShutdownComplete,
    });

    expect(code).toBe(EXIT_CODES.timeout);
    expect(onShutdownComplete).not.toHaveBeenCalled();
    await hooks.run();
  });
});

describe('installSignalHandlers', () => {
  it('should shut down on a configured signal and uninstall cleanly', async () => {
    const before = process.listenerCount('SIGUSR2');
    const hooks = new ShutdownHooks();
    const fn = vi.fn();
    hooks.register('clients', fn);
    const onShutdownComplete = vi.fn();

    const uninstall = installSignalHandlers(hooks, {
      signals: ['SIGUSR2'],
      exitProcess: false,
      onShutdownComplete,
    });
    expect(process.listenerCount('SIGUSR2')).toBe(before + 1);

    process.emit('SIGUSR2', 'SIGUSR2');
    process.emit('SIGUSR2', 'SIGUSR2');
    await vi.waitFor(() => expect(onShutdownComplete).toHaveBeenCalledTimes(1));

    expect(fn).toHaveBeenCalledTimes(1);
    uninstall();
    expect(process.listenerCount('SIGUSR2')).toBe(before);
  });
});

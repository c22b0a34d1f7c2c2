// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN HOOKS — Prioritized Cleanup Steps
// ═══════════════════════════════════════════════════════════════════════════════
//
// - Higher priority groups run first; hooks inside a group run in parallel
// - Each hook has its own timeout
// - One failing hook does not stop the others
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * `critical` stops intake (listeners, transports), `high` releases outbound
 * connections, `normal` and `low` are everything after.
 */
export type ShutdownPriority = 'critical' | 'high' | 'normal' | 'low';

export const PRIORITY_ORDER: readonly ShutdownPriority[] = ['critical', 'high', 'normal', 'low'];

export type ShutdownHookFn = () => Promise<void> | void;

export interface ShutdownHook {
  readonly name: string;
  readonly fn: ShutdownHookFn;
  readonly priority: ShutdownPriority;
  /** 0 = the registry default */
  readonly timeoutMs: number;
}

export interface HookResult {
  readonly name: string;
  readonly success: boolean;
  readonly durationMs: number;
  readonly error?: Error;
  readonly timedOut: boolean;
}

export interface ShutdownResult {
  readonly success: boolean;
  readonly totalDurationMs: number;
  readonly hooks: HookResult[];
  readonly failed: string[];
}

export class HookTimeoutError extends Error {
  constructor(name: string, timeoutMs: number) {
    super(`Shutdown hook "${name}" timed out after ${timeoutMs}ms`);
    this.name = 'HookTimeoutError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// REGISTRY
// ─────────────────────────────────────────────────────────────────────────────────

export class ShutdownHooks {
  private readonly hooks = new Map<string, ShutdownHook>();
  private running: Promise<ShutdownResult> | null = null;
  private readonly logger = getLogger({ component: 'shutdown' });

  constructor(private readonly defaultTimeoutMs: number = 5000) {}

  get size(): number {
    return this.hooks.size;
  }

  get inProgress(): boolean {
    return this.running !== null;
  }

  register(
    name: string,
    fn: ShutdownHookFn,
    options: { priority?: ShutdownPriority; timeoutMs?: number } = {}
  ): void {
    if (this.hooks.has(name)) {
      this.logger.warn('Overwriting existing shutdown hook', { name });
    }
    const priority = options.priority ?? 'normal';
    this.hooks.set(name, { name, fn, priority, timeoutMs: options.timeoutMs ?? 0 });
    this.logger.debug('Registered shutdown hook', { name, priority });
  }

  unregister(name: string): boolean {
    return this.hooks.delete(name);
  }

  /**
   * Hooks in execution order.
   */
  list(): ShutdownHook[] {
    const all = [...this.hooks.values()];
    return PRIORITY_ORDER.flatMap(priority => all.filter(hook => hook.priority === priority));
  }

  /**
   * Run every hook once. Later calls return the first run's result.
   */
  run(): Promise<ShutdownResult> {
    if (!this.running) {
      this.running = this.runAll();
    }
    return this.running;
  }

  private async runAll(): Promise<ShutdownResult> {
    const startTime = Date.now();
    const results: HookResult[] = [];

    this.logger.info('Executing shutdown hooks', { hooks: this.list().map(hook => hook.name) });

    for (const priority of PRIORITY_ORDER) {
      const group = [...this.hooks.values()].filter(hook => hook.priority === priority);
      if (group.length === 0) continue;

      results.push(...(await Promise.all(group.map(hook => this.execute(hook)))));
    }

    const failed = results.filter(result => !result.success).map(result => result.name);
    const totalDurationMs = Date.now() - startTime;

    this.logger.info('Shutdown hooks completed', {
      success: failed.length === 0,
      totalDurationMs,
      failed,
    });

    return { success: failed.length === 0, totalDurationMs, hooks: results, failed };
  }

  private async execute(hook: ShutdownHook): Promise<HookResult> {
    const startTime = Date.now();
    const timeoutMs = hook.timeoutMs > 0 ? hook.timeoutMs : this.defaultTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    try {
      await Promise.race([
        Promise.resolve().then(hook.fn),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new HookTimeoutError(hook.name, timeoutMs)), timeoutMs);
        }),
      ]);

      const durationMs = Date.now() - startTime;
      this.logger.debug('Shutdown hook completed', { name: hook.name, durationMs });
      return { name: hook.name, success: true, durationMs, timedOut: false };
    } catch (error) {
      const durationMs = Date.now() - startTime;
      const timedOut = error instanceof HookTimeoutError;
      this.logger.error('Shutdown hook failed', error, { name: hook.name, durationMs, timedOut });
      return {
        name: hook.name,
        success: false,
        durationMs,
        error: error instanceof Error ? error : new Error(String(error)),
        timedOut,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMMON HOOKS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Stop an HTTP listener from accepting connections.
 */
export function createServerCloseHook(
  server: { close: (callback?: (err?: Error) => void) => unknown }
): ShutdownHookFn {
  return () => new Promise<void>((resolve, reject) => {
    server.close(err => {
      if (err) reject(err);
      else resolve();
    });
  });
}

/**
 * Release every cached Abstract API client.
 */
export function createRegistryCloseHook(registry: { closeAll: () => Promise<void> }): ShutdownHookFn {
  return () => registry.closeAll();
}

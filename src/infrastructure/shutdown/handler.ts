// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN HANDLER — Signals, Global Timeout, Exit Codes
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';
import type { ShutdownHooks, ShutdownResult } from './hooks.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface ShutdownConfig {
  /** Upper bound for the whole shutdown */
  readonly timeoutMs: number;

  readonly signals: readonly NodeJS.Signals[];

  /** Whether to call process.exit() when done */
  readonly exitProcess: boolean;

  readonly onShutdownComplete?: (result: ShutdownResult, exitCode: number) => void;
}

export const DEFAULT_SHUTDOWN_CONFIG: ShutdownConfig = {
  timeoutMs: 10_000,
  signals: ['SIGTERM', 'SIGINT'],
  exitProcess: true,
};

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  timeout: 124,
} as const;

const logger = getLogger({ component: 'shutdown' });

// ─────────────────────────────────────────────────────────────────────────────────
// SHUTDOWN EXECUTION
// ─────────────────────────────────────────────────────────────────────────────────

const TIMED_OUT = Symbol('timed-out');

/**
 * Run the hooks within the global timeout and resolve the exit code.
 */
export async function performShutdown(
  hooks: ShutdownHooks,
  reason: string,
  config: Partial<ShutdownConfig> = {}
): Promise<number> {
  const settings: ShutdownConfig = { ...DEFAULT_SHUTDOWN_CONFIG, ...config };
  logger.info('Starting graceful shutdown', { reason, timeoutMs: settings.timeoutMs });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<typeof TIMED_OUT>(resolve => {
    timer = setTimeout(() => resolve(TIMED_OUT), settings.timeoutMs);
  });

  const outcome = await Promise.race([hooks.run(), timeout]);
  clearTimeout(timer);

  let exitCode: number;
  if (outcome === TIMED_OUT) {
    exitCode = EXIT_CODES.timeout;
    logger.error('Shutdown timed out', undefined, { timeoutMs: settings.timeoutMs });
  } else {
    exitCode = outcome.success ? EXIT_CODES.success : EXIT_CODES.failure;
    if (outcome.success) {
      logger.info('Graceful shutdown completed', { totalDurationMs: outcome.totalDurationMs });
    } else {
      logger.warn('Shutdown completed with failures', { failed: outcome.failed });
    }
    settings.onShutdownComplete?.(outcome, exitCode);
  }

  if (settings.exitProcess) {
    process.exit(exitCode);
  }

  return exitCode;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SIGNAL HANDLERS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Run the hooks on the first of `config.signals`; repeated signals are ignored.
 *
 * @returns A function that removes the listeners again
 */
export function installSignalHandlers(
  hooks: ShutdownHooks,
  config: Partial<ShutdownConfig> = {}
): () => void {
  const signals = config.signals ?? DEFAULT_SHUTDOWN_CONFIG.signals;

  const onSignal = (signal: NodeJS.Signals): void => {
    if (hooks.inProgress) {
      logger.warn('Received signal during shutdown, ignoring', { signal });
      return;
    }
    logger.info('Received shutdown signal', { signal });
    performShutdown(hooks, signal, config).catch((error: unknown) => {
      logger.fatal('Shutdown failed', error);
      process.exit(EXIT_CODES.failure);
    });
  };

  for (const signal of signals) {
    process.on(signal, onSignal);
  }
  logger.debug('Signal handlers installed', { signals });

  return () => {
    for (const signal of signals) {
      process.off(signal, onSignal);
    }
  };
}

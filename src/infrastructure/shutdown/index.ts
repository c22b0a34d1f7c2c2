// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN MODULE — Exports
// ═══════════════════════════════════════════════════════════════════════════════

export {
  ShutdownHooks,
  HookTimeoutError,
  PRIORITY_ORDER,
  createServerCloseHook,
  createRegistryCloseHook,
  type ShutdownPriority,
  type ShutdownHookFn,
  type ShutdownHook,
  type HookResult,
  type ShutdownResult,
} from './hooks.js';

export {
  performShutdown,
  installSignalHandlers,
  DEFAULT_SHUTDOWN_CONFIG,
  EXIT_CODES,
  type ShutdownConfig,
} from './handler.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment Config, Transport Selection, Per-Service API Keys
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function envBool(key: string, defaultValue: boolean = false): boolean {
  const value = process.env[key]?.toLowerCase();
  if (value === undefined) return defaultValue;
  return value === 'true' || value === '1' || value === 'yes';
}

function envNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function envString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function envOptional(key: string): string | undefined {
  const value = process.env[key];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────────────────────────

export type Environment = 'development' | 'staging' | 'production' | 'test';

const EnvironmentSchema = z.enum(['development', 'staging', 'production', 'test']);

export interface EnvironmentConfig {
  environment: Environment;
  isProduction: boolean;
  isDevelopment: boolean;
  debugMode: boolean;
}

export function loadEnvironmentConfig(): EnvironmentConfig {
  const parsed = EnvironmentSchema.safeParse(envString('NODE_ENV', 'development'));
  const environment: Environment = parsed.success ? parsed.data : 'development';

  return {
    environment,
    isProduction: environment === 'production',
    isDevelopment: environment === 'development',
    debugMode: envBool('DEBUG', false),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// SERVER CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export const TransportSchema = z.enum(['stdio', 'http']);

export type TransportMode = z.infer<typeof TransportSchema>;

export interface ServerConfig {
  /** Name reported to MCP clients and by the health endpoint */
  name: string;
  version: string;
  transport: TransportMode;
  host: string;
  port: number;
}

export const SERVER_NAME = 'abstract-api-mcp';
export const SERVER_VERSION = '0.1.3';

export function loadServerConfig(): ServerConfig {
  const rawTransport = (envOptional('MCP_TRANSPORT') ?? 'stdio').toLowerCase();
  const transport = TransportSchema.safeParse(rawTransport);
  if (!transport.success) {
    throw new Error(`Invalid MCP_TRANSPORT "${rawTransport}": expected "stdio" or "http"`);
  }

  return {
    name: SERVER_NAME,
    version: SERVER_VERSION,
    transport: transport.data,
    host: envOptional('HOST') ?? '0.0.0.0',
    port: envNumber('PORT', 8000),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ABSTRACT API CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export const GENERIC_API_KEY_ENV = 'ABSTRACT_API_KEY';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const EXTENDED_TIMEOUT_MS = 60_000;

export interface AbstractApiConfig {
  /** Fallback key for services without their own key */
  apiKey?: string;
  timeoutMs: number;
  userAgent: string;
}

export function loadAbstractApiConfig(): AbstractApiConfig {
  return {
    apiKey: envOptional(GENERIC_API_KEY_ENV),
    timeoutMs: envNumber('ABSTRACT_API_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
    userAgent: envOptional('ABSTRACT_API_USER_AGENT') ?? `${SERVER_NAME}/${SERVER_VERSION}`,
  };
}

/**
 * Environment variable holding the key for one service, e.g. `ABSTRACT_EMAIL_API_KEY`.
 */
export function serviceApiKeyEnvVar(service: string): string {
  return `ABSTRACT_${service.toUpperCase()}_API_KEY`;
}

/**
 * Service-scoped key only. The generic key is applied later by the client.
 */
export function getServiceApiKey(service: string): string | undefined {
  return envOptional(serviceApiKeyEnvVar(service));
}

// ─────────────────────────────────────────────────────────────────────────────────
// SHUTDOWN CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export interface ShutdownSettings {
  timeoutMs: number;
}

export function loadShutdownSettings(): ShutdownSettings {
  return {
    timeoutMs: envNumber('SHUTDOWN_TIMEOUT_MS', 10_000),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMBINED CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export interface AppConfig {
  env: EnvironmentConfig;
  server: ServerConfig;
  abstractApi: AbstractApiConfig;
  shutdown: ShutdownSettings;
}

let cachedConfig: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    env: loadEnvironmentConfig(),
    server: loadServerConfig(),
    abstractApi: loadAbstractApiConfig(),
    shutdown: loadShutdownSettings(),
  };

  return cachedConfig;
}

export function reloadConfig(): AppConfig {
  cachedConfig = null;
  return loadConfig();
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLIENT REGISTRY — One Abstract API Client per Logical Service
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each Abstract API product is billed and keyed separately, so clients are
// cached per service name rather than shared. The registry is owned by the
// server's start-up code and handed to every tool handler.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getServiceApiKey, serviceApiKeyEnvVar, GENERIC_API_KEY_ENV } from '../config/index.js';
import { getLogger } from '../observability/logging/index.js';
import { AbstractClient, type AbstractClientOptions } from '../services/abstract-api/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export const SERVICES = [
  'email',
  'phone',
  'vat',
  'ip',
  'timezone',
  'holidays',
  'exchange',
  'company',
  'scrape',
  'screenshot',
] as const;

export type ServiceName = (typeof SERVICES)[number];

/**
 * Where tool handlers send caller-visible diagnostics.
 */
export interface ToolReporter {
  warning(message: string): Promise<void>;
  error(message: string): Promise<void>;
}

export type ClientFactory = (options: AbstractClientOptions) => AbstractClient;

export interface ClientRegistryOptions {
  /** Builds a client on first use of a service */
  createClient?: ClientFactory;
}

export function missingKeyWarning(service: string): string {
  return (
    `No API key configured for ${service} service. ` +
    `Set ${serviceApiKeyEnvVar(service)} or ${GENERIC_API_KEY_ENV} in your .env file`
  );
}

// ─────────────────────────────────────────────────────────────────────────────────
// REGISTRY
// ─────────────────────────────────────────────────────────────────────────────────

export class ClientRegistry {
  private readonly clients = new Map<ServiceName, AbstractClient>();
  private readonly createClient: ClientFactory;
  private readonly logger = getLogger({ component: 'registry' });

  constructor(options: ClientRegistryOptions = {}) {
    this.createClient = options.createClient ?? (clientOptions => new AbstractClient(clientOptions));
  }

  get size(): number {
    return this.clients.size;
  }

  has(service: ServiceName): boolean {
    return this.clients.has(service);
  }

  services(): ServiceName[] {
    return [...this.clients.keys()];
  }

  /**
   * Cached client for `service`, created on first use with the service's own key.
   * A missing key is reported as a warning; the client falls back to the generic key.
   */
  async getClient(service: ServiceName, reporter: ToolReporter): Promise<AbstractClient> {
    const cached = this.clients.get(service);
    if (cached) {
      return cached;
    }

    // Lookup and insert happen before the first await
    const apiKey = getServiceApiKey(service);
    const client = this.createClient({ apiKey });
    this.clients.set(service, client);

    this.logger.info('Client created', { service, credentials: apiKey !== undefined ? 'service' : 'fallback' });

    if (apiKey === undefined) {
      await reporter.warning(missingKeyWarning(service));
    }

    return client;
  }

  /**
   * Empty the cache, then close every client it held. A client created while
   * this runs stays cached and open.
   */
  async closeAll(): Promise<void> {
    const entries = [...this.clients.entries()];
    this.clients.clear();

    const results = await Promise.allSettled(entries.map(([, client]) => client.close()));

    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.error('Failed to close client', result.reason, { service: entries[index]?.[0] });
      }
    });

    this.logger.info('All clients closed', { count: entries.length });
  }
}

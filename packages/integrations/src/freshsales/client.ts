/**
 * ╔══════════════════════════════════════════════════════════════════════════════╗
 * ║                          FRESHSALES CRM CLIENT                                ║
 * ║                                                                               ║
 * ║  One entry point per account: every resource client shares the domain,      ║
 * ║  credentials, logger and transport.                                           ║
 * ╚══════════════════════════════════════════════════════════════════════════════╝
 */

import { createLogger, validateEnv, withCorrelationId, type Logger } from '@freshsales-sdk/core';
import { parseClientConfig, type FetchFn } from './http-gateway.js';
import type { ResourceClient, ResourceClientSharedOptions } from './resource-client.js';
import {
  AccountsClient,
  ContactsClient,
  createResourceClient,
  DealsClient,
  LeadsClient,
} from './resources.js';
import { SelectorClient } from './selector-client.js';

// =============================================================================
// TYPES
// =============================================================================

export interface FreshsalesClientOptions {
  /** Account subdomain, e.g. `acme` for https://acme.freshsales.io */
  domain: string;
  apiKey: string;
  perPage?: number | undefined;
  timeoutMs?: number | undefined;
  logger?: Logger | undefined;
  /** Bound to every log line of this client */
  correlationId?: string | undefined;
  fetch?: FetchFn | undefined;
}

// =============================================================================
// CLIENT
// =============================================================================

export class FreshsalesClient {
  readonly contacts: ContactsClient;
  readonly accounts: AccountsClient;
  readonly deals: DealsClient;
  readonly leads: LeadsClient;
  readonly tasks: ResourceClient;
  readonly notes: ResourceClient;
  readonly salesActivities: ResourceClient;
  readonly selectors: SelectorClient;

  constructor(options: FreshsalesClientOptions) {
    const config = parseClientConfig({
      domain: options.domain,
      apiKey: options.apiKey,
      perPage: options.perPage,
      timeoutMs: options.timeoutMs,
    });

    const baseLogger = options.logger ?? createLogger({ name: 'freshsales' });
    const logger = options.correlationId
      ? withCorrelationId(baseLogger, options.correlationId)
      : baseLogger;

    const shared: ResourceClientSharedOptions = {
      domain: config.domain,
      apiKey: config.apiKey,
      perPage: config.perPage,
      timeoutMs: config.timeoutMs,
      logger,
      fetch: options.fetch,
    };

    this.contacts = new ContactsClient(shared, config);
    this.accounts = new AccountsClient(shared, config);
    this.deals = new DealsClient(shared, config);
    this.leads = new LeadsClient(shared, config);
    this.tasks = createResourceClient('tasks', shared, config);
    this.notes = createResourceClient('notes', shared, config);
    this.salesActivities = createResourceClient('sales_activities', shared, config);
    this.selectors = new SelectorClient(shared, config);

    logger.debug({ domain: config.domain }, 'Freshsales client initialized');
  }
}

// =============================================================================
// FACTORY FUNCTION
// =============================================================================

/**
 * Create a configured Freshsales client
 *
 * @example
 * ```typescript
 * const client = createFreshsalesClient(getFreshsalesCredentials());
 * for await (const contact of client.contacts.getAllGenerator(viewId, 50)) {
 *   console.log(contact.owner);
 * }
 * ```
 */
export function createFreshsalesClient(options: FreshsalesClientOptions): FreshsalesClient {
  return new FreshsalesClient(options);
}

/**
 * Get Freshsales client settings from environment variables
 *
 * @throws ValidationError if FRESHSALES_DOMAIN or FRESHSALES_API_KEY is not set
 */
export function getFreshsalesCredentials(
  env: Record<string, string | undefined> = process.env
): FreshsalesClientOptions {
  const validated = validateEnv(env);

  return {
    domain: validated.FRESHSALES_DOMAIN,
    apiKey: validated.FRESHSALES_API_KEY,
    perPage: validated.FRESHSALES_PER_PAGE,
    timeoutMs: validated.FRESHSALES_TIMEOUT_MS,
  };
}

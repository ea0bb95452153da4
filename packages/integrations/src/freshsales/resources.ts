/**
 * Resource kinds as declarative configuration over `ResourceClient`
 */

import type { CrmRecord, FreshsalesClientConfig, RecordId, ResourceKind } from '@freshsales-sdk/types';
import { unwrapCollection } from './envelope.js';
import type { NormalizerKind } from './normalizers.js';
import {
  ResourceClient,
  type ResourceCapabilities,
  type ResourceClientOptions,
  type ResourceClientSharedOptions,
} from './resource-client.js';

// =============================================================================
// DESCRIPTORS
// =============================================================================

export interface ResourceDescriptor {
  readonly resourceType: string;
  readonly resourceTypeSingular?: string;
  readonly defaultParams?: Readonly<Record<string, string>>;
  readonly normalize: NormalizerKind;
  readonly capabilities: Readonly<ResourceCapabilities>;
}

const RECENT_FIRST = { sort: 'updated_at', sort_type: 'desc' } as const;

const ERASABLE: ResourceCapabilities = { forget: true, bulkDelete: true };
const READ_WRITE_ONLY: ResourceCapabilities = { forget: false, bulkDelete: false };

export const RESOURCE_DESCRIPTORS: Readonly<Record<ResourceKind, ResourceDescriptor>> = Object.freeze({
  contacts: {
    resourceType: 'contacts',
    defaultParams: { include: 'sales_accounts,appointments,owner,contact_status', ...RECENT_FIRST },
    normalize: 'contacts',
    capabilities: ERASABLE,
  },
  accounts: {
    resourceType: 'sales_accounts',
    defaultParams: { include: 'appointments,owner,industry_type', ...RECENT_FIRST },
    normalize: 'accounts',
    capabilities: ERASABLE,
  },
  deals: {
    resourceType: 'deals',
    defaultParams: { include: 'sales_account,appointments,owner,deal_stage', ...RECENT_FIRST },
    normalize: 'deals',
    capabilities: ERASABLE,
  },
  leads: {
    resourceType: 'leads',
    defaultParams: { include: 'sales_account,appointments,owner,lead_stage', ...RECENT_FIRST },
    normalize: 'leads',
    capabilities: ERASABLE,
  },
  tasks: {
    resourceType: 'tasks',
    normalize: 'none',
    capabilities: READ_WRITE_ONLY,
  },
  notes: {
    resourceType: 'notes',
    normalize: 'none',
    capabilities: READ_WRITE_ONLY,
  },
  sales_activities: {
    resourceType: 'sales_activities',
    resourceTypeSingular: 'sales_activity',
    normalize: 'none',
    capabilities: READ_WRITE_ONLY,
  },
});

function optionsFor(kind: ResourceKind, shared: ResourceClientSharedOptions): ResourceClientOptions {
  const descriptor = RESOURCE_DESCRIPTORS[kind];
  return {
    ...shared,
    resourceType: descriptor.resourceType,
    resourceTypeSingular: descriptor.resourceTypeSingular,
    defaultParams: descriptor.defaultParams,
    normalize: descriptor.normalize,
    capabilities: descriptor.capabilities,
  };
}

// =============================================================================
// CLIENTS
// =============================================================================

export class ContactsClient extends ResourceClient {
  constructor(options: ResourceClientSharedOptions, config?: FreshsalesClientConfig) {
    super(optionsFor('contacts', options), config);
  }

  async getActivities(id: RecordId): Promise<CrmRecord[]> {
    const response = await this.gateway.request('GET', `${this.recordPath(id)}/activities`);
    return unwrapCollection(response, 'activities', `contact ${id} activities`);
  }

  async getAppointments(id: RecordId): Promise<CrmRecord[]> {
    const response = await this.gateway.request('GET', `${this.recordPath(id)}/appointments`);
    return unwrapCollection(response, 'appointments', `contact ${id} appointments`);
  }
}

export interface AccountBulkDeleteOptions {
  /** Also delete the contacts and deals linked to the accounts */
  deleteAssociatedContactsDeals?: boolean;
}

export class AccountsClient extends ResourceClient {
  constructor(options: ResourceClientSharedOptions, config?: FreshsalesClientConfig) {
    super(optionsFor('accounts', options), config);
  }

  override async bulkDelete(
    ids: readonly RecordId[],
    options: AccountBulkDeleteOptions = {}
  ): Promise<unknown> {
    this.requireCapability('bulkDelete');
    const body: CrmRecord = { selected_ids: this.checkIds(ids) };
    if (options.deleteAssociatedContactsDeals !== undefined) {
      body.delete_associated_contacts_deals = options.deleteAssociatedContactsDeals;
    }
    return this.destroyMany(body);
  }
}

export class DealsClient extends ResourceClient {
  constructor(options: ResourceClientSharedOptions, config?: FreshsalesClientConfig) {
    super(optionsFor('deals', options), config);
  }
}

export class LeadsClient extends ResourceClient {
  constructor(options: ResourceClientSharedOptions, config?: FreshsalesClientConfig) {
    super(optionsFor('leads', options), config);
  }
}

/**
 * Generic client for any kind, built from its descriptor
 */
export function createResourceClient(
  kind: ResourceKind,
  options: ResourceClientSharedOptions,
  config?: FreshsalesClientConfig
): ResourceClient {
  return new ResourceClient(optionsFor(kind, options), config);
}

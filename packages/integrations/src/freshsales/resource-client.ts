/**
 * ╔══════════════════════════════════════════════════════════════════════════════╗
 * ║                       FRESHSALES RESOURCE CLIENT                              ║
 * ║                                                                               ║
 * ║  Shared CRUD, view pagination and normalization for one resource endpoint.   ║
 * ╚══════════════════════════════════════════════════════════════════════════════╝
 */

import { createLogger, InvalidArgumentError, NotImplementedError, type Logger } from '@freshsales-sdk/core';
import {
  RecordIdSchema,
  type CrmRecord,
  type Envelope,
  type FreshsalesClientConfig,
  type FreshsalesView,
  type QueryParams,
  type RecordId,
  type ViewId,
} from '@freshsales-sdk/types';
import { expectEnvelope, unwrapCollection, unwrapRecord } from './envelope.js';
import { FreshsalesHttpGateway, parseClientConfig, type FetchFn } from './http-gateway.js';
import { NORMALIZERS, type Normalizer, type NormalizerKind } from './normalizers.js';
import { ViewPager } from './view-pager.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ResourceCapabilities {
  /** DELETE `/{resource}/{id}/forget` */
  forget: boolean;
  /** POST `/{resource}/bulk_destroy` */
  bulkDelete: boolean;
}

/**
 * Connection settings shared by every client of one account
 */
export interface ResourceClientSharedOptions {
  domain: string;
  apiKey: string;
  /** Sent as `per_page` on view listings */
  perPage?: number | undefined;
  logger?: Logger | undefined;
  fetch?: FetchFn | undefined;
  timeoutMs?: number | undefined;
}

export interface ResourceClientOptions extends ResourceClientSharedOptions {
  /** Plural endpoint segment, e.g. `contacts` */
  resourceType: string;
  /** JSON key of a single record; `resourceType` minus its last character when omitted */
  resourceTypeSingular?: string | undefined;
  defaultParams?: QueryParams | undefined;
  normalize?: NormalizerKind | Normalizer | undefined;
  capabilities?: Partial<ResourceCapabilities> | undefined;
}

const RESOURCE_SEGMENT = /^[a-z0-9_]+$/i;

/**
 * Validate the connection part of shared options
 */
export function parseSharedConfig(options: ResourceClientSharedOptions): FreshsalesClientConfig {
  return parseClientConfig({
    domain: options.domain,
    apiKey: options.apiKey,
    perPage: options.perPage,
    timeoutMs: options.timeoutMs,
  });
}

// =============================================================================
// CLIENT
// =============================================================================

export class ResourceClient {
  readonly resourceType: string;
  readonly resourceTypeSingular: string;
  readonly capabilities: Readonly<ResourceCapabilities>;
  protected readonly gateway: FreshsalesHttpGateway;
  protected readonly logger: Logger;
  private readonly normalizer: Normalizer;
  private readonly perPage: number | undefined;

  /**
   * @param config - Already validated settings; parsed from `options` when omitted
   */
  constructor(
    options: ResourceClientOptions,
    config: FreshsalesClientConfig = parseSharedConfig(options)
  ) {
    if (!RESOURCE_SEGMENT.test(options.resourceType)) {
      throw new InvalidArgumentError('resourceType', `"${options.resourceType}" is not an endpoint segment`);
    }

    this.resourceType = options.resourceType;
    this.resourceTypeSingular =
      options.resourceTypeSingular ?? options.resourceType.slice(0, -1);
    this.capabilities = Object.freeze({
      forget: options.capabilities?.forget ?? false,
      bulkDelete: options.capabilities?.bulkDelete ?? false,
    });
    this.perPage = config.perPage;

    const normalize = options.normalize ?? 'none';
    this.normalizer = typeof normalize === 'function' ? normalize : NORMALIZERS[normalize];

    this.logger = (options.logger ?? createLogger({ name: 'freshsales' })).child({
      resource: this.resourceType,
    });
    this.gateway = new FreshsalesHttpGateway(config, {
      defaultParams: options.defaultParams,
      logger: this.logger,
      fetch: options.fetch,
    });
  }

  // ===========================================================================
  // VIEWS
  // ===========================================================================

  /**
   * Saved filters of this resource
   */
  async getViews(): Promise<FreshsalesView[]> {
    const response = await this.gateway.request('GET', `/${this.resourceType}/filters`);
    return unwrapCollection(response, 'filters', `${this.resourceType} filters`);
  }

  /**
   * Lazy listing of a view. Each iteration restarts at page 1 and stops
   * after `limit` records or the last page.
   */
  getAllGenerator(viewId: ViewId, limit?: number): ViewPager {
    const path = `/${this.resourceType}/view/${this.encodeId(viewId, 'viewId')}`;

    return new ViewPager({
      fetchPage: (page) => this.gateway.request('GET', path, { page, per_page: this.perPage }),
      resourceKey: this.resourceType,
      normalize: this.normalizer,
      limit,
      logger: this.logger,
      context: `${this.resourceType} view ${viewId}`,
    });
  }

  /**
   * Eager listing of a view
   */
  async getAll(viewId: ViewId, limit?: number): Promise<CrmRecord[]> {
    return this.getAllGenerator(viewId, limit).toArray();
  }

  // ===========================================================================
  // CRUD
  // ===========================================================================

  /**
   * Fetch one record, normalized against its own response
   *
   * @throws NotFoundError if the record does not exist
   */
  async get(id: RecordId): Promise<CrmRecord> {
    const response = await this.gateway.request('GET', this.recordPath(id));
    const context = `${this.resourceTypeSingular} ${id}`;
    const envelope = expectEnvelope(response, context);
    const record = unwrapRecord(envelope, this.resourceTypeSingular, context);
    return this.normalize(record, envelope);
  }

  async create(data: CrmRecord): Promise<unknown> {
    return this.gateway.request('POST', `/${this.resourceType}`, undefined, this.wrap(data));
  }

  async update(id: RecordId, data: CrmRecord): Promise<unknown> {
    return this.gateway.request('PUT', this.recordPath(id), undefined, this.wrap(data));
  }

  async delete(id: RecordId): Promise<unknown> {
    return this.gateway.request('DELETE', this.recordPath(id));
  }

  /**
   * Permanently erase a record and its personal data
   */
  async forget(id: RecordId): Promise<unknown> {
    this.requireCapability('forget');
    return this.gateway.request('DELETE', `${this.recordPath(id)}/forget`);
  }

  async bulkDelete(ids: readonly RecordId[]): Promise<unknown> {
    this.requireCapability('bulkDelete');
    return this.destroyMany({ selected_ids: this.checkIds(ids) });
  }

  /**
   * Resolve id references on `record` from sibling collections of `envelope`
   */
  normalize(record: CrmRecord, envelope: Envelope): CrmRecord {
    return this.normalizer(record, envelope);
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  protected async destroyMany(body: CrmRecord): Promise<unknown> {
    return this.gateway.request('POST', `/${this.resourceType}/bulk_destroy`, undefined, body);
  }

  protected requireCapability(capability: keyof ResourceCapabilities): void {
    if (!this.capabilities[capability]) {
      throw new NotImplementedError(capability, this.resourceType);
    }
  }

  protected recordPath(id: RecordId): string {
    return `/${this.resourceType}/${this.encodeId(id)}`;
  }

  protected checkIds(ids: readonly RecordId[]): RecordId[] {
    if (ids.length === 0) {
      throw new InvalidArgumentError('ids', 'expected at least one id');
    }
    for (const id of ids) {
      this.encodeId(id);
    }
    return [...ids];
  }

  protected encodeId(id: RecordId, argument = 'id'): string {
    const parsed = RecordIdSchema.safeParse(id);
    if (!parsed.success) {
      throw new InvalidArgumentError(argument, `expected a non-empty string or integer, got ${String(id)}`);
    }
    return encodeURIComponent(String(parsed.data));
  }

  private wrap(data: CrmRecord): CrmRecord {
    return { [this.resourceTypeSingular]: data };
  }
}

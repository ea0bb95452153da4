/**
 * Read-only access to the `/selector` lookup endpoints (owners, stages,
 * currencies, pipelines, activity types). Responses are not normalized.
 */

import { createLogger, InvalidArgumentError } from '@freshsales-sdk/core';
import {
  RecordIdSchema,
  type CrmRecord,
  type FreshsalesClientConfig,
  type RecordId,
} from '@freshsales-sdk/types';
import { unwrapCollection } from './envelope.js';
import { FreshsalesHttpGateway } from './http-gateway.js';
import { parseSharedConfig, type ResourceClientSharedOptions } from './resource-client.js';

const SELECTOR_NAME = /^[a-z0-9_]+(?:\/[a-z0-9_]+)*$/i;

export type SelectorClientOptions = Omit<ResourceClientSharedOptions, 'perPage'>;

export class SelectorClient {
  private readonly gateway: FreshsalesHttpGateway;

  constructor(
    options: SelectorClientOptions,
    config: FreshsalesClientConfig = parseSharedConfig(options)
  ) {
    const logger = (options.logger ?? createLogger({ name: 'freshsales' })).child({
      resource: 'selector',
    });
    this.gateway = new FreshsalesHttpGateway(config, { logger, fetch: options.fetch });
  }

  /**
   * Raw decoded body of `/selector/{name}`
   */
  async fetch(name: string): Promise<unknown> {
    if (!SELECTOR_NAME.test(name)) {
      throw new InvalidArgumentError('selector', `"${name}" is not a selector name`);
    }
    return this.gateway.request('GET', `/selector/${name}`);
  }

  async owners(): Promise<CrmRecord[]> {
    return this.list('owners', 'users');
  }

  async dealStages(): Promise<CrmRecord[]> {
    return this.list('deal_stages', 'deal_stages');
  }

  async currencies(): Promise<CrmRecord[]> {
    return this.list('currencies', 'currencies');
  }

  async dealReasons(): Promise<CrmRecord[]> {
    return this.list('deal_reasons', 'deal_reasons');
  }

  async dealTypes(): Promise<CrmRecord[]> {
    return this.list('deal_types', 'deal_types');
  }

  async dealPipelines(): Promise<CrmRecord[]> {
    return this.list('deal_pipelines', 'deal_pipelines');
  }

  /**
   * Stages of one deal pipeline
   */
  async dealPipelineStages(pipelineId: RecordId): Promise<CrmRecord[]> {
    return this.list(`deal_pipelines/${segment(pipelineId, 'pipelineId')}/deal_stages`, 'deal_stages');
  }

  async salesActivityTypes(): Promise<CrmRecord[]> {
    return this.list('sales_activity_types', 'sales_activity_types');
  }

  /**
   * Outcomes available for one sales activity type
   */
  async salesActivityOutcomes(typeId: RecordId): Promise<CrmRecord[]> {
    return this.list(
      `sales_activity_types/${segment(typeId, 'typeId')}/sales_activity_outcomes`,
      'sales_activity_outcomes'
    );
  }

  private async list(name: string, key: string): Promise<CrmRecord[]> {
    return unwrapCollection(await this.fetch(name), key, `selector ${name}`);
  }
}

function segment(id: RecordId, argument: string): string {
  const parsed = RecordIdSchema.safeParse(id);
  if (!parsed.success || !/^[a-z0-9_-]+$/i.test(String(parsed.data))) {
    throw new InvalidArgumentError(argument, `expected an id, got ${String(id)}`);
  }
  return String(parsed.data);
}

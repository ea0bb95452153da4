/**
 * Lazy, restartable listing of a saved view.
 *
 * Every `for await` over a `ViewPager` starts a fresh `ViewCursor` at page 1.
 * The cursor fetches one page at a time, only when its buffer runs dry, and
 * stops once the limit is reached or the last page is consumed.
 */

import { InvalidArgumentError, MalformedResponseError, type Logger } from '@freshsales-sdk/core';
import { ViewPageEnvelopeSchema, type CrmRecord, type Envelope } from '@freshsales-sdk/types';
import { expectEnvelope, unwrapCollection } from './envelope.js';
import { FRESHSALES_SERVICE } from './http-gateway.js';
import type { Normalizer } from './normalizers.js';

export interface ViewPagerOptions {
  /** Fetch one page (1-based) of the view */
  fetchPage: (page: number) => Promise<unknown>;
  /** Key of the record array in each page, e.g. `contacts` */
  resourceKey: string;
  normalize: Normalizer;
  /** Maximum number of records to yield; unbounded when omitted */
  limit?: number | undefined;
  logger: Logger;
  /** Label for logs and errors, e.g. `contacts view 12` */
  context: string;
}

function assertLimit(limit: number | undefined): void {
  if (limit === undefined) return;
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidArgumentError('limit', `expected a non-negative integer, got ${limit}`);
  }
}

/**
 * Pull-based cursor over one pass of a view.
 * Not safe for overlapping `next()` calls; `for await` never overlaps them.
 */
export class ViewCursor implements AsyncIterator<CrmRecord, undefined> {
  private page = 0;
  private totalPages = 0;
  private buffer: CrmRecord[] = [];
  private index = 0;
  private envelope: Envelope = {};
  private emitted = 0;
  private finished = false;

  constructor(private readonly options: ViewPagerOptions) {}

  /** Records yielded so far */
  get count(): number {
    return this.emitted;
  }

  /** Pages fetched so far */
  get pagesFetched(): number {
    return this.page;
  }

  async next(): Promise<IteratorResult<CrmRecord, undefined>> {
    if (this.finished) {
      return this.done();
    }

    const { limit, logger, context } = this.options;
    if (limit !== undefined && this.emitted >= limit) {
      logger.debug({ context, limit }, 'Reached limit, stopping pagination');
      return this.done();
    }

    while (this.index >= this.buffer.length) {
      if (this.page > 0 && this.page >= this.totalPages) {
        return this.done();
      }
      await this.loadPage(this.page + 1);
    }

    const record = this.buffer[this.index];
    this.index += 1;
    if (record === undefined) {
      return this.done();
    }

    this.emitted += 1;
    return { done: false, value: this.options.normalize(record, this.envelope) };
  }

  async return(): Promise<IteratorResult<CrmRecord, undefined>> {
    return this.done();
  }

  private done(): IteratorResult<CrmRecord, undefined> {
    this.finished = true;
    this.buffer = [];
    this.index = 0;
    return { done: true, value: undefined };
  }

  private async loadPage(page: number): Promise<void> {
    const { fetchPage, resourceKey, logger, context } = this.options;
    const startedAt = Date.now();

    let envelope: Envelope;
    let totalPages: number;
    let records: CrmRecord[];
    try {
      envelope = expectEnvelope(await fetchPage(page), context);
      const parsed = ViewPageEnvelopeSchema.safeParse(envelope);
      if (!parsed.success) {
        throw new MalformedResponseError(
          FRESHSALES_SERVICE,
          `${context} page ${page} is missing meta.total_pages`
        );
      }
      totalPages = parsed.data.meta.total_pages;
      records = unwrapCollection(envelope, resourceKey, `${context} page ${page}`);
    } catch (error) {
      this.finished = true;
      this.buffer = [];
      throw error;
    }

    logger.debug(
      { context, page, totalPages, records: records.length, durationMs: Date.now() - startedAt },
      'Fetched view page'
    );

    this.page = page;
    this.totalPages = totalPages;
    this.envelope = envelope;
    this.buffer = records;
    this.index = 0;
  }
}

/**
 * Restartable async sequence of normalized records from a saved view
 */
export class ViewPager implements AsyncIterable<CrmRecord> {
  constructor(private readonly options: ViewPagerOptions) {
    assertLimit(options.limit);
  }

  get limit(): number | undefined {
    return this.options.limit;
  }

  [Symbol.asyncIterator](): ViewCursor {
    return new ViewCursor(this.options);
  }

  /**
   * Drain one full pass into an array
   */
  async toArray(): Promise<CrmRecord[]> {
    const records: CrmRecord[] = [];
    for await (const record of this) {
      records.push(record);
    }
    return records;
  }
}

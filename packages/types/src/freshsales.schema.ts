/**
 * Zod schemas for the Freshsales CRM REST API.
 *
 * Records are kept as open JSON objects: the client only checks that the
 * keys it reads are present and leaves every other field untouched.
 */

import { z } from 'zod';

// =============================================================================
// RESOURCE KINDS
// =============================================================================

/**
 * Resource kinds exposed by the client facade
 */
export const ResourceKindSchema = z.enum([
  'contacts',
  'accounts',
  'deals',
  'leads',
  'tasks',
  'notes',
  'sales_activities',
]);
export type ResourceKind = z.infer<typeof ResourceKindSchema>;

// =============================================================================
// RECORDS & ENVELOPES
// =============================================================================

/**
 * One remote entity (contact, account, deal, ...) as a keyed JSON mapping
 */
export const CrmRecordSchema = z.record(z.string(), z.unknown());
export type CrmRecord = z.infer<typeof CrmRecordSchema>;

/**
 * Full decoded body of one response, including sibling collections
 */
export type Envelope = CrmRecord;

/**
 * Identifier of a record or a saved view
 */
export const RecordIdSchema = z.union([z.string().min(1), z.number().int()]);
export type RecordId = z.infer<typeof RecordIdSchema>;
export type ViewId = RecordId;

/**
 * A saved server-side filter as returned by `/{resource}/filters`
 */
export type FreshsalesView = CrmRecord;

/**
 * List-view page: `meta.total_pages` drives pagination
 */
export const ViewPageMetaSchema = z
  .object({
    total_pages: z.number().int().nonnegative(),
    total: z.number().int().nonnegative().optional(),
  })
  .passthrough();

export const ViewPageEnvelopeSchema = z
  .object({
    meta: ViewPageMetaSchema,
  })
  .passthrough();

// =============================================================================
// QUERY PARAMETERS
// =============================================================================

export const QueryValueSchema = z.union([z.string(), z.number(), z.boolean()]);
export type QueryValue = z.infer<typeof QueryValueSchema>;

/**
 * Query parameters as accepted by the client; absent values are dropped
 */
export type QueryParams = Record<string, QueryValue | null | undefined>;

// =============================================================================
// CLIENT CONFIGURATION
// =============================================================================

/**
 * Account subdomain label, e.g. `acme` for `https://acme.freshsales.io`
 */
export const FreshsalesDomainSchema = z
  .string()
  .min(1, 'Domain is required')
  .max(63)
  .regex(/^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/i, 'Domain must be a single subdomain label');

export const FreshsalesClientConfigSchema = z.object({
  domain: FreshsalesDomainSchema,
  apiKey: z.string().min(1, 'API key is required'),
  /** Page size sent as `per_page` on view listings (API maximum is 100) */
  perPage: z.number().int().min(1).max(100).optional(),
  /** Transport timeout per request in milliseconds */
  timeoutMs: z.number().int().positive().max(300000).optional(),
});
export type FreshsalesClientConfig = z.infer<typeof FreshsalesClientConfigSchema>;

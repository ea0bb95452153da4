/**
 * Freshsales SDK Types Package
 *
 * Zod schemas and inferred types shared by the client packages.
 *
 * @module @freshsales-sdk/types
 */

export {
  ResourceKindSchema,
  CrmRecordSchema,
  RecordIdSchema,
  ViewPageMetaSchema,
  ViewPageEnvelopeSchema,
  QueryValueSchema,
  FreshsalesDomainSchema,
  FreshsalesClientConfigSchema,
  type ResourceKind,
  type CrmRecord,
  type Envelope,
  type RecordId,
  type ViewId,
  type FreshsalesView,
  type QueryValue,
  type QueryParams,
  type FreshsalesClientConfig,
} from './freshsales.schema.js';

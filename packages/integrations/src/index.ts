/**
 * ╔══════════════════════════════════════════════════════════════════════════════╗
 * ║                       @freshsales-sdk/integrations                            ║
 * ║                                                                               ║
 * ║  Freshsales CRM REST client: resource clients with paginated view listings,  ║
 * ║  record normalization and selector lookups.                                   ║
 * ╚══════════════════════════════════════════════════════════════════════════════╝
 */

// =============================================================================
// Freshsales Client
// =============================================================================

export * from './freshsales/index.js';

// Re-export Freshsales types from @freshsales-sdk/types for convenience
export type {
  CrmRecord,
  Envelope,
  FreshsalesView,
  QueryParams,
  RecordId,
  ResourceKind,
  ViewId,
} from '@freshsales-sdk/types';

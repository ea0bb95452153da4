/**
 * Presence checks over decoded response envelopes
 */

import { MalformedResponseError } from '@freshsales-sdk/core';
import type { CrmRecord, Envelope } from '@freshsales-sdk/types';
import { FRESHSALES_SERVICE } from './http-gateway.js';

export function isRecord(value: unknown): value is CrmRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Require a JSON object body
 */
export function expectEnvelope(response: unknown, context: string): Envelope {
  if (!isRecord(response)) {
    throw new MalformedResponseError(FRESHSALES_SERVICE, `${context} did not return a JSON object`);
  }
  return response;
}

/**
 * Sibling collection by key; absent or non-array collections read as empty
 */
export function collectionOf(envelope: Envelope, key: string): CrmRecord[] {
  const value = envelope[key];
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/**
 * Linear scan by `id` equality
 */
export function findById(collection: readonly CrmRecord[], id: unknown): CrmRecord | null {
  if (id === null || id === undefined) {
    return null;
  }
  return collection.find((item) => item.id === id) ?? null;
}

/**
 * Unwrap a required array under `key`
 */
export function unwrapCollection(response: unknown, key: string, context: string): CrmRecord[] {
  const envelope = expectEnvelope(response, context);
  const value = envelope[key];
  if (!Array.isArray(value)) {
    throw new MalformedResponseError(FRESHSALES_SERVICE, `${context} is missing "${key}"`);
  }
  const items = value.filter(isRecord);
  if (items.length !== value.length) {
    throw new MalformedResponseError(FRESHSALES_SERVICE, `${context} has non-object entries in "${key}"`);
  }
  return items;
}

/**
 * Unwrap a required object under `key`
 */
export function unwrapRecord(envelope: Envelope, key: string, context: string): CrmRecord {
  const value = envelope[key];
  if (!isRecord(value)) {
    throw new MalformedResponseError(FRESHSALES_SERVICE, `${context} is missing "${key}"`);
  }
  return value;
}

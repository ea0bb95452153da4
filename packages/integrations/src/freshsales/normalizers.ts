/**
 * Per-kind normalization: resolve id references on a record into the
 * objects found in sibling collections of the same envelope.
 *
 * Records are updated in place and returned. An id field that is absent
 * leaves the record alone; a missing collection or match resolves to `null`.
 */

import type { CrmRecord, Envelope } from '@freshsales-sdk/types';
import { collectionOf, findById } from './envelope.js';

export type Normalizer = (record: CrmRecord, envelope: Envelope) => CrmRecord;

export type NormalizerKind = 'contacts' | 'accounts' | 'deals' | 'leads' | 'none';

interface ReferenceRule {
  /** Id field on the record, e.g. `owner_id` */
  idField: string;
  /** Field receiving the resolved object, e.g. `owner` */
  target: string;
  /** Sibling collection key in the envelope, e.g. `users` */
  collection: string;
}

const OWNER: ReferenceRule = { idField: 'owner_id', target: 'owner', collection: 'users' };

function applyRules(record: CrmRecord, envelope: Envelope, rules: readonly ReferenceRule[]): void {
  for (const rule of rules) {
    if (rule.idField in record) {
      record[rule.target] = findById(collectionOf(envelope, rule.collection), record[rule.idField]);
    }
  }
}

function referenceNormalizer(rules: readonly ReferenceRule[]): Normalizer {
  return (record, envelope) => {
    applyRules(record, envelope, rules);
    return record;
  };
}

/**
 * `appointment_ids` -> `appointments`, each with its `outcome` resolved.
 * Matches are copied so the envelope's own collection is left untouched.
 */
function resolveAppointments(record: CrmRecord, envelope: Envelope): void {
  const ids = record.appointment_ids;
  if (!Array.isArray(ids)) {
    return;
  }

  const appointments = collectionOf(envelope, 'appointments');
  const outcomes = collectionOf(envelope, 'outcomes');

  record.appointments = ids.map((appointmentId: unknown) => {
    const appointment = findById(appointments, appointmentId);
    if (!appointment) {
      return null;
    }
    const outcome = findById(outcomes, appointment.outcome_id);
    return { ...appointment, outcome };
  });
}

const normalizeContact: Normalizer = (record, envelope) => {
  applyRules(record, envelope, [
    OWNER,
    { idField: 'contact_status_id', target: 'contact_status', collection: 'contact_status' },
  ]);
  resolveAppointments(record, envelope);
  return record;
};

export const NORMALIZERS: Readonly<Record<NormalizerKind, Normalizer>> = Object.freeze({
  contacts: normalizeContact,
  accounts: referenceNormalizer([
    OWNER,
    { idField: 'industry_type_id', target: 'industry_type', collection: 'industry_types' },
  ]),
  deals: referenceNormalizer([
    OWNER,
    { idField: 'sales_account_id', target: 'sales_account', collection: 'sales_accounts' },
    { idField: 'deal_stage_id', target: 'deal_stage', collection: 'deal_stages' },
  ]),
  leads: referenceNormalizer([
    OWNER,
    { idField: 'lead_stage_id', target: 'lead_stage', collection: 'lead_stages' },
  ]),
  none: (record) => record,
});

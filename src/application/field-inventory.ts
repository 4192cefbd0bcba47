import type { RawRecord } from '../domain/index.js';
import type { FieldLookup, FieldRole, InventoryStrategy } from '../domain/index.js';
import { FIELD_ROLES, hasField, rolesOf, statelessLookup } from '../domain/index.js';

/**
 * Every field name seen across a batch, bucketed by role.
 *
 * Bucket order is order of first appearance anywhere in the batch.
 * Built once before per-record mapping and never mutated afterwards.
 */
export interface FieldInventory {
  readonly fields: ReadonlySet<string>;
  readonly buckets: ReadonlyMap<FieldRole, readonly string[]>;
}

/** Single pass over a batch collecting and classifying field names. */
export function buildFieldInventory(records: Iterable<RawRecord>): FieldInventory {
  const fields = new Set<string>();
  const buckets = new Map<FieldRole, string[]>(FIELD_ROLES.map((role) => [role, []]));

  for (const record of records) {
    for (const name of Object.keys(record)) {
      if (fields.has(name)) continue;
      fields.add(name);

      for (const role of rolesOf(name)) {
        buckets.get(role)?.push(name);
      }
    }
  }

  return Object.freeze({ fields, buckets });
}

/** Sorted field names, for the discovery report. */
export function describeInventory(inventory: FieldInventory): string[] {
  return [...inventory.fields].sort();
}

/**
 * Lookup backed by a pre-built inventory.
 *
 * Identifier candidates follow bucket order, so when a record carries
 * several equally ranked id fields the one seen first in the batch
 * wins. Every other role keeps the record's own field order.
 */
export function createCategorizedLookup(inventory: FieldInventory): FieldLookup {
  const members = new Map<FieldRole, ReadonlySet<string>>(
    FIELD_ROLES.map((role) => [role, new Set(inventory.buckets.get(role) ?? [])]),
  );

  return {
    strategy: 'categorized',

    candidates(record: RawRecord, role: FieldRole): readonly string[] {
      if (role === 'id') {
        const bucket = inventory.buckets.get('id') ?? [];
        return bucket.filter((name) => hasField(record, name));
      }

      const bucket = members.get(role);
      return Object.keys(record).filter((name) => bucket?.has(name) === true);
    },
  };
}

/** Picks the lookup for a strategy. */
export function resolveLookup(strategy: InventoryStrategy, inventory: FieldInventory): FieldLookup {
  return strategy === 'categorized' ? createCategorizedLookup(inventory) : statelessLookup;
}

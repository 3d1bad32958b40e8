/**
 * Host Record Gateway: the port business agents use to act on the host
 * application's records (leads, orders, products, invoices, employees).
 */
import type { JsonObject, JsonValue } from '@/core/types.js';

// ─── Types ──────────────────────────────────────────────────────

/** A record of the host application, addressed by model and numeric id. */
export interface HostRecord {
  id: number;
  model: string;
  values: JsonObject;
}

export interface RecordQuery {
  /** Case-insensitive substring of the record's `name`. */
  text?: string;
  /** Exact matches on top-level values. */
  filters?: JsonObject;
  limit?: number;
}

export interface HostRecordGateway {
  create(model: string, values: JsonObject): Promise<HostRecord>;
  search(model: string, query?: RecordQuery): Promise<HostRecord[]>;
  read(model: string, id: number): Promise<HostRecord | null>;
}

const DEFAULT_SEARCH_LIMIT = 20;

// ─── In-Memory Gateway ──────────────────────────────────────────

function matches(record: HostRecord, query: RecordQuery): boolean {
  if (query.text !== undefined && query.text !== '') {
    const name = record.values['name'];
    if (typeof name !== 'string' || !name.toLowerCase().includes(query.text.toLowerCase())) {
      return false;
    }
  }
  for (const [key, expected] of Object.entries(query.filters ?? {})) {
    if (!sameValue(record.values[key], expected)) return false;
  }
  return true;
}

function sameValue(actual: JsonValue | undefined, expected: JsonValue): boolean {
  return JSON.stringify(actual) === JSON.stringify(expected);
}

/**
 * Create an in-memory gateway for development and tests.
 * Ids are assigned per model, starting at 1, in seed order.
 */
export function createMemoryRecordGateway(
  seed: Record<string, JsonObject[]> = {},
): HostRecordGateway {
  const models = new Map<string, HostRecord[]>();

  function insert(model: string, values: JsonObject): HostRecord {
    const records = models.get(model) ?? [];
    const record: HostRecord = { id: records.length + 1, model, values: structuredClone(values) };
    records.push(record);
    models.set(model, records);
    return structuredClone(record);
  }

  for (const [model, rows] of Object.entries(seed)) {
    for (const values of rows) insert(model, values);
  }

  return {
    create(model: string, values: JsonObject): Promise<HostRecord> {
      return Promise.resolve(insert(model, values));
    },

    search(model: string, query: RecordQuery = {}): Promise<HostRecord[]> {
      const found = (models.get(model) ?? [])
        .filter((record) => matches(record, query))
        .slice(0, query.limit ?? DEFAULT_SEARCH_LIMIT);
      return Promise.resolve(found.map((record) => structuredClone(record)));
    },

    read(model: string, id: number): Promise<HostRecord | null> {
      const record = models.get(model)?.find((candidate) => candidate.id === id);
      return Promise.resolve(record ? structuredClone(record) : null);
    },
  };
}

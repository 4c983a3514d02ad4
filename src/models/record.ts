import { Origin } from './origin';

/**
 * One parsed field/value group. Field names are unique within a record and
 * their order carries no meaning. `fieldOffsets` holds, per field, the line
 * offset of its `key:` line from the first line of the record.
 */
export interface UnitRecord {
  readonly data: ReadonlyMap<string, string>;
  readonly origin: Origin;
  readonly fieldOffsets: ReadonlyMap<string, number>;
}

export function makeRecord(data: Record<string, string> | ReadonlyArray<readonly [string, string]>, origin: Origin = Origin.unknown(), fieldOffsets?: ReadonlyMap<string, number>): UnitRecord {
  const entries: ReadonlyArray<readonly [string, string]> = isEntryList(data) ? data : Object.entries(data);
  return Object.freeze({
    data: new Map(entries),
    origin,
    fieldOffsets: fieldOffsets ?? new Map(entries.map(([k]) => [k, 0] as const))
  });
}

function isEntryList(data: Record<string, string> | ReadonlyArray<readonly [string, string]>): data is ReadonlyArray<readonly [string, string]> {
  return Array.isArray(data);
}

/** Single-line origin of one field, falling back to the record origin. */
export function fieldOrigin(record: UnitRecord, field: string): Origin {
  const offset = record.fieldOffsets.get(field);
  if(offset === undefined) return record.origin;
  return record.origin.justLine().withOffset(offset);
}

export function recordToObject(record: UnitRecord): Record<string, string> {
  return Object.fromEntries(record.data);
}

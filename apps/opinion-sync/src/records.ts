import type { ApiRecord } from '@courtsync/resilient-fetch';

/**
 * Keep only `fields` that exist on the record, in the order given. No list
 * (or an empty one) returns the record unchanged.
 */
export function projectFields(record: ApiRecord, fields?: readonly string[]): ApiRecord {
  if (!fields || fields.length === 0) {
    return record;
  }
  const projected: ApiRecord = {};
  for (const field of fields) {
    if (Object.prototype.hasOwnProperty.call(record, field)) {
      projected[field] = record[field];
    }
  }
  return projected;
}

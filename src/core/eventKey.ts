import { MissingFieldError } from "./errors.js";
import type { DataRecord, EventKey, IdentityFields, RecordValue } from "./types.js";

const INTEGER_STRING_PATTERN = /^-?\d+$/;

function integerField(record: DataRecord, field: string): bigint {
  if (!Object.hasOwn(record, field)) {
    throw new MissingFieldError(field);
  }

  const value: RecordValue | undefined = record[field];
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  if (typeof value === "string" && INTEGER_STRING_PATTERN.test(value.trim())) {
    return BigInt(value.trim());
  }
  if (value === null || value === undefined) {
    throw new MissingFieldError(field);
  }

  throw new MissingFieldError(field, "not an integer");
}

export function extractEventKey(record: DataRecord, fields: IdentityFields): EventKey {
  return {
    run: integerField(record, fields.run),
    segment: integerField(record, fields.segment),
    event: integerField(record, fields.event),
  };
}

export function formatEventKey(key: EventKey): string {
  return `${key.run}:${key.segment}:${key.event}`;
}

export function eventKeyString(record: DataRecord, fields: IdentityFields): string {
  return formatEventKey(extractEventKey(record, fields));
}

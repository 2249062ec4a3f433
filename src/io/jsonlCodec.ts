import { gunzipSync, gzipSync } from "node:zlib";
import { z } from "zod";
import { CollectionFormatError } from "../core/errors.js";
import type { DataRecord, RecordValue } from "../core/types.js";
import type {
  Collection,
  FieldSpec,
  FieldType,
  ReadCollectionOptions,
} from "./recordStore.js";

export const COLLECTION_SCHEMA_VERSION = 1 as const;

const COLLECTION_SUFFIXES = [".jsonl", ".jsonl.gz"] as const;

const fieldSpecSchema = z.object({
  name: z.string().min(1),
  type: z.enum(["int", "uint", "long", "ulong", "float", "double", "bool", "string"]),
  source: z.string().min(1).optional(),
});

const headerSchema = z.object({
  schemaVersion: z.literal(COLLECTION_SCHEMA_VERSION),
  tree: z.string().min(1),
  fields: z.array(fieldSpecSchema),
});

const recordSchema = z.record(
  z.union([z.string(), z.number(), z.boolean(), z.null()]),
);

export function isCollectionName(name: string): boolean {
  return COLLECTION_SUFFIXES.some((suffix) => name.endsWith(suffix));
}

export function isGzipLocation(location: string): boolean {
  return location.endsWith(".gz");
}

export function inferFieldType(value: RecordValue): FieldType {
  if (typeof value === "boolean") {
    return "bool";
  }
  if (typeof value === "number") {
    return Number.isInteger(value) ? "long" : "double";
  }
  return "string";
}

/**
 * Field order follows first appearance. A field that is null in every record
 * is typed "string".
 */
export function inferSchema(records: DataRecord[]): FieldSpec[] {
  const schema: FieldSpec[] = [];
  const byName = new Map<string, FieldSpec>();
  const untyped = new Set<string>();

  for (const record of records) {
    for (const [name, value] of Object.entries(record)) {
      const existing = byName.get(name);
      if (!existing) {
        const field: FieldSpec = {
          name,
          type: value === null ? "string" : inferFieldType(value),
        };
        byName.set(name, field);
        schema.push(field);
        if (value === null) {
          untyped.add(name);
        }
      } else if (value !== null && untyped.has(name)) {
        existing.type = inferFieldType(value);
        untyped.delete(name);
      }
    }
  }

  return schema;
}

function projectRecord(record: DataRecord, schema: FieldSpec[]): DataRecord {
  const projected: DataRecord = {};
  for (const field of schema) {
    projected[field.name] = record[field.source ?? field.name] ?? null;
  }
  return projected;
}

function pickFields(record: DataRecord, fields: Set<string>): DataRecord {
  const picked: DataRecord = {};
  for (const [name, value] of Object.entries(record)) {
    if (fields.has(name)) {
      picked[name] = value;
    }
  }
  return picked;
}

/**
 * Applied renames are dropped from the written header: after projection the
 * records carry the target names.
 */
export function encodeCollection(location: string, collection: Collection): Buffer {
  const header = {
    schemaVersion: COLLECTION_SCHEMA_VERSION,
    tree: collection.tree,
    fields: collection.schema.map((field) => ({ name: field.name, type: field.type })),
  };

  const lines = [JSON.stringify(header)];
  for (const record of collection.records) {
    lines.push(JSON.stringify(projectRecord(record, collection.schema)));
  }

  const body = Buffer.from(`${lines.join("\n")}\n`, "utf-8");
  return isGzipLocation(location) ? gzipSync(body) : body;
}

function parseJsonLine(location: string, line: string, lineNumber: number): unknown {
  try {
    return JSON.parse(line);
  } catch {
    throw new CollectionFormatError(location, `line ${lineNumber} is not valid JSON`);
  }
}

export function decodeCollection(
  location: string,
  body: Buffer,
  options: ReadCollectionOptions,
): Collection {
  let text: string;
  try {
    text = (isGzipLocation(location) ? gunzipSync(body) : body).toString("utf-8");
  } catch {
    throw new CollectionFormatError(location, "not a gzip stream");
  }

  const lines = text.split("\n").filter((line) => line.trim().length > 0);
  const [headerLine, ...recordLines] = lines;
  if (headerLine === undefined) {
    throw new CollectionFormatError(location, "missing header line");
  }

  const header = headerSchema.safeParse(parseJsonLine(location, headerLine, 1));
  if (!header.success) {
    throw new CollectionFormatError(
      location,
      `invalid header: ${header.error.issues[0]?.message ?? "unknown issue"}`,
    );
  }

  if (header.data.tree !== options.tree) {
    throw new CollectionFormatError(
      location,
      `tree '${options.tree}' not found (collection holds '${header.data.tree}')`,
    );
  }

  // Renames declared in the header are applied here, so records and schema
  // both carry the target names.
  const declared = header.data.fields;
  const selected = options.fields ? new Set(options.fields) : undefined;
  const schema = declared
    .filter((field) => !selected || selected.has(field.name))
    .map((field): FieldSpec => ({ name: field.name, type: field.type }));

  const records: DataRecord[] = recordLines.map((line, offset) => {
    const lineNumber = offset + 2;
    const parsed = recordSchema.safeParse(parseJsonLine(location, line, lineNumber));
    if (!parsed.success) {
      throw new CollectionFormatError(
        location,
        `line ${lineNumber} is not a flat record of scalar values`,
      );
    }
    const record = declared.length > 0 ? projectRecord(parsed.data, declared) : parsed.data;
    return selected ? pickFields(record, selected) : record;
  });

  return {
    tree: header.data.tree,
    schema,
    records,
  };
}

import type { DataRecord } from "../core/types.js";

export type FieldType =
  | "int"
  | "uint"
  | "long"
  | "ulong"
  | "float"
  | "double"
  | "bool"
  | "string";

export interface FieldSpec {
  name: string;
  type: FieldType;
  /** Input field the value is read from when it differs from `name`. */
  source?: string;
}

export interface Collection {
  tree: string;
  schema: FieldSpec[];
  records: DataRecord[];
}

export interface ReadCollectionOptions {
  tree: string;
  /** Only these fields are materialized on each record. */
  fields?: string[];
}

export interface RecordStore {
  list(directory: string): Promise<string[]>;
  exists(location: string): Promise<boolean>;
  read(location: string, options: ReadCollectionOptions): Promise<Collection>;
  /** Publishes the whole collection at once; readers never see a partial object. */
  write(location: string, collection: Collection): Promise<void>;
  remove(location: string): Promise<void>;
  join(directory: string, name: string): string;
}

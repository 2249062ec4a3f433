import { extractEventKey, formatEventKey } from "./eventKey.js";
import type { Category, DataRecord, EventKey, IdentityFields } from "./types.js";

export interface PartitionEntry {
  key: EventKey;
  isTrain: boolean;
  isTest: boolean;
  trainCount: number;
  testCount: number;
  firstSeenIn: Category;
}

export type PartitionConflictKind =
  | "cross-category"
  | "duplicate-train"
  | "duplicate-test";

export interface PartitionConflict {
  key: string;
  kind: PartitionConflictKind;
  occurrences: number;
}

export type PartitionLookup =
  | { kind: "none" }
  | { kind: "single"; entry: PartitionEntry }
  | { kind: "double"; entry: PartitionEntry }
  | { kind: "multiple"; entry: PartitionEntry; occurrences: number };

export interface PartitionIndexStats {
  trainRecords: number;
  testRecords: number;
  uniqueKeys: number;
  conflictingKeys: number;
}

function occurrencesOf(entry: PartitionEntry): number {
  return entry.trainCount + entry.testCount;
}

function conflictKind(entry: PartitionEntry): PartitionConflictKind {
  if (entry.trainCount > 0 && entry.testCount > 0) {
    return "cross-category";
  }
  return entry.trainCount > 0 ? "duplicate-train" : "duplicate-test";
}

export class PartitionIndex {
  private readonly entries = new Map<string, PartitionEntry>();
  private readonly conflictLog: PartitionConflict[] = [];
  private trainRecords = 0;
  private testRecords = 0;

  add(key: EventKey, category: Category): PartitionEntry {
    const keyString = formatEventKey(key);
    const existing = this.entries.get(keyString);

    if (category === "train") {
      this.trainRecords += 1;
    } else {
      this.testRecords += 1;
    }

    if (!existing) {
      const created: PartitionEntry = {
        key,
        isTrain: category === "train",
        isTest: category === "test",
        trainCount: category === "train" ? 1 : 0,
        testCount: category === "test" ? 1 : 0,
        firstSeenIn: category,
      };
      this.entries.set(keyString, created);
      return created;
    }

    if (category === "train") {
      existing.trainCount += 1;
      existing.isTrain = true;
    } else {
      existing.testCount += 1;
      existing.isTest = true;
    }

    this.conflictLog.push({
      key: keyString,
      kind: conflictKind(existing),
      occurrences: occurrencesOf(existing),
    });

    return existing;
  }

  get(key: EventKey): PartitionEntry | undefined {
    return this.entries.get(formatEventKey(key));
  }

  lookup(key: EventKey): PartitionLookup {
    const entry = this.get(key);
    if (!entry) {
      return { kind: "none" };
    }

    const occurrences = occurrencesOf(entry);
    if (occurrences === 1) {
      return { kind: "single", entry };
    }
    if (occurrences === 2) {
      return { kind: "double", entry };
    }
    return { kind: "multiple", entry, occurrences };
  }

  get size(): number {
    return this.entries.size;
  }

  conflicts(): PartitionConflict[] {
    return [...this.conflictLog];
  }

  stats(): PartitionIndexStats {
    const conflictingKeys = new Set(this.conflictLog.map((conflict) => conflict.key));
    return {
      trainRecords: this.trainRecords,
      testRecords: this.testRecords,
      uniqueKeys: this.entries.size,
      conflictingKeys: conflictingKeys.size,
    };
  }
}

export function buildPartitionIndex(
  train: Iterable<DataRecord>,
  test: Iterable<DataRecord>,
  fields: IdentityFields,
): PartitionIndex {
  const index = new PartitionIndex();

  for (const record of train) {
    index.add(extractEventKey(record, fields), "train");
  }
  for (const record of test) {
    index.add(extractEventKey(record, fields), "test");
  }

  return index;
}

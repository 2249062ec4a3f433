import type { Logger } from "../logging/logger.js";
import { ConflictingAssignmentError, IdentityIntegrityError } from "./errors.js";
import { extractEventKey, formatEventKey } from "./eventKey.js";
import type { PartitionIndex } from "./partitionIndex.js";
import {
  DEFAULT_FLAG_FIELDS,
  type DataRecord,
  type FlagFields,
  type IdentityFields,
} from "./types.js";

export type PropagationState = "loading" | "scanning" | "written" | "discarded";

export interface PropagationCounts {
  total: number;
  train: number;
  test: number;
  unmatched: number;
}

export interface ApplyPartitionOptions {
  file: string;
  identityFields: IdentityFields;
  flagFields?: FlagFields;
  identityOnly?: boolean;
  logger?: Logger;
  progressEvery?: number;
}

export type PropagationResult =
  | { status: "written"; records: DataRecord[]; counts: PropagationCounts }
  | {
      status: "discarded";
      error: ConflictingAssignmentError;
      counts: PropagationCounts;
    };

const DEFAULT_PROGRESS_EVERY = 1000;

function emptyCounts(): PropagationCounts {
  return {
    total: 0,
    train: 0,
    test: 0,
    unmatched: 0,
  };
}

function baseRecord(
  record: DataRecord,
  fields: IdentityFields,
  identityOnly: boolean,
): DataRecord {
  if (!identityOnly) {
    return { ...record };
  }

  return {
    [fields.run]: record[fields.run] ?? null,
    [fields.segment]: record[fields.segment] ?? null,
    [fields.event]: record[fields.event] ?? null,
  };
}

export function isAlreadySplit(
  fieldNames: Iterable<string>,
  flagFields: FlagFields = DEFAULT_FLAG_FIELDS,
): boolean {
  const names = new Set(fieldNames);
  return names.has(flagFields.train) && names.has(flagFields.test);
}

export function applyPartition(
  records: DataRecord[],
  index: PartitionIndex,
  options: ApplyPartitionOptions,
): PropagationResult {
  const flagFields = options.flagFields ?? DEFAULT_FLAG_FIELDS;
  const identityOnly = options.identityOnly === true;
  const progressEvery = options.progressEvery ?? DEFAULT_PROGRESS_EVERY;
  const logger = options.logger;

  const counts = emptyCounts();
  const output: DataRecord[] = [];

  logger?.debug(`${options.file}: scanning ${records.length} records`);

  for (const [recordIndex, record] of records.entries()) {
    if (progressEvery > 0 && recordIndex % progressEvery === 0) {
      logger?.debug(`${options.file}: processing record ${recordIndex}`);
    }

    const key = extractEventKey(record, options.identityFields);
    const match = index.lookup(key);

    if (match.kind === "multiple") {
      throw new IdentityIntegrityError(
        options.file,
        formatEventKey(key),
        match.occurrences,
      );
    }

    if (match.kind === "double") {
      return {
        status: "discarded",
        error: new ConflictingAssignmentError(
          options.file,
          formatEventKey(key),
          recordIndex,
        ),
        counts,
      };
    }

    const isTrain = match.kind === "single" && match.entry.isTrain;
    const isTest = match.kind === "single" && match.entry.isTest;

    counts.total += 1;
    if (isTrain) {
      counts.train += 1;
    } else if (isTest) {
      counts.test += 1;
    } else {
      counts.unmatched += 1;
    }

    output.push({
      ...baseRecord(record, options.identityFields, identityOnly),
      [flagFields.train]: isTrain,
      [flagFields.test]: isTest,
    });
  }

  return {
    status: "written",
    records: output,
    counts,
  };
}

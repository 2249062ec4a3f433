import type { EventSplitConfig } from "../config/config.js";
import {
  CollectionFormatError,
  CollectionNotFoundError,
  EmptyReferenceError,
  IdentityIntegrityError,
  MissingFieldError,
  ReferenceMissingError,
  errorMessage,
} from "../core/errors.js";
import { type PartitionIndex, buildPartitionIndex } from "../core/partitionIndex.js";
import {
  type PropagationResult,
  type PropagationState,
  applyPartition,
  isAlreadySplit,
} from "../core/propagation.js";
import type { IdentityFields } from "../core/types.js";
import { inferSchema } from "../io/jsonlCodec.js";
import type { ResolvedLocation } from "../io/openRecordStore.js";
import type { Collection, FieldSpec } from "../io/recordStore.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import {
  type FileReport,
  type RunSummary,
  skipOutcomeFor,
  skippedReport,
  summarizeRun,
} from "./outcomes.js";

export type PropagateConfig = Pick<
  EventSplitConfig,
  | "tree"
  | "splitTree"
  | "identityFields"
  | "flagFields"
  | "identityOnly"
  | "skipPrefixes"
  | "skipFiles"
>;

export interface PropagateDatasetOptions {
  input: ResolvedLocation;
  train: ResolvedLocation;
  test: ResolvedLocation;
  output: ResolvedLocation;
  config: PropagateConfig;
  logger?: Logger;
}

export interface ReferenceLocations {
  train: ResolvedLocation;
  test: ResolvedLocation;
}

const MAX_LOGGED_CONFLICTS = 10;

function identityFieldNames(fields: IdentityFields): string[] {
  return [fields.run, fields.segment, fields.event];
}

function identitySchema(input: FieldSpec[], fields: IdentityFields): FieldSpec[] {
  return identityFieldNames(fields).map((name): FieldSpec => {
    return input.find((field) => field.name === name) ?? { name, type: "ulong" };
  });
}

function propagatedSchema(input: Collection, config: PropagateConfig): FieldSpec[] {
  const base = input.schema.length > 0 ? input.schema : inferSchema(input.records);
  const kept = config.identityOnly ? identitySchema(base, config.identityFields) : base;
  return [
    ...kept.filter(
      (field) =>
        field.name !== config.flagFields.train && field.name !== config.flagFields.test,
    ),
    { name: config.flagFields.train, type: "bool" },
    { name: config.flagFields.test, type: "bool" },
  ];
}

/**
 * Reads the Train and Test references for one dataset (identity fields only)
 * and indexes them. Throws ReferenceMissingError or EmptyReferenceError.
 */
export async function loadPartitionIndex(
  references: ReferenceLocations,
  config: Pick<PropagateConfig, "splitTree" | "identityFields">,
  logger: Logger = silentLogger,
): Promise<PartitionIndex> {
  const readOptions = {
    tree: config.splitTree,
    fields: identityFieldNames(config.identityFields),
  };

  for (const [category, reference] of [
    ["train", references.train],
    ["test", references.test],
  ] as const) {
    if (!(await reference.store.exists(reference.location))) {
      throw new ReferenceMissingError(category, reference.location);
    }
  }

  const train = await references.train.store.read(references.train.location, readOptions);
  const test = await references.test.store.read(references.test.location, readOptions);

  if (train.records.length === 0 && test.records.length === 0) {
    throw new EmptyReferenceError(references.train.location, references.test.location);
  }

  const index = buildPartitionIndex(train.records, test.records, config.identityFields);

  const conflicts = index.conflicts();
  if (conflicts.length > 0) {
    logger.warn(
      `${conflicts.length} repeated event keys in the references; lookups on them will not resolve to a single category`,
    );
    for (const conflict of conflicts.slice(0, MAX_LOGGED_CONFLICTS)) {
      logger.warn(`Repeated key ${conflict.key} (${conflict.kind}, seen ${conflict.occurrences}x)`);
    }
  }

  return index;
}

function transition(
  logger: Logger,
  name: string,
  state: PropagationState,
  detail?: string,
): void {
  logger.debug(`${name}: ${state}${detail ? ` (${detail})` : ""}`);
}

async function propagateFile(
  name: string,
  options: PropagateDatasetOptions,
  logger: Logger,
): Promise<FileReport> {
  const { input, train, test, output, config } = options;
  const outputLocation = output.store.join(output.location, name);

  transition(logger, name, "loading");
  const index = await loadPartitionIndex(
    {
      train: { store: train.store, location: train.store.join(train.location, name) },
      test: { store: test.store, location: test.store.join(test.location, name) },
    },
    config,
    logger,
  );

  const collection = await input.store.read(input.store.join(input.location, name), {
    tree: config.tree,
    fields: config.identityOnly
      ? [
          ...identityFieldNames(config.identityFields),
          config.flagFields.train,
          config.flagFields.test,
        ]
      : undefined,
  });

  const fieldNames = [
    ...collection.schema.map((field) => field.name),
    ...Object.keys(collection.records[0] ?? {}),
  ];
  if (isAlreadySplit(fieldNames, config.flagFields)) {
    const message = `${name} already carries ${config.flagFields.train}/${config.flagFields.test}; not re-splitting it`;
    logger.warn(message);
    return skippedReport(name, "skipped-already-split", message);
  }

  transition(logger, name, "scanning", `${collection.records.length} records`);
  const result: PropagationResult = applyPartition(collection.records, index, {
    file: name,
    identityFields: config.identityFields,
    flagFields: config.flagFields,
    identityOnly: config.identityOnly,
    logger,
  });

  if (result.status === "discarded") {
    await output.store.remove(outputLocation);
    transition(logger, name, "discarded");
    logger.warn(`The file ${name} was not split in the previous split, skipping it`, {
      key: result.error.key,
      recordIndex: result.error.recordIndex,
    });
    return {
      file: name,
      outcome: "discarded-conflict",
      message: result.error.message,
      recordsRead: collection.records.length,
      recordsWritten: 0,
    };
  }

  await output.store.write(outputLocation, {
    tree: config.tree,
    schema: propagatedSchema(collection, config),
    records: result.records,
  });
  transition(logger, name, "written");

  if (result.counts.unmatched > 0) {
    logger.warn(
      `${name}: ${result.counts.unmatched} of ${result.counts.total} records matched neither reference and were flagged train=false, test=false`,
    );
  }

  return {
    file: name,
    outcome: "written",
    recordsRead: collection.records.length,
    recordsWritten: result.records.length,
    trainCount: result.counts.train,
    testCount: result.counts.test,
    unmatchedCount: result.counts.unmatched,
  };
}

export async function propagateDataset(
  options: PropagateDatasetOptions,
): Promise<RunSummary> {
  const { input, config } = options;
  const logger = (options.logger ?? silentLogger).child("propagate");

  const names = await input.store.list(input.location);
  const reports: FileReport[] = [];

  for (const name of names) {
    const skip = skipOutcomeFor(name, config);
    if (skip) {
      logger.info(`Skipping ${name} (${skip})`);
      reports.push(skippedReport(name, skip));
      continue;
    }

    logger.info(`Processing file ${name}`);
    const outputLocation = options.output.store.join(options.output.location, name);

    try {
      reports.push(await propagateFile(name, options, logger.child(name)));
    } catch (error) {
      if (error instanceof IdentityIntegrityError) {
        await options.output.store.remove(outputLocation);
        logger.error(error.message);
        reports.push(skippedReport(name, "fatal-integrity-error", error.message));
        return summarizeRun({
          command: "propagate",
          files: reports,
          abortReason: error.message,
        });
      }
      if (error instanceof ReferenceMissingError) {
        logger.warn(`${error.message}; skipping ${name}`);
        reports.push(skippedReport(name, "skipped-reference-missing", error.message));
        continue;
      }
      if (error instanceof EmptyReferenceError) {
        logger.warn(`${error.message}; nothing to propagate for ${name}`);
        reports.push(skippedReport(name, "skipped-empty-reference", error.message));
        continue;
      }
      if (error instanceof MissingFieldError) {
        const message = `${name}: ${error.message}`;
        await options.output.store.remove(outputLocation);
        logger.error(message);
        reports.push(skippedReport(name, "failed-missing-field", message));
        continue;
      }
      if (error instanceof CollectionFormatError || error instanceof CollectionNotFoundError) {
        await options.output.store.remove(outputLocation);
        logger.error(errorMessage(error));
        reports.push(skippedReport(name, "failed-invalid-input", errorMessage(error)));
        continue;
      }
      throw error;
    }
  }

  return summarizeRun({ command: "propagate", files: reports });
}

import type { EventSplitConfig } from "../config/config.js";
import {
  CollectionFormatError,
  CollectionNotFoundError,
  errorMessage,
} from "../core/errors.js";
import { partitionRecords } from "../core/partitionGenerator.js";
import {
  type RandomSource,
  createSeededRandom,
  deriveFileSeed,
  drawEntropySeed,
} from "../core/random.js";
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

export const TRAIN_DIRECTORY = "Train";
export const TEST_DIRECTORY = "Test";

export type SplitConfig = Pick<
  EventSplitConfig,
  | "tree"
  | "ratio"
  | "seed"
  | "randomScope"
  | "weightField"
  | "skipPrefixes"
  | "skipFiles"
>;

export interface SplitDatasetOptions {
  input: ResolvedLocation;
  output: ResolvedLocation;
  config: SplitConfig;
  logger?: Logger;
}

function outputSchema(input: Collection, weightField: string): FieldSpec[] {
  const base = input.schema.length > 0 ? input.schema : inferSchema(input.records);
  return [
    ...base.filter((field) => field.name !== weightField),
    { name: weightField, type: "float" },
  ];
}

export async function splitDataset(options: SplitDatasetOptions): Promise<RunSummary> {
  const { input, output, config } = options;
  const logger = (options.logger ?? silentLogger).child("split");

  const seed = config.seed ?? drawEntropySeed();
  if (config.seed === undefined) {
    logger.warn(
      `No seed given; drew seed ${seed}. Pass it back with --seed to reproduce this split.`,
    );
  }

  const sharedRandom = createSeededRandom(seed);
  const randomFor = (name: string): { random: RandomSource; seed: number } => {
    if (config.randomScope === "shared") {
      return { random: sharedRandom, seed };
    }
    const fileSeed = deriveFileSeed(seed, name);
    return { random: createSeededRandom(fileSeed), seed: fileSeed };
  };

  const trainDir = output.store.join(output.location, TRAIN_DIRECTORY);
  const testDir = output.store.join(output.location, TEST_DIRECTORY);

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
    const trainLocation = output.store.join(trainDir, name);
    const testLocation = output.store.join(testDir, name);

    let collection: Collection;
    try {
      collection = await input.store.read(input.store.join(input.location, name), {
        tree: config.tree,
      });
    } catch (error) {
      if (error instanceof CollectionFormatError || error instanceof CollectionNotFoundError) {
        // A previous run's pair must not outlive a failed input.
        await output.store.remove(trainLocation);
        await output.store.remove(testLocation);
        logger.error(errorMessage(error));
        reports.push(skippedReport(name, "failed-invalid-input", errorMessage(error)));
        continue;
      }
      throw error;
    }

    const { random, seed: fileSeed } = randomFor(name);
    const result = partitionRecords(collection.records, {
      ratio: config.ratio,
      random,
      weightField: config.weightField,
    });
    logger.debug(
      `Splitting ${result.plan.total} records into ${result.plan.trainCount} train and ${result.plan.testCount} test`,
    );

    const schema = outputSchema(collection, config.weightField);

    await output.store.write(trainLocation, {
      tree: collection.tree,
      schema,
      records: result.train,
    });
    try {
      await output.store.write(testLocation, {
        tree: collection.tree,
        schema,
        records: result.test,
      });
    } catch (error) {
      await output.store.remove(trainLocation);
      throw error;
    }

    reports.push({
      file: name,
      outcome: "written",
      recordsRead: collection.records.length,
      recordsWritten: result.train.length + result.test.length,
      trainCount: result.train.length,
      testCount: result.test.length,
      seed: config.randomScope === "per-file" ? fileSeed : undefined,
    });
  }

  return summarizeRun({ command: "split", files: reports, seed });
}

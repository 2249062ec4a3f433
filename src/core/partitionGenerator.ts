import { InvalidRatioError } from "./errors.js";
import { type RandomSource, randomIndexBelow } from "./random.js";
import {
  type Category,
  DEFAULT_WEIGHT_FIELD,
  type DataRecord,
  type SplitRatio,
} from "./types.js";

export interface SplitPlan {
  total: number;
  trainCount: number;
  testCount: number;
  trainIndices: number[];
  isTrain: boolean[];
}

export interface ReweightFactors {
  train: number;
  test: number;
}

export interface PartitionRecordsOptions {
  ratio: SplitRatio;
  random: RandomSource;
  weightField?: string;
}

export interface PartitionResult {
  plan: SplitPlan;
  factors: ReweightFactors;
  train: DataRecord[];
  test: DataRecord[];
}

export function assertValidRatio(ratio: SplitRatio): void {
  const valid =
    Number.isSafeInteger(ratio.train) &&
    Number.isSafeInteger(ratio.test) &&
    ratio.train > 0 &&
    ratio.test > 0;
  if (!valid) {
    throw new InvalidRatioError(ratio.train, ratio.test);
  }
}

export function trainCountFor(total: number, ratio: SplitRatio): number {
  assertValidRatio(ratio);
  return Math.floor((total * ratio.train) / (ratio.train + ratio.test));
}

export function reweightFactors(ratio: SplitRatio): ReweightFactors {
  assertValidRatio(ratio);
  const sum = ratio.train + ratio.test;
  return {
    train: sum / ratio.train,
    test: sum / ratio.test,
  };
}

export function computeSplitPlan(
  total: number,
  ratio: SplitRatio,
  random: RandomSource,
): SplitPlan {
  if (!Number.isSafeInteger(total) || total < 0) {
    throw new Error(`record count must be a non-negative integer, got: ${total}`);
  }

  const trainCount = trainCountFor(total, ratio);

  // Partial Fisher-Yates: the first trainCount slots end up as a uniform
  // sample without replacement.
  const pool = Array.from({ length: total }, (_, index) => index);
  for (let slot = 0; slot < trainCount; slot += 1) {
    const swapIndex = slot + randomIndexBelow(random, total - slot);
    const current = pool[slot] as number;
    pool[slot] = pool[swapIndex] as number;
    pool[swapIndex] = current;
  }

  const trainIndices = pool.slice(0, trainCount).sort((a, b) => a - b);
  const isTrain = new Array<boolean>(total).fill(false);
  for (const index of trainIndices) {
    isTrain[index] = true;
  }

  return {
    total,
    trainCount,
    testCount: total - trainCount,
    trainIndices,
    isTrain,
  };
}

export function categoryOf(plan: SplitPlan, index: number): Category {
  return plan.isTrain[index] ? "train" : "test";
}

export function partitionRecords(
  records: DataRecord[],
  options: PartitionRecordsOptions,
): PartitionResult {
  const weightField = options.weightField ?? DEFAULT_WEIGHT_FIELD;
  const factors = reweightFactors(options.ratio);
  const plan = computeSplitPlan(records.length, options.ratio, options.random);

  const train: DataRecord[] = [];
  const test: DataRecord[] = [];

  for (const [index, record] of records.entries()) {
    if (categoryOf(plan, index) === "train") {
      train.push({ ...record, [weightField]: factors.train });
    } else {
      test.push({ ...record, [weightField]: factors.test });
    }
  }

  return {
    plan,
    factors,
    train,
    test,
  };
}

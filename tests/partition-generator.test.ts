import { describe, expect, it } from "vitest";
import { ConfigError, InvalidRatioError } from "../src/core/errors.js";
import { buildPartitionIndex } from "../src/core/partitionIndex.js";
import {
  computeSplitPlan,
  partitionRecords,
  reweightFactors,
  trainCountFor,
} from "../src/core/partitionGenerator.js";
import { createSeededRandom, deriveFileSeed, normalizeSeed } from "../src/core/random.js";
import { DEFAULT_IDENTITY_FIELDS, type DataRecord } from "../src/core/types.js";

function events(count: number): DataRecord[] {
  return Array.from({ length: count }, (_, index) => ({
    Run: 1,
    LumiSec: 1 + Math.floor(index / 4),
    Event: 1000 + index,
    id: index,
  }));
}

describe("seeded random source", () => {
  it("repeats the same sequence for the same seed", () => {
    const first = createSeededRandom(42);
    const second = createSeededRandom(42);

    const a = Array.from({ length: 5 }, () => first());
    const b = Array.from({ length: 5 }, () => second());

    expect(a).toEqual(b);
    for (const value of a) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("keeps seeds 0 and 1 distinct and rejects seeds outside 32 bits", () => {
    const zero = createSeededRandom(0);
    const one = createSeededRandom(1);
    expect(zero()).toBe(1013904223 / 4294967296);
    expect(one()).not.toBe(1013904223 / 4294967296);

    expect(normalizeSeed(0xffffffff)).toBe(0xffffffff);
    expect(() => normalizeSeed(42 + 2 ** 32)).toThrow(ConfigError);
    expect(() => normalizeSeed(-1)).toThrow("seed must be an integer in [0, 4294967295], got: -1");
    expect(() => createSeededRandom(1.5)).toThrow(ConfigError);
  });

  it("derives distinct per-file seeds from one run seed", () => {
    expect(deriveFileSeed(42, "SignalA.jsonl")).toBe(deriveFileSeed(42, "SignalA.jsonl"));
    expect(deriveFileSeed(42, "SignalA.jsonl")).not.toBe(deriveFileSeed(42, "SignalB.jsonl"));
  });
});

describe("split plan", () => {
  it("splits 10 records 3:1 into 7 train and 3 test", () => {
    const plan = computeSplitPlan(10, { train: 3, test: 1 }, createSeededRandom(42));

    expect(plan.trainCount).toBe(7);
    expect(plan.testCount).toBe(3);
    expect(plan.trainIndices).toHaveLength(7);
    expect(new Set(plan.trainIndices).size).toBe(7);
    expect(plan.isTrain.filter(Boolean)).toHaveLength(7);
    for (const index of plan.trainIndices) {
      expect(index).toBeGreaterThanOrEqual(0);
      expect(index).toBeLessThan(10);
      expect(plan.isTrain[index]).toBe(true);
    }
  });

  it("reproduces the same train indices for the same seed", () => {
    const first = computeSplitPlan(10, { train: 3, test: 1 }, createSeededRandom(42));
    const second = computeSplitPlan(10, { train: 3, test: 1 }, createSeededRandom(42));

    expect(second.trainIndices).toEqual(first.trainIndices);
  });

  it("still produces a complete partition for another seed", () => {
    const plan = computeSplitPlan(10, { train: 3, test: 1 }, createSeededRandom(7));

    expect(plan.trainIndices).toHaveLength(7);
    expect(plan.isTrain.filter((value) => !value)).toHaveLength(3);
  });

  it("sizes train as floor(n * train / (train + test))", () => {
    const ratios = [
      { train: 1, test: 1 },
      { train: 3, test: 1 },
      { train: 1, test: 3 },
      { train: 7, test: 3 },
      { train: 10, test: 1 },
    ];

    for (const ratio of ratios) {
      for (let total = 0; total <= 25; total += 1) {
        const plan = computeSplitPlan(total, ratio, createSeededRandom(total + 1));
        const expected = Math.floor((total * ratio.train) / (ratio.train + ratio.test));

        expect(plan.trainCount).toBe(expected);
        expect(trainCountFor(total, ratio)).toBe(expected);
        expect(plan.trainCount + plan.testCount).toBe(total);
        expect(plan.isTrain).toHaveLength(total);
      }
    }
  });

  it("rejects non-positive or fractional factors", () => {
    expect(() => computeSplitPlan(10, { train: 0, test: 1 }, createSeededRandom(1))).toThrow(
      InvalidRatioError,
    );
    expect(() => reweightFactors({ train: 1.5, test: 1 })).toThrow(
      "Train and test factors must be positive integers, got 1.5:1",
    );
  });

  it("handles an empty collection", () => {
    const plan = computeSplitPlan(0, { train: 1, test: 1 }, createSeededRandom(3));

    expect(plan).toEqual({
      total: 0,
      trainCount: 0,
      testCount: 0,
      trainIndices: [],
      isTrain: [],
    });
  });
});

describe("record partitioning", () => {
  it("stamps each category with its reweight factor", () => {
    expect(reweightFactors({ train: 3, test: 1 })).toEqual({ train: 4 / 3, test: 4 });

    const result = partitionRecords(events(10), {
      ratio: { train: 3, test: 1 },
      random: createSeededRandom(42),
    });

    expect(result.train).toHaveLength(7);
    expect(result.test).toHaveLength(3);
    for (const record of result.train) {
      expect(record.splitFactor).toBe(4 / 3);
    }
    for (const record of result.test) {
      expect(record.splitFactor).toBe(4);
    }
  });

  it("keeps input order and drops or duplicates nothing", () => {
    const records = events(10);
    const expectedPlan = computeSplitPlan(
      10,
      { train: 3, test: 1 },
      createSeededRandom(42),
    );

    const result = partitionRecords(records, {
      ratio: { train: 3, test: 1 },
      random: createSeededRandom(42),
      weightField: "w",
    });

    const trainIds = result.train.map((record) => record.id);
    const testIds = result.test.map((record) => record.id);

    expect(trainIds).toEqual(expectedPlan.trainIndices);
    expect(testIds).toEqual(
      records.map((_, index) => index).filter((index) => !expectedPlan.isTrain[index]),
    );
    expect([...trainIds, ...testIds].sort((a, b) => Number(a) - Number(b))).toEqual(
      records.map((record) => record.id),
    );
    expect(result.train[0]).toHaveProperty("w");
    expect(result.train[0]).not.toHaveProperty("splitFactor");
  });

  it("round-trips through a partition index built from its own output", () => {
    const records = events(40);
    const result = partitionRecords(records, {
      ratio: { train: 2, test: 1 },
      random: createSeededRandom(2024),
    });

    const index = buildPartitionIndex(result.train, result.test, DEFAULT_IDENTITY_FIELDS);

    expect(index.conflicts()).toEqual([]);
    for (const [position, record] of records.entries()) {
      const lookup = index.lookup({
        run: BigInt(Number(record.Run)),
        segment: BigInt(Number(record.LumiSec)),
        event: BigInt(Number(record.Event)),
      });
      expect(lookup.kind).toBe("single");
      if (lookup.kind !== "single") {
        continue;
      }
      expect(lookup.entry.isTrain).toBe(result.plan.isTrain[position]);
      expect(lookup.entry.isTest).toBe(!result.plan.isTrain[position]);
    }
  });
});

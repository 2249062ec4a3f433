import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../src/config/config.js";
import { EmptyReferenceError, ReferenceMissingError } from "../src/core/errors.js";
import type { DataRecord } from "../src/core/types.js";
import { FileRecordStore } from "../src/io/fileRecordStore.js";
import { inferSchema } from "../src/io/jsonlCodec.js";
import { Logger } from "../src/logging/logger.js";
import { exitCodeFor } from "../src/pipeline/outcomes.js";
import {
  type PropagateConfig,
  loadPartitionIndex,
  propagateDataset,
} from "../src/pipeline/propagateDataset.js";
import { splitDataset } from "../src/pipeline/splitDataset.js";

const tempDirs: string[] = [];
const store = new FileRecordStore();

afterEach(async () => {
  while (tempDirs.length > 0) {
    const path = tempDirs.pop();
    if (!path) {
      continue;
    }
    await rm(path, { recursive: true, force: true });
  }
});

interface Layout {
  root: string;
  input: string;
  train: string;
  test: string;
  output: string;
}

async function layout(): Promise<Layout> {
  const root = await mkdtemp(join(tmpdir(), "eventsplit-propagate-"));
  tempDirs.push(root);
  return {
    root,
    input: join(root, "input"),
    train: join(root, "split", "Train"),
    test: join(root, "split", "Test"),
    output: join(root, "output"),
  };
}

function event(id: number, extra: DataRecord = {}): DataRecord {
  return { Run: 4, LumiSec: 12, Event: id, ...extra };
}

async function writeCollection(
  dir: string,
  name: string,
  records: DataRecord[],
): Promise<void> {
  await store.write(join(dir, name), {
    tree: "bdttree",
    schema: inferSchema(records),
    records,
  });
}

function propagateConfig(overrides: Partial<PropagateConfig> = {}): PropagateConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

function run(dirs: Layout, config: PropagateConfig = propagateConfig(), logger?: Logger) {
  return propagateDataset({
    input: { store, location: dirs.input },
    train: { store, location: dirs.train },
    test: { store, location: dirs.test },
    output: { store, location: dirs.output },
    config,
    logger,
  });
}

describe("propagate dataset", () => {
  it("re-splits a derivative collection from the reference split", async () => {
    const dirs = await layout();
    await writeCollection(dirs.train, "SignalA.jsonl", [event(1), event(2), event(3)]);
    await writeCollection(dirs.test, "SignalA.jsonl", [event(4), event(5)]);
    await writeCollection(dirs.input, "SignalA.jsonl", [
      event(1, { bdt: 0.5 }),
      event(4, { bdt: 0.25 }),
      event(6, { bdt: 0.75 }),
      event(2, { bdt: 1 }),
    ]);

    const summary = await run(dirs);

    expect(summary.outcomes.written).toBe(1);
    expect(summary.unmatchedCount).toBe(1);
    expect(summary.files[0]).toEqual({
      file: "SignalA.jsonl",
      outcome: "written",
      recordsRead: 4,
      recordsWritten: 4,
      trainCount: 2,
      testCount: 1,
      unmatchedCount: 1,
    });
    expect(exitCodeFor(summary)).toBe(0);

    const output = await store.read(join(dirs.output, "SignalA.jsonl"), { tree: "bdttree" });
    expect(output.records).toEqual([
      { Run: 4, LumiSec: 12, Event: 1, bdt: 0.5, isTrain: true, isTest: false },
      { Run: 4, LumiSec: 12, Event: 4, bdt: 0.25, isTrain: false, isTest: true },
      { Run: 4, LumiSec: 12, Event: 6, bdt: 0.75, isTrain: false, isTest: false },
      { Run: 4, LumiSec: 12, Event: 2, bdt: 1, isTrain: true, isTest: false },
    ]);
    expect(output.schema.slice(-2)).toEqual([
      { name: "isTrain", type: "bool" },
      { name: "isTest", type: "bool" },
    ]);
  });

  it("writes only identity fields and flags in identity-only mode", async () => {
    const dirs = await layout();
    await writeCollection(dirs.train, "SignalA.jsonl", [event(1)]);
    await writeCollection(dirs.test, "SignalA.jsonl", [event(2)]);
    await writeCollection(dirs.input, "SignalA.jsonl", [event(2, { bdt: 0.1 })]);

    await run(dirs, propagateConfig({ identityOnly: true }));

    const output = await store.read(join(dirs.output, "SignalA.jsonl"), { tree: "bdttree" });
    expect(output.schema.map((field) => field.name)).toEqual([
      "Run",
      "LumiSec",
      "Event",
      "isTrain",
      "isTest",
    ]);
    expect(output.records).toEqual([
      { Run: 4, LumiSec: 12, Event: 2, isTrain: false, isTest: true },
    ]);
  });

  it("isolates file-level failures and reports every outcome", async () => {
    const dirs = await layout();

    // SignalA: fine.
    await writeCollection(dirs.train, "SignalA.jsonl", [event(1)]);
    await writeCollection(dirs.test, "SignalA.jsonl", [event(2)]);
    await writeCollection(dirs.input, "SignalA.jsonl", [event(1), event(2)]);

    // SignalB: no references.
    await writeCollection(dirs.input, "SignalB.jsonl", [event(1)]);

    // SignalC: references were never split.
    await writeCollection(dirs.train, "SignalC.jsonl", [event(7), event(8)]);
    await writeCollection(dirs.test, "SignalC.jsonl", [event(7), event(8)]);
    await writeCollection(dirs.input, "SignalC.jsonl", [event(7), event(8)]);

    // SignalD: empty references.
    await writeCollection(dirs.train, "SignalD.jsonl", []);
    await writeCollection(dirs.test, "SignalD.jsonl", []);
    await writeCollection(dirs.input, "SignalD.jsonl", [event(1)]);

    // SignalE: derivative without a segment field.
    await writeCollection(dirs.train, "SignalE.jsonl", [event(1)]);
    await writeCollection(dirs.test, "SignalE.jsonl", [event(2)]);
    await writeCollection(dirs.input, "SignalE.jsonl", [{ Run: 4, Event: 1 }]);

    const summary = await run(dirs);

    expect(summary.files.map((report) => [report.file, report.outcome])).toEqual([
      ["SignalA.jsonl", "written"],
      ["SignalB.jsonl", "skipped-reference-missing"],
      ["SignalC.jsonl", "discarded-conflict"],
      ["SignalD.jsonl", "skipped-empty-reference"],
      ["SignalE.jsonl", "failed-missing-field"],
    ]);
    expect(summary.aborted).toBe(false);
    expect(summary.outcomes).toMatchObject({
      written: 1,
      "skipped-reference-missing": 1,
      "discarded-conflict": 1,
      "skipped-empty-reference": 1,
      "failed-missing-field": 1,
    });
    expect(summary.files[2]?.message).toBe(
      "Event 4:12:7 matched twice in the references for SignalC.jsonl (record 0); the file was not split in the previous split",
    );
    expect(exitCodeFor(summary)).toBe(1);
    expect(await readdir(dirs.output)).toEqual(["SignalA.jsonl"]);
  });

  it("removes the previous output when a rerun fails", async () => {
    const dirs = await layout();
    const outputLocation = join(dirs.output, "SignalA.jsonl");
    await writeCollection(dirs.train, "SignalA.jsonl", [event(1)]);
    await writeCollection(dirs.test, "SignalA.jsonl", [event(2)]);
    await writeCollection(dirs.input, "SignalA.jsonl", [event(1), event(2)]);

    await run(dirs);
    expect(await store.exists(outputLocation)).toBe(true);

    await writeCollection(dirs.input, "SignalA.jsonl", [{ Run: 4, Event: 1 }]);
    const missingField = await run(dirs);
    expect(missingField.files.map((report) => report.outcome)).toEqual(["failed-missing-field"]);
    expect(await store.exists(outputLocation)).toBe(false);

    await writeCollection(dirs.input, "SignalA.jsonl", [event(1), event(2)]);
    await run(dirs);
    expect(await store.exists(outputLocation)).toBe(true);

    await store.write(join(dirs.input, "SignalA.jsonl"), {
      tree: "Events",
      schema: inferSchema([event(1)]),
      records: [event(1)],
    });
    const invalidInput = await run(dirs);
    expect(invalidInput.files.map((report) => report.outcome)).toEqual(["failed-invalid-input"]);
    expect(await store.exists(outputLocation)).toBe(false);
  });

  it("aborts the run when a key matches more than twice", async () => {
    const dirs = await layout();
    await writeCollection(dirs.train, "SignalA.jsonl", [event(3), event(3)]);
    await writeCollection(dirs.test, "SignalA.jsonl", [event(3)]);
    await writeCollection(dirs.input, "SignalA.jsonl", [event(3)]);

    await writeCollection(dirs.train, "SignalB.jsonl", [event(1)]);
    await writeCollection(dirs.test, "SignalB.jsonl", [event(2)]);
    await writeCollection(dirs.input, "SignalB.jsonl", [event(1)]);

    const summary = await run(dirs);

    expect(summary.aborted).toBe(true);
    expect(summary.abortReason).toBe(
      "Event 4:12:3 matched 3 reference records for SignalA.jsonl; the identity fields do not identify events uniquely",
    );
    expect(summary.files.map((report) => report.outcome)).toEqual(["fatal-integrity-error"]);
    expect(exitCodeFor(summary)).toBe(2);
    expect(await store.exists(join(dirs.output, "SignalB.jsonl"))).toBe(false);
  });

  it("skips a collection that already carries split flags", async () => {
    const dirs = await layout();
    await writeCollection(dirs.train, "SignalA.jsonl", [event(1)]);
    await writeCollection(dirs.test, "SignalA.jsonl", [event(2)]);
    await writeCollection(dirs.input, "SignalA.jsonl", [event(1), event(2)]);

    await run(dirs);

    const again = await propagateDataset({
      input: { store, location: dirs.output },
      train: { store, location: dirs.train },
      test: { store, location: dirs.test },
      output: { store, location: join(dirs.root, "output-again") },
      config: propagateConfig(),
    });

    expect(again.files.map((report) => report.outcome)).toEqual(["skipped-already-split"]);
    expect(await store.exists(join(dirs.root, "output-again", "SignalA.jsonl"))).toBe(false);
  });

  it("reproduces a generated split on a reprocessed dataset", async () => {
    const dirs = await layout();
    const original = Array.from({ length: 30 }, (_, index) => event(index, { pt: index }));
    await writeCollection(join(dirs.root, "original"), "SignalA.jsonl", original);

    await splitDataset({
      input: { store, location: join(dirs.root, "original") },
      output: { store, location: join(dirs.root, "split") },
      config: { ...DEFAULT_CONFIG, ratio: { train: 2, test: 1 }, seed: 11 },
    });

    const reprocessed = original.map((record, index) => ({ ...record, bdt: (index + 0.5) / 30 }));
    await writeCollection(dirs.input, "SignalA.jsonl", reprocessed);

    const summary = await run(dirs);
    expect(summary.files[0]).toMatchObject({
      outcome: "written",
      trainCount: 20,
      testCount: 10,
      unmatchedCount: 0,
    });

    const trainEvents = new Set(
      (await store.read(join(dirs.train, "SignalA.jsonl"), { tree: "bdttree" })).records.map(
        (record) => record.Event,
      ),
    );
    const output = await store.read(join(dirs.output, "SignalA.jsonl"), { tree: "bdttree" });
    for (const record of output.records) {
      expect(record.isTrain).toBe(trainEvents.has(record.Event));
      expect(record.isTest).toBe(!trainEvents.has(record.Event));
    }
  });

  it("logs skipped and discarded files", async () => {
    const dirs = await layout();
    await writeCollection(dirs.input, "SignalB.jsonl", [event(1)]);
    const lines: string[] = [];

    await run(dirs, propagateConfig(), new Logger({ level: "warn", sink: (line) => lines.push(line) }));

    expect(lines).toEqual([
      `[warn] (propagate) The pre-split train collection does not exist: ${join(dirs.train, "SignalB.jsonl")}; skipping SignalB.jsonl`,
    ]);
  });
});

describe("reference loading", () => {
  it("raises ReferenceMissingError and EmptyReferenceError", async () => {
    const dirs = await layout();
    const config = propagateConfig();
    const references = {
      train: { store, location: join(dirs.train, "X.jsonl") },
      test: { store, location: join(dirs.test, "X.jsonl") },
    };

    await writeCollection(dirs.train, "X.jsonl", []);
    await expect(loadPartitionIndex(references, config)).rejects.toThrow(ReferenceMissingError);

    await writeCollection(dirs.test, "X.jsonl", []);
    await expect(loadPartitionIndex(references, config)).rejects.toThrow(EmptyReferenceError);
  });
});

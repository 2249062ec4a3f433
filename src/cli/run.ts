import {
  type ConfigInput,
  configFromEnv,
  loadConfigFile,
  resolveConfig,
} from "../config/config.js";
import { EventSplitError } from "../core/errors.js";
import { openRecordStore } from "../io/openRecordStore.js";
import { createLogger } from "../logging/logger.js";
import { exitCodeFor } from "../pipeline/outcomes.js";
import { loadPartitionIndex, propagateDataset } from "../pipeline/propagateDataset.js";
import { splitDataset } from "../pipeline/splitDataset.js";
import { HELP_TEXT, parseArgs } from "./args.js";

export interface CliIo {
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultIo: CliIo = {
  env: process.env,
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function printJson(io: CliIo, value: unknown): void {
  io.stdout(`${JSON.stringify(value, null, 2)}\n`);
}

export async function runCli(argv: string[], io: CliIo = defaultIo): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if (parsed.command === "help") {
      io.stdout(`${HELP_TEXT}\n`);
      return 0;
    }

    const configPath = parsed.configPath ?? io.env.EVENTSPLIT_CONFIG?.trim();
    const fileLayer: ConfigInput = configPath ? await loadConfigFile(configPath) : {};
    const config = resolveConfig(fileLayer, configFromEnv(io.env), parsed.overrides);
    const logger = createLogger({ level: config.logLevel, logFile: config.logFile });

    if (parsed.command === "split") {
      const summary = await splitDataset({
        input: openRecordStore(parsed.inputPath),
        output: openRecordStore(parsed.outputPath),
        config,
        logger,
      });
      printJson(io, summary);
      return exitCodeFor(summary);
    }

    if (parsed.command === "propagate") {
      const summary = await propagateDataset({
        input: openRecordStore(parsed.inputPath),
        train: openRecordStore(parsed.trainPath),
        test: openRecordStore(parsed.testPath),
        output: openRecordStore(parsed.outputPath),
        config,
        logger,
      });
      printJson(io, summary);
      return exitCodeFor(summary);
    }

    const index = await loadPartitionIndex(
      {
        train: openRecordStore(parsed.trainPath),
        test: openRecordStore(parsed.testPath),
      },
      config,
      logger.child("index"),
    );
    const conflicts = index.conflicts();
    printJson(io, { stats: index.stats(), conflicts });
    return conflicts.length > 0 ? 1 : 0;
  } catch (error) {
    if (error instanceof EventSplitError) {
      io.stderr(`${error.message}\n`);
      return 2;
    }
    throw error;
  }
}

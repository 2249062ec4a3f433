import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError } from "../core/errors.js";
import { MAX_SEED, type RandomScope } from "../core/random.js";
import {
  DEFAULT_FLAG_FIELDS,
  DEFAULT_IDENTITY_FIELDS,
  DEFAULT_WEIGHT_FIELD,
  type FlagFields,
  type IdentityFields,
  type SplitRatio,
} from "../core/types.js";
import type { LogLevel } from "../logging/logger.js";

export interface EventSplitConfig {
  identityFields: IdentityFields;
  tree: string;
  splitTree: string;
  ratio: SplitRatio;
  seed?: number;
  randomScope: RandomScope;
  weightField: string;
  flagFields: FlagFields;
  skipPrefixes: string[];
  skipFiles: string[];
  identityOnly: boolean;
  logLevel: LogLevel;
  logFile?: string;
}

const fieldName = z.string().trim().min(1);
const positiveFactor = z.number().int().positive();

export const configInputSchema = z
  .object({
    identityFields: z
      .object({
        run: fieldName,
        segment: fieldName,
        event: fieldName,
      })
      .partial(),
    tree: fieldName,
    splitTree: fieldName,
    ratio: z
      .object({
        train: positiveFactor,
        test: positiveFactor,
      })
      .partial(),
    seed: z.number().int().min(0).max(MAX_SEED).nullable(),
    randomScope: z.enum(["per-file", "shared"]),
    weightField: fieldName,
    flagFields: z
      .object({
        train: fieldName,
        test: fieldName,
      })
      .partial(),
    skipPrefixes: z.array(z.string()),
    skipFiles: z.array(z.string()),
    identityOnly: z.boolean(),
    logLevel: z.enum(["debug", "info", "warn", "error", "silent"]),
    logFile: z.string().min(1),
  })
  .partial()
  .strict();

export type ConfigInput = z.infer<typeof configInputSchema>;

export const DEFAULT_CONFIG: Readonly<EventSplitConfig> = {
  identityFields: { ...DEFAULT_IDENTITY_FIELDS },
  tree: "bdttree",
  splitTree: "bdttree",
  ratio: { train: 1, test: 1 },
  randomScope: "per-file",
  weightField: DEFAULT_WEIGHT_FIELD,
  flagFields: { ...DEFAULT_FLAG_FIELDS },
  skipPrefixes: ["Data"],
  skipFiles: ["puWeights"],
  identityOnly: false,
  logLevel: "warn",
};

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseConfigInput(raw: unknown, source: string): ConfigInput {
  const parsed = configInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config in ${source}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function loadConfigFile(path: string): Promise<ConfigInput> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch {
    throw new ConfigError(`Cannot read config file: ${path}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Invalid config at ${path}: not valid JSON.`);
  }

  return parseConfigInput(parsed, path);
}

function integerFromEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) {
    return undefined;
  }

  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${name} must be an integer, got: ${raw}`);
  }
  return parsed;
}

function stringFromEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

export function configFromEnv(env: NodeJS.ProcessEnv): ConfigInput {
  const trainFactor = integerFromEnv(env, "EVENTSPLIT_TRAIN_FACTOR");
  const testFactor = integerFromEnv(env, "EVENTSPLIT_TEST_FACTOR");

  const raw: Record<string, unknown> = {
    tree: stringFromEnv(env, "EVENTSPLIT_TREE"),
    splitTree: stringFromEnv(env, "EVENTSPLIT_SPLIT_TREE"),
    seed: integerFromEnv(env, "EVENTSPLIT_SEED"),
    randomScope: stringFromEnv(env, "EVENTSPLIT_RANDOM_SCOPE"),
    logLevel: stringFromEnv(env, "EVENTSPLIT_LOG_LEVEL"),
    logFile: stringFromEnv(env, "EVENTSPLIT_LOG_FILE"),
    ratio:
      trainFactor === undefined && testFactor === undefined
        ? undefined
        : { train: trainFactor, test: testFactor },
  };

  return parseConfigInput(raw, "environment");
}

export function resolveConfig(...layers: ConfigInput[]): EventSplitConfig {
  const config: EventSplitConfig = {
    ...DEFAULT_CONFIG,
    identityFields: { ...DEFAULT_CONFIG.identityFields },
    ratio: { ...DEFAULT_CONFIG.ratio },
    flagFields: { ...DEFAULT_CONFIG.flagFields },
    skipPrefixes: [...DEFAULT_CONFIG.skipPrefixes],
    skipFiles: [...DEFAULT_CONFIG.skipFiles],
  };

  for (const layer of layers) {
    config.identityFields = {
      run: layer.identityFields?.run ?? config.identityFields.run,
      segment: layer.identityFields?.segment ?? config.identityFields.segment,
      event: layer.identityFields?.event ?? config.identityFields.event,
    };
    config.ratio = {
      train: layer.ratio?.train ?? config.ratio.train,
      test: layer.ratio?.test ?? config.ratio.test,
    };
    config.flagFields = {
      train: layer.flagFields?.train ?? config.flagFields.train,
      test: layer.flagFields?.test ?? config.flagFields.test,
    };
    config.tree = layer.tree ?? config.tree;
    config.splitTree = layer.splitTree ?? config.splitTree;
    config.randomScope = layer.randomScope ?? config.randomScope;
    config.weightField = layer.weightField ?? config.weightField;
    config.skipPrefixes = layer.skipPrefixes ?? config.skipPrefixes;
    config.skipFiles = layer.skipFiles ?? config.skipFiles;
    config.identityOnly = layer.identityOnly ?? config.identityOnly;
    config.logLevel = layer.logLevel ?? config.logLevel;
    config.logFile = layer.logFile ?? config.logFile;

    // null clears a seed set by an earlier layer.
    if (layer.seed === null) {
      config.seed = undefined;
    } else if (layer.seed !== undefined) {
      config.seed = layer.seed;
    }
  }

  if (config.flagFields.train === config.flagFields.test) {
    throw new ConfigError("flagFields.train and flagFields.test must differ");
  }

  return config;
}

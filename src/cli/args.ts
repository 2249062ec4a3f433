import { type ConfigInput, parseConfigInput } from "../config/config.js";
import { ConfigError } from "../core/errors.js";
import { isLogLevel } from "../logging/logger.js";

interface CommonOptions {
  configPath?: string;
  overrides: ConfigInput;
}

export type ParsedCommand =
  | { command: "help" }
  | (CommonOptions & { command: "split"; inputPath: string; outputPath: string })
  | (CommonOptions & {
      command: "propagate";
      inputPath: string;
      trainPath: string;
      testPath: string;
      outputPath: string;
    })
  | (CommonOptions & { command: "index"; trainPath: string; testPath: string });

type CommandName = Exclude<ParsedCommand["command"], "help">;

export const HELP_TEXT = [
  "eventsplit - seeded train/test splitting of event collections and propagation of the split",
  "",
  "Usage:",
  "  eventsplit split -i <input dir> -o <output dir> [options]",
  "  eventsplit propagate -i <input dir> --train-path <dir> --test-path <dir> -o <output dir> [options]",
  "  eventsplit index --train <collection> --test <collection> [options]",
  "",
  "split writes <output>/Train/<file> and <output>/Test/<file> for every collection in <input>.",
  "propagate stamps isTrain/isTest on every collection in <input> from the same-named",
  "collections under --train-path and --test-path.",
  "index prints the statistics and repeated keys of one Train/Test reference pair.",
  "",
  "Locations are local paths or gs://bucket/path URIs.",
  "",
  "Environment variables:",
  "  EVENTSPLIT_CONFIG         JSON config file",
  "  EVENTSPLIT_TREE           Tree name of the input collections (default: bdttree)",
  "  EVENTSPLIT_SPLIT_TREE     Tree name of the reference collections (default: bdttree)",
  "  EVENTSPLIT_TRAIN_FACTOR   Train share of the ratio (default: 1)",
  "  EVENTSPLIT_TEST_FACTOR    Test share of the ratio (default: 1)",
  "  EVENTSPLIT_SEED           Random seed, 0 to 4294967295",
  "  EVENTSPLIT_RANDOM_SCOPE   per-file | shared (default: per-file)",
  "  EVENTSPLIT_LOG_LEVEL      debug | info | warn | error | silent (default: warn)",
  "  EVENTSPLIT_LOG_FILE       Write the full log to this file",
  "",
  "Options:",
  "  -i, --input-path <path>",
  "  -o, --output-path <path>",
  "  --train-path <path>       (propagate)",
  "  --test-path <path>        (propagate)",
  "  --train <path>            (index)",
  "  --test <path>             (index)",
  "  -t, --tree <name>",
  "  --split-tree <name>",
  "  --train-factor <n>",
  "  --test-factor <n>",
  "  -s, --seed <n>            0 to 4294967295",
  "  --random-scope <per-file|shared>",
  "  --weight-field <name>",
  "  --identity-only",
  "  --config <path>",
  "  -l, --log-level <level>",
  "  --log-file <path>",
  "  --help",
].join("\n");

function parseIntegerArg(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === "" || !Number.isInteger(parsed)) {
    throw new ConfigError(`${flag} expects an integer, got: ${value ?? "(nothing)"}`);
  }
  return parsed;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("--")) {
    throw new ConfigError(`${flag} expects a value`);
  }
  return value;
}

function requirePath(command: CommandName, flag: string, value: string | undefined): string {
  if (!value) {
    throw new ConfigError(`${command} requires ${flag}`);
  }
  return value;
}

function isCommandName(value: string | undefined): value is CommandName {
  return value === "split" || value === "propagate" || value === "index";
}

export function parseArgs(argv: string[]): ParsedCommand {
  const [command, ...rest] = argv;

  if (!command || command === "--help" || command === "-h" || command === "help") {
    return { command: "help" };
  }
  if (!isCommandName(command)) {
    throw new ConfigError(`Unknown command: ${command}`);
  }

  const paths: Record<string, string | undefined> = {};
  const overrides: ConfigInput = {};
  let configPath: string | undefined;

  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i] ?? "";
    const next = rest[i + 1];

    if (arg === "--help" || arg === "-h") {
      return { command: "help" };
    }

    if (arg === "--identity-only") {
      overrides.identityOnly = true;
      continue;
    }

    // Every remaining flag takes one value.
    i += 1;

    if (arg === "-i" || arg === "--input-path") {
      paths.input = requireValue(arg, next);
    } else if (arg === "-o" || arg === "--output-path") {
      paths.output = requireValue(arg, next);
    } else if (arg === "--train-path" || arg === "--train") {
      paths.train = requireValue(arg, next);
    } else if (arg === "--test-path" || arg === "--test") {
      paths.test = requireValue(arg, next);
    } else if (arg === "-t" || arg === "--tree") {
      overrides.tree = requireValue(arg, next);
    } else if (arg === "--split-tree") {
      overrides.splitTree = requireValue(arg, next);
    } else if (arg === "--train-factor") {
      overrides.ratio = { ...overrides.ratio, train: parseIntegerArg(arg, next) };
    } else if (arg === "--test-factor") {
      overrides.ratio = { ...overrides.ratio, test: parseIntegerArg(arg, next) };
    } else if (arg === "-s" || arg === "--seed") {
      overrides.seed = parseIntegerArg(arg, next);
    } else if (arg === "--random-scope") {
      const scope = requireValue(arg, next);
      if (scope !== "per-file" && scope !== "shared") {
        throw new ConfigError(`--random-scope must be per-file or shared, got: ${scope}`);
      }
      overrides.randomScope = scope;
    } else if (arg === "--weight-field") {
      overrides.weightField = requireValue(arg, next);
    } else if (arg === "--config") {
      configPath = requireValue(arg, next);
    } else if (arg === "-l" || arg === "--log-level") {
      const level = requireValue(arg, next);
      if (!isLogLevel(level)) {
        throw new ConfigError(`Unknown log level: ${level}`);
      }
      overrides.logLevel = level;
    } else if (arg === "--log-file") {
      overrides.logFile = requireValue(arg, next);
    } else {
      throw new ConfigError(`Unknown arg: ${arg}`);
    }
  }

  const common: CommonOptions = {
    configPath,
    overrides: parseConfigInput(overrides, "command line"),
  };

  if (command === "split") {
    return {
      ...common,
      command,
      inputPath: requirePath(command, "--input-path", paths.input),
      outputPath: requirePath(command, "--output-path", paths.output),
    };
  }

  if (command === "propagate") {
    return {
      ...common,
      command,
      inputPath: requirePath(command, "--input-path", paths.input),
      trainPath: requirePath(command, "--train-path", paths.train),
      testPath: requirePath(command, "--test-path", paths.test),
      outputPath: requirePath(command, "--output-path", paths.output),
    };
  }

  return {
    ...common,
    command,
    trainPath: requirePath(command, "--train", paths.train),
    testPath: requirePath(command, "--test", paths.test),
  };
}

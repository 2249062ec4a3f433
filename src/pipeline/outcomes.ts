export type FileOutcome =
  | "written"
  | "skipped-data-sample"
  | "skipped-excluded"
  | "skipped-already-split"
  | "skipped-reference-missing"
  | "skipped-empty-reference"
  | "discarded-conflict"
  | "failed-missing-field"
  | "failed-invalid-input"
  | "fatal-integrity-error";

const FAILURE_OUTCOMES = new Set<FileOutcome>([
  "discarded-conflict",
  "failed-missing-field",
  "failed-invalid-input",
  "fatal-integrity-error",
]);

export interface FileReport {
  file: string;
  outcome: FileOutcome;
  message?: string;
  recordsRead: number;
  recordsWritten: number;
  trainCount?: number;
  testCount?: number;
  unmatchedCount?: number;
  seed?: number;
}

export interface RunSummary {
  command: "split" | "propagate";
  generatedAtUtc: string;
  seed?: number;
  aborted: boolean;
  abortReason?: string;
  outcomes: Record<FileOutcome, number>;
  recordsRead: number;
  recordsWritten: number;
  unmatchedCount: number;
  files: FileReport[];
}

export interface SkipRules {
  skipPrefixes: string[];
  skipFiles: string[];
}

export function collectionStem(name: string): string {
  return name.replace(/\.jsonl(\.gz)?$/, "");
}

export function skipOutcomeFor(name: string, rules: SkipRules): FileOutcome | undefined {
  if (rules.skipFiles.includes(collectionStem(name))) {
    return "skipped-excluded";
  }
  if (rules.skipPrefixes.some((prefix) => prefix && name.startsWith(prefix))) {
    return "skipped-data-sample";
  }
  return undefined;
}

export function skippedReport(
  file: string,
  outcome: FileOutcome,
  message?: string,
): FileReport {
  return {
    file,
    outcome,
    message,
    recordsRead: 0,
    recordsWritten: 0,
  };
}

export function summarizeRun(params: {
  command: RunSummary["command"];
  files: FileReport[];
  seed?: number;
  abortReason?: string;
  now?: Date;
}): RunSummary {
  const outcomes: Record<FileOutcome, number> = {
    written: 0,
    "skipped-data-sample": 0,
    "skipped-excluded": 0,
    "skipped-already-split": 0,
    "skipped-reference-missing": 0,
    "skipped-empty-reference": 0,
    "discarded-conflict": 0,
    "failed-missing-field": 0,
    "failed-invalid-input": 0,
    "fatal-integrity-error": 0,
  };

  let recordsRead = 0;
  let recordsWritten = 0;
  let unmatchedCount = 0;

  for (const report of params.files) {
    outcomes[report.outcome] += 1;
    recordsRead += report.recordsRead;
    recordsWritten += report.recordsWritten;
    unmatchedCount += report.unmatchedCount ?? 0;
  }

  return {
    command: params.command,
    generatedAtUtc: (params.now ?? new Date()).toISOString(),
    seed: params.seed,
    aborted: params.abortReason !== undefined,
    abortReason: params.abortReason,
    outcomes,
    recordsRead,
    recordsWritten,
    unmatchedCount,
    files: params.files,
  };
}

export function exitCodeFor(summary: RunSummary): number {
  if (summary.aborted) {
    return 2;
  }
  return summary.files.some((report) => FAILURE_OUTCOMES.has(report.outcome)) ? 1 : 0;
}

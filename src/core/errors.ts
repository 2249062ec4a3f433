export type EventSplitErrorCode =
  | "missing_field"
  | "reference_missing"
  | "conflicting_assignment"
  | "identity_integrity"
  | "empty_reference"
  | "invalid_ratio"
  | "config"
  | "collection_not_found"
  | "collection_format";

export class EventSplitError extends Error {
  readonly code: EventSplitErrorCode;

  constructor(code: EventSplitErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MissingFieldError extends EventSplitError {
  readonly field: string;
  readonly reason: "absent" | "not an integer";

  constructor(field: string, reason: "absent" | "not an integer" = "absent") {
    super(
      "missing_field",
      reason === "absent"
        ? `Record is missing identity field '${field}'`
        : `Identity field '${field}' is not an integer`,
    );
    this.field = field;
    this.reason = reason;
  }
}

export class ReferenceMissingError extends EventSplitError {
  readonly location: string;
  readonly category: "train" | "test";

  constructor(category: "train" | "test", location: string) {
    super(
      "reference_missing",
      `The pre-split ${category} collection does not exist: ${location}`,
    );
    this.location = location;
    this.category = category;
  }
}

export class EmptyReferenceError extends EventSplitError {
  readonly trainLocation: string;
  readonly testLocation: string;

  constructor(trainLocation: string, testLocation: string) {
    super(
      "empty_reference",
      `Both reference collections are empty: ${trainLocation}, ${testLocation}`,
    );
    this.trainLocation = trainLocation;
    this.testLocation = testLocation;
  }
}

export class ConflictingAssignmentError extends EventSplitError {
  readonly file: string;
  readonly key: string;
  readonly recordIndex: number;

  constructor(file: string, key: string, recordIndex: number) {
    super(
      "conflicting_assignment",
      `Event ${key} matched twice in the references for ${file} (record ${recordIndex}); the file was not split in the previous split`,
    );
    this.file = file;
    this.key = key;
    this.recordIndex = recordIndex;
  }
}

export class IdentityIntegrityError extends EventSplitError {
  readonly file: string;
  readonly key: string;
  readonly matchCount: number;

  constructor(file: string, key: string, matchCount: number) {
    super(
      "identity_integrity",
      `Event ${key} matched ${matchCount} reference records for ${file}; the identity fields do not identify events uniquely`,
    );
    this.file = file;
    this.key = key;
    this.matchCount = matchCount;
  }
}

export class InvalidRatioError extends EventSplitError {
  constructor(trainFactor: number, testFactor: number) {
    super(
      "invalid_ratio",
      `Train and test factors must be positive integers, got ${trainFactor}:${testFactor}`,
    );
  }
}

export class ConfigError extends EventSplitError {
  constructor(message: string) {
    super("config", message);
  }
}

export class CollectionNotFoundError extends EventSplitError {
  readonly location: string;

  constructor(location: string) {
    super("collection_not_found", `Collection not found: ${location}`);
    this.location = location;
  }
}

export class CollectionFormatError extends EventSplitError {
  readonly location: string;

  constructor(location: string, detail: string) {
    super("collection_format", `Invalid collection ${location}: ${detail}`);
    this.location = location;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

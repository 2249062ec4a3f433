export type RecordValue = string | number | boolean | null;

export type DataRecord = Record<string, RecordValue>;

export type Category = "train" | "test";

export interface EventKey {
  readonly run: bigint;
  readonly segment: bigint;
  readonly event: bigint;
}

export interface IdentityFields {
  run: string;
  segment: string;
  event: string;
}

export const DEFAULT_IDENTITY_FIELDS: Readonly<IdentityFields> = {
  run: "Run",
  segment: "LumiSec",
  event: "Event",
};

export interface SplitRatio {
  train: number;
  test: number;
}

export interface FlagFields {
  train: string;
  test: string;
}

export const DEFAULT_FLAG_FIELDS: Readonly<FlagFields> = {
  train: "isTrain",
  test: "isTest",
};

export const DEFAULT_WEIGHT_FIELD = "splitFactor";

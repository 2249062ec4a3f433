export * from "./core/types.js";
export * from "./core/errors.js";
export * from "./core/random.js";
export * from "./core/eventKey.js";
export * from "./core/partitionGenerator.js";
export * from "./core/partitionIndex.js";
export * from "./core/propagation.js";

export * from "./io/recordStore.js";
export * from "./io/jsonlCodec.js";
export * from "./io/fileRecordStore.js";
export * from "./io/gcsRecordStore.js";
export * from "./io/openRecordStore.js";

export * from "./config/config.js";
export * from "./logging/logger.js";

export * from "./pipeline/outcomes.js";
export * from "./pipeline/splitDataset.js";
export * from "./pipeline/propagateDataset.js";

export { runCli } from "./cli/run.js";

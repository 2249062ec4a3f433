import { isAbsolute, resolve } from "node:path";
import { FileRecordStore } from "./fileRecordStore.js";
import { GcsRecordStore } from "./gcsRecordStore.js";
import type { RecordStore } from "./recordStore.js";

export interface ResolvedLocation {
  store: RecordStore;
  location: string;
}

const GCS_URI_PATTERN = /^gs:\/\/([^/]+)\/?(.*)$/;

export function isGcsUri(raw: string): boolean {
  return GCS_URI_PATTERN.test(raw);
}

/**
 * `gs://bucket/path` goes to Cloud Storage; anything else is a local path
 * resolved against the working directory.
 */
export function openRecordStore(raw: string): ResolvedLocation {
  const match = GCS_URI_PATTERN.exec(raw);
  if (match) {
    return {
      store: new GcsRecordStore({ bucket: match[1] ?? "" }),
      location: match[2] ?? "",
    };
  }

  return {
    store: new FileRecordStore(),
    location: isAbsolute(raw) ? raw : resolve(process.cwd(), raw),
  };
}

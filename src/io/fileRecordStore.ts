import { randomUUID } from "node:crypto";
import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { CollectionNotFoundError } from "../core/errors.js";
import { decodeCollection, encodeCollection, isCollectionName } from "./jsonlCodec.js";
import type { Collection, ReadCollectionOptions, RecordStore } from "./recordStore.js";

function isNotFound(error: unknown): boolean {
  if (!error || typeof error !== "object") {
    return false;
  }
  return (error as { code?: unknown }).code === "ENOENT";
}

export class FileRecordStore implements RecordStore {
  async list(directory: string): Promise<string[]> {
    const entries = await readdir(directory, { withFileTypes: true }).catch(
      (error: unknown) => {
        if (isNotFound(error)) {
          throw new CollectionNotFoundError(directory);
        }
        throw error;
      },
    );

    return entries
      .filter((entry) => entry.isFile() && isCollectionName(entry.name))
      .map((entry) => entry.name)
      .sort();
  }

  async exists(location: string): Promise<boolean> {
    const info = await stat(location).catch(() => null);
    return info?.isFile() ?? false;
  }

  async read(location: string, options: ReadCollectionOptions): Promise<Collection> {
    let body: Buffer;
    try {
      body = await readFile(location);
    } catch (error) {
      if (isNotFound(error)) {
        throw new CollectionNotFoundError(location);
      }
      throw error;
    }

    return decodeCollection(location, body, options);
  }

  async write(location: string, collection: Collection): Promise<void> {
    await mkdir(dirname(location), { recursive: true });

    const tempPath = `${location}.tmp-${randomUUID()}`;
    try {
      await writeFile(tempPath, encodeCollection(location, collection));
      await rename(tempPath, location);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  async remove(location: string): Promise<void> {
    await rm(location, { force: true });
  }

  join(directory: string, name: string): string {
    return join(directory, name);
  }
}

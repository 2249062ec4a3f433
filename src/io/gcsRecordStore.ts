import { randomUUID } from "node:crypto";
import { posix } from "node:path";
import { Storage } from "@google-cloud/storage";
import { CollectionNotFoundError } from "../core/errors.js";
import { decodeCollection, encodeCollection, isCollectionName } from "./jsonlCodec.js";
import type { Collection, ReadCollectionOptions, RecordStore } from "./recordStore.js";

export interface GcsRecordStoreOptions {
  bucket: string;
}

function isNotFound(error: unknown): boolean {
  if (!error || typeof error !== "object") {
    return false;
  }

  const code = (error as { code?: unknown }).code;
  if (code === 404) {
    return true;
  }

  const statusCode = (error as { statusCode?: unknown }).statusCode;
  return statusCode === 404;
}

function directoryPrefix(directory: string): string {
  const trimmed = directory.replace(/^\/+/, "");
  if (!trimmed) {
    return "";
  }
  return trimmed.endsWith("/") ? trimmed : `${trimmed}/`;
}

export class GcsRecordStore implements RecordStore {
  private readonly bucketName: string;
  private readonly storage: Storage;

  constructor(options: GcsRecordStoreOptions) {
    this.bucketName = options.bucket;
    this.storage = new Storage();
  }

  private object(location: string) {
    return this.storage.bucket(this.bucketName).file(location.replace(/^\/+/, ""));
  }

  private uri(location: string): string {
    return `gs://${this.bucketName}/${location.replace(/^\/+/, "")}`;
  }

  async list(directory: string): Promise<string[]> {
    const prefix = directoryPrefix(directory);
    const [files] = await this.storage.bucket(this.bucketName).getFiles({ prefix });

    return files
      .map((file) => file.name.slice(prefix.length))
      .filter((name) => name.length > 0 && !name.includes("/"))
      .filter(isCollectionName)
      .sort();
  }

  async exists(location: string): Promise<boolean> {
    const [exists] = await this.object(location).exists();
    return exists;
  }

  async read(location: string, options: ReadCollectionOptions): Promise<Collection> {
    let body: Buffer;
    try {
      [body] = await this.object(location).download();
    } catch (error) {
      if (isNotFound(error)) {
        throw new CollectionNotFoundError(this.uri(location));
      }
      throw error;
    }

    return decodeCollection(this.uri(location), body, options);
  }

  async write(location: string, collection: Collection): Promise<void> {
    const temp = this.object(`${location}.tmp-${randomUUID()}`);

    try {
      await temp.save(encodeCollection(location, collection), {
        contentType: "application/x-ndjson",
        resumable: false,
      });
      await temp.move(location.replace(/^\/+/, ""));
    } catch (error) {
      await temp.delete({ ignoreNotFound: true });
      throw error;
    }
  }

  async remove(location: string): Promise<void> {
    await this.object(location).delete({ ignoreNotFound: true });
  }

  join(directory: string, name: string): string {
    return posix.join(directory, name);
  }
}

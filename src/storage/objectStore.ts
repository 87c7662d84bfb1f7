import { Storage, Bucket } from "@google-cloud/storage";
import { StorageError, errorMessage } from "../errors";
import { logger } from "../logger/logger";
import type { StoredPrompt } from "../types";

/**
 * The object-store operations the pipeline needs. Keys are bucket-relative.
 */
export interface ObjectStore {
  readonly bucketName: string;
  writeText(key: string, data: string, contentType?: string): Promise<void>;
  readText(key: string): Promise<string>;
  list(prefix: string): Promise<string[]>;
  downloadToFile(key: string, destination: string): Promise<void>;
}

/**
 * Google Cloud Storage backed implementation.
 */
export class GcsObjectStore implements ObjectStore {
  private bucket: Bucket;

  constructor(projectId: string, readonly bucketName: string, storage?: Storage) {
    this.bucket = (storage ?? new Storage({ projectId })).bucket(bucketName);
  }

  async writeText(
    key: string,
    data: string,
    contentType = "text/plain"
  ): Promise<void> {
    try {
      await this.bucket.file(key).save(data, { contentType, resumable: false });
      logger.info(`Uploaded gs://${this.bucketName}/${key}`);
    } catch (error) {
      throw new StorageError(
        `Error uploading gs://${this.bucketName}/${key}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async readText(key: string): Promise<string> {
    try {
      const [contents] = await this.bucket.file(key).download();
      return contents.toString("utf-8");
    } catch (error) {
      throw new StorageError(
        `Error downloading gs://${this.bucketName}/${key}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async list(prefix: string): Promise<string[]> {
    try {
      const [files] = await this.bucket.getFiles({ prefix });
      return files.map((file) => file.name);
    } catch (error) {
      throw new StorageError(
        `Error listing gs://${this.bucketName}/${prefix}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async downloadToFile(key: string, destination: string): Promise<void> {
    try {
      await this.bucket.file(key).download({ destination });
    } catch (error) {
      throw new StorageError(
        `Error downloading gs://${this.bucketName}/${key} to ${destination}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }
}

/**
 * Resolves `gs://bucket/key` or a bare key to a key inside `bucketName`.
 */
export function parseGcsUri(reference: string, bucketName: string): string {
  if (!reference.startsWith("gs://")) {
    return reference.replace(/^\/+/, "");
  }
  const withoutScheme = reference.slice("gs://".length);
  const slash = withoutScheme.indexOf("/");
  const bucket = slash === -1 ? withoutScheme : withoutScheme.slice(0, slash);
  const key = slash === -1 ? "" : withoutScheme.slice(slash + 1);

  if (bucket !== bucketName) {
    throw new StorageError(
      `${reference} is outside the configured bucket "${bucketName}".`
    );
  }
  if (!key) {
    throw new StorageError(`${reference} does not name an object.`);
  }
  return key;
}

/**
 * Reads every `.txt` object under `prefix`, ordered by file name.
 *
 * The order returned here is the scene order for rendering.
 */
export async function fetchOrderedPrompts(
  store: ObjectStore,
  prefix: string
): Promise<StoredPrompt[]> {
  const folder = prefix && !prefix.endsWith("/") ? `${prefix}/` : prefix;
  logger.info(`Fetching prompts from gs://${store.bucketName}/${folder}...`);

  const keys = (await store.list(folder))
    .filter((key) => key.endsWith(".txt"))
    .map((key) => ({ key, fileName: key.split("/").pop() ?? "" }))
    .filter(({ fileName }) => fileName.length > 0)
    .sort((a, b) => (a.fileName < b.fileName ? -1 : a.fileName > b.fileName ? 1 : 0));

  if (keys.length === 0) {
    logger.warn(`No .txt files found in gs://${store.bucketName}/${folder}`);
    return [];
  }

  const prompts: StoredPrompt[] = [];
  for (const { key } of keys) {
    prompts.push({ key, text: await store.readText(key) });
  }

  logger.info(`Found and sorted ${prompts.length} prompts.`);
  return prompts;
}

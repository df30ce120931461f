// Endpoint stores for durable region availability state
//
// The file store reads the whole file into a snapshot and replaces it
// whole under an exclusive cross-process lock. Readers never see a partial
// write because content lands through a rename.

import { mkdir, open, readFile, rename, unlink } from "fs/promises";
import { dirname } from "path";
import { lock } from "proper-lockfile";
import type { EndpointSnapshot, EndpointStore } from "../types/endpoint";
import {
  EndpointFileSchema,
  EndpointSnapshotSchema,
  fromFileEntry,
  toFileEntry,
} from "../zod/endpoint";
import {
  FailoverError,
  FailoverErrorCodes,
  errorMessage,
} from "../utils/errors";

/**
 * Parse endpoint file content into a frozen snapshot.
 * @throws FailoverError CONFIG_LOAD_FAILED
 */
export function parseEndpointFile(
  content: string,
  path: string,
): EndpointSnapshot {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new FailoverError(
      `Load configuration file failed! ${errorMessage(error)}`,
      { code: FailoverErrorCodes.CONFIG_LOAD_FAILED, path, cause: error },
    );
  }

  const parsed = EndpointFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new FailoverError(
      `Load configuration file failed! ${issue ? `[${issue.path.join(".")}] ${issue.message}` : "invalid content"}`,
      {
        code: FailoverErrorCodes.CONFIG_LOAD_FAILED,
        path,
        cause: parsed.error,
      },
    );
  }

  return Object.freeze(parsed.data.map(fromFileEntry));
}

/**
 * Serialize records to endpoint file content, or `null` when the payload is
 * empty or invalid
 */
export function serializeEndpoints(records: EndpointSnapshot): string | null {
  if (records.length === 0) return null;
  if (!EndpointSnapshotSchema.safeParse(records).success) return null;
  return JSON.stringify(records.map(toFileEntry), null, 2);
}

export interface FileEndpointStoreOptions {
  /**
   * Times to retry acquiring the lock before giving up
   * @default 10
   */
  lockRetries?: number;

  /**
   * Age in milliseconds after which a lock left by a dead process is taken over
   * @default 10000
   */
  lockStaleMs?: number;
}

/**
 * File-based endpoint store
 */
export class FileEndpointStore implements EndpointStore {
  private readonly lockRetries: number;
  private readonly lockStaleMs: number;
  private lastError: FailoverError | undefined;

  constructor(options: FileEndpointStoreOptions = {}) {
    this.lockRetries = options.lockRetries ?? 10;
    this.lockStaleMs = options.lockStaleMs ?? 10000;
  }

  async load(path: string): Promise<EndpointSnapshot> {
    let content: string;
    try {
      content = await readFile(path, "utf-8");
    } catch (error) {
      throw new FailoverError(
        `Load configuration file failed! ${errorMessage(error)}`,
        { code: FailoverErrorCodes.CONFIG_LOAD_FAILED, path, cause: error },
      );
    }
    return parseEndpointFile(content, path);
  }

  async persist(path: string, records: EndpointSnapshot): Promise<boolean> {
    const content = serializeEndpoints(records);
    if (content === null) {
      this.lastError = new FailoverError("JSON configurations are invalid!", {
        code: FailoverErrorCodes.PERSIST_FAILED,
        path,
      });
      return false;
    }

    const tempPath = `${path}.${process.pid}.${Date.now()}.tmp`;
    let release: (() => Promise<void>) | undefined;

    try {
      await mkdir(dirname(path), { recursive: true });
      release = await lock(path, {
        realpath: false,
        stale: this.lockStaleMs,
        retries: {
          retries: this.lockRetries,
          factor: 1.5,
          minTimeout: 20,
          maxTimeout: 500,
        },
      });

      const handle = await open(tempPath, "w");
      try {
        await handle.writeFile(content, "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, path);

      this.lastError = undefined;
      return true;
    } catch (error) {
      this.lastError = new FailoverError(
        `Error writing to file: ${errorMessage(error)}`,
        { code: FailoverErrorCodes.PERSIST_FAILED, path, cause: error },
      );
      await unlink(tempPath).catch(() => {
        // Temp file was never created or already renamed
      });
      return false;
    } finally {
      if (release) {
        await release().catch((error: unknown) => {
          // Content is already in place; only report the lock problem
          this.lastError = new FailoverError(
            `Error releasing lock: ${errorMessage(error)}`,
            { code: FailoverErrorCodes.PERSIST_FAILED, path, cause: error },
          );
        });
      }
    }
  }

  /**
   * Error behind the last `persist()` that returned false
   */
  getLastError(): FailoverError | undefined {
    return this.lastError;
  }
}

/**
 * In-memory endpoint store for testing and embedded use.
 * Content is kept serialized so it behaves like the file store.
 */
export class InMemoryEndpointStore implements EndpointStore {
  private readonly files = new Map<string, string>();
  private lastError: FailoverError | undefined;

  async load(path: string): Promise<EndpointSnapshot> {
    const content = this.files.get(path);
    if (content === undefined) {
      throw new FailoverError(
        `Load configuration file failed! No such entry: ${path}`,
        { code: FailoverErrorCodes.CONFIG_LOAD_FAILED, path },
      );
    }
    return parseEndpointFile(content, path);
  }

  async persist(path: string, records: EndpointSnapshot): Promise<boolean> {
    const content = serializeEndpoints(records);
    if (content === null) {
      this.lastError = new FailoverError("JSON configurations are invalid!", {
        code: FailoverErrorCodes.PERSIST_FAILED,
        path,
      });
      return false;
    }
    this.files.set(path, content);
    this.lastError = undefined;
    return true;
  }

  /**
   * Store raw content, bypassing validation (useful for seeding bad files)
   */
  write(path: string, content: string): void {
    this.files.set(path, content);
  }

  read(path: string): string | undefined {
    return this.files.get(path);
  }

  getLastError(): FailoverError | undefined {
    return this.lastError;
  }
}

/**
 * Store types that can report why a persist failed
 */
export function hasLastError(
  store: EndpointStore,
): store is EndpointStore & { getLastError(): FailoverError | undefined } {
  return (
    "getLastError" in store && typeof store.getLastError === "function"
  );
}

import crypto from "crypto";
import fs from "fs";
import { CHUNK_SIZE } from "./config";
import { causeOf, ConfigurationError, FileAccessError, toError } from "./errors";
import { HashAlgorithm, MappedResult, ScanErrorCause } from "./types";

const fsp = fs.promises;

export const HASH_ALGORITHMS: readonly HashAlgorithm[] = ["md5", "sha1", "sha256"];

export interface HashFailure {
  cause: ScanErrorCause;
  reason: string;
}

export type HashOutcome =
  | { ok: true; digest: string; bytes: number }
  | { ok: false; error: HashFailure };

/** Signature shared by {@link hashFile} and test doubles. */
export type FileHasher = (
  filePath: string,
  algorithm: HashAlgorithm,
  expectedSize?: number
) => Promise<HashOutcome>;

function isHashAlgorithm(value: string): value is HashAlgorithm {
  return HASH_ALGORITHMS.some((alg) => alg === value);
}

/**
 * Validates a user-supplied algorithm name ("MD5", "sha-256", ...).
 *
 * @throws ConfigurationError for anything other than md5, sha1 or sha256
 */
export function parseHashAlgorithm(value: string): HashAlgorithm {
  const normalized = value.trim().toLowerCase().replace(/-/g, "");
  if (isHashAlgorithm(normalized)) {
    return normalized;
  }
  throw new ConfigurationError(
    `Unknown hash algorithm "${value}". Use one of: ${HASH_ALGORITHMS.join(", ")}.`
  );
}

/**
 * Computes the digest of a file using streaming to avoid loading it into memory.
 *
 * The file is read sequentially in 64 KiB chunks, so memory use does not
 * depend on file size. I/O failures are returned, not thrown. When
 * `expectedSize` is given and a different number of bytes is read, the file
 * changed after it was enumerated and the outcome is a `changed` failure.
 *
 * @example
 * const outcome = await hashFile('/path/to/file.txt', 'sha256');
 * if (outcome.ok) {
 *   console.log(outcome.digest); // "3a7bd3e2360a3d29eea436fcfb7e44c735d117c42d1c1835420b6b9942dd4f1b"
 * }
 */
export function hashFile(
  filePath: string,
  algorithm: HashAlgorithm,
  expectedSize?: number
): Promise<HashOutcome> {
  return new Promise((resolve) => {
    const hash = crypto.createHash(algorithm);
    const stream = fs.createReadStream(filePath, { highWaterMark: CHUNK_SIZE });
    let bytes = 0;

    stream.on("error", (err) => {
      resolve({ ok: false, error: { cause: causeOf(err), reason: err.message } });
    });
    stream.on("data", (chunk) => {
      bytes += chunk.length;
      hash.update(chunk);
    });
    stream.on("end", () => {
      if (expectedSize !== undefined && bytes !== expectedSize) {
        resolve({
          ok: false,
          error: {
            cause: "changed",
            reason: `File changed during scan: expected ${expectedSize} bytes, read ${bytes}`
          }
        });
        return;
      }
      resolve({ ok: true, digest: hash.digest("hex"), bytes });
    });
  });
}

async function readChunk(handle: fs.promises.FileHandle, buffer: Buffer): Promise<number> {
  let filled = 0;
  while (filled < buffer.length) {
    const { bytesRead } = await handle.read(buffer, filled, buffer.length - filled, null);
    if (bytesRead === 0) {
      break;
    }
    filled += bytesRead;
  }
  return filled;
}

async function onFile<T>(filePath: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (err) {
    throw new FileAccessError(filePath, err);
  }
}

/**
 * Compares two files byte by byte, one chunk at a time.
 *
 * @throws FileAccessError naming whichever of the two files could not be read
 */
export async function filesEqual(a: string, b: string): Promise<boolean> {
  const left = await onFile(a, () => fsp.open(a, "r"));
  try {
    const right = await onFile(b, () => fsp.open(b, "r"));
    try {
      const leftBuf = Buffer.alloc(CHUNK_SIZE);
      const rightBuf = Buffer.alloc(CHUNK_SIZE);

      while (true) {
        const leftRead = await onFile(a, () => readChunk(left, leftBuf));
        const rightRead = await onFile(b, () => readChunk(right, rightBuf));
        if (leftRead !== rightRead) {
          return false;
        }
        if (leftRead === 0) {
          return true;
        }
        if (!leftBuf.subarray(0, leftRead).equals(rightBuf.subarray(0, rightRead))) {
          return false;
        }
      }
    } finally {
      await right.close();
    }
  } finally {
    await left.close();
  }
}

export interface MapOptions<T> {
  /** No new item is started once this is aborted */
  signal?: AbortSignal;
  /** Invoked after each item completes (completed count, current item) */
  onProgress?: (completed: number, item: T) => void;
}

/**
 * Maps items through an async function with controlled concurrency.
 *
 * Items are processed in parallel with at most `limit` in flight. All errors
 * are captured and returned rather than thrown. Once `signal` aborts, workers
 * finish the item they hold and take no more; the untouched slots stay null
 * and `aborted` is set.
 *
 * @example
 * const { results, errors } = await mapWithConcurrency(
 *   files,
 *   4,
 *   async (file) => hashFile(file, 'md5'),
 *   { onProgress: (completed) => console.log(`Progress: ${completed}`) }
 * );
 * console.log(`Processed ${results.length}, ${errors.length} failures`);
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  mapper: (item: T) => Promise<R | null>,
  options: MapOptions<T> = {}
): Promise<MappedResult<T, R>> {
  const results: (R | null)[] = new Array(items.length).fill(null);
  const errors: MappedResult<T, R>["errors"] = [];
  let index = 0;
  let completed = 0;
  let aborted = false;

  async function worker(): Promise<void> {
    while (true) {
      const current = index;
      if (current >= items.length) {
        return;
      }
      if (options.signal?.aborted) {
        aborted = true;
        return;
      }
      index += 1;

      try {
        results[current] = await mapper(items[current]);
      } catch (err) {
        results[current] = null;
        errors.push({ index: current, item: items[current], error: toError(err) });
      }

      completed++;
      options.onProgress?.(completed, items[current]);
    }
  }

  const workers = Array.from({ length: Math.max(1, limit) }, () => worker());
  await Promise.all(workers);
  return { results, errors, aborted };
}

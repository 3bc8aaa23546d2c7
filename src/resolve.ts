import { HASH_CONCURRENCY } from "./config";
import { causeOf, errorMessage, FileAccessError } from "./errors";
import { FileHasher, filesEqual, hashFile, HashOutcome, mapWithConcurrency } from "./hash";
import {
  DigestKey,
  FileRecord,
  HashAlgorithm,
  KeepPolicy,
  ScanErrorRecord,
  SizeBucket
} from "./types";

/** A duplicate group before the controller numbers it. */
export interface ResolvedGroup {
  key: DigestKey;
  files: FileRecord[];
  keep: string;
}

export interface ResolveOptions {
  algorithm: HashAlgorithm;
  keep: KeepPolicy;
  verify?: boolean;
  hasher?: FileHasher;
  concurrency?: number;
  signal?: AbortSignal;
  /** Maps a record's path to the path handed to the file system */
  ioPath?: (filePath: string) => string;
  onFileHashed?: (file: FileRecord, outcome: HashOutcome) => void;
  onError?: (record: ScanErrorRecord) => void;
}

export interface BucketResolution {
  groups: ResolvedGroup[];
  /** True when cancellation cut the bucket short; `groups` is then empty */
  aborted: boolean;
}

export function digestKeyString(key: DigestKey): string {
  return `${key.size}:${key.algorithm}:${key.digest}`;
}

/**
 * Picks the member to keep: oldest or newest modification time, with the
 * lexicographically smallest path winning a tie.
 */
export function selectKeep(files: readonly FileRecord[], policy: KeepPolicy): FileRecord {
  if (files.length === 0) {
    throw new RangeError("Cannot choose a file to keep from an empty group.");
  }

  let best = files[0];
  for (const file of files.slice(1)) {
    const older = file.mtimeMs < best.mtimeMs;
    const newer = file.mtimeMs > best.mtimeMs;
    if ((policy === "oldest" && older) || (policy === "newest" && newer)) {
      best = file;
    } else if (file.mtimeMs === best.mtimeMs && file.path < best.path) {
      best = file;
    }
  }
  return best;
}

/**
 * Splits a digest group into runs of byte-identical files. A file that cannot
 * be read for the comparison is reported against its own path and dropped;
 * when that file heads a run, the next member takes its place.
 */
async function splitByContent(
  files: FileRecord[],
  ioPath: (filePath: string) => string,
  onError?: (record: ScanErrorRecord) => void
): Promise<FileRecord[][]> {
  const partitions: FileRecord[][] = [];
  const report = (file: FileRecord, err: unknown) => {
    const original = err instanceof FileAccessError ? err.cause : err;
    onError?.({ path: file.path, kind: "hashing", cause: causeOf(original), reason: errorMessage(original) });
  };

  for (const file of files) {
    let placed = false;
    let readable = true;
    let index = 0;

    while (!placed && readable && index < partitions.length) {
      const partition = partitions[index];
      const head = partition[0];
      try {
        if (await filesEqual(ioPath(head.path), ioPath(file.path))) {
          partition.push(file);
          placed = true;
        } else {
          index++;
        }
      } catch (err) {
        if (err instanceof FileAccessError && err.path === ioPath(head.path)) {
          report(head, err);
          partition.shift();
          if (partition.length === 0) {
            partitions.splice(index, 1);
          }
        } else {
          report(file, err);
          readable = false;
        }
      }
    }

    if (readable && !placed) {
      partitions.push([file]);
    }
  }

  return partitions;
}

/**
 * Hashes every member of a size bucket and regroups them by digest.
 *
 * Members that fail to hash are reported through `onError` and left out.
 * Digest groups reduced to a single member are dropped. Groups come back in
 * the order of their first member, members in enumeration order.
 *
 * If `signal` aborts before every member was hashed the bucket is abandoned
 * and no groups are returned for it.
 */
export async function resolveBucket(
  bucket: SizeBucket,
  options: ResolveOptions
): Promise<BucketResolution> {
  const hasher = options.hasher ?? hashFile;
  const ioPath = options.ioPath ?? ((filePath: string) => filePath);

  const hashing = await mapWithConcurrency(
    bucket.files,
    options.concurrency ?? HASH_CONCURRENCY,
    async (file) => {
      const outcome = await hasher(ioPath(file.path), options.algorithm, bucket.size);
      options.onFileHashed?.(file, outcome);
      if (!outcome.ok) {
        options.onError?.({
          path: file.path,
          kind: "hashing",
          cause: outcome.error.cause,
          reason: outcome.error.reason
        });
        return null;
      }
      return outcome.digest;
    },
    { signal: options.signal }
  );

  for (const { item, error } of hashing.errors) {
    options.onError?.({ path: item.path, kind: "hashing", cause: causeOf(error), reason: error.message });
  }

  if (hashing.aborted) {
    return { groups: [], aborted: true };
  }

  const byKey = new Map<string, { key: DigestKey; files: FileRecord[] }>();
  hashing.results.forEach((digest, index) => {
    if (digest === null) {
      return;
    }
    const key: DigestKey = { size: bucket.size, algorithm: options.algorithm, digest };
    const id = digestKeyString(key);
    const entry = byKey.get(id);
    if (entry) {
      entry.files.push(bucket.files[index]);
    } else {
      byKey.set(id, { key, files: [bucket.files[index]] });
    }
  });

  const groups: ResolvedGroup[] = [];
  for (const { key, files } of byKey.values()) {
    if (files.length < 2) {
      continue;
    }

    const partitions = options.verify ? await splitByContent(files, ioPath, options.onError) : [files];

    for (const members of partitions) {
      if (members.length >= 2) {
        groups.push({ key, files: members, keep: selectKeep(members, options.keep).path });
      }
    }
  }

  return { groups, aborted: false };
}

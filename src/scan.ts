import fs from "fs";
import path from "path";
import { causeOf, errorMessage, FatalScanError } from "./errors";
import { defaultAttributes, FileAttributes } from "./platform";
import { FileRecord, ScanErrorRecord, SizeBucket } from "./types";

const fsp = fs.promises;

/**
 * The file-system calls the enumerator makes. Tests substitute failing
 * implementations; everything else uses {@link nodeFileSystem}.
 */
export interface FileSystemAccess {
  readdir(dirPath: string): Promise<fs.Dirent[]>;
  stat(filePath: string): Promise<fs.Stats>;
}

export const nodeFileSystem: FileSystemAccess = {
  readdir: (dirPath) => fsp.readdir(dirPath, { withFileTypes: true }),
  stat: (filePath) => fsp.stat(filePath)
};

export interface WalkOptions {
  fileSystem?: FileSystemAccess;
  attributes?: FileAttributes;
  signal?: AbortSignal;
  /** Absolute paths to leave out entirely */
  excludePaths?: ReadonlySet<string>;
  /** Called once for every directory entry looked at */
  onEntry?: () => void;
  onError?: (record: ScanErrorRecord) => void;
}

function byName(a: fs.Dirent, b: fs.Dirent): number {
  if (a.name < b.name) return -1;
  return a.name > b.name ? 1 : 0;
}

/**
 * Recursively walks a directory tree and yields a {@link FileRecord} for each
 * regular file, depth-first with entries in name order.
 *
 * Symbolic links are never followed, so link cycles cannot cause infinite
 * traversal. A subdirectory that cannot be listed, or a file that cannot be
 * stat'ed, is reported once through `onError` and skipped. Failing to list
 * the root itself throws {@link FatalScanError}.
 *
 * The walk stops yielding as soon as `signal` is aborted.
 *
 * @example
 * for await (const file of walkDirectory('/path/to/dir')) {
 *   console.log(`${file.path}: ${file.size} bytes`);
 * }
 */
export async function* walkDirectory(
  rootDir: string,
  options: WalkOptions = {}
): AsyncGenerator<FileRecord, void, undefined> {
  const fileSystem = options.fileSystem ?? nodeFileSystem;
  const attributes = options.attributes ?? defaultAttributes();

  async function* walk(dir: string, isRoot: boolean): AsyncGenerator<FileRecord, void, undefined> {
    let entries: fs.Dirent[];
    try {
      entries = await fileSystem.readdir(attributes.normalizeLongPath(dir));
    } catch (err) {
      const message = errorMessage(err);
      if (isRoot) {
        throw new FatalScanError(`Cannot read root directory: ${message}`, dir);
      }
      options.onError?.({ path: dir, kind: "enumeration", cause: causeOf(err), reason: message });
      return;
    }

    entries.sort(byName);

    for (const entry of entries) {
      if (options.signal?.aborted) {
        return;
      }

      const fullPath = path.join(dir, entry.name);
      options.onEntry?.();

      if (entry.isSymbolicLink() || options.excludePaths?.has(fullPath)) {
        continue;
      }

      if (entry.isDirectory()) {
        yield* walk(fullPath, false);
        continue;
      }

      if (!entry.isFile()) {
        continue;
      }

      let stats: fs.Stats;
      try {
        stats = await fileSystem.stat(attributes.normalizeLongPath(fullPath));
      } catch (err) {
        options.onError?.({
          path: fullPath,
          kind: "enumeration",
          cause: causeOf(err),
          reason: errorMessage(err)
        });
        continue;
      }

      if (!stats.isFile()) {
        continue;
      }

      yield {
        path: fullPath,
        size: stats.size,
        mtimeMs: stats.mtimeMs,
        hidden: attributes.isHidden(fullPath),
        system: attributes.isSystem(fullPath)
      };
    }
  }

  yield* walk(rootDir, true);
}

/**
 * Accumulates files into buckets keyed by exact byte size.
 *
 * Bucket order follows the first file seen with each size, and files keep
 * their enumeration order inside a bucket. Only files of a size shared with
 * another file can be duplicates, so this is what keeps unique files from
 * ever being hashed.
 */
export class SizeGrouper {
  private readonly buckets = new Map<number, FileRecord[]>();
  private count = 0;
  private candidateTotal = 0;

  add(file: FileRecord): void {
    this.count++;
    const group = this.buckets.get(file.size);
    if (group) {
      group.push(file);
      // A second member turns the first one into a candidate too.
      this.candidateTotal += group.length === 2 ? 2 : 1;
    } else {
      this.buckets.set(file.size, [file]);
    }
  }

  get fileCount(): number {
    return this.count;
  }

  /** Number of files sitting in buckets with at least one other member. */
  get candidateCount(): number {
    return this.candidateTotal;
  }

  get sizeGroups(): ReadonlyMap<number, readonly FileRecord[]> {
    return this.buckets;
  }

  /** Buckets with two or more members, the only ones worth hashing. */
  candidates(): SizeBucket[] {
    const result: SizeBucket[] = [];
    for (const [size, files] of this.buckets) {
      if (files.length >= 2) {
        result.push({ size, files: [...files] });
      }
    }
    return result;
  }
}

/**
 * Groups files by size in one pass.
 *
 * @example
 * const groups = groupBySize(files);
 * for (const [size, members] of groups) {
 *   if (members.length > 1) {
 *     console.log(`${members.length} files of size ${size} bytes`);
 *   }
 * }
 */
export function groupBySize(files: Iterable<FileRecord>): ReadonlyMap<number, readonly FileRecord[]> {
  const grouper = new SizeGrouper();
  for (const file of files) {
    grouper.add(file);
  }
  return grouper.sizeGroups;
}

import os from "os";
import { FilterConfig, HashAlgorithm, KeepPolicy } from "./types";

export const OUTPUT_FILE_NAME = "duplicates.txt";
export const HASH_CONCURRENCY = Math.max(2, Math.min(8, os.cpus().length || 2));

/** Files are read in chunks of this many bytes while hashing. */
export const CHUNK_SIZE = 64 * 1024;

export const PROGRESS_INTERVAL_MS = 100;
export const ESTIMATOR_WINDOW = 10;

export const DEFAULT_ALGORITHM: HashAlgorithm = "md5";
export const DEFAULT_KEEP_POLICY: KeepPolicy = "oldest";

export const DEFAULT_FILTER_CONFIG: Readonly<FilterConfig> = Object.freeze({
  extensions: [],
  minSize: 0,
  maxSize: 0,
  excludePatterns: [],
  skipHidden: false,
  skipSystem: true
});

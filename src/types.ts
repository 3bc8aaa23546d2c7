/**
 * Hash algorithms the scanner can use, from fastest/weakest to slowest/strongest.
 */
export type HashAlgorithm = "md5" | "sha1" | "sha256";

/**
 * Which member of a duplicate group is kept: the one with the oldest or the
 * newest modification time.
 */
export type KeepPolicy = "oldest" | "newest";

/**
 * One regular file considered by a scan. Immutable once enumerated.
 */
export interface FileRecord {
  /** Absolute path, unique within a scan */
  readonly path: string;
  readonly size: number;
  /** Last modification time in milliseconds since the epoch */
  readonly mtimeMs: number;
  readonly hidden: boolean;
  readonly system: boolean;
}

/**
 * Files sharing one exact byte size, in enumeration order.
 */
export interface SizeBucket {
  readonly size: number;
  readonly files: readonly FileRecord[];
}

/**
 * Identity of a file's content: two files are duplicates iff their keys match.
 */
export interface DigestKey {
  readonly size: number;
  readonly algorithm: HashAlgorithm;
  readonly digest: string;
}

export interface DuplicateGroup {
  /** Monotonic within a scan, starting at 1 */
  readonly id: number;
  readonly key: DigestKey;
  /** Members in enumeration order, at least two */
  readonly files: readonly FileRecord[];
  /** Path of the member chosen by the keep policy */
  readonly keep: string;
}

export type ScanStatus = "completed" | "cancelled" | "failed";

export type ScanState = "idle" | "scanning" | ScanStatus;

export type ScanPhase = "enumerating" | "hashing" | "done";

export type ScanErrorKind = "enumeration" | "hashing";

/** Why a path could not be examined. */
export type ScanErrorCause = "access-denied" | "not-found" | "changed" | "io";

/**
 * A per-path failure recorded during a scan. These never abort the scan.
 */
export interface ScanErrorRecord {
  readonly path: string;
  readonly kind: ScanErrorKind;
  readonly cause: ScanErrorCause;
  /** Human-readable reason */
  readonly reason: string;
}

export interface FilterConfig {
  /** Allowed extensions (".txt", "txt" or "*.txt"), case-insensitive; empty allows all */
  extensions: string[];
  /** Inclusive lower bound in bytes */
  minSize: number;
  /** Inclusive upper bound in bytes, 0 for no bound */
  maxSize: number;
  /** Shell-style patterns matched against file name and full path */
  excludePatterns: string[];
  skipHidden: boolean;
  skipSystem: boolean;
}

export interface ScanRequest {
  root: string;
  filter?: Partial<FilterConfig>;
  algorithm?: HashAlgorithm;
  keep?: KeepPolicy;
  /** Confirm digest matches with a full byte comparison */
  verify?: boolean;
  /** Absolute paths never examined (e.g. the report being written) */
  excludePaths?: string[];
  signal?: AbortSignal;
}

/**
 * Point-in-time view of a running scan. A new object is published on every
 * change, so a reader never sees a half-updated snapshot.
 */
export interface ScanProgress {
  readonly phase: ScanPhase;
  /** Directory entries looked at during enumeration */
  readonly entriesExamined: number;
  /** Files accepted by the filter */
  readonly filesFound: number;
  /** Files hashed (successfully or not) */
  readonly filesProcessed: number;
  /** Files expected to be hashed; grows during enumeration */
  readonly estimatedTotal: number;
  readonly bytesHashed: number;
  /** 0.0 to 1.0, never decreases within a scan */
  readonly fraction: number;
  readonly secondsRemaining: number;
  readonly errorCount: number;
}

export interface ScanResult {
  readonly root: string;
  readonly status: ScanStatus;
  readonly algorithm: HashAlgorithm;
  readonly keep: KeepPolicy;
  readonly groups: readonly DuplicateGroup[];
  /** Files accepted by the filter */
  readonly filesExamined: number;
  readonly bytesHashed: number;
  readonly errorCount: number;
  readonly errors: readonly ScanErrorRecord[];
  /** Set when status is "failed" */
  readonly failure?: string;
  readonly elapsedMs: number;
}

/**
 * Statistics derived from a scan result.
 */
export interface ScanStats {
  /** Total number of files accepted during enumeration */
  filesScanned: number;
  /** Number of duplicate groups found */
  duplicateGroups: number;
  /** Total number of files across all groups */
  duplicateFiles: number;
  /** Bytes freed by removing every member except the kept one */
  reclaimableBytes: number;
  /** Number of paths that could not be examined */
  errors: number;
}

/**
 * Result of mapping items with concurrency, including both successes and errors.
 */
export interface MappedResult<T, R> {
  /** Array of results (null for failed or skipped items) */
  results: (R | null)[];
  /** Array of errors that occurred during mapping */
  errors: Array<{
    /** Index of the item that failed */
    index: number;
    /** The item that failed */
    item: T;
    /** The error that occurred */
    error: Error;
  }>;
  /** True when the signal aborted before every item was started */
  aborted: boolean;
}

import fs from "fs";
import path from "path";
import {
  DEFAULT_ALGORITHM,
  DEFAULT_KEEP_POLICY,
  ESTIMATOR_WINDOW,
  HASH_CONCURRENCY,
  PROGRESS_INTERVAL_MS
} from "./config";
import { ConfigurationError, errorMessage, FatalScanError, ScanBusyError } from "./errors";
import { createFileFilter, resolveFilterConfig } from "./filter";
import { FileHasher, HASH_ALGORITHMS } from "./hash";
import { defaultAttributes, FileAttributes } from "./platform";
import { Clock, ProgressEstimator } from "./progress";
import { resolveBucket } from "./resolve";
import { FileSystemAccess, SizeGrouper, walkDirectory } from "./scan";
import {
  DuplicateGroup,
  FilterConfig,
  HashAlgorithm,
  KeepPolicy,
  ScanErrorRecord,
  ScanPhase,
  ScanProgress,
  ScanRequest,
  ScanResult,
  ScanState,
  ScanStatus,
  SizeBucket
} from "./types";

const fsp = fs.promises;

export interface ScanHooks {
  onPhase?: (phase: ScanPhase, progress: ScanProgress) => void;
  /** Batched; at most one call per progress interval plus one per phase change */
  onProgress?: (progress: ScanProgress) => void;
  onError?: (record: ScanErrorRecord) => void;
  /** Called after every size bucket that was fully resolved, with its new groups */
  onBucketResolved?: (bucket: SizeBucket, groups: readonly DuplicateGroup[]) => void;
}

export interface ScanControllerOptions {
  fileSystem?: FileSystemAccess;
  attributes?: FileAttributes;
  hasher?: FileHasher;
  concurrency?: number;
  progressIntervalMs?: number;
  estimatorWindow?: number;
  clock?: Clock;
}

/** A scan request after validation, with every default filled in. */
export interface ValidatedRequest {
  root: string;
  filter: FilterConfig;
  algorithm: HashAlgorithm;
  keep: KeepPolicy;
  verify: boolean;
  excludePaths: ReadonlySet<string>;
}

const IDLE_PROGRESS: ScanProgress = Object.freeze({
  phase: "done",
  entriesExamined: 0,
  filesFound: 0,
  filesProcessed: 0,
  estimatedTotal: 0,
  bytesHashed: 0,
  fraction: 0,
  secondsRemaining: 0,
  errorCount: 0
});

/**
 * Checks a scan request and fills in defaults.
 *
 * @throws ConfigurationError when the root is missing, is a symbolic link or
 *   not a directory, or when the filter, algorithm or keep policy is invalid
 */
export async function validateScanRequest(request: ScanRequest): Promise<ValidatedRequest> {
  if (!request.root) {
    throw new ConfigurationError("A root directory is required.");
  }

  const root = path.resolve(request.root);
  let stats: fs.Stats;
  try {
    stats = await fsp.lstat(root);
  } catch (err) {
    throw new ConfigurationError(`Cannot access directory: ${errorMessage(err)}`);
  }

  if (stats.isSymbolicLink()) {
    throw new ConfigurationError("Refusing to follow a symbolic link as the root directory.");
  }
  if (!stats.isDirectory()) {
    throw new ConfigurationError(`Provided path is not a directory: ${root}`);
  }

  const algorithm = request.algorithm ?? DEFAULT_ALGORITHM;
  if (!HASH_ALGORITHMS.includes(algorithm)) {
    throw new ConfigurationError(`Unknown hash algorithm "${algorithm}".`);
  }

  const keep = request.keep ?? DEFAULT_KEEP_POLICY;
  if (keep !== "oldest" && keep !== "newest") {
    throw new ConfigurationError(`Unknown keep policy "${keep}".`);
  }

  return {
    root,
    filter: resolveFilterConfig(request.filter),
    algorithm,
    keep,
    verify: request.verify ?? false,
    excludePaths: new Set((request.excludePaths ?? []).map((p) => path.resolve(p)))
  };
}

/**
 * Runs one duplicate scan at a time and exposes its progress while it runs.
 *
 * States: idle → scanning → completed | cancelled | failed. A terminal
 * controller accepts a new scan directly, or can be returned to idle with
 * {@link clear}. Progress snapshots are replaced wholesale, never mutated.
 *
 * @example
 * const controller = new ScanController();
 * const pending = controller.scan({ root: '/photos', algorithm: 'sha1' });
 * const timer = setInterval(() => console.log(controller.progress.fraction), 500);
 * const result = await pending;
 * clearInterval(timer);
 */
export class ScanController {
  private currentState: ScanState = "idle";
  private busy = false;
  private snapshot: ScanProgress = IDLE_PROGRESS;
  private errorLog: ScanErrorRecord[] = [];
  private lastResult: ScanResult | null = null;
  private abortController: AbortController | null = null;
  private lastEmit = 0;

  private readonly attributes: FileAttributes;
  private readonly clock: Clock;

  constructor(private readonly options: ScanControllerOptions = {}) {
    this.attributes = options.attributes ?? defaultAttributes();
    this.clock = options.clock ?? Date.now;
  }

  get state(): ScanState {
    return this.currentState;
  }

  get progress(): ScanProgress {
    return this.snapshot;
  }

  get errors(): readonly ScanErrorRecord[] {
    return [...this.errorLog];
  }

  get result(): ScanResult | null {
    return this.lastResult;
  }

  /**
   * Requests cancellation of the running scan. Takes effect at the next file
   * boundary. Returns false when nothing is running.
   */
  cancel(): boolean {
    if (!this.abortController || this.abortController.signal.aborted) {
      return false;
    }
    this.abortController.abort();
    return true;
  }

  /** Drops the last result and returns a finished controller to idle. */
  clear(): void {
    if (this.busy) {
      throw new ScanBusyError();
    }
    this.currentState = "idle";
    this.snapshot = IDLE_PROGRESS;
    this.errorLog = [];
    this.lastResult = null;
  }

  /**
   * Scans `request.root` for duplicate files.
   *
   * Per-file problems are collected in the result, never thrown.
   *
   * @throws ScanBusyError when another scan is running on this controller
   * @throws ConfigurationError when the request is invalid; the state is left unchanged
   */
  async scan(request: ScanRequest, hooks: ScanHooks = {}): Promise<ScanResult> {
    if (this.busy) {
      throw new ScanBusyError();
    }
    this.busy = true;

    // Cancellation is accepted from here on, even while the request is validated.
    const abort = new AbortController();
    const external = request.signal;
    const forward = () => abort.abort();
    if (external?.aborted) {
      abort.abort();
    } else {
      external?.addEventListener("abort", forward, { once: true });
    }
    this.abortController = abort;

    try {
      const validated = await validateScanRequest(request);
      return await this.run(validated, abort.signal, hooks);
    } finally {
      external?.removeEventListener("abort", forward);
      this.busy = false;
      this.abortController = null;
    }
  }

  private async run(request: ValidatedRequest, signal: AbortSignal, hooks: ScanHooks): Promise<ScanResult> {
    const startedAt = this.clock();
    this.currentState = "scanning";
    this.lastResult = null;
    this.errorLog = [];
    this.lastEmit = 0;
    this.snapshot = Object.freeze({ ...IDLE_PROGRESS, phase: "enumerating" });

    const estimator = new ProgressEstimator(
      this.options.estimatorWindow ?? ESTIMATOR_WINDOW,
      this.clock
    );
    const groups: DuplicateGroup[] = [];
    let failure: string | undefined;

    const recordError = (record: ScanErrorRecord) => {
      this.errorLog.push(record);
      this.publish({ errorCount: this.errorLog.length }, hooks);
      hooks.onError?.(record);
    };

    try {
      this.enterPhase("enumerating", {}, hooks);

      const grouper = new SizeGrouper();
      const accept = createFileFilter(request.filter, this.attributes);
      let entriesExamined = 0;

      const files = walkDirectory(request.root, {
        fileSystem: this.options.fileSystem,
        attributes: this.attributes,
        signal,
        excludePaths: request.excludePaths,
        onEntry: () => {
          entriesExamined++;
        },
        onError: recordError
      });

      for await (const file of files) {
        if (accept(file)) {
          grouper.add(file);
        }
        this.publish(
          { entriesExamined, filesFound: grouper.fileCount, estimatedTotal: grouper.candidateCount },
          hooks
        );
        if (signal.aborted) {
          break;
        }
      }

      if (!signal.aborted) {
        const buckets = grouper.candidates();
        const total = grouper.candidateCount;
        let processed = 0;
        let bytesHashed = 0;

        estimator.start();
        this.enterPhase("hashing", { entriesExamined, estimatedTotal: total }, hooks);

        for (const bucket of buckets) {
          if (signal.aborted) {
            break;
          }

          const resolution = await resolveBucket(bucket, {
            algorithm: request.algorithm,
            keep: request.keep,
            verify: request.verify,
            hasher: this.options.hasher,
            concurrency: this.options.concurrency ?? HASH_CONCURRENCY,
            signal,
            ioPath: (filePath) => this.attributes.normalizeLongPath(filePath),
            onFileHashed: (_file, outcome) => {
              processed++;
              if (outcome.ok) {
                bytesHashed += outcome.bytes;
              }
              estimator.observe(processed, total);
              this.publish(
                {
                  filesProcessed: processed,
                  bytesHashed,
                  fraction: estimator.fraction,
                  secondsRemaining: estimator.secondsRemaining
                },
                hooks
              );
            },
            onError: recordError
          });

          if (resolution.aborted) {
            break;
          }

          const added: DuplicateGroup[] = [];
          for (const group of resolution.groups) {
            const numbered: DuplicateGroup = Object.freeze({
              id: groups.length + 1,
              key: Object.freeze({ ...group.key }),
              files: Object.freeze([...group.files]),
              keep: group.keep
            });
            groups.push(numbered);
            added.push(numbered);
          }
          hooks.onBucketResolved?.(bucket, added);
        }
      }
    } catch (err) {
      if (!(err instanceof FatalScanError)) {
        this.currentState = "failed";
        throw err;
      }
      failure = err.message;
    }

    const status: ScanStatus = failure ? "failed" : signal.aborted ? "cancelled" : "completed";
    if (status === "completed") {
      estimator.complete();
    }
    this.enterPhase(
      "done",
      { fraction: estimator.fraction, secondsRemaining: 0, errorCount: this.errorLog.length },
      hooks
    );

    const result: ScanResult = Object.freeze({
      root: request.root,
      status,
      algorithm: request.algorithm,
      keep: request.keep,
      groups: Object.freeze([...groups]),
      filesExamined: this.snapshot.filesFound,
      bytesHashed: this.snapshot.bytesHashed,
      errorCount: this.errorLog.length,
      errors: Object.freeze([...this.errorLog]),
      ...(failure !== undefined ? { failure } : {}),
      elapsedMs: this.clock() - startedAt
    });

    this.lastResult = result;
    this.currentState = status;
    return result;
  }

  private enterPhase(phase: ScanPhase, patch: Partial<ScanProgress>, hooks: ScanHooks): void {
    this.snapshot = Object.freeze({ ...this.snapshot, ...patch, phase });
    hooks.onPhase?.(phase, this.snapshot);
    this.lastEmit = this.clock();
    hooks.onProgress?.(this.snapshot);
  }

  private publish(patch: Partial<ScanProgress>, hooks: ScanHooks): void {
    this.snapshot = Object.freeze({ ...this.snapshot, ...patch });

    const interval = this.options.progressIntervalMs ?? PROGRESS_INTERVAL_MS;
    const now = this.clock();
    if (now - this.lastEmit >= interval) {
      this.lastEmit = now;
      hooks.onProgress?.(this.snapshot);
    }
  }
}

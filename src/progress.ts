import { ESTIMATOR_WINDOW, PROGRESS_INTERVAL_MS } from "./config";
import { formatDuration } from "./report";
import { ScanPhase, ScanProgress, ScanResult } from "./types";

export type Clock = () => number;

/**
 * Estimates time remaining from a moving average of the processing rate.
 *
 * Each observation contributes one rate sample (items per second since
 * `start()`); the estimate uses the mean of the last `windowSize` samples so
 * one slow file does not swing the figure.
 */
export class ProgressEstimator {
  private readonly samples: number[] = [];
  private startedAt: number | null = null;
  private done = 0;
  private total = 0;
  private currentFraction = 0;

  constructor(
    private readonly windowSize: number = ESTIMATOR_WINDOW,
    private readonly clock: Clock = Date.now
  ) {
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new RangeError(`Window size must be a positive integer, got ${windowSize}.`);
    }
  }

  start(): void {
    this.reset();
    this.startedAt = this.clock();
  }

  reset(): void {
    this.samples.length = 0;
    this.startedAt = null;
    this.done = 0;
    this.total = 0;
    this.currentFraction = 0;
  }

  observe(done: number, total: number): void {
    if (this.startedAt === null) {
      return;
    }

    this.done = done;
    this.total = total;
    if (total > 0) {
      this.currentFraction = Math.max(this.currentFraction, Math.min(1, done / total));
    }

    const elapsedSeconds = (this.clock() - this.startedAt) / 1000;
    if (done > 0 && elapsedSeconds > 0) {
      this.samples.push(done / elapsedSeconds);
      if (this.samples.length > this.windowSize) {
        this.samples.shift();
      }
    }
  }

  /** Marks all work finished. */
  complete(): void {
    this.currentFraction = 1;
    this.done = this.total;
  }

  /** Fraction complete, 0.0 to 1.0; never decreases until `reset()`. */
  get fraction(): number {
    return this.currentFraction;
  }

  /** Zero when nothing remains or no rate has been measured yet. */
  get secondsRemaining(): number {
    const remaining = this.total - this.done;
    if (remaining <= 0 || this.currentFraction >= 1 || this.samples.length === 0) {
      return 0;
    }

    const rate = this.samples.reduce((sum, sample) => sum + sample, 0) / this.samples.length;
    if (rate <= 0) {
      return 0;
    }
    return Math.max(0, remaining / rate);
  }
}

/**
 * Interface for progress reporting during duplicate file scanning.
 */
export interface ProgressReporter {
  /** Called when the scan enters a new phase */
  phase(phase: ScanPhase, progress: ScanProgress): void;

  /** Called with each batched progress snapshot */
  update(progress: ScanProgress): void;

  /** Called once the scan has a result */
  finish(result: ScanResult): void;
}

/**
 * Progress reporter that outputs to stderr with throttled updates.
 * Updates are throttled to avoid excessive I/O during fast operations.
 */
class StderrProgressReporter implements ProgressReporter {
  private lastUpdate = 0;

  constructor(
    private readonly stream: NodeJS.WritableStream,
    private readonly intervalMs: number
  ) {}

  phase(phase: ScanPhase, progress: ScanProgress): void {
    switch (phase) {
      case "enumerating":
        this.stream.write("Phase 1: Collecting files...\n");
        break;
      case "hashing":
        this.stream.write(`\rFiles found: ${progress.filesFound}\n`);
        this.stream.write(`Phase 2: Comparing ${progress.estimatedTotal} candidate files...\n`);
        break;
      case "done":
        this.stream.write("\r" + " ".repeat(70) + "\r");
        break;
    }
  }

  update(progress: ScanProgress): void {
    const now = Date.now();
    if (now - this.lastUpdate < this.intervalMs) return;
    this.lastUpdate = now;

    if (progress.phase === "enumerating") {
      this.stream.write(`\rFiles found: ${progress.filesFound}`);
      return;
    }

    const percent = (progress.fraction * 100).toFixed(1);
    const eta = formatDuration(progress.secondsRemaining);
    const display = `\rHashing: ${progress.filesProcessed}/${progress.estimatedTotal} (${percent}%) ETA ${eta}`;

    // Pad with spaces to clear previous line
    this.stream.write(display + " ".repeat(20));
  }

  finish(result: ScanResult): void {
    this.stream.write(`Scan ${result.status} in ${formatDuration(result.elapsedMs / 1000)}.\n`);
  }
}

/**
 * No-op progress reporter that produces no output.
 * Used when progress reporting is disabled (e.g., when piping stdout).
 */
class NoOpProgressReporter implements ProgressReporter {
  phase(_phase: ScanPhase, _progress: ScanProgress): void {}
  update(_progress: ScanProgress): void {}
  finish(_result: ScanResult): void {}
}

/**
 * Creates a progress reporter based on whether progress should be enabled.
 *
 * @param enabled - Whether to enable progress reporting
 * @param stream - Where progress lines go, stderr by default
 */
export function createProgressReporter(
  enabled: boolean,
  stream: NodeJS.WritableStream = process.stderr,
  intervalMs = PROGRESS_INTERVAL_MS
): ProgressReporter {
  return enabled ? new StderrProgressReporter(stream, intervalMs) : new NoOpProgressReporter();
}

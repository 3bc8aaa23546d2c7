import { DuplicateGroup, FileRecord, ScanResult, ScanStats } from "./types";

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"];

/**
 * Formats a byte count with binary units, e.g. `1536` → `"1.50 KB"`.
 */
export function formatSize(bytes: number): string {
  let value = bytes;
  for (const unit of SIZE_UNITS) {
    if (Math.abs(value) < 1024) {
      return unit === "B" ? `${value} B` : `${value.toFixed(2)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(2)} PB`;
}

/**
 * Formats seconds as `"42s"`, `"3m 5s"` or `"2h 10m"`.
 */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  if (total < 60) {
    return `${total}s`;
  }
  if (total < 3600) {
    return `${Math.floor(total / 60)}m ${total % 60}s`;
  }
  return `${Math.floor(total / 3600)}h ${Math.floor((total % 3600) / 60)}m`;
}

/**
 * Computes summary statistics for a scan result.
 */
export function summarize(result: ScanResult): ScanStats {
  let duplicateFiles = 0;
  let reclaimableBytes = 0;

  for (const group of result.groups) {
    duplicateFiles += group.files.length;
    reclaimableBytes += group.key.size * (group.files.length - 1);
  }

  return {
    filesScanned: result.filesExamined,
    duplicateGroups: result.groups.length,
    duplicateFiles,
    reclaimableBytes,
    errors: result.errorCount
  };
}

/**
 * Lists every group member except the one kept, in group order. This is the
 * selection handed to whatever performs deletion.
 */
export function disposableFiles(result: ScanResult): FileRecord[] {
  const files: FileRecord[] = [];
  for (const group of result.groups) {
    for (const file of group.files) {
      if (file.path !== group.keep) {
        files.push(file);
      }
    }
  }
  return files;
}

function formatGroup(group: DuplicateGroup): string {
  let text = `Group ${group.id}: ${group.files.length} files, ${formatSize(group.key.size)} each, ` +
    `${group.key.algorithm} ${group.key.digest}\n`;
  for (const file of group.files) {
    text += file.path === group.keep ? `[keep] ${file.path}\n` : `- ${file.path}\n`;
  }
  return text;
}

/**
 * Renders the duplicate groups of a scan as plain text, one block per group
 * separated by blank lines. Returns an empty string when there are no groups.
 *
 * @example
 * Group 1: 2 files, 5 B each, md5 5d41402abc4b2a76b9719d911017c592
 * [keep] /data/a.txt
 * - /data/b.txt
 */
export function formatReport(result: ScanResult): string {
  return result.groups.map((group) => formatGroup(group) + "\n").join("");
}

/**
 * Renders the summary block printed after a scan.
 */
export function formatSummary(result: ScanResult): string {
  const stats = summarize(result);
  const lines = [
    `Status: ${result.status}`,
    `Files examined: ${stats.filesScanned}`,
    `Bytes hashed: ${formatSize(result.bytesHashed)}`,
    `Duplicate groups: ${stats.duplicateGroups} (${stats.duplicateFiles} files)`,
    `Reclaimable: ${formatSize(stats.reclaimableBytes)}`,
    `Errors: ${stats.errors}`
  ];
  if (result.failure) {
    lines.push(`Failure: ${result.failure}`);
  }
  return lines.join("\n") + "\n";
}

/**
 * Serializes a scan result for machine consumption.
 */
export function toJson(result: ScanResult): string {
  return JSON.stringify({ ...result, stats: summarize(result) }, null, 2) + "\n";
}

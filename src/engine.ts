export * from "./types";
export * from "./errors";
export { DEFAULT_FILTER_CONFIG, CHUNK_SIZE } from "./config";
export { createFileFilter, resolveFilterConfig, globToRegExp, normalizeExtension } from "./filter";
export type { FileFilter } from "./filter";
export { defaultAttributes, posixAttributes, win32Attributes } from "./platform";
export type { FileAttributes } from "./platform";
export { walkDirectory, groupBySize, SizeGrouper, nodeFileSystem } from "./scan";
export type { FileSystemAccess, WalkOptions } from "./scan";
export { hashFile, filesEqual, parseHashAlgorithm, HASH_ALGORITHMS } from "./hash";
export type { FileHasher, HashOutcome, HashFailure } from "./hash";
export { resolveBucket, selectKeep, digestKeyString } from "./resolve";
export type { ResolvedGroup, ResolveOptions } from "./resolve";
export { ProgressEstimator } from "./progress";
export { ScanController, validateScanRequest } from "./controller";
export type { ScanHooks, ScanControllerOptions, ValidatedRequest } from "./controller";
export { formatReport, formatSummary, summarize, disposableFiles, toJson } from "./report";

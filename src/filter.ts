import path from "path";
import { DEFAULT_FILTER_CONFIG } from "./config";
import { ConfigurationError } from "./errors";
import { FileAttributes } from "./platform";
import { FileRecord, FilterConfig } from "./types";

export type FileFilter = (file: FileRecord) => boolean;

/**
 * Normalizes an extension entry to the ".ext" form used for comparison.
 * Accepts "txt", ".txt" and "*.txt".
 */
export function normalizeExtension(ext: string): string {
  const trimmed = ext.trim().toLowerCase().replace(/^\*/, "");
  if (!trimmed) {
    return "";
  }
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

function isByteCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Merges a partial filter configuration over the defaults and validates it.
 *
 * @throws ConfigurationError when a size bound is not a non-negative integer,
 *   or when minSize exceeds a non-zero maxSize
 */
export function resolveFilterConfig(partial: Partial<FilterConfig> = {}): FilterConfig {
  const config: FilterConfig = {
    extensions: (partial.extensions ?? DEFAULT_FILTER_CONFIG.extensions)
      .map(normalizeExtension)
      .filter((ext) => ext.length > 0),
    minSize: partial.minSize ?? DEFAULT_FILTER_CONFIG.minSize,
    maxSize: partial.maxSize ?? DEFAULT_FILTER_CONFIG.maxSize,
    excludePatterns: (partial.excludePatterns ?? DEFAULT_FILTER_CONFIG.excludePatterns).filter(
      (pattern) => pattern.length > 0
    ),
    skipHidden: partial.skipHidden ?? DEFAULT_FILTER_CONFIG.skipHidden,
    skipSystem: partial.skipSystem ?? DEFAULT_FILTER_CONFIG.skipSystem
  };

  if (!isByteCount(config.minSize)) {
    throw new ConfigurationError(`Minimum size must be a non-negative integer, got ${config.minSize}.`);
  }
  if (!isByteCount(config.maxSize)) {
    throw new ConfigurationError(`Maximum size must be a non-negative integer, got ${config.maxSize}.`);
  }
  if (config.maxSize !== 0 && config.minSize > config.maxSize) {
    throw new ConfigurationError(
      `Minimum size (${config.minSize}) is greater than maximum size (${config.maxSize}).`
    );
  }

  return config;
}

/**
 * Translates a shell-style pattern into an anchored, case-insensitive RegExp.
 *
 * Supports `*` (any run of characters, including separators), `?` (one
 * character), `[abc]`, `[a-z]` and the negated `[!abc]`. An unterminated `[`
 * matches itself.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = "";
  let i = 0;

  while (i < pattern.length) {
    const char = pattern[i];
    i++;

    if (char === "*") {
      source += ".*";
    } else if (char === "?") {
      source += ".";
    } else if (char === "[") {
      let j = i;
      if (pattern[j] === "!") j++;
      if (pattern[j] === "]") j++;
      while (j < pattern.length && pattern[j] !== "]") j++;

      if (j >= pattern.length) {
        source += "\\[";
        continue;
      }

      let body = pattern.slice(i, j).replace(/\\/g, "\\\\");
      i = j + 1;
      if (body.startsWith("!")) {
        body = `^${body.slice(1)}`;
      } else if (body.startsWith("^")) {
        body = `\\${body}`;
      }
      source += `[${body.replace(/]/g, "\\]")}]`;
    } else {
      source += char.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
    }
  }

  return new RegExp(`^${source}$`, "is");
}

/**
 * Builds the per-file eligibility predicate. Rejections are silent; callers
 * count them if they care.
 */
export function createFileFilter(config: FilterConfig, attributes: FileAttributes): FileFilter {
  const extensions = new Set(config.extensions.map(normalizeExtension));
  const patterns = config.excludePatterns.map(globToRegExp);

  return (file) => {
    if (config.skipHidden && (file.hidden || attributes.isHidden(file.path))) {
      return false;
    }

    if (config.skipSystem && (file.system || attributes.isSystem(file.path))) {
      return false;
    }

    if (patterns.length > 0) {
      const name = path.basename(file.path);
      if (patterns.some((re) => re.test(name) || re.test(file.path))) {
        return false;
      }
    }

    if (extensions.size > 0 && !extensions.has(path.extname(file.path).toLowerCase())) {
      return false;
    }

    if (file.size < config.minSize) {
      return false;
    }

    return config.maxSize === 0 || file.size <= config.maxSize;
  };
}

import path from "path";

/**
 * Platform capabilities the filter and enumerator rely on. Node.js exposes no
 * hidden/system attribute bits, so each platform decides from the path.
 */
export interface FileAttributes {
  isHidden(filePath: string): boolean;
  isSystem(filePath: string): boolean;
  normalizeLongPath(filePath: string): string;
}

const WINDOWS_MAX_PATH = 260;

const WINDOWS_SYSTEM_FILES = new Set([
  "desktop.ini",
  "thumbs.db",
  "ehthumbs.db",
  "pagefile.sys",
  "hiberfil.sys",
  "swapfile.sys",
  "ntuser.dat"
]);

export const posixAttributes: FileAttributes = {
  isHidden: (filePath) => path.posix.basename(filePath).startsWith("."),
  isSystem: () => false,
  normalizeLongPath: (filePath) => filePath
};

export const win32Attributes: FileAttributes = {
  isHidden: (filePath) => path.win32.basename(filePath).startsWith("."),
  isSystem: (filePath) => WINDOWS_SYSTEM_FILES.has(path.win32.basename(filePath).toLowerCase()),
  normalizeLongPath(filePath) {
    if (filePath.length < WINDOWS_MAX_PATH || filePath.startsWith("\\\\?\\")) {
      return filePath;
    }
    const resolved = path.win32.resolve(filePath);
    if (resolved.startsWith("\\\\")) {
      // \\server\share\... becomes \\?\UNC\server\share\...
      return `\\\\?\\UNC\\${resolved.slice(2)}`;
    }
    return `\\\\?\\${resolved}`;
  }
};

export function defaultAttributes(platform: NodeJS.Platform = process.platform): FileAttributes {
  return platform === "win32" ? win32Attributes : posixAttributes;
}

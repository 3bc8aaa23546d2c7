import { describe, it, expect } from 'vitest';
import {
  createFileFilter,
  globToRegExp,
  normalizeExtension,
  resolveFilterConfig
} from '../src/filter';
import { ConfigurationError } from '../src/errors';
import { FileAttributes, posixAttributes, win32Attributes } from '../src/platform';
import { FileRecord, FilterConfig } from '../src/types';

function file(filePath: string, size = 10, extra: Partial<FileRecord> = {}): FileRecord {
  return { path: filePath, size, mtimeMs: 0, hidden: false, system: false, ...extra };
}

function filterFor(partial: Partial<FilterConfig>, attributes: FileAttributes = posixAttributes) {
  return createFileFilter(resolveFilterConfig(partial), attributes);
}

describe('resolveFilterConfig', () => {
  it('should fill in defaults', () => {
    expect(resolveFilterConfig()).toEqual({
      extensions: [],
      minSize: 0,
      maxSize: 0,
      excludePatterns: [],
      skipHidden: false,
      skipSystem: true
    });
  });

  it('should normalize extensions', () => {
    const config = resolveFilterConfig({ extensions: ['TXT', '.Jpg', '*.png', ''] });
    expect(config.extensions).toEqual(['.txt', '.jpg', '.png']);
  });

  it('should reject a minimum size above a non-zero maximum', () => {
    expect(() => resolveFilterConfig({ minSize: 2048, maxSize: 1024 })).toThrow(ConfigurationError);
  });

  it('should allow any minimum size when maximum is unbounded', () => {
    expect(resolveFilterConfig({ minSize: 2048, maxSize: 0 }).minSize).toBe(2048);
  });

  it('should reject negative or fractional bounds', () => {
    expect(() => resolveFilterConfig({ minSize: -1 })).toThrow(ConfigurationError);
    expect(() => resolveFilterConfig({ maxSize: 1.5 })).toThrow(ConfigurationError);
  });
});

describe('normalizeExtension', () => {
  it('should produce the dotted lower-case form', () => {
    expect(normalizeExtension('MP3')).toBe('.mp3');
    expect(normalizeExtension('*.Tar')).toBe('.tar');
    expect(normalizeExtension(' .gz ')).toBe('.gz');
    expect(normalizeExtension('*')).toBe('');
  });
});

describe('globToRegExp', () => {
  it('should match star and question mark', () => {
    expect(globToRegExp('*.tmp').test('cache.tmp')).toBe(true);
    expect(globToRegExp('*.tmp').test('cache.tmp.bak')).toBe(false);
    expect(globToRegExp('file?.txt').test('file1.txt')).toBe(true);
    expect(globToRegExp('file?.txt').test('file10.txt')).toBe(false);
  });

  it('should match case-insensitively', () => {
    expect(globToRegExp('THUMBS.DB').test('thumbs.db')).toBe(true);
  });

  it('should support character classes and negation', () => {
    expect(globToRegExp('img[0-9].png').test('img7.png')).toBe(true);
    expect(globToRegExp('img[0-9].png').test('imgx.png')).toBe(false);
    expect(globToRegExp('img[!0-9].png').test('imgx.png')).toBe(true);
    expect(globToRegExp('img[!0-9].png').test('img7.png')).toBe(false);
  });

  it('should treat regex metacharacters literally', () => {
    expect(globToRegExp('a+b(1).txt').test('a+b(1).txt')).toBe(true);
    expect(globToRegExp('a.b').test('axb')).toBe(false);
  });

  it('should match an unterminated bracket literally', () => {
    expect(globToRegExp('[abc').test('[abc')).toBe(true);
  });

  it('should let star cross directory separators', () => {
    expect(globToRegExp('/data/*/cache/*').test('/data/x/y/cache/file')).toBe(true);
  });
});

describe('createFileFilter', () => {
  it('should accept everything with the defaults', () => {
    const accept = filterFor({});
    expect(accept(file('/r/a.txt'))).toBe(true);
    expect(accept(file('/r/.profile'))).toBe(true);
    expect(accept(file('/r/empty', 0))).toBe(true);
  });

  it('should filter by extension case-insensitively', () => {
    const accept = filterFor({ extensions: ['.txt', 'jpg'] });
    expect(accept(file('/r/a.TXT'))).toBe(true);
    expect(accept(file('/r/b.Jpg'))).toBe(true);
    expect(accept(file('/r/c.png'))).toBe(false);
    expect(accept(file('/r/no-extension'))).toBe(false);
  });

  it('should apply inclusive size bounds', () => {
    const accept = filterFor({ minSize: 1024, maxSize: 4096 });
    expect(accept(file('/r/a', 1023))).toBe(false);
    expect(accept(file('/r/a', 1024))).toBe(true);
    expect(accept(file('/r/a', 4096))).toBe(true);
    expect(accept(file('/r/a', 4097))).toBe(false);
  });

  it('should treat a zero maximum as unbounded', () => {
    const accept = filterFor({ minSize: 1, maxSize: 0 });
    expect(accept(file('/r/a', 0))).toBe(false);
    expect(accept(file('/r/a', Number.MAX_SAFE_INTEGER))).toBe(true);
  });

  it('should reject when any exclusion pattern matches the name or the path', () => {
    const accept = filterFor({ excludePatterns: ['*.tmp', '*/node_modules/*'] });
    expect(accept(file('/r/build.TMP'))).toBe(false);
    expect(accept(file('/r/node_modules/pkg/index.js'))).toBe(false);
    expect(accept(file('/r/src/index.js'))).toBe(true);
  });

  it('should skip hidden files only when asked', () => {
    expect(filterFor({ skipHidden: true })(file('/r/.env'))).toBe(false);
    expect(filterFor({ skipHidden: true })(file('/r/visible', 10, { hidden: true }))).toBe(false);
    expect(filterFor({ skipHidden: false })(file('/r/.env'))).toBe(true);
  });

  it('should skip system files by default on Windows', () => {
    const accept = filterFor({}, win32Attributes);
    expect(accept(file('C:\\photos\\Thumbs.db'))).toBe(false);
    expect(accept(file('C:\\photos\\beach.jpg'))).toBe(true);
    expect(filterFor({ skipSystem: false }, win32Attributes)(file('C:\\photos\\desktop.ini'))).toBe(true);
  });
});

describe('platform attributes', () => {
  it('should leave short Windows paths alone', () => {
    expect(win32Attributes.normalizeLongPath('C:\\data\\a.txt')).toBe('C:\\data\\a.txt');
  });

  it('should prefix long Windows paths', () => {
    const long = 'C:\\' + 'd'.repeat(300) + '\\a.txt';
    expect(win32Attributes.normalizeLongPath(long)).toBe('\\\\?\\' + long);
  });

  it('should use the UNC form for long share paths', () => {
    const long = '\\\\server\\share\\' + 'd'.repeat(300);
    expect(win32Attributes.normalizeLongPath(long)).toBe('\\\\?\\UNC\\server\\share\\' + 'd'.repeat(300));
  });

  it('should treat dot files as hidden on POSIX', () => {
    expect(posixAttributes.isHidden('/home/u/.bashrc')).toBe(true);
    expect(posixAttributes.isHidden('/home/.u/file')).toBe(false);
    expect(posixAttributes.isSystem('/etc/passwd')).toBe(false);
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmodSync, mkdirSync, writeFileSync, rmSync, symlinkSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { createDiscoveryConfig, parseList } from '../../../src/discovery/config.js';
import { discover, matchesExtension, validateRoot } from '../../../src/discovery/discover.js';
import { formatFileMap } from '../../../src/discovery/file-map.js';
import { IgnoreSet } from '../../../src/ignore/ignore-set.js';
import { DiscoveryError } from '../../../src/lib/errors.js';

let counter = 0;

function createFixture(name: string): string {
  const root = join(tmpdir(), `ctxpick-discover-${name}-${Date.now()}-${counter++}`);
  mkdirSync(root, { recursive: true });
  return root;
}

function write(root: string, relPath: string, content: string = ''): string {
  const full = join(root, relPath);
  mkdirSync(join(full, '..'), { recursive: true });
  writeFileSync(full, content);
  return full;
}

function sorted(paths: string[]): string[] {
  return [...paths].sort();
}

// ─── Config ─────────────────────────────────────────────────────────────────

describe('createDiscoveryConfig', () => {
  it('fills in defaults', () => {
    const config = createDiscoveryConfig();
    expect(config.root).toBe('.');
    expect(config.extensions.size).toBe(0);
    expect(config.excludeSubstrings).toEqual([]);
    expect(config.vcsDirName).toBe('.git');
    expect(config.useIgnoreFile).toBe(true);
  });

  it('strips leading dots from extensions and drops empty excludes', () => {
    const config = createDiscoveryConfig({ extensions: ['.rs', 'py', ''], excludeSubstrings: ['target', ''] });
    expect([...config.extensions].sort()).toEqual(['py', 'rs']);
    expect(config.excludeSubstrings).toEqual(['target']);
  });

  it('is frozen', () => {
    const config = createDiscoveryConfig();
    expect(Object.isFrozen(config)).toBe(true);
  });
});

describe('parseList', () => {
  it('splits, trims and drops empty items', () => {
    expect(parseList('.git, .venv ,,target')).toEqual(['.git', '.venv', 'target']);
    expect(parseList('')).toEqual([]);
    expect(parseList(undefined)).toEqual([]);
  });
});

describe('matchesExtension', () => {
  it('accepts everything with an empty allow-list', () => {
    expect(matchesExtension('Makefile', new Set())).toBe(true);
  });

  it('compares the text after the last dot', () => {
    const rs = new Set(['rs']);
    expect(matchesExtension('main.rs', rs)).toBe(true);
    expect(matchesExtension('main.test.rs', rs)).toBe(true);
    expect(matchesExtension('main.rsx', rs)).toBe(false);
    expect(matchesExtension('Makefile', rs)).toBe(false);
    expect(matchesExtension('.rs', rs)).toBe(false);
  });
});

// ─── Walk ───────────────────────────────────────────────────────────────────

describe('discover', () => {
  let fixture: string;

  beforeEach(() => {
    fixture = createFixture('walk');
  });

  afterEach(() => {
    rmSync(fixture, { recursive: true, force: true });
  });

  it('filters by extension as a set', () => {
    write(fixture, 'a.rs');
    write(fixture, 'b.py');
    write(fixture, 'c.rs');

    const result = discover(createDiscoveryConfig({ root: fixture, extensions: ['rs'] }));

    expect(new Set(result.paths)).toEqual(new Set([join(fixture, 'a.rs'), join(fixture, 'c.rs')]));
    expect(result.scanned).toBe(3);
  });

  it('accepts every file with an empty allow-list', () => {
    write(fixture, 'Makefile');
    write(fixture, 'src/main.rs');

    const result = discover(createDiscoveryConfig({ root: fixture }));

    expect(sorted(result.paths)).toEqual(sorted([join(fixture, 'Makefile'), join(fixture, 'src', 'main.rs')]));
  });

  it('prunes subtrees whose path contains an exclude substring', () => {
    write(fixture, 'src/main.rs');
    write(fixture, 'target/debug/out.rs');

    const result = discover(createDiscoveryConfig({ root: fixture, excludeSubstrings: ['target'] }));

    expect(result.paths).toEqual([join(fixture, 'src', 'main.rs')]);
    expect(result.skipped).toContainEqual({ path: join(fixture, 'target'), reason: 'excluded' });
    expect(result.fileMap.has(join(fixture, 'target'))).toBe(false);
  });

  it('prunes the version-control directory by substring', () => {
    write(fixture, '.git/HEAD');
    write(fixture, '.gitignore', '');
    write(fixture, 'src/main.rs');

    const result = discover(createDiscoveryConfig({ root: fixture, vcsDirName: '.git', useIgnoreFile: false }));

    // ".gitignore" contains ".git" as well
    expect(result.paths).toEqual([join(fixture, 'src', 'main.rs')]);
  });

  it('walks the version-control directory when the name is empty', () => {
    write(fixture, '.git/HEAD');

    const result = discover(createDiscoveryConfig({ root: fixture, vcsDirName: '', useIgnoreFile: false }));

    expect(result.paths).toEqual([join(fixture, '.git', 'HEAD')]);
  });

  it('applies the root .gitignore, including negation', () => {
    write(fixture, '.gitignore', 'dist/\n*.log\n!keep.log\n');
    write(fixture, 'dist/bundle.js');
    write(fixture, 'app.log');
    write(fixture, 'keep.log');
    write(fixture, 'src/index.js');

    const result = discover(createDiscoveryConfig({ root: fixture }));

    expect(sorted(result.paths)).toEqual(sorted([join(fixture, 'keep.log'), join(fixture, 'src', 'index.js')]));
    expect(result.skipped).toContainEqual({ path: join(fixture, 'dist'), reason: 'ignored' });
    expect(result.skipped).toContainEqual({ path: join(fixture, 'app.log'), reason: 'ignored' });
  });

  it('ignores the .gitignore when the toggle is off', () => {
    write(fixture, '.gitignore', '*.log\n');
    write(fixture, 'app.log');

    const result = discover(createDiscoveryConfig({ root: fixture, useIgnoreFile: false }));

    expect(result.paths).toEqual([join(fixture, 'app.log')]);
  });

  it('uses an injected rule set instead of the ignore file', () => {
    write(fixture, 'a.txt');
    write(fixture, 'b.txt');

    const result = discover(
      createDiscoveryConfig({ root: fixture, useIgnoreFile: false }),
      { ignoreSet: IgnoreSet.fromLines(['a.txt']) },
    );

    expect(result.paths).toEqual([join(fixture, 'b.txt')]);
  });

  it('never emits symbolic links', () => {
    const target = write(fixture, 'a.rs');
    symlinkSync(target, join(fixture, 'link.rs'));

    const result = discover(createDiscoveryConfig({ root: fixture }));

    expect(result.paths).toEqual([target]);
  });

  it('maps every visited directory to its files, before the extension filter', () => {
    write(fixture, 'src/main.rs');
    write(fixture, 'src/notes.txt');
    mkdirSync(join(fixture, 'empty'));

    const result = discover(createDiscoveryConfig({ root: fixture, extensions: ['rs'] }));

    expect(result.paths).toEqual([join(fixture, 'src', 'main.rs')]);
    expect(result.fileMap.get(fixture)).toEqual([]);
    expect(result.fileMap.get(join(fixture, 'empty'))).toEqual([]);
    expect(result.fileMap.get(join(fixture, 'src'))).toEqual([
      join(fixture, 'src', 'main.rs'),
      join(fixture, 'src', 'notes.txt'),
    ]);
  });

  it('reports progress for every regular file', () => {
    write(fixture, 'a.rs');
    write(fixture, 'b.py');
    write(fixture, 'c.rs');
    const updates: { scanned: number; matched: number }[] = [];

    discover(createDiscoveryConfig({ root: fixture, extensions: ['rs'] }), {
      onProgress: progress => updates.push(progress),
    });

    expect(updates).toHaveLength(3);
    expect(updates[2]).toEqual({ scanned: 3, matched: 2 });
  });

  // root can read a chmod 000 directory, so the permission check only holds for other users
  it.skipIf(process.getuid?.() === 0)('skips an unreadable subdirectory and keeps walking', () => {
    write(fixture, 'a.rs');
    write(fixture, 'locked/b.rs');
    write(fixture, 'z.rs');
    const locked = join(fixture, 'locked');
    chmodSync(locked, 0o000);

    try {
      const result = discover(createDiscoveryConfig({ root: fixture, extensions: ['rs'] }));

      expect(result.paths).toEqual([join(fixture, 'a.rs'), join(fixture, 'z.rs')]);
      expect(result.skipped).toEqual([{ path: locked, reason: 'unreadable' }]);
      expect(result.fileMap.has(locked)).toBe(false);
    } finally {
      chmodSync(locked, 0o755);
    }
  });

  it('throws DiscoveryError for a missing root', () => {
    const missing = join(fixture, 'nope');
    expect(() => discover(createDiscoveryConfig({ root: missing }))).toThrow(DiscoveryError);
    expect(() => validateRoot(missing)).toThrow(`Path does not exist: ${missing}`);
  });

  it('throws DiscoveryError when the root is a file', () => {
    const file = write(fixture, 'plain.txt');
    expect(() => discover(createDiscoveryConfig({ root: file }))).toThrow(`Path is not a directory: ${file}`);
  });
});

// ─── File map ───────────────────────────────────────────────────────────────

describe('formatFileMap', () => {
  it('prints directories in order, each followed by its files', () => {
    const map = new Map([
      ['b', ['b/2.txt', 'b/1.txt']],
      ['a', []],
    ]);
    expect(formatFileMap(map)).toBe('a\nb\n├── b/1.txt\n├── b/2.txt\n');
  });

  it('is empty for an empty map', () => {
    expect(formatFileMap(new Map())).toBe('');
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmod, lstat, symlink } from 'fs/promises';
import { join } from 'path';
import { walkRoot } from './walker.js';
import { createRuleScan } from './scan-result.js';
import { compileExcludes } from '../utils/glob.js';
import { makeRule, makeTempDir, removeTempDir, writeTree } from '../test/fixtures.js';

describe('walkRoot', () => {
  let tmp: string;
  let root: string;

  beforeEach(async () => {
    tmp = await makeTempDir();
    root = join(tmp, 'root');
    await writeTree(root, {
      'a.txt': 'hello',
      'sub/b.txt': 'abc',
      'sub/deeper/': '',
    });
  });

  afterEach(async () => {
    await chmod(join(root, 'sub'), 0o755).catch(() => undefined);
    await removeTempDir(tmp);
  });

  it('records files and directories below the root, never the root itself', async () => {
    const scan = createRuleScan(makeRule());

    await walkRoot(root, scan);

    expect(scan.files).toEqual([join(root, 'a.txt'), join(root, 'sub', 'b.txt')]);
    expect(scan.dirs).toEqual([join(root, 'sub'), join(root, 'sub', 'deeper')]);
    expect(scan.bytes).toBe(8);
    expect(scan.entries).toBe(2);
    expect(scan.errors).toBe(0);
  });

  it('prunes excluded directories', async () => {
    const scan = createRuleScan(makeRule());

    await walkRoot(root, scan, { exclude: compileExcludes(['sub']).matcher });

    expect(scan.files).toEqual([join(root, 'a.txt')]);
    expect(scan.dirs).toEqual([]);
    expect(scan.bytes).toBe(5);
  });

  it('matches exclusions against the root-relative path', async () => {
    await writeTree(root, { 'notes.bak': 'x', 'notes.bak.txt': 'yy' });
    const scan = createRuleScan(makeRule());

    await walkRoot(root, scan, { exclude: compileExcludes(['*.bak', 'sub/deeper']).matcher });

    expect(scan.files).toEqual([join(root, 'a.txt'), join(root, 'notes.bak.txt'), join(root, 'sub', 'b.txt')]);
    expect(scan.dirs).toEqual([join(root, 'sub')]);
  });

  it('records a file root as its only entry', async () => {
    const scan = createRuleScan(makeRule());

    await walkRoot(join(root, 'a.txt'), scan);

    expect(scan.files).toEqual([join(root, 'a.txt')]);
    expect(scan.dirs).toEqual([]);
    expect(scan.bytes).toBe(5);
  });

  it('excludes a file root only with a star-only pattern', async () => {
    const named = createRuleScan(makeRule());
    const starred = createRuleScan(makeRule());

    await walkRoot(join(root, 'a.txt'), named, { exclude: compileExcludes(['*.txt', 'a.txt']).matcher });
    await walkRoot(join(root, 'a.txt'), starred, { exclude: compileExcludes(['*']).matcher });

    expect(named.files).toEqual([join(root, 'a.txt')]);
    expect(starred.files).toEqual([]);
  });

  it('excludes nested matches of a leading star pattern', async () => {
    await writeTree(root, { 'x/y/keep.txt': 'keep', 'x/y/drop.txt': 'drop' });
    const scan = createRuleScan(makeRule());

    await walkRoot(root, scan, { exclude: compileExcludes(['*/keep.txt']).matcher });

    expect(scan.files).toContain(join(root, 'x', 'y', 'drop.txt'));
    expect(scan.files).not.toContain(join(root, 'x', 'y', 'keep.txt'));
  });

  it('matches a bare name only at the top of the root', async () => {
    await writeTree(root, { 'cache/x': '1', 'app/cache/y': '2' });
    const scan = createRuleScan(makeRule());

    await walkRoot(root, scan, { exclude: compileExcludes(['cache']).matcher });

    expect(scan.files).toEqual([join(root, 'a.txt'), join(root, 'app', 'cache', 'y'), join(root, 'sub', 'b.txt')]);
    expect(scan.dirs).toEqual([
      join(root, 'app'),
      join(root, 'app', 'cache'),
      join(root, 'sub'),
      join(root, 'sub', 'deeper'),
    ]);
  });

  it('neither follows nor records symlinks below the root', async () => {
    await writeTree(tmp, { 'outside/secret.txt': 'do not touch' });
    await symlink(join(tmp, 'outside'), join(root, 'linked-dir'));
    await symlink(join(tmp, 'outside', 'secret.txt'), join(root, 'linked-file'));
    const scan = createRuleScan(makeRule());

    await walkRoot(root, scan);

    expect(scan.files).toEqual([join(root, 'a.txt'), join(root, 'sub', 'b.txt')]);
    expect(scan.dirs).toEqual([join(root, 'sub'), join(root, 'sub', 'deeper')]);
  });

  it('records a symlink root as a file without following it', async () => {
    const link = join(tmp, 'root-link');
    await symlink(root, link);
    const scan = createRuleScan(makeRule());

    await walkRoot(link, scan);

    expect(scan.files).toEqual([link]);
    expect(scan.dirs).toEqual([]);
    expect(scan.bytes).toBe((await lstat(link)).size);
  });

  it('ignores a missing root', async () => {
    const scan = createRuleScan(makeRule());

    await walkRoot(join(tmp, 'missing'), scan);

    expect(scan.files).toEqual([]);
    expect(scan.errors).toBe(0);
  });

  it('lets a file filter and directory switch narrow the result', async () => {
    const scan = createRuleScan(makeRule());

    await walkRoot(root, scan, {
      acceptFile: (path) => path.endsWith('b.txt'),
      recordDirs: false,
    });

    expect(scan.files).toEqual([join(root, 'sub', 'b.txt')]);
    expect(scan.dirs).toEqual([]);
    expect(scan.bytes).toBe(3);
  });

  it.skipIf(process.getuid?.() === 0)('records unreadable directories as errors and keeps going', async () => {
    await chmod(join(root, 'sub'), 0o000);
    const scan = createRuleScan(makeRule());

    await walkRoot(root, scan);

    expect(scan.files).toEqual([join(root, 'a.txt')]);
    expect(scan.dirs).toEqual([join(root, 'sub')]);
    expect(scan.errors).toBe(1);
    expect(scan.errorMessages[0]).toMatch(/^Failed to read directory .*sub: /);
  });
});

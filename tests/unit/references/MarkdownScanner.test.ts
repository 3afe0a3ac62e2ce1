/**
 * @file MarkdownScanner.test.ts
 * @module tests/unit/references/MarkdownScanner
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Unit tests for recursive markdown file discovery.
 */

import { existsSync, mkdirSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { findMarkdownFiles } from '../../../src/references/markdown-scanner.js';
import { makeTempDir } from '../../setup.js';

describe('findMarkdownFiles', () => {
  let rootDir: string;

  beforeEach(() => {
    rootDir = makeTempDir('scanner');
  });

  afterEach(() => {
    if (existsSync(rootDir)) {
      rmSync(rootDir, { recursive: true, force: true });
    }
  });

  it('should find markdown files recursively in sorted order', () => {
    mkdirSync(join(rootDir, 'sub', 'deeper'), { recursive: true });
    writeFileSync(join(rootDir, 'b.md'), '# b');
    writeFileSync(join(rootDir, 'a.md'), '# a');
    writeFileSync(join(rootDir, 'sub', 'c.md'), '# c');
    writeFileSync(join(rootDir, 'sub', 'deeper', 'd.md'), '# d');

    expect(findMarkdownFiles(rootDir)).toEqual([
      join(rootDir, 'a.md'),
      join(rootDir, 'b.md'),
      join(rootDir, 'sub', 'c.md'),
      join(rootDir, 'sub', 'deeper', 'd.md'),
    ]);
  });

  it('should ignore files with other extensions', () => {
    writeFileSync(join(rootDir, 'notes.txt'), 'text');
    writeFileSync(join(rootDir, 'page.markdown'), 'text');
    writeFileSync(join(rootDir, 'index.md'), '# index');

    expect(findMarkdownFiles(rootDir)).toEqual([join(rootDir, 'index.md')]);
  });

  it('should return an empty list for a missing directory', () => {
    expect(findMarkdownFiles(join(rootDir, 'does-not-exist'))).toEqual([]);
  });

  it('should return an empty list for an empty directory', () => {
    expect(findMarkdownFiles(rootDir)).toEqual([]);
  });

  it('should follow a symlinked subdirectory', () => {
    const linkedDir = makeTempDir('scanner-linked');
    try {
      writeFileSync(join(linkedDir, 'linked.md'), '# linked');
      writeFileSync(join(rootDir, 'a.md'), '# a');
      symlinkSync(linkedDir, join(rootDir, 'shared'), 'dir');

      expect(findMarkdownFiles(rootDir)).toEqual([
        join(rootDir, 'a.md'),
        join(rootDir, 'shared', 'linked.md'),
      ]);
    } finally {
      rmSync(linkedDir, { recursive: true, force: true });
    }
  });

  it('should propagate the error of a dangling symlink', () => {
    symlinkSync(join(rootDir, 'missing-target.md'), join(rootDir, 'dangling.md'));

    expect(() => findMarkdownFiles(rootDir)).toThrow(/ENOENT/);
  });

  it('should propagate the error of a symlink cycle', () => {
    symlinkSync('loop', join(rootDir, 'loop'));

    expect(() => findMarkdownFiles(rootDir)).toThrow(/ELOOP/);
  });
});

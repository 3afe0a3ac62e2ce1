/**
 * @file markdown-scanner.ts
 * @module references/markdown-scanner
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Recursive discovery of Markdown files in the contents tree.
 */

import { existsSync, readdirSync, statSync } from 'node:fs';
import { join } from 'node:path';

/**
 * Find all markdown files below a directory.
 *
 * Walks the tree with an explicit stack. Symbolic links are followed, so a
 * link cycle ends in an ELOOP error from `stat` rather than a silent skip.
 * A missing root yields an empty list; every other I/O error propagates.
 *
 * @param dir - Directory to search
 * @returns Paths of all `.md` files, sorted
 */
export function findMarkdownFiles(dir: string): string[] {
  const files: string[] = [];

  if (!existsSync(dir) || !statSync(dir).isDirectory()) return files;

  const stack: string[] = [dir];

  for (let currentDir = stack.pop(); currentDir !== undefined; currentDir = stack.pop()) {
    for (const name of readdirSync(currentDir)) {
      const fullPath = join(currentDir, name);
      if (statSync(fullPath).isDirectory()) {
        stack.push(fullPath);
      } else if (name.endsWith('.md')) {
        files.push(fullPath);
      }
    }
  }

  return files.sort();
}

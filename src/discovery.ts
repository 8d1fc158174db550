/**
 * Test file discovery for the CLI.
 */

import * as fs from 'fs';
import * as path from 'path';

const TEST_FILE_SUFFIXES = ['.test.js', '.spec.js'];
const SKIPPED_DIRS = new Set(['node_modules', 'dist']);

export function isTestFile(name: string): boolean {
  return TEST_FILE_SUFFIXES.some((suffix) => name.endsWith(suffix));
}

function walk(dir: string, files: string[]): void {
  if (!fs.existsSync(dir)) return;
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  for (const e of entries) {
    const full = path.join(dir, e.name);
    if (e.isDirectory()) {
      if (!SKIPPED_DIRS.has(e.name)) walk(full, files);
    } else if (e.isFile() && isTestFile(e.name)) {
      files.push(full);
    }
  }
}

/**
 * Resolves one CLI pattern to absolute test file paths, sorted so that load
 * (and therefore declaration) order does not depend on the file system.
 * A pattern containing '*' searches everything under `cwd`; a directory is
 * searched recursively; a file is taken as is.
 */
export function findTestFiles(pattern: string, cwd: string): string[] {
  const files: string[] = [];
  const resolved = path.resolve(cwd, pattern);

  if (pattern.includes('*')) {
    walk(cwd, files);
  } else if (fs.existsSync(resolved) && fs.statSync(resolved).isDirectory()) {
    walk(resolved, files);
  } else if (fs.existsSync(resolved) && fs.statSync(resolved).isFile()) {
    files.push(resolved);
  }

  return files.map((f) => path.resolve(f)).sort();
}

/** All files for several patterns, first occurrence wins. */
export function findAllTestFiles(patterns: readonly string[], cwd: string): string[] {
  const seen = new Set<string>();
  for (const pattern of patterns) {
    for (const file of findTestFiles(pattern, cwd)) seen.add(file);
  }
  return Array.from(seen);
}

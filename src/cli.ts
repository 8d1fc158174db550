#!/usr/bin/env node
// crosscheck CLI: load test files, then run every declared test once.
// Usage: crosscheck [--filter=<expr>] [--no-color] [pattern...]
// Examples: crosscheck  |  crosscheck test/  |  crosscheck --filter='Io_*-*Slow*'

import * as path from 'path';
import { exitStatus, resolveConfig } from './config';
import { findAllTestFiles } from './discovery';
import { formatFilter } from './filter';
import { harness } from './index';
import { consoleSink } from './reporter';

function loadTestFile(filePath: string): void {
  require(path.resolve(filePath));
}

async function main(): Promise<number> {
  const cwd = process.cwd();
  const config = resolveConfig(process.argv.slice(2), process.env);

  const testFiles = findAllTestFiles(config.patterns, cwd);
  if (testFiles.length === 0) {
    console.log(`No test files found for ${config.patterns.join(' ')}.`);
    return 0;
  }

  for (const file of testFiles) {
    try {
      loadTestFile(file);
    } catch (err) {
      console.error(`Failed to load ${path.relative(cwd, file)}:`, err);
      return 1;
    }
  }

  harness.setFilter(config.filter);
  harness.setOutput(consoleSink({ color: config.color }));
  if (config.filter !== undefined) {
    console.log(`Filter: ${formatFilter(harness.filter)}`);
  }
  return harness.runTests();
}

main()
  .then((code) => {
    process.exitCode = exitStatus(code);
  })
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });

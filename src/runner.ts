/**
 * Test runner: one sequential pass over the registry.
 *
 * For each descriptor the current candidate id is checked against the filter.
 * Allowed tests are run and reported; others are counted as ignored. A
 * parameterized test is offered again after every run until its combinations
 * are exhausted, or until one of them is filtered out.
 */

import { performance } from 'perf_hooks';
import { candidateOf, invoke } from './descriptors';
import type { CombinationCursor } from './descriptors';
import { defaultFilter } from './filter';
import { isAllowed } from './pattern-matcher';
import type { TestRegistry } from './registry';
import { Reporter, consoleSink } from './reporter';
import type { FilterExpression, ReportSink, RunReport, TestResult } from './types';

export interface RunOptions {
  /** Defaults to everything included, nothing excluded. */
  filter?: FilterExpression;
  /** Defaults to standard output. */
  sink?: ReportSink;
  /** Millisecond clock used for test durations. */
  now?: () => number;
}

/** Moves to the next combination, or rewinds the cursor when there is none. */
function advanceOrReset(cursor: CombinationCursor): boolean {
  if (cursor.advance()) return true;
  cursor.reset();
  return false;
}

export async function runTests(registry: TestRegistry, options?: RunOptions): Promise<RunReport> {
  const filter = options?.filter ?? defaultFilter();
  const reporter = new Reporter(options?.sink ?? consoleSink());
  const now = options?.now ?? (() => performance.now());

  let run = 0;
  let passed = 0;
  let ignored = 0;
  const results: TestResult[] = [];
  let lastSuite: string | undefined;

  for (const descriptor of registry.iterate()) {
    if (descriptor.kind === 'parameterized') {
      descriptor.cursor.reset();
      if (descriptor.cursor.size === 0) {
        ignored++;
        continue;
      }
    }

    let offered = true;
    while (offered) {
      const candidate = candidateOf(descriptor);
      if (!isAllowed(filter, candidate)) {
        ignored++;
        break;
      }

      if (descriptor.suite !== lastSuite) {
        reporter.handle({ type: 'suite', suite: descriptor.suite });
        lastSuite = descriptor.suite;
      }

      reporter.handle({ type: 'started', id: candidate.id });
      const start = now();
      const outcome = await invoke(descriptor);
      const duration = now() - start;

      const ok = outcome.status === 'ok';
      const message = outcome.status === 'ok' ? undefined : outcome.message;
      reporter.handle({ type: 'finished', id: candidate.id, passed: ok, duration, message });
      results.push({ id: candidate.id, suite: descriptor.suite, name: descriptor.name, passed: ok, duration, message });

      run++;
      if (ok) passed++;

      offered = descriptor.kind === 'parameterized' && advanceOrReset(descriptor.cursor);
    }
  }

  const success = passed === run;
  reporter.handle({ type: 'tally', run, passed, ignored, success });

  return { run, passed, ignored, success, exitCode: run - passed, results };
}

/**
 * Harness: owns one registry, the active filter and the output sink.
 *
 *   const harness = new Harness();
 *   harness.test('Io', 'Serialization', () => { ... });
 *   process.exitCode = await harness.runTests();
 */

import {
  fixtureTest,
  parameterizedTest,
  plainTest,
} from './descriptors';
import type {
  Fixture,
  FixtureClass,
  FixtureTestFn,
  FixtureTestOptions,
  ParameterizedTestFn,
} from './descriptors';
import { defaultFilter, parseFilter } from './filter';
import type { ParameterSpace } from './parameter-space';
import { TestRegistry } from './registry';
import { consoleSink } from './reporter';
import { runTests } from './runner';
import type { FilterExpression, ReportSink, RunReport, TestFn } from './types';

export interface HarnessOptions {
  registry?: TestRegistry;
  sink?: ReportSink;
  now?: () => number;
}

export class Harness {
  readonly registry: TestRegistry;
  private filterExpr: FilterExpression = defaultFilter();
  private sink: ReportSink;
  private readonly now?: () => number;
  private lastReport: RunReport | undefined;

  constructor(options?: HarnessOptions) {
    this.registry = options?.registry ?? new TestRegistry();
    this.sink = options?.sink ?? consoleSink();
    this.now = options?.now;
  }

  /** Declares a plain test. */
  test(suite: string, name: string, body: TestFn): void {
    this.registry.register(plainTest(suite, name, body));
  }

  /** Declares a test that gets a freshly constructed fixture, disposed after the run. */
  testF<F extends Fixture>(
    FixtureType: FixtureClass<F>,
    name: string,
    body: FixtureTestFn<F>,
    options?: FixtureTestOptions
  ): void {
    this.registry.register(fixtureTest(FixtureType, name, body, options));
  }

  /** Declares a test run once for every combination of `space`. */
  testC<S extends ParameterSpace>(suite: string, name: string, space: S, body: ParameterizedTestFn<S>): void {
    this.registry.register(parameterizedTest(suite, name, space, body));
  }

  /** Replaces the filter; `undefined` selects everything. */
  setFilter(filterStr?: string | null): void {
    this.filterExpr = parseFilter(filterStr);
  }

  get filter(): FilterExpression {
    return this.filterExpr;
  }

  setOutput(sink: ReportSink): void {
    this.sink = sink;
  }

  get report(): RunReport | undefined {
    return this.lastReport;
  }

  /** Runs every allowed test; resolves to the number of failed tests. */
  async runTests(): Promise<number> {
    this.lastReport = await runTests(this.registry, { filter: this.filterExpr, sink: this.sink, now: this.now });
    return this.lastReport.exitCode;
  }
}

/**
 * crosscheck: minimal unit-test harness
 *
 * Usage in test files:
 *   const { test, testF, testC, assert } = require('crosscheck');
 */

import { Harness } from './harness';

/** Process-wide harness that the CLI runs. */
export const harness = new Harness();

export const test = harness.test.bind(harness);
export const testF = harness.testF.bind(harness);
export const testC = harness.testC.bind(harness);

export { Harness } from './harness';
export type { HarnessOptions } from './harness';
export { assert, fail, AssertionError, formatExpression, printValue } from './assertions';
export { cartesianSet, cartesianSpace, ParameterSpaceExpander } from './parameter-space';
export type { CartesianSet, ParameterSpace, ProductSet } from './parameter-space';
export { match, matchAny, isAllowed } from './pattern-matcher';
export { parseFilter, formatFilter, defaultFilter } from './filter';
export { TestRegistry, RegistrationError } from './registry';
export { plainTest, fixtureTest, parameterizedTest, candidateOf, invoke } from './descriptors';
export type { DisposableFixture, Fixture, FixtureClass, TestDescriptor, FixtureTestOptions } from './descriptors';
export { runTests } from './runner';
export type { RunOptions } from './runner';
export { Reporter, consoleSink, streamSink, memorySink } from './reporter';
export type { MemorySink, StreamSinkOptions, TextStream } from './reporter';
export type { FilterExpression, Outcome, ReportSink, RunEvent, RunReport, TestFn, TestResult } from './types';

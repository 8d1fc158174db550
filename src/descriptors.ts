/**
 * Test descriptors: a declared test's identity plus its runnable body.
 *
 * Three kinds share one shape: plain tests, fixture tests (fresh fixture per run,
 * disposed afterwards) and parameterized tests (one run per combination of a
 * parameter space).
 */

import { AssertionError } from './assertions';
import type { ParameterSpace, ProductSet } from './parameter-space';
import { ParameterSpaceExpander } from './parameter-space';
import type { Candidate, Outcome, TestFn } from './types';

/** Joins suite and test name in candidate ids. */
export const SUITE_NAME_SEPARATOR = '_';

/**
 * Any default-constructible class can be a fixture: setup happens in the
 * constructor, and a `dispose()` method, if present, is the teardown.
 */
export type Fixture = object;

export interface DisposableFixture {
  dispose(): void | Promise<void>;
}

export type FixtureClass<F extends Fixture> = new () => F;

export type FixtureTestFn<F extends Fixture> = (fixture: F) => void | Promise<void>;

function isDisposable(fixture: Fixture): fixture is DisposableFixture {
  return 'dispose' in fixture && typeof fixture.dispose === 'function';
}

async function teardown(fixture: Fixture): Promise<void> {
  if (isDisposable(fixture)) await Promise.resolve(fixture.dispose());
}

export type ParameterizedTestFn<S extends ParameterSpace> = (
  combination: ProductSet<S>,
  iteration: number
) => void | Promise<void>;

/** The part of an expander the runner drives. */
export interface CombinationCursor {
  readonly size: number;
  advance(): boolean;
  reset(): void;
  formatSuffix(): string;
  iterationOrdinal(): number;
}

interface DescriptorBase {
  readonly suite: string;
  readonly name: string;
  /** Next-declared test; set by the registry. */
  next?: TestDescriptor;
  readonly body: TestFn;
}

export interface PlainDescriptor extends DescriptorBase {
  readonly kind: 'plain';
}

export interface FixtureDescriptor extends DescriptorBase {
  readonly kind: 'fixture';
}

export interface ParameterizedDescriptor extends DescriptorBase {
  readonly kind: 'parameterized';
  readonly cursor: CombinationCursor;
}

export type TestDescriptor = PlainDescriptor | FixtureDescriptor | ParameterizedDescriptor;

export function plainTest(suite: string, name: string, body: TestFn): PlainDescriptor {
  return { kind: 'plain', suite, name, body };
}

export interface FixtureTestOptions {
  /** Suite name; defaults to the fixture class name. */
  suite?: string;
}

export function fixtureTest<F extends Fixture>(
  FixtureType: FixtureClass<F>,
  name: string,
  body: FixtureTestFn<F>,
  options?: FixtureTestOptions
): FixtureDescriptor {
  return {
    kind: 'fixture',
    suite: options?.suite ?? FixtureType.name,
    name,
    body: () => runWithFixture(FixtureType, body),
  };
}

export function parameterizedTest<S extends ParameterSpace>(
  suite: string,
  name: string,
  space: S,
  body: ParameterizedTestFn<S>
): ParameterizedDescriptor {
  const expander = new ParameterSpaceExpander(space);
  return {
    kind: 'parameterized',
    suite,
    name,
    cursor: expander,
    body: () => body(expander.currentCombination(), expander.iterationOrdinal()),
  };
}

async function runWithFixture<F extends Fixture>(FixtureType: FixtureClass<F>, body: FixtureTestFn<F>): Promise<void> {
  const fixture = new FixtureType();
  try {
    await Promise.resolve(body(fixture));
  } catch (err) {
    // The body's failure is the one reported.
    await teardown(fixture).catch(() => {});
    throw err;
  }
  await teardown(fixture);
}

/** Id of the descriptor's current execution, plus the id without its suite. */
export function candidateOf(descriptor: TestDescriptor): Candidate {
  const suffix = descriptor.kind === 'parameterized' ? descriptor.cursor.formatSuffix() : '';
  const alias = `${descriptor.name}${suffix}`;
  return { id: `${descriptor.suite}${SUITE_NAME_SEPARATOR}${alias}`, alias };
}

export function describeFailure(err: unknown): Outcome {
  if (err instanceof AssertionError) {
    return { status: 'fail', message: err.message };
  }
  const detail = err instanceof Error ? err.message : String(err);
  return { status: 'unexpected', message: `Unexpected exception thrown: ${detail}` };
}

/** Runs the body once. Never throws; failures come back as an outcome. */
export async function invoke(descriptor: TestDescriptor): Promise<Outcome> {
  try {
    await Promise.resolve(descriptor.body());
    return { status: 'ok' };
  } catch (err) {
    return describeFailure(err);
  }
}

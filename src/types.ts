/**
 * Internal types for the harness.
 */

export type TestFn = () => void | Promise<void>;

/** Result of invoking one test body. */
export type Outcome =
  | { status: 'ok' }
  | { status: 'fail'; message: string }
  | { status: 'unexpected'; message: string };

/** Include/exclude pattern lists derived from a filter string. */
export interface FilterExpression {
  include: string[];
  exclude: string[];
}

/** Identity checked against the filter for one test execution. */
export interface Candidate {
  /** `Suite_Name` plus the combination suffix, if any. */
  id: string;
  /** Same as `id` without the suite qualifier. */
  alias?: string;
}

export interface TestResult {
  id: string;
  suite: string;
  name: string;
  passed: boolean;
  /** Wall-clock milliseconds. */
  duration: number;
  message?: string;
}

export interface RunReport {
  run: number;
  passed: number;
  ignored: number;
  success: boolean;
  /** `run - passed`; usable as a process exit status. */
  exitCode: number;
  results: TestResult[];
}

/** Line-oriented output for run events. */
export interface ReportSink {
  appendLine(line: string, tone?: Tone): void;
}

/** Presentation hint; sinks that cannot colour ignore it. */
export type Tone = 'pass' | 'fail';

/** Notifications emitted during a pass over the registry, in order. */
export type RunEvent =
  | { type: 'suite'; suite: string }
  | { type: 'started'; id: string }
  | { type: 'finished'; id: string; passed: boolean; duration: number; message?: string }
  | { type: 'tally'; run: number; passed: number; ignored: number; success: boolean };

/**
 * Console-style reporting. Run events are rendered into tagged lines:
 *
 *   [==========] Io
 *   [STARTED   ] Io_Serialization
 *   [        OK] Io_Serialization (0.42ms)
 *
 * and handed to a ReportSink, the only place colour is applied.
 */

import type { ReportSink, RunEvent, Tone } from './types';

const STATUS = {
  failed: '    FAILED',
  ok: '        OK',
  started: 'STARTED   ',
  suite: '==========',
  tally: '----------',
} as const;

const COLOR: Record<Tone, string> = {
  pass: '\x1b[32m',
  fail: '\x1b[31m',
};
const RESET = '\x1b[0m';

export function formatDuration(ms: number): string {
  return `${Number(ms.toFixed(3))}ms`;
}

function tag(status: keyof typeof STATUS): string {
  return `[${STATUS[status]}]`;
}

export class Reporter {
  constructor(private readonly sink: ReportSink) {}

  handle(event: RunEvent): void {
    switch (event.type) {
      case 'suite':
        this.sink.appendLine(`${tag('suite')} ${event.suite}`);
        break;
      case 'started':
        this.sink.appendLine(`${tag('started')} ${event.id}`);
        break;
      case 'finished':
        this.sink.appendLine(
          `${tag(event.passed ? 'ok' : 'failed')} ${event.id} (${formatDuration(event.duration)})`,
          event.passed ? 'pass' : 'fail'
        );
        if (event.message !== undefined) this.sink.appendLine(event.message);
        break;
      case 'tally':
        this.sink.appendLine(tag('suite'));
        this.sink.appendLine(`${tag('tally')} ${event.run} tests run.`);
        this.sink.appendLine(`${tag('tally')} ${event.passed} tests passed.`);
        if (event.ignored > 0) {
          this.sink.appendLine(`${tag('tally')} ${event.ignored} tests ignored.`);
        }
        this.sink.appendLine(`${tag(event.success ? 'ok' : 'failed')} Final result.`, event.success ? 'pass' : 'fail');
        break;
    }
  }
}

export interface MemorySink extends ReportSink {
  readonly lines: string[];
}

/** Keeps lines in memory, uncoloured. */
export function memorySink(): MemorySink {
  const lines: string[] = [];
  return {
    lines,
    appendLine(line) {
      lines.push(line);
    },
  };
}

export interface StreamSinkOptions {
  color?: boolean;
}

/** Anything text can be written to, such as process.stdout. */
export interface TextStream {
  write(text: string): unknown;
}

export function streamSink(stream: TextStream, options?: StreamSinkOptions): ReportSink {
  const color = options?.color ?? false;
  return {
    appendLine(line, tone) {
      const text = color && tone ? `${COLOR[tone]}${line}${RESET}` : line;
      stream.write(`${text}\n`);
    },
  };
}

/** Standard output; coloured when it is a terminal unless told otherwise. */
export function consoleSink(options?: StreamSinkOptions): ReportSink {
  return streamSink(process.stdout, { color: options?.color ?? process.stdout.isTTY === true });
}

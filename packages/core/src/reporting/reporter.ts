import { type AssertionOutcome, type RunState, type TestError, Verbosity, type Writer } from '../types';
import {
  formatErrorLine,
  formatFailureDetail,
  formatOutcomeLine,
  formatSummary,
  USAGE
} from './format';

export interface ReporterOptions {
  verbosity: Verbosity;
  color: boolean;
  /** Per-assertion lines, summary and usage. Defaults to stdout. */
  out?: Writer;
  /** Test errors. Defaults to stderr. */
  err?: Writer;
}

export interface Reporter {
  outcome(outcome: AssertionOutcome): void;
  error(entry: TestError): void;
  summary(state: RunState): void;
  usage(): void;
}

export function createReporter(options: ReporterOptions): Reporter {
  const { verbosity, color } = options;
  const out = options.out ?? process.stdout;
  const err = options.err ?? process.stderr;

  const println = (writer: Writer, line: string): void => {
    writer.write(`${line}\n`);
  };

  return {
    outcome(outcome) {
      if (verbosity < Verbosity.Normal) return;
      println(out, formatOutcomeLine(outcome, color));
      if (outcome.status === 'failed' && verbosity === Verbosity.Verbose) {
        for (const line of formatFailureDetail(outcome, color)) {
          println(out, line);
        }
      }
    },

    error(entry) {
      if (verbosity < Verbosity.Normal) return;
      println(err, formatErrorLine(entry, color));
    },

    summary(state) {
      if (verbosity < Verbosity.Summary) return;
      println(out, formatSummary(state));
    },

    usage() {
      println(out, USAGE);
    }
  };
}

/** In-memory writer, mostly for capturing reporter output. */
export function createBufferWriter(): Writer & { text(): string; lines(): string[] } {
  const chunks: string[] = [];
  return {
    write(text) {
      chunks.push(text);
    },
    text() {
      return chunks.join('');
    },
    lines() {
      const joined = chunks.join('');
      if (joined === '') return [];
      return joined.replace(/\n$/, '').split('\n');
    }
  };
}

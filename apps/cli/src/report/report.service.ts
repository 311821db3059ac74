import { Inject, Injectable } from '@nestjs/common';
import type { ExecutionResult } from '@hostfan/shared';
import { formatReportLine } from './report-format';

export const REPORT_SINK = Symbol('REPORT_SINK');

export interface ReportSink {
  write(chunk: string, callback: (error?: Error | null) => void): boolean;
}

/**
 * Adapts a stream such as stdout. A stream error (EPIPE once the reader has
 * gone) fails the pending and every later write instead of being thrown as
 * an unhandled 'error' event.
 */
export function streamSink(stream: NodeJS.WritableStream): ReportSink {
  let failure: Error | undefined;
  stream.on('error', (err: Error) => {
    if (!failure) failure = err;
  });
  return {
    write(chunk, callback) {
      if (failure) {
        callback(failure);
        return false;
      }
      return stream.write(chunk, callback);
    },
  };
}

/**
 * Writes one line per result, in completion order. Writes are chained so at
 * most one is in flight and each line goes out in a single `write` call.
 */
@Injectable()
export class ReportService {
  private tail: Promise<void> = Promise.resolve();
  private written = 0;

  constructor(@Inject(REPORT_SINK) private readonly sink: ReportSink) {}

  get linesWritten(): number {
    return this.written;
  }

  report(result: ExecutionResult): Promise<void> {
    return this.writeLine(formatReportLine(result));
  }

  writeLine(line: string): Promise<void> {
    const next = this.tail.then(() => this.write(`${line}\n`));
    // the rejection reaches the caller through `next`; later lines still get their turn
    this.tail = next.catch(() => undefined);
    return next;
  }

  flush(): Promise<void> {
    return this.tail;
  }

  private write(chunk: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sink.write(chunk, err => {
        if (err) {
          reject(err);
          return;
        }
        this.written++;
        resolve();
      });
    });
  }
}

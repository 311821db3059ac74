import { Inject, Injectable, Logger } from '@nestjs/common';
import type { DispatchSummary, ExecutionResult } from '@hostfan/shared';
import { errorMessage, InvalidConcurrencyError, InvalidOptionError } from '../common/errors';
import { JobQueue } from './job-queue';
import { DispatchRequest, Job, REMOTE_EXECUTOR, RemoteExecutor, ResultHandler } from './task.types';

/**
 * Fans a script out over a bounded pool of workers. Each worker holds at most
 * one remote session, so `concurrency` caps open sessions at all times.
 * Results reach `onResult` in completion order, not host order.
 */
@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name);

  constructor(@Inject(REMOTE_EXECUTOR) private readonly executor: RemoteExecutor) {}

  async dispatch(req: DispatchRequest, onResult: ResultHandler, signal?: AbortSignal): Promise<DispatchSummary> {
    const { concurrency, exec } = req;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new InvalidConcurrencyError(concurrency);
    }
    if (!Number.isInteger(exec.connectTimeoutSeconds) || exec.connectTimeoutSeconds < 1) {
      throw new InvalidOptionError(`connect timeout must be a positive integer (got ${exec.connectTimeoutSeconds})`);
    }

    const jobs: Job[] = req.hosts.map(host => Object.freeze({ host, script: req.script, jumpbox: req.jumpbox }));
    const queue = new JobQueue(jobs);
    const summary: DispatchSummary = {
      total: jobs.length,
      dispatched: 0,
      succeeded: 0,
      failed: 0,
      skipped: 0,
      cancelled: false,
      failuresByKind: {},
    };

    this.logger.log(
      `>>> ${jobs.length} hosts · ${concurrency} workers · connect timeout ${exec.connectTimeoutSeconds}s` +
        (req.jumpbox ? ` · via ${req.jumpbox}` : ''),
    );

    const worker = async (): Promise<void> => {
      while (!signal?.aborted) {
        const job = queue.take();
        if (!job) return;
        summary.dispatched++;
        const result = await this.runOne(job, req, signal);
        this.tally(summary, result);
        await onResult(result);
      }
    };

    // idle workers would return on their first take()
    const workerCount = Math.min(concurrency, jobs.length);
    const outcomes = await Promise.allSettled(Array.from({ length: workerCount }, () => worker()));
    const rejected = outcomes.find((o): o is PromiseRejectedResult => o.status === 'rejected');
    if (rejected) throw rejected.reason;

    summary.skipped = queue.remaining;
    summary.cancelled = signal?.aborted ?? false;
    if (summary.cancelled) {
      this.logger.warn(`run interrupted: ${summary.dispatched} attempted, ${summary.skipped} never started`);
    }
    return summary;
  }

  private async runOne(job: Job, req: DispatchRequest, signal?: AbortSignal): Promise<ExecutionResult> {
    try {
      return await this.executor.execute(job, req.exec, signal);
    } catch (err) {
      this.logger.error(`[${job.host}] executor failed unexpectedly: ${errorMessage(err)}`);
      return {
        host: job.host,
        status: 'failure',
        kind: 'ScriptExecutionError',
        detail: errorMessage(err),
        output: '',
        exitCode: null,
        durationMs: 0,
      };
    }
  }

  private tally(summary: DispatchSummary, result: ExecutionResult): void {
    if (result.status === 'success') {
      summary.succeeded++;
      this.logger.debug(`[${result.host}] ok (${result.durationMs} ms)`);
      return;
    }
    summary.failed++;
    summary.failuresByKind[result.kind] = (summary.failuresByKind[result.kind] ?? 0) + 1;
    this.logger.warn(`[${result.host}] ${result.kind}: ${result.detail}`);
  }
}

import { Injectable, Logger } from '@nestjs/common';
import type { DispatchSummary } from '@hostfan/shared';
import { PreflightError } from '../common/errors';
import { EXIT_HOST_FAILURES, EXIT_INTERRUPTED, EXIT_OK, EXIT_PREFLIGHT } from '../common/exit-codes';
import { expandHostPattern } from '../hosts/host-pattern';
import { ReportService } from '../report/report.service';
import { SettingsService } from '../settings/settings.service';
import { TasksService } from '../tasks/tasks.service';
import { CliOptions, toRunRequest } from './run-options.dto';
import { ScriptLoaderService } from './script-loader.service';

@Injectable()
export class RunService {
  private readonly logger = new Logger(RunService.name);

  constructor(
    private readonly settingsService: SettingsService,
    private readonly scriptLoader: ScriptLoaderService,
    private readonly tasksService: TasksService,
    private readonly reportService: ReportService,
  ) {}

  /** Runs one invocation and returns the process exit status. */
  async run(options: CliOptions, signal?: AbortSignal): Promise<number> {
    try {
      return await this.execute(options, signal);
    } catch (err) {
      if (err instanceof PreflightError) {
        this.logger.error(err.message);
        return EXIT_PREFLIGHT;
      }
      throw err;
    }
  }

  private async execute(options: CliOptions, signal?: AbortSignal): Promise<number> {
    // everything up to dispatch is pre-flight: no session is opened before it succeeds
    const request = toRunRequest(options);
    const hosts = expandHostPattern(request.hosts);

    if (request.mode === 'list') {
      for (const host of hosts) await this.reportService.writeLine(host);
      return EXIT_OK;
    }

    const settings = await this.settingsService.resolve({
      connectTimeoutSeconds: options.connectTimeout,
      commandTimeoutSeconds: options.commandTimeout,
      hostKeyChecking: options.hostKeyChecking,
      user: options.user,
      port: options.port,
      identityFile: options.identity,
    });
    const script = await this.scriptLoader.load(request.script);
    if (script.length === 0) this.logger.warn(`script '${request.script}' is empty`);

    const summary = await this.tasksService.dispatch(
      { hosts, script, jumpbox: request.jumpbox, concurrency: request.concurrency, exec: settings },
      result => this.reportService.report(result),
      signal,
    );
    await this.reportService.flush();
    this.logger.log(describeSummary(summary));

    if (summary.cancelled) return EXIT_INTERRUPTED;
    return summary.failed > 0 ? EXIT_HOST_FAILURES : EXIT_OK;
  }
}

export function describeSummary(summary: DispatchSummary): string {
  let text = `<<< ${summary.total} hosts, ${summary.succeeded} succeeded, ${summary.failed} failed`;
  if (summary.skipped > 0) text += `, ${summary.skipped} skipped`;
  const kinds = Object.entries(summary.failuresByKind).map(([kind, count]) => `${kind} ${count}`);
  if (kinds.length > 0) text += ` (${kinds.join(', ')})`;
  return text;
}

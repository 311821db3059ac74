import { Injectable } from '@nestjs/common';
import type { ExecutionResult, FailureKind } from '@hostfan/shared';
import { errorMessage } from '../common/errors';
import { flattenOutput } from '../report/report-format';
import { SshCapture, SshService } from '../ssh/ssh.service';
import { classifySshFailure, sshDiagnostic } from '../ssh/ssh-failure';
import type { Job, RemoteExecOptions, RemoteExecutor } from './task.types';

/**
 * Runs one job over ssh: the script is fed to the remote command on stdin
 * and the session's combined output is captured and flattened.
 */
@Injectable()
export class RemoteExecutorService implements RemoteExecutor {
  constructor(private readonly ssh: SshService) {}

  async execute(job: Job, options: RemoteExecOptions, signal?: AbortSignal): Promise<ExecutionResult> {
    const startedAt = Date.now();
    let capture: SshCapture;
    try {
      capture = await this.ssh.executeCapture({
        host: job.host,
        command: options.remoteCommand,
        stdin: job.script,
        jumpbox: job.jumpbox,
        user: options.user,
        port: options.port,
        identityFile: options.identityFile,
        connectTimeoutSeconds: options.connectTimeoutSeconds,
        killAfterSeconds: options.commandTimeoutSeconds,
        hostKeyCheckingMode: options.hostKeyChecking,
        sshBinary: options.sshBinary,
        signal,
      });
    } catch (err) {
      return {
        host: job.host,
        status: 'failure',
        kind: 'HostUnreachable',
        detail: `could not start ${options.sshBinary}: ${errorMessage(err)}`,
        output: '',
        exitCode: null,
        durationMs: Date.now() - startedAt,
      };
    }

    const durationMs = Date.now() - startedAt;
    const output = flattenOutput(capture.combined);
    const fail = (kind: FailureKind, detail: string): ExecutionResult => ({
      host: job.host,
      status: 'failure',
      kind,
      detail,
      output,
      exitCode: capture.code,
      durationMs,
    });

    if (capture.aborted) return fail('Cancelled', 'run interrupted before the session finished');
    if (capture.spawnError) {
      return fail('HostUnreachable', `could not start ${options.sshBinary}: ${capture.spawnError.message}`);
    }
    if (capture.timedOut) {
      return fail('ScriptExecutionError', `command timed out after ${options.commandTimeoutSeconds}s`);
    }
    if (capture.code === 0) {
      return { host: job.host, status: 'success', output, exitCode: 0, durationMs };
    }

    const kind = classifySshFailure(capture.code, capture.stderr);
    if (kind) {
      return fail(kind, sshDiagnostic(capture.stderr) || `ssh exited with status ${capture.code}`);
    }
    const status =
      capture.code === null ? `terminated by ${capture.signal ?? 'signal'}` : `exit status ${capture.code}`;
    return fail('ScriptExecutionError', output ? `${status}: ${output}` : status);
  }
}

import { Inject, Injectable, Logger } from '@nestjs/common';
import { spawn } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';
import type { HostKeyCheckingMode } from '@hostfan/shared';

export const SSH_SPAWN = Symbol('SSH_SPAWN');

/** The slice of a child process that SshService drives. */
export interface SshChild {
  stdin: Writable;
  stdout: Readable;
  stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export type SpawnSsh = (binary: string, args: string[]) => SshChild;

export const spawnSsh: SpawnSsh = (binary, args) => spawn(binary, args, { stdio: ['pipe', 'pipe', 'pipe'] });

export interface SshExecOptions {
  host: string;
  command: string;
  stdin?: Buffer;
  jumpbox?: string;
  user?: string;
  port?: number;
  identityFile?: string;
  connectTimeoutSeconds?: number; // SSH connect timeout
  killAfterSeconds: number; // hard kill after this timeout, 0 disables
  hostKeyCheckingMode?: HostKeyCheckingMode;
  sshBinary?: string;
  signal?: AbortSignal;
  onStdout?: (chunk: Buffer) => void;
  onStderr?: (chunk: Buffer) => void;
}

export interface SshCapture {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved in arrival order */
  combined: string;
  timedOut: boolean;
  aborted: boolean;
  spawnError?: Error;
}

@Injectable()
export class SshService {
  private readonly logger = new Logger(SshService.name);

  constructor(@Inject(SSH_SPAWN) private readonly spawnChild: SpawnSsh) {}

  buildArgs(options: SshExecOptions): string[] {
    const { host, command, jumpbox, user, port, identityFile, connectTimeoutSeconds = 30 } = options;
    const hk = options.hostKeyCheckingMode ?? 'yes';

    const args = [
      '-T',
      '-o',
      'BatchMode=yes',
      '-o',
      `ConnectTimeout=${Math.max(1, Math.min(600, connectTimeoutSeconds))}`,
      '-o',
      `StrictHostKeyChecking=${hk}`,
      '-o',
      'PasswordAuthentication=no',
      '-o',
      'KbdInteractiveAuthentication=no',
      '-o',
      'PreferredAuthentications=publickey',
    ];
    if (jumpbox) args.push('-J', jumpbox);
    if (user) args.push('-l', user);
    if (port) args.push('-p', String(port));
    if (identityFile) args.push('-o', 'IdentitiesOnly=yes', '-i', identityFile);

    return [...args, host, '--', command];
  }

  async executeCapture(options: SshExecOptions): Promise<SshCapture> {
    const { killAfterSeconds, signal, onStdout, onStderr } = options;
    const binary = options.sshBinary ?? 'ssh';
    const args = this.buildArgs(options);
    this.logger.verbose(`${binary} ${args.join(' ')}`);

    return await new Promise<SshCapture>(resolve => {
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      const combinedChunks: Buffer[] = [];
      let timedOut = false;
      let aborted = false;
      let settled = false;
      let timeout: NodeJS.Timeout | undefined;
      let child: SshChild | undefined;

      const onAbort = () => {
        aborted = true;
        child?.kill('SIGTERM');
      };

      const finish = (code: number | null, exitSignal: NodeJS.Signals | null, spawnError?: Error) => {
        if (settled) return;
        settled = true;
        if (timeout) clearTimeout(timeout);
        signal?.removeEventListener('abort', onAbort);
        resolve({
          code,
          signal: exitSignal,
          stdout: Buffer.concat(stdoutChunks).toString('utf8'),
          stderr: Buffer.concat(stderrChunks).toString('utf8'),
          combined: Buffer.concat(combinedChunks).toString('utf8'),
          timedOut,
          aborted,
          spawnError,
        });
      };

      const proc = this.spawnChild(binary, args);
      child = proc;

      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener('abort', onAbort, { once: true });
      }

      if (killAfterSeconds > 0) {
        timeout = setTimeout(() => {
          timedOut = true;
          proc.kill('SIGKILL');
        }, killAfterSeconds * 1000);
      }

      proc.stdout.on('data', (d: Buffer) => {
        stdoutChunks.push(d);
        combinedChunks.push(d);
        onStdout?.(d);
      });
      proc.stderr.on('data', (d: Buffer) => {
        stderrChunks.push(d);
        combinedChunks.push(d);
        onStderr?.(d);
      });
      // ssh may exit before consuming the whole script (e.g. auth failure)
      proc.stdin.on('error', err => this.logger.debug(`[${options.host}] stdin closed early: ${err.message}`));

      proc.on('close', (code, exitSignal) => finish(code, exitSignal));
      proc.on('error', err => finish(null, null, err));

      proc.stdin.end(options.stdin ?? Buffer.alloc(0));
    });
  }
}

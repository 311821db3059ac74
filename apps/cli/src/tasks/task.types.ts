import type { ExecutionResult, HostKeyCheckingMode } from '@hostfan/shared';

export const REMOTE_EXECUTOR = Symbol('REMOTE_EXECUTOR');

/** One host's share of a run. The script buffer is the same snapshot for every job. */
export interface Job {
  readonly host: string;
  readonly script: Buffer;
  readonly jumpbox?: string;
}

export interface RemoteExecOptions {
  connectTimeoutSeconds: number;
  commandTimeoutSeconds: number;
  hostKeyChecking: HostKeyCheckingMode;
  sshBinary: string;
  remoteCommand: string;
  user?: string;
  port?: number;
  identityFile?: string;
}

export interface RemoteExecutor {
  /** Resolves with a result for every outcome; per-host failures are values, not rejections. */
  execute(job: Job, options: RemoteExecOptions, signal?: AbortSignal): Promise<ExecutionResult>;
}

export interface DispatchRequest {
  hosts: readonly string[];
  script: Buffer;
  jumpbox?: string;
  concurrency: number;
  exec: RemoteExecOptions;
}

export type ResultHandler = (result: ExecutionResult) => void | Promise<void>;

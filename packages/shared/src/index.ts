export const FAILURE_KINDS = [
  'ConnectionTimeout',
  'AuthenticationFailure',
  'HostUnreachable',
  'ScriptExecutionError',
  'Cancelled',
] as const;

export type FailureKind = (typeof FAILURE_KINDS)[number];

export type HostKeyCheckingMode = 'yes' | 'accept-new' | 'no';

/**
 * Outcome of running the script on one host. `output` never contains a
 * newline; it is the flattened combined stdout/stderr of the session.
 */
export type ExecutionResult =
  | {
      host: string;
      status: 'success';
      output: string;
      exitCode: 0;
      durationMs: number;
    }
  | {
      host: string;
      status: 'failure';
      kind: FailureKind;
      detail: string;
      output: string;
      exitCode: number | null;
      durationMs: number;
    };

export interface RunSettings {
  connectTimeoutSeconds: number; // 1–600, default 30
  commandTimeoutSeconds: number; // 0 disables the kill timer
  hostKeyChecking: HostKeyCheckingMode;
  sshBinary: string;
  remoteCommand: string; // reads the script from stdin
  user?: string;
  port?: number;
  identityFile?: string;
}

export const DEFAULT_SETTINGS: RunSettings = {
  connectTimeoutSeconds: 30,
  commandTimeoutSeconds: 0,
  hostKeyChecking: 'yes',
  sshBinary: 'ssh',
  remoteCommand: 'bash -s',
};

export interface DispatchSummary {
  total: number;
  dispatched: number;
  succeeded: number;
  failed: number;
  skipped: number;
  cancelled: boolean;
  failuresByKind: Partial<Record<FailureKind, number>>;
}

import type { FailureKind } from '@hostfan/shared';

/** ssh exits with 255 when the failure is its own rather than the remote command's. */
export const SSH_FAILURE_EXIT = 255;

// Only lines in the shape the ssh client prints are considered; the remote
// script's own stderr shares the stream.
const RULES: Array<{ kind: FailureKind; pattern: RegExp }> = [
  {
    kind: 'ConnectionTimeout',
    pattern:
      /^(?:ssh: connect to host \S+ port \d+: (?:Connection|Operation) timed out|Connection timed out during banner exchange|channel \d+: open failed: connect failed: Connection timed out)/,
  },
  {
    kind: 'AuthenticationFailure',
    pattern:
      /^(?:[^\s:]+: Permission denied \(|Host key verification failed\.|Received disconnect from .*Too many authentication failures|Unable to negotiate with .*no matching host key type)/,
  },
  {
    kind: 'HostUnreachable',
    pattern:
      /^(?:ssh: Could not resolve hostname |ssh: connect to host \S+ port \d+: (?:No route to host|Network is unreachable|Connection refused)|kex_exchange_identification: |Connection (?:closed|reset) by |channel \d+: open failed: |stdio forwarding failed)/,
  },
];

/**
 * Maps an ssh client failure onto a failure kind using its diagnostics on
 * stderr. Returns undefined when the exit status belongs to the remote
 * command.
 */
export function classifySshFailure(code: number | null, stderr: string): FailureKind | undefined {
  if (code !== SSH_FAILURE_EXIT) return undefined;
  const lines = stderr.split(/\r?\n/).map(line => line.trim());
  return RULES.find(rule => lines.some(line => rule.pattern.test(line)))?.kind;
}

/** Last non-empty stderr line, which is where ssh puts its diagnosis. */
export function sshDiagnostic(stderr: string): string {
  const lines = stderr.split(/\r?\n/).map(line => line.trim()).filter(Boolean);
  return lines[lines.length - 1] ?? '';
}

import type { ExecutionResult } from '@hostfan/shared';

/** Collapses captured output onto one physical line: every line break becomes a space. */
export function flattenOutput(text: string): string {
  return text.replace(/\r\n|\r|\n/g, ' ').trimEnd();
}

/**
 * `<host>, <output>` for a success, `<host>, <kind>: <detail>` for a
 * failure. No trailing line terminator.
 */
export function formatReportLine(result: ExecutionResult): string {
  if (result.status === 'success') {
    return `${result.host}, ${flattenOutput(result.output)}`;
  }
  return `${result.host}, ${result.kind}: ${flattenOutput(result.detail)}`;
}

import { flattenOutput, formatReportLine } from './report-format';

describe('flattenOutput', () => {
  it('turns every line break into a single space', () => {
    expect(flattenOutput('a\nb\r\nc\rd')).toBe('a b c d');
    expect(flattenOutput('a\n\nb')).toBe('a  b');
  });

  it('drops the trailing break', () => {
    expect(flattenOutput('pong\n')).toBe('pong');
  });
});

describe('formatReportLine', () => {
  it('formats a success as host and output', () => {
    expect(
      formatReportLine({ host: 'web1', status: 'success', output: 'up 3 days', exitCode: 0, durationMs: 12 }),
    ).toBe('web1, up 3 days');
  });

  it('flattens multi-line success output onto the report line', () => {
    expect(
      formatReportLine({ host: 'web1', status: 'success', output: 'load 0.1\nusers 3\r\n', exitCode: 0, durationMs: 5 }),
    ).toBe('web1, load 0.1 users 3');
  });

  it('formats a failure as host, kind and detail', () => {
    expect(
      formatReportLine({
        host: 'web2',
        status: 'failure',
        kind: 'AuthenticationFailure',
        detail: 'web2: Permission denied (publickey).',
        output: '',
        exitCode: 255,
        durationMs: 40,
      }),
    ).toBe('web2, AuthenticationFailure: web2: Permission denied (publickey).');
  });

  it('never lets a newline through in the detail', () => {
    const line = formatReportLine({
      host: 'web3',
      status: 'failure',
      kind: 'ScriptExecutionError',
      detail: 'exit status 2:\nboom\n',
      output: '',
      exitCode: 2,
      durationMs: 1,
    });
    expect(line).toBe('web3, ScriptExecutionError: exit status 2: boom');
  });
});

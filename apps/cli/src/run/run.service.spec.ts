import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { AppModule } from '../app.module';
import { EXIT_HOST_FAILURES, EXIT_INTERRUPTED, EXIT_OK, EXIT_PREFLIGHT } from '../common/exit-codes';
import { REPORT_SINK } from '../report/report.service';
import { REMOTE_EXECUTOR } from '../tasks/task.types';
import { FakeExecutor, succeed } from '../testing/fake-executor';
import { MemorySink } from '../testing/memory-sink';
import type { CliOptions } from './run-options.dto';
import { describeSummary, RunService } from './run.service';
import { ScriptLoaderService } from './script-loader.service';

describe('RunService', () => {
  let root: string;
  let script: string;
  let errorSpy: jest.SpyInstance;

  beforeAll(() => Logger.overrideLogger(false));

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'hostfan-run-'));
    script = join(root, 'check.sh');
    writeFileSync(script, 'echo pong\n');
    errorSpy = jest.spyOn(Logger.prototype, 'error');
  });

  afterEach(() => {
    errorSpy.mockRestore();
    rmSync(root, { recursive: true, force: true });
  });

  async function harness(executor = new FakeExecutor(succeed('pong', 1))) {
    const sink = new MemorySink();
    const moduleRef = await Test.createTestingModule({ imports: [AppModule.forRoot()] })
      .overrideProvider(REMOTE_EXECUTOR)
      .useValue(executor)
      .overrideProvider(REPORT_SINK)
      .useValue(sink)
      .compile();
    const run = (options: CliOptions, signal?: AbortSignal) => moduleRef.get(RunService).run(options, signal);
    return { run, sink, executor, loader: moduleRef.get(ScriptLoaderService) };
  }

  it('runs the script on every host and exits 0', async () => {
    const { run, sink, executor, loader } = await harness();
    const load = jest.spyOn(loader, 'load');

    const code = await run({ hosts: 'web{1..3}', script, processes: '2' });

    expect(code).toBe(EXIT_OK);
    expect([...sink.lines].sort()).toEqual(['web1, pong', 'web2, pong', 'web3, pong']);
    expect(load).toHaveBeenCalledTimes(1);
    expect(executor.calls.map(c => c.job.script.toString())).toEqual(['echo pong\n', 'echo pong\n', 'echo pong\n']);
    expect(new Set(executor.calls.map(c => c.job.script)).size).toBe(1);
  });

  it('hands resolved settings and the jump host to the executor', async () => {
    const { run, executor } = await harness();

    await run({
      hosts: 'db1',
      script,
      processes: '1',
      jumpbox: 'gw.example.test',
      connectTimeout: '4',
      user: 'ops',
    });

    expect(executor.calls[0].job.jumpbox).toBe('gw.example.test');
    expect(executor.calls[0].options).toMatchObject({ connectTimeoutSeconds: 4, user: 'ops', sshBinary: 'ssh' });
  });

  it('aborts before any session when the script does not exist', async () => {
    const { run, sink, executor } = await harness();
    const missing = join(root, 'missing.sh');

    const code = await run({ hosts: 'web{1..3}', script: missing, processes: '2' });

    expect(code).toBe(EXIT_PREFLIGHT);
    expect(executor.calls).toHaveLength(0);
    expect(sink.chunks).toEqual([]);
    expect(errorSpy).toHaveBeenCalledWith(`script file '${missing}' not found`);
  });

  it('rejects a directory given as the script', async () => {
    const { run, executor } = await harness();

    const code = await run({ hosts: 'web1', script: root, processes: '1' });

    expect(code).toBe(EXIT_PREFLIGHT);
    expect(executor.calls).toHaveLength(0);
    expect(errorSpy).toHaveBeenCalledWith(`script file '${root}' is not a regular file`);
  });

  it.each<[string, CliOptions]>([
    ['a bad worker count', { hosts: 'web1', processes: '0' }],
    ['an inverted range', { hosts: 'web{3..1}', processes: '2' }],
    ['a bad connect timeout', { hosts: 'web1', processes: '2', connectTimeout: 'soon' }],
  ])('aborts on %s with no side effects', async (_label, options) => {
    const { run, sink, executor } = await harness();

    const code = await run({ script, ...options });

    expect(code).toBe(EXIT_PREFLIGHT);
    expect(executor.calls).toHaveLength(0);
    expect(sink.chunks).toEqual([]);
  });

  it('exits 1 when any host fails', async () => {
    const executor = new FakeExecutor(async job =>
      job.host === 'web2'
        ? {
            host: job.host,
            status: 'failure',
            kind: 'HostUnreachable',
            detail: 'ssh: Could not resolve hostname web2: Name or service not known',
            output: '',
            exitCode: 255,
            durationMs: 0,
          }
        : { host: job.host, status: 'success', output: 'pong', exitCode: 0, durationMs: 0 },
    );
    const { run, sink } = await harness(executor);

    const code = await run({ hosts: 'web{1..3}', script, processes: '3' });

    expect(code).toBe(EXIT_HOST_FAILURES);
    expect(sink.lines).toHaveLength(3);
    expect(sink.lines).toContain('web2, HostUnreachable: ssh: Could not resolve hostname web2: Name or service not known');
  });

  it('exits 130 and starts nothing once interrupted', async () => {
    const { run, sink, executor } = await harness();
    const controller = new AbortController();
    controller.abort();

    const code = await run({ hosts: 'web{1..3}', script, processes: '2' }, controller.signal);

    expect(code).toBe(EXIT_INTERRUPTED);
    expect(executor.calls).toHaveLength(0);
    expect(sink.chunks).toEqual([]);
  });

  it('lists the expanded hosts without reading a script or connecting', async () => {
    const { run, sink, executor, loader } = await harness();
    const load = jest.spyOn(loader, 'load');

    const code = await run({ hosts: '{a,b}serv{1,2}', listHosts: true });

    expect(code).toBe(EXIT_OK);
    expect(sink.lines).toEqual(['aserv1', 'aserv2', 'bserv1', 'bserv2']);
    expect(load).not.toHaveBeenCalled();
    expect(executor.calls).toHaveLength(0);
  });

  it('rethrows errors that are not pre-flight failures', async () => {
    const sinkError = new Error('stdout closed');
    const executor = new FakeExecutor(succeed('pong'));
    const moduleRef = await Test.createTestingModule({ imports: [AppModule.forRoot()] })
      .overrideProvider(REMOTE_EXECUTOR)
      .useValue(executor)
      .overrideProvider(REPORT_SINK)
      .useValue(new MemorySink(() => 0, sinkError))
      .compile();

    await expect(moduleRef.get(RunService).run({ hosts: 'web1', script, processes: '1' })).rejects.toBe(sinkError);
  });
});

describe('describeSummary', () => {
  it('mentions skipped hosts and failure kinds only when present', () => {
    expect(
      describeSummary({
        total: 3,
        dispatched: 3,
        succeeded: 3,
        failed: 0,
        skipped: 0,
        cancelled: false,
        failuresByKind: {},
      }),
    ).toBe('<<< 3 hosts, 3 succeeded, 0 failed');

    expect(
      describeSummary({
        total: 10,
        dispatched: 4,
        succeeded: 1,
        failed: 3,
        skipped: 6,
        cancelled: true,
        failuresByKind: { ConnectionTimeout: 2, Cancelled: 1 },
      }),
    ).toBe('<<< 10 hosts, 1 succeeded, 3 failed, 6 skipped (ConnectionTimeout 2, Cancelled 1)');
  });
});

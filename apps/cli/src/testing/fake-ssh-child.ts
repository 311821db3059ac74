import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import type { SpawnSsh, SshChild } from '../ssh/ssh.service';

const tick = () => new Promise<void>(resolve => setImmediate(resolve));

/** In-process stand-in for a spawned ssh client. */
export class FakeSshChild extends EventEmitter implements SshChild {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly killSignals: NodeJS.Signals[] = [];
  private readonly received: Buffer[] = [];
  private closed = false;

  constructor() {
    super();
    this.stdin.on('data', (d: Buffer) => this.received.push(d));
  }

  get stdinText(): string {
    return Buffer.concat(this.received).toString('utf8');
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.killSignals.push(signal);
    setImmediate(() => this.close(null, signal));
    return true;
  }

  async writeStdout(text: string): Promise<void> {
    this.stdout.write(text);
    await tick();
  }

  async writeStderr(text: string): Promise<void> {
    this.stderr.write(text);
    await tick();
  }

  close(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.closed) return;
    this.closed = true;
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => this.emit('close', code, signal));
  }
}

export interface SpawnRecord {
  binary: string;
  args: string[];
  child: FakeSshChild;
}

/**
 * Builds a SpawnSsh that hands out FakeSshChild instances; `behave` runs on
 * the next turn of the event loop, after listeners are attached.
 */
export function fakeSpawn(behave: (child: FakeSshChild, args: string[]) => Promise<void> | void): {
  spawn: SpawnSsh;
  calls: SpawnRecord[];
} {
  const calls: SpawnRecord[] = [];
  const spawn: SpawnSsh = (binary, args) => {
    const child = new FakeSshChild();
    calls.push({ binary, args, child });
    setImmediate(() => {
      void Promise.resolve(behave(child, args));
    });
    return child;
  };
  return { spawn, calls };
}

export function respond(output: { stdout?: string; stderr?: string; code: number }) {
  return async (child: FakeSshChild): Promise<void> => {
    if (output.stdout) await child.writeStdout(output.stdout);
    if (output.stderr) await child.writeStderr(output.stderr);
    child.close(output.code);
  };
}

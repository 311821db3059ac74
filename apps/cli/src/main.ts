#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { CommanderError } from 'commander';
import { AppModule } from './app.module';
import { buildProgram } from './cli/program';
import { errorMessage } from './common/errors';
import { EXIT_INTERNAL, EXIT_OK, EXIT_PREFLIGHT } from './common/exit-codes';
import { logLevelsFor, StderrLogger } from './common/stderr-logger';
import type { CliOptions } from './run/run-options.dto';
import { RunService } from './run/run.service';

async function runCli(options: CliOptions): Promise<number> {
  const app = await NestFactory.createApplicationContext(AppModule.forRoot({ configFile: options.config }), {
    logger: false,
    abortOnError: false,
  });
  app.useLogger(new StderrLogger('hostfan', { logLevels: logLevelsFor(options) }));
  const logger = new Logger('Bootstrap');

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn(`${signal} received, abandoning in-flight sessions`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    return await app.get(RunService).run(options, controller.signal);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await app.close();
  }
}

async function bootstrap(): Promise<void> {
  let exitCode = EXIT_OK;
  const program = buildProgram(async options => {
    exitCode = await runCli(options);
  });

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      process.exitCode = err.exitCode === 0 ? EXIT_OK : EXIT_PREFLIGHT;
      return;
    }
    throw err;
  }
  process.exitCode = exitCode;
}

bootstrap().catch(err => {
  process.stderr.write(`hostfan: ${errorMessage(err)}\n`);
  process.exitCode = EXIT_INTERNAL;
});

#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { buildProgram, PlainRequest } from './cli/program';
import { CommandRunnerService } from './commands/command-runner.service';
import { parseCommandRequest } from './common/dto/command-request.dto';
import {
  UNEXPECTED_ERROR_EXIT_CODE,
  errorMessage,
  isClusterscopeError,
} from './common/errors/clusterscope.errors';
import { StderrLogger, resolveLogLevels } from './common/logging/stderr.logger';

async function runRequest(plain: PlainRequest): Promise<void> {
  const request = parseCommandRequest(plain);

  const app = await NestFactory.createApplicationContext(AppModule, { bufferLogs: true });
  const logLevels = resolveLogLevels(request.silent, app.get(ConfigService).get<string>('logLevel'));
  app.useLogger(new StderrLogger('clusterscope', { logLevels }));

  try {
    await app.get(CommandRunnerService).run(request);
  } finally {
    await app.close();
  }
}

function fail(err: unknown): void {
  process.stderr.write(`clusterscope: ${errorMessage(err)}\n`);
  process.exitCode = isClusterscopeError(err) ? err.exitCode : UNEXPECTED_ERROR_EXIT_CODE;
}

buildProgram(runRequest).parseAsync(process.argv).catch(fail);

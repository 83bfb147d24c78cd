#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { CLI_USAGE, CliCommand, parseCliArgs } from './cli-args';
import { PipelineFatalError } from './pipeline/errors/pipeline.errors';
import { PipelineModule } from './pipeline/pipeline.module';
import {
  PipelineRunnerService,
  resolvePeriod,
} from './pipeline/services/pipeline-runner.service';
import { defaultFetchOptions } from './pipeline/services/post-fetcher.service';

const logger = new Logger('Cli');

async function execute(
  runner: PipelineRunnerService,
  command: CliCommand,
): Promise<unknown> {
  switch (command.name) {
    case 'collect': {
      const options = defaultFetchOptions();
      return runner.collect(
        command.windowHours === undefined
          ? options
          : { ...options, windowHours: command.windowHours },
      );
    }
    case 'classify':
      return runner.classify({
        windowHours: command.windowHours,
        snapshotFile: command.snapshotFile,
      });
    case 'report': {
      if (command.scope === 'single') {
        return runner.report('single');
      }
      const period = resolvePeriod(command.scope, command.period);
      if (!period) {
        throw new PipelineFatalError(
          `period ${command.period} is not a valid ${command.scope} period`,
        );
      }
      return runner.report(command.scope, period);
    }
    case 'run-all':
      return runner.runAll();
  }
}

async function main(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (!parsed.ok) {
    process.stderr.write(`${parsed.error}\n\n${CLI_USAGE}\n`);
    return 1;
  }

  const app = await NestFactory.createApplicationContext(PipelineModule, {
    logger: ['log', 'warn', 'error'],
  });
  try {
    const result = await execute(
      app.get(PipelineRunnerService),
      parsed.command,
    );
    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    return 0;
  } catch (error) {
    if (error instanceof PipelineFatalError) {
      logger.error(`${parsed.command.name} failed: ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    await app.close();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const message =
      error instanceof Error ? (error.stack ?? error.message) : String(error);
    logger.error(`unexpected failure: ${message}`);
    process.exitCode = 1;
  });

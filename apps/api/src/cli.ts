import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { CliModule } from './cli/cli.module';
import { CliRunnerService } from './cli/cli-runner.service';

const logger = new Logger('Cli');

async function main(): Promise<void> {
  const app = await NestFactory.createApplicationContext(CliModule, {
    logger: ['log', 'warn', 'error'],
  });
  try {
    await app.get(CliRunnerService).run(process.argv.slice(2));
  } finally {
    await app.close();
  }
}

main().catch((err: unknown) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});

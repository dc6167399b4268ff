import 'reflect-metadata';
import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module.js';
import { FileLogger, parseLogLevels } from './logging/file-logger.js';
import { TutorLoopService } from './tutor/tutor-loop.service.js';
import { maskSecret } from './common/mask-secret.js';

function loadEnv() {
  // The orchestrator injects the environment itself; .env is for local runs only
  if (process.env.CORAL_ORCHESTRATION_RUNTIME) return;
  const here = dirname(fileURLToPath(import.meta.url));
  const rootEnv = resolve(here, '../../../.env');
  if (existsSync(rootEnv)) dotenvConfig({ path: rootEnv });
  else dotenvConfig();
}

async function bootstrap() {
  loadEnv();

  const fileLogger = new FileLogger('TutorAgent', {
    logFilePath: process.env.LOG_FILE ?? 'logs/tutor.log',
    levels: parseLogLevels(process.env.LOG_LEVEL),
    mirrorToConsole: process.env.LOG_TO_CONSOLE !== 'false',
  });
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.createApplicationContext(AppModule, { logger: fileLogger });

  // Masked keys help diagnose auth errors without printing them
  logger.log(`OPENAI_API_KEY: ${maskSecret(process.env.OPENAI_API_KEY, 6, 2)}`);
  logger.log(`ANTHROPIC_API_KEY: ${maskSecret(process.env.ANTHROPIC_API_KEY, 6, 2)}`);

  const loop = app.get(TutorLoopService);
  const shutdown = (signal: NodeJS.Signals) => {
    logger.log(`Received ${signal}, stopping tutor loop`);
    loop.stop();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  // Runs until a signal arrives; the Coral connection closes with the app
  await loop.run();
  await app.close();
  await fileLogger.close();
}

bootstrap().catch((err: unknown) => {
  console.error('Tutor agent failed to start', err);
  process.exitCode = 1;
});

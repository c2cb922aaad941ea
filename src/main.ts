import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module.js';
import { GameError } from './common/errors/game-errors.js';
import { AdventureService } from './engine/adventure/adventure.service.js';
import { GameLoggerService } from './engine/logging/game-logger.service.js';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    abortOnError: false,
  });
  const logger = new Logger('Bootstrap');

  try {
    const gameLogger = app.get(GameLoggerService).create();
    const result = app.get(AdventureService).play({ logger: gameLogger });
    logger.log(`Adventure finished: ${result.outcome}`);
    logger.log(`\n${result.player.describe()}`);
  } finally {
    await app.close();
  }
}

bootstrap().catch((err: unknown) => {
  const logger = new Logger('Bootstrap');
  if (err instanceof GameError) {
    logger.error(`${err.code}: ${err.message}`);
  } else {
    logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  }
  process.exitCode = 1;
});

import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { ConfigValidationError, loadAppConfig } from './config/app.config';
import { getErrorMessage, getErrorStack } from './common/utils/error.util';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const config = loadAppConfig();

  logger.log('Starting nickname relay bot...');
  logger.log(`Database host: ${config.database.host}`);
  logger.log('Bot token: set');

  const app = await NestFactory.createApplicationContext(
    AppModule.forRoot(config),
    { logger: config.logLevels },
  );
  app.enableShutdownHooks();
}

bootstrap().catch((error: unknown) => {
  if (error instanceof ConfigValidationError) {
    error.problems.forEach((problem) => logger.error(problem));
  } else {
    logger.error(
      `Failed to start: ${getErrorMessage(error)}`,
      getErrorStack(error),
    );
  }

  process.exit(1);
});

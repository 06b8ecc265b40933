import 'reflect-metadata';
import { Logger, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp, setupSwagger } from './app.setup';
import { APP_CONFIG, AppConfig } from './config/configuration';

function logLevelsFor(env: string): LogLevel[] {
  return env === 'production'
    ? ['log', 'warn', 'error', 'fatal']
    : ['log', 'warn', 'error', 'fatal', 'debug', 'verbose'];
}

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  try {
    const app = await NestFactory.create(AppModule, {
      logger: logLevelsFor(process.env.APP_ENV ?? 'development'),
    });
    const config = app.get<AppConfig>(APP_CONFIG);

    configureApp(app);
    setupSwagger(app);
    app.enableShutdownHooks();

    await app.listen(config.port);
    logger.log(`Application is running on: http://localhost:${config.port}/api/v1 (${config.env}, ${config.storageBackend} storage)`);
    logger.log(`Swagger documentation: http://localhost:${config.port}/api/docs`);
  } catch (error) {
    logger.error('Error starting the application', error instanceof Error ? error.stack : String(error));
    process.exit(1);
  }
}

void bootstrap();

import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app/app.module';
import { configureApp } from './app/app.setup';
import { loadConfig } from './app/config/app-config';

async function bootstrap() {
  const config = loadConfig();

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: config.logLevels,
    bodyParser: false,
  });
  configureApp(app, config);
  app.enableShutdownHooks();

  await app.listen(config.port);
  Logger.log(`Application is running on: http://localhost:${config.port}/${config.apiPrefix}`);
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.message : String(err), 'Bootstrap');
  process.exit(1);
});

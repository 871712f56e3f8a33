#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { ConsoleShell } from './contact-book/presentation/cli/console-shell';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  // Structured logging
  app.useLogger(app.get(Logger));

  await app.get(ConsoleShell).run();
  await app.close();
}
void bootstrap();

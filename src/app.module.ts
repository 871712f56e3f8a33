import { Module } from '@nestjs/common';
import { LoggerModule, Params } from 'nestjs-pino';
import { destination } from 'pino';
import { ContactBookModule } from './contact-book/contact-book.module';
import { AppConfigModule } from './shared/config/app-config.module';
import { AppConfig } from './shared/config/app.config';

// stdout belongs to the conversation, so every log line goes to stderr
function loggerParams(config: AppConfig): Params {
  if (config.nodeEnv === 'production') {
    return { pinoHttp: [{ level: config.logLevel }, destination(2)] };
  }

  return {
    pinoHttp: {
      level: config.logLevel,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    },
  };
}

@Module({
  imports: [
    // Structured logging
    LoggerModule.forRootAsync({
      imports: [AppConfigModule],
      inject: [AppConfig],
      useFactory: loggerParams,
    }),

    // Feature modules
    ContactBookModule,
  ],
})
export class AppModule {}

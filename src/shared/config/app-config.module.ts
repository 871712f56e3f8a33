import { Module } from '@nestjs/common';
import { AppConfig, loadAppConfig } from './app.config';

@Module({
  providers: [
    {
      provide: AppConfig,
      useFactory: () => loadAppConfig(process.env),
    },
  ],
  exports: [AppConfig],
})
export class AppConfigModule {}

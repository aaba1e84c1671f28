import { Global, Module } from '@nestjs/common';
import { SettingsService } from './settings.service.js';

@Global()
@Module({
  providers: [
    {
      provide: SettingsService,
      useFactory: () => new SettingsService(process.env),
    },
  ],
  exports: [SettingsService],
})
export class SettingsModule {}

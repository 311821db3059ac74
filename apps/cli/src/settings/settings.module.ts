import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SETTINGS_FILE, SettingsService } from './settings.service';

export interface SettingsModuleOptions {
  configFile?: string;
}

@Module({})
export class SettingsModule {
  static forRoot(options: SettingsModuleOptions = {}): DynamicModule {
    return {
      module: SettingsModule,
      global: true,
      imports: [ConfigModule.forRoot({ isGlobal: true })],
      providers: [SettingsService, { provide: SETTINGS_FILE, useValue: options.configFile ?? null }],
      exports: [SettingsService],
    };
  }
}

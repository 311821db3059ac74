import { DynamicModule, Module } from '@nestjs/common';
import { RunModule } from './run/run.module';
import { SettingsModule, SettingsModuleOptions } from './settings/settings.module';

@Module({})
export class AppModule {
  static forRoot(options: SettingsModuleOptions = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [SettingsModule.forRoot(options), RunModule],
    };
  }
}

import { Module } from '@nestjs/common';
import { ReportModule } from '../report/report.module';
import { TasksModule } from '../tasks/tasks.module';
import { RunService } from './run.service';
import { ScriptLoaderService } from './script-loader.service';

@Module({
  imports: [TasksModule, ReportModule],
  providers: [RunService, ScriptLoaderService],
  exports: [RunService],
})
export class RunModule {}

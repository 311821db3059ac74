import { Module } from '@nestjs/common';
import { REPORT_SINK, ReportService, streamSink } from './report.service';

@Module({
  providers: [ReportService, { provide: REPORT_SINK, useFactory: () => streamSink(process.stdout) }],
  exports: [ReportService],
})
export class ReportModule {}

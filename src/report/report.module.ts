import { Module } from '@nestjs/common';
import { VavReportService } from './vav-report.service';

@Module({
  providers: [VavReportService],
  exports: [VavReportService],
})
export class ReportModule {}

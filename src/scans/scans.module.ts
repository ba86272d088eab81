import { GmpModule } from '@gmp/gmp.module';
import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { ReportPollerService } from '@scans/report-poller.service';
import { ScanLauncherService } from '@scans/scan-launcher.service';
import { ScanPollScheduler } from '@scans/scan-poll.scheduler';
import { ScanRegistryService } from '@scans/scan-registry.service';
import { ScansController } from '@scans/scans.controller';
import { ScansService } from '@scans/scans.service';
import { TargetTaskBuilderService } from '@scans/target-task-builder.service';

@Module({
  imports: [GmpModule, ScheduleModule.forRoot()],
  controllers: [ScansController],
  providers: [
    ScanRegistryService,
    TargetTaskBuilderService,
    ScanLauncherService,
    ReportPollerService,
    ScansService,
    ScanPollScheduler,
  ],
  exports: [ScansService, ScanRegistryService],
})
export class ScansModule {}

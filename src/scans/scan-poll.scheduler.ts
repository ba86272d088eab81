import { describeError } from '@common/utils/error-handler';
import { ConfigService } from '@config/config.service';
import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { ScanRegistryService, isTerminalStatus } from '@scans/scan-registry.service';
import { ScansService } from '@scans/scans.service';

export const SCAN_POLL_INTERVAL_NAME = 'scan-status-poll';

/**
 * Optional cadence on top of the pull interface: refreshes every active scan at a fixed interval
 */
@Injectable()
export class ScanPollScheduler implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ScanPollScheduler.name);
  private polling = false;

  constructor(
    private readonly configService: ConfigService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly registry: ScanRegistryService,
    private readonly scansService: ScansService,
  ) {}

  onModuleInit(): void {
    const { enabled, intervalMs } = this.configService.getPollingConfig();
    if (!enabled) {
      this.logger.log('Background polling disabled, scan status is refreshed on request only');
      return;
    }

    const interval = setInterval(() => {
      this.pollActiveScans().catch(error => this.logger.error(`Background poll failed: ${describeError(error)}`));
    }, intervalMs);
    this.schedulerRegistry.addInterval(SCAN_POLL_INTERVAL_NAME, interval);

    this.logger.log(`Background polling every ${intervalMs / 1000} seconds`);
  }

  onModuleDestroy(): void {
    if (this.schedulerRegistry.doesExist('interval', SCAN_POLL_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(SCAN_POLL_INTERVAL_NAME);
    }
  }

  /**
   * Poll every scan that has not finished yet. Returns how many were polled.
   */
  async pollActiveScans(): Promise<number> {
    if (this.polling) {
      this.logger.debug('Previous poll still in progress, skipping');
      return 0;
    }

    this.polling = true;
    try {
      const active = this.registry.list().filter(record => !isTerminalStatus(record.status));
      for (const record of active) {
        const result = await this.scansService.refreshStatus(record.scanId);
        this.logger.debug(`Scan ${record.scanId}: ${result.status} (${result.progress}%)`);
      }
      return active.length;
    } finally {
      this.polling = false;
    }
  }
}

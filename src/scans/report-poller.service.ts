import { GMP_TASK_STATES } from '@common/constants/gmp';
import { NotReadyError } from '@common/utils/error-handler';
import { ConfigService } from '@config/config.service';
import { GmpSession } from '@gmp/gmp-session';
import { Injectable, Logger } from '@nestjs/common';
import { translateReport } from '@scans/report-translator';
import { ScanRegistryService, isTerminalStatus } from '@scans/scan-registry.service';
import { ObservedScanStatus, PollResult, ScanResult } from '@types';

function includesState(states: readonly string[], status: string): boolean {
  return states.includes(status);
}

/**
 * Map a gvmd task state onto a scan status
 */
export function mapTaskStatus(engineStatus: string): ObservedScanStatus {
  if (includesState(GMP_TASK_STATES.PENDING, engineStatus)) return 'Pending';
  if (includesState(GMP_TASK_STATES.RUNNING, engineStatus)) return 'Running';
  if (includesState(GMP_TASK_STATES.DONE, engineStatus)) return 'Done';
  if (includesState(GMP_TASK_STATES.FAILED, engineStatus)) return 'Failed';
  return 'Unknown';
}

/**
 * Pull-based status checks and report retrieval. One engine round-trip per call, no timers.
 */
@Injectable()
export class ReportPollerService {
  private readonly logger = new Logger(ReportPollerService.name);

  constructor(
    private readonly registry: ScanRegistryService,
    private readonly configService: ConfigService,
  ) {}

  async pollStatus(session: GmpSession, scanId: string): Promise<PollResult> {
    const record = this.registry.get(scanId);

    if (isTerminalStatus(record.status)) {
      return { scanId, status: record.status, progress: record.progress, authoritative: true };
    }

    const task = await session.getTask(record.taskId);
    const observed = mapTaskStatus(task.status);

    if (observed === 'Unknown') {
      this.logger.warn(`Scan ${scanId}: unrecognised task state "${task.status}", keeping ${record.status}`);
      return { scanId, status: 'Unknown', progress: record.progress, authoritative: false };
    }

    const updated = this.registry.updateStatus(scanId, observed, task.progress);
    this.logger.debug(`Scan ${scanId}: engine reports ${task.status} (${task.progress}%)`);
    return { scanId, status: updated.status, progress: updated.progress, authoritative: true };
  }

  /**
   * Fetch and translate the report of a finished scan. The translation is cached on the record.
   */
  async fetchResult(session: GmpSession, scanId: string): Promise<ScanResult> {
    const record = this.registry.get(scanId);

    if (record.status !== 'Done') {
      throw new NotReadyError(`Scan ${scanId} is ${record.status}`, scanId, record.status);
    }
    if (record.result) {
      return record.result;
    }

    const { reportFilter } = this.configService.getScanDefaults();
    const raw = await session.getReport(record.reportId, { filter: reportFilter, details: true });
    const result = translateReport(raw, { name: record.name, targets: record.targets });

    this.registry.attachResult(scanId, result);
    this.logger.log(`Scan ${scanId}: translated report with ${result.result_details.length} findings`);
    return result;
  }
}

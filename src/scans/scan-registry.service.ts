import { AppError, NotFoundError } from '@common/utils/error-handler';
import { KeyedMutex } from '@common/utils/keyed-mutex';
import { Injectable, Logger } from '@nestjs/common';
import { ObservedScanStatus, ScanRecord, ScanResult, ScanStatus } from '@types';

const STATUS_RANK: Record<ScanStatus, number> = {
  Pending: 0,
  Running: 1,
  Done: 2,
  Failed: 2,
};

export function isTerminalStatus(status: ScanStatus): boolean {
  return STATUS_RANK[status] === 2;
}

/**
 * In-process map from scan id to its record. Entries live until the process exits.
 */
@Injectable()
export class ScanRegistryService {
  private readonly logger = new Logger(ScanRegistryService.name);
  private readonly records = new Map<string, ScanRecord>();
  private readonly mutex = new KeyedMutex();

  get size(): number {
    return this.records.size;
  }

  put(scanId: string, record: ScanRecord): void {
    if (this.records.has(scanId)) {
      throw new AppError(`Scan ${scanId} is already registered`, 'DUPLICATE_SCAN_ID', { scanId });
    }
    this.records.set(scanId, { ...record, scanId, targets: [...record.targets] });
    this.logger.log(`Registered scan ${scanId} (${record.name}) for ${record.targets.join(', ')}`);
  }

  get(scanId: string): ScanRecord {
    const record = this.records.get(scanId);
    if (!record) {
      throw new NotFoundError(`Scan ${scanId} not found`, 'scan', scanId);
    }
    return { ...record, targets: [...record.targets] };
  }

  /**
   * Apply a polled status. Status only moves forward; Unknown and regressions leave the record as is.
   */
  updateStatus(scanId: string, status: ObservedScanStatus, progress?: number): ScanRecord {
    const record = this.records.get(scanId);
    if (!record) {
      throw new NotFoundError(`Scan ${scanId} not found`, 'scan', scanId);
    }

    if (status === 'Unknown') {
      return this.get(scanId);
    }

    record.lastPolledAt = new Date();

    const advances = STATUS_RANK[status] > STATUS_RANK[record.status];
    if (status !== record.status && !advances) {
      this.logger.warn(`Ignoring status change ${record.status} -> ${status} for scan ${scanId}`);
      return this.get(scanId);
    }

    if (advances) {
      this.logger.log(`Scan ${scanId}: ${record.status} -> ${status}`);
      record.status = status;
    }

    if (status === 'Done') {
      record.progress = 100;
    } else if (progress !== undefined && progress >= record.progress) {
      record.progress = progress;
    }

    return this.get(scanId);
  }

  /**
   * Cache the translated report of a finished scan
   */
  attachResult(scanId: string, result: ScanResult): void {
    const record = this.records.get(scanId);
    if (!record) {
      throw new NotFoundError(`Scan ${scanId} not found`, 'scan', scanId);
    }
    record.result = result;
  }

  list(status?: ScanStatus): ScanRecord[] {
    return [...this.records.values()]
      .filter(record => status === undefined || record.status === status)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map(record => ({ ...record, targets: [...record.targets] }));
  }

  /**
   * Serialize work on one record; different scans never wait on each other
   */
  runExclusive<T>(scanId: string, task: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(scanId, task);
  }
}

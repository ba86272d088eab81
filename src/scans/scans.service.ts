import {
  AlreadyStartedError,
  AuthError,
  ConnectionError,
  NotReadyError,
  RemoteObjectError,
  TimeoutError,
  ValidationError,
  describeError,
} from '@common/utils/error-handler';
import { withRetry } from '@common/utils/retry';
import { parseTargets } from '@common/utils/target-parser';
import { ConfigService } from '@config/config.service';
import { GmpSession } from '@gmp/gmp-session';
import { SessionManagerService } from '@gmp/session-manager.service';
import { Injectable, Logger } from '@nestjs/common';
import { ReportPollerService } from '@scans/report-poller.service';
import { ScanLauncherService } from '@scans/scan-launcher.service';
import { ScanRegistryService, isTerminalStatus } from '@scans/scan-registry.service';
import { TargetTaskBuilderService } from '@scans/target-task-builder.service';
import {
  ObservedScanStatus,
  PollResult,
  ScanListEntry,
  ScanRecord,
  ScanResult,
  ScanResultsResponse,
  TriggerScanBody,
  TriggerScanResponse,
} from '@types';
import { randomUUID } from 'crypto';

interface ScanRequest {
  name: string;
  addresses: string[];
  configId?: string;
  portListId?: string;
  requestToken: string;
}

interface LaunchedScan {
  scanId: string;
  taskId: string;
  targetId: string;
}

function isTransportFailure(error: unknown): boolean {
  return error instanceof ConnectionError || error instanceof TimeoutError;
}

// Failures on the engine side of a poll; these surface as an Unknown observation
function isEngineFailure(error: unknown): boolean {
  return isTransportFailure(error) || error instanceof AuthError || error instanceof RemoteObjectError;
}

function optionalId(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || !value.trim()) {
    throw new ValidationError(`${field} must be a non-empty string`, field, value);
  }
  return value.trim();
}

/**
 * Drives a scan request through target creation, task creation, start, polling and report translation
 */
@Injectable()
export class ScansService {
  private readonly logger = new Logger(ScansService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly sessionManager: SessionManagerService,
    private readonly builder: TargetTaskBuilderService,
    private readonly launcher: ScanLauncherService,
    private readonly poller: ReportPollerService,
    private readonly registry: ScanRegistryService,
  ) {}

  /**
   * Validate the request, create target and task, start the scan and register it.
   * A transport failure retries the whole pipeline on a fresh session; the lookups in
   * the builder and launcher keep a retry from creating a second target, task or scan.
   */
  async triggerScan(body: TriggerScanBody): Promise<TriggerScanResponse> {
    const { scan_name: scanName, targets } = body;
    if (typeof scanName !== 'string' || !scanName.trim()) {
      throw new ValidationError('scan_name is required', 'scan_name', scanName);
    }
    if (targets === undefined || targets === null || targets === '') {
      throw new ValidationError('targets is required', 'targets', targets);
    }

    const request: ScanRequest = {
      name: scanName.trim(),
      addresses: parseTargets(targets),
      configId: optionalId(body.config_id, 'config_id'),
      portListId: optionalId(body.port_list_id, 'port_list_id'),
      requestToken: randomUUID(),
    };

    this.logger.log(`Triggering scan "${request.name}" for ${request.addresses.join(', ')}`);

    const { maxAttempts, retryDelayMs } = this.configService.getRetryConfig();
    const launched = await withRetry(
      attempt => this.sessionManager.withSession(session => this.launchScan(session, request, attempt > 1)),
      { maxAttempts, retryDelayMs, isRetryable: isTransportFailure, operation: `trigger scan "${request.name}"` },
    );

    this.registry.put(launched.scanId, {
      scanId: launched.scanId,
      taskId: launched.taskId,
      targetId: launched.targetId,
      reportId: launched.scanId,
      name: request.name,
      targets: request.addresses,
      status: 'Pending',
      progress: 0,
      createdAt: new Date(),
      lastPolledAt: null,
      result: null,
    });

    return {
      message: 'Scan started',
      scan_name: request.name,
      targets: typeof targets === 'string' ? targets : request.addresses.join(','),
      scan_id: launched.scanId,
    };
  }

  /**
   * Current view of a scan: polls once when it is still active and fetches the report once it is done.
   * A scan that is not done yet yields empty detail and summary lists, never an error.
   */
  async getResults(scanId: string): Promise<ScanResultsResponse> {
    // Unknown ids fail before any engine traffic
    this.registry.get(scanId);

    return this.registry.runExclusive(scanId, async () => {
      let record = this.registry.get(scanId);
      if (record.result) {
        return this.toResultsResponse(record, record.status, record.result);
      }

      let observed: ObservedScanStatus = record.status;
      if (!isTerminalStatus(record.status)) {
        observed = (await this.pollSafely(scanId)).status;
        record = this.registry.get(scanId);
      }

      if (record.status !== 'Done') {
        return this.toResultsResponse(record, observed, null);
      }

      try {
        const result = await this.readWithRetry(`fetch report ${scanId}`, session =>
          this.poller.fetchResult(session, scanId),
        );
        return this.toResultsResponse(record, 'Done', result);
      } catch (error) {
        if (error instanceof NotReadyError) {
          return this.toResultsResponse(record, observed, null);
        }
        throw error;
      }
    });
  }

  /**
   * Poll one scan under its record lock; used by the background scheduler
   */
  async refreshStatus(scanId: string): Promise<PollResult> {
    return this.registry.runExclusive(scanId, () => this.pollSafely(scanId));
  }

  listScans(): ScanListEntry[] {
    return this.registry.list().map(record => ({
      scan_id: record.scanId,
      scan_name: record.name,
      targets: record.targets,
      status: record.status,
      progress: record.progress,
      created_at: record.createdAt.toISOString(),
      last_polled_at: record.lastPolledAt ? record.lastPolledAt.toISOString() : null,
    }));
  }

  private async launchScan(session: GmpSession, request: ScanRequest, isRetry: boolean): Promise<LaunchedScan> {
    const target = await this.builder.createTarget(session, request.name, request.addresses, {
      requestToken: request.requestToken,
      portListId: request.portListId,
    });

    const task = await this.builder.createTask(session, target.id, request.configId, {
      name: request.name,
      requestToken: request.requestToken,
      checkExisting: isRetry,
    });

    try {
      const scanId = await this.launcher.startTask(session, task.id);
      return { scanId, taskId: task.id, targetId: target.id };
    } catch (error) {
      // Only a task this request created on a lost attempt may be picked up again
      if (isRetry && task.kind === 'AlreadyExists' && error instanceof AlreadyStartedError) {
        const scanId = await this.launcher.recoverScanId(session, task.id);
        return { scanId, taskId: task.id, targetId: target.id };
      }
      throw error;
    }
  }

  /**
   * Poll with retries. When the engine cannot be reached the stored status stays as it
   * is and the caller sees Unknown.
   */
  private async pollSafely(scanId: string): Promise<PollResult> {
    try {
      return await this.readWithRetry(`poll scan ${scanId}`, session => this.poller.pollStatus(session, scanId));
    } catch (error) {
      if (isEngineFailure(error)) {
        const record = this.registry.get(scanId);
        this.logger.warn(`Polling scan ${scanId} failed, status stays ${record.status}: ${describeError(error)}`);
        return { scanId, status: 'Unknown', progress: record.progress, authoritative: false };
      }
      throw error;
    }
  }

  private readWithRetry<T>(operation: string, read: (session: GmpSession) => Promise<T>): Promise<T> {
    const { maxAttempts, retryDelayMs } = this.configService.getRetryConfig();
    return withRetry(() => this.sessionManager.withSession(read), { maxAttempts, retryDelayMs, operation });
  }

  private toResultsResponse(
    record: ScanRecord,
    status: ObservedScanStatus,
    result: ScanResult | null,
  ): ScanResultsResponse {
    return {
      scan_name: record.name,
      targets: [...record.targets],
      status,
      progress: record.progress,
      result_details: result ? result.result_details : [],
      result_summary: result ? result.result_summary : [],
    };
  }
}

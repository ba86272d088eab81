import { AlreadyStartedError, RemoteObjectError } from '@common/utils/error-handler';
import { KeyedMutex } from '@common/utils/keyed-mutex';
import { GmpSession } from '@gmp/gmp-session';
import { Injectable, Logger } from '@nestjs/common';

const STARTABLE_TASK_STATUS = 'New';

/**
 * Starts tasks, at most once each. The report id the engine hands back is the scan id.
 */
@Injectable()
export class ScanLauncherService {
  private readonly logger = new Logger(ScanLauncherService.name);
  private readonly startedTasks = new Map<string, string>();
  private readonly mutex = new KeyedMutex();

  async startTask(session: GmpSession, taskId: string): Promise<string> {
    return this.mutex.runExclusive(taskId, async () => {
      const known = this.startedTasks.get(taskId);
      if (known) {
        throw new AlreadyStartedError(`Task ${taskId} was already started as scan ${known}`, taskId, { scanId: known });
      }

      const task = await session.getTask(taskId);
      if (task.status !== STARTABLE_TASK_STATUS) {
        throw new AlreadyStartedError(`Task ${taskId} is ${task.status}, it can only be started once`, taskId, {
          status: task.status,
        });
      }

      const scanId = await session.startTask(taskId);
      this.startedTasks.set(taskId, scanId);
      this.logger.log(`Started task ${taskId}, scan id ${scanId}`);
      return scanId;
    });
  }

  /**
   * Scan id of a task that an earlier, interrupted attempt of the same request started
   */
  async recoverScanId(session: GmpSession, taskId: string): Promise<string> {
    return this.mutex.runExclusive(taskId, async () => {
      const known = this.startedTasks.get(taskId);
      if (known) return known;

      const task = await session.getTask(taskId);
      const scanId = task.currentReportId ?? task.lastReportId;
      if (!scanId) {
        throw new RemoteObjectError(`Task ${taskId} is ${task.status} but has no report`, 'get_tasks', '404');
      }

      this.startedTasks.set(taskId, scanId);
      this.logger.warn(`Recovered scan id ${scanId} for task ${taskId} after an interrupted start`);
      return scanId;
    });
  }
}

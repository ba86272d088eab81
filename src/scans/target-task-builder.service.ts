import { REQUEST_MARKER_PREFIX } from '@common/constants/gmp';
import { RemoteObjectError, ValidationError } from '@common/utils/error-handler';
import { parseTargets } from '@common/utils/target-parser';
import { ConfigService } from '@config/config.service';
import { GmpSession } from '@gmp/gmp-session';
import { Injectable, Logger } from '@nestjs/common';
import { CreateOutcome, GmpNamedObject } from '@types';

export interface TargetOptions {
  requestToken: string;
  portListId?: string;
}

export interface TaskOptions {
  name: string;
  requestToken: string;
  scannerId?: string;
  // Set on retries, when an earlier attempt may have created the task already
  checkExisting?: boolean;
}

/**
 * Comment stamped on every object created for one scan request
 */
export function requestMarker(requestToken: string): string {
  return `${REQUEST_MARKER_PREFIX}${requestToken}`;
}

/**
 * Name of the remote target for one request. gvmd refuses duplicate target names,
 * and targets are never deleted here, so the caller's name alone cannot be reused.
 */
export function remoteTargetName(name: string, requestToken: string): string {
  return `${name} ${requestToken}`;
}

/**
 * Creates the remote target and task a scan needs. Creation is not idempotent on the
 * engine side, so every create is preceded by a lookup for what an earlier attempt left.
 */
@Injectable()
export class TargetTaskBuilderService {
  private readonly logger = new Logger(TargetTaskBuilderService.name);

  constructor(private readonly configService: ConfigService) {}

  async createTarget(
    session: GmpSession,
    name: string,
    addresses: string[],
    options: TargetOptions,
  ): Promise<CreateOutcome> {
    if (!name.trim()) {
      throw new ValidationError('Target name must not be empty', 'scan_name', name);
    }
    const hosts = parseTargets(addresses);
    const marker = requestMarker(options.requestToken);

    const targetName = remoteTargetName(name, options.requestToken);

    const ours = (await session.getTargets()).find(target => target.name === targetName && target.comment === marker);
    if (ours) {
      this.logger.log(`Reusing target ${ours.id} created by an earlier attempt for "${name}"`);
      return { kind: 'AlreadyExists', id: ours.id };
    }

    const id = await session.createTarget({
      name: targetName,
      hosts,
      portListId: options.portListId ?? this.configService.getScanDefaults().portListId,
      comment: marker,
    });
    this.logger.log(`Created target ${id} "${targetName}" with hosts ${hosts.join(',')}`);
    return { kind: 'Created', id };
  }

  async createTask(
    session: GmpSession,
    targetId: string,
    configId: string | undefined,
    options: TaskOptions,
  ): Promise<CreateOutcome> {
    const marker = requestMarker(options.requestToken);

    if (options.checkExisting) {
      const existing = (await session.getTasks()).find(
        task => task.name === options.name && task.comment === marker && task.targetId === targetId,
      );
      if (existing) {
        this.logger.log(`Reusing task ${existing.id} created by an earlier attempt for "${options.name}"`);
        return { kind: 'AlreadyExists', id: existing.id };
      }
    }

    const resolvedConfigId = configId ?? (await this.resolveScanConfigId(session));
    const scannerId = options.scannerId ?? (await this.resolveScannerId(session));

    const id = await session.createTask({
      name: options.name,
      targetId,
      configId: resolvedConfigId,
      scannerId,
      comment: marker,
    });
    this.logger.log(`Created task ${id} "${options.name}" for target ${targetId}`);
    return { kind: 'Created', id };
  }

  private async resolveScanConfigId(session: GmpSession): Promise<string> {
    const { scanConfigId, scanConfigName } = this.configService.getScanDefaults();
    if (scanConfigId) return scanConfigId;
    return this.findByName(await session.getScanConfigs(), scanConfigName, 'get_configs', 'scan config');
  }

  private async resolveScannerId(session: GmpSession): Promise<string> {
    const { scannerId, scannerName } = this.configService.getScanDefaults();
    if (scannerId) return scannerId;
    return this.findByName(await session.getScanners(), scannerName, 'get_scanners', 'scanner');
  }

  private findByName(objects: GmpNamedObject[], name: string, command: string, kind: string): string {
    const match = objects.find(object => object.name === name);
    if (!match) {
      throw new RemoteObjectError(`Default ${kind} "${name}" not found`, command, '404');
    }
    return match.id;
  }
}

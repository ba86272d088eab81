import { describeError } from '@common/utils/error-handler';
import { ConfigService } from '@config/config.service';
import { SessionManagerService } from '@gmp/session-manager.service';
import { Injectable, Logger } from '@nestjs/common';
import { ScanRegistryService } from '@scans/scan-registry.service';

export interface EngineHealth {
  status: 'ok' | 'error';
  version?: string;
  error?: string;
}

export interface HealthStatus {
  status: 'ok' | 'degraded';
  uptime: number;
  timestamp: string;
  environment: string;
  trackedScans: number;
  engine: EngineHealth;
}

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);
  private readonly startTime = Date.now();

  constructor(
    private readonly configService: ConfigService,
    private readonly sessionManager: SessionManagerService,
    private readonly registry: ScanRegistryService,
  ) {}

  /**
   * Get the health status of the application, including whether gvmd accepts a session
   */
  async getHealth(): Promise<HealthStatus> {
    const engine = await this.checkEngine();

    return {
      status: engine.status === 'ok' ? 'ok' : 'degraded',
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      timestamp: new Date().toISOString(),
      environment: this.configService.getEnvironment(),
      trackedScans: this.registry.size,
      engine,
    };
  }

  private async checkEngine(): Promise<EngineHealth> {
    try {
      const version = await this.sessionManager.withSession(async session => session.version ?? 'unknown');
      return { status: 'ok', version };
    } catch (error) {
      this.logger.warn(`Engine health check failed: ${describeError(error)}`);
      return { status: 'error', error: describeError(error) };
    }
  }
}

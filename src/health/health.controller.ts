import { Controller, Get } from '@nestjs/common';
import { HealthService, HealthStatus } from '@health/health.service';

@Controller('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  /**
   * GET /api/health
   *
   * @returns HealthStatus object with application status information
   * - status: 'degraded' when no GMP session can be opened
   * - uptime: seconds since application start
   * - engine: GMP protocol version reported by gvmd, or the connection error
   */
  @Get()
  getHealth(): Promise<HealthStatus> {
    return this.healthService.getHealth();
  }
}

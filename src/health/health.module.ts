import { Module } from '@nestjs/common';
import { GmpModule } from '@gmp/gmp.module';
import { HealthController } from '@health/health.controller';
import { HealthService } from '@health/health.service';
import { ScansModule } from '@scans/scans.module';

@Module({
  imports: [GmpModule, ScansModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}

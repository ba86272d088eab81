import 'reflect-metadata';
import { ConfigModule } from '@config/config.module';
import { HealthModule } from '@health/health.module';
import { LoggingModule } from '@logging/logging.module';
import { ScansModule } from '@scans/scans.module';
import { Module } from '@nestjs/common';

@Module({
  imports: [ConfigModule, LoggingModule, ScansModule, HealthModule],
})
export class AppModule {}

import { ConfigService } from '@config/config.service';
import { CustomLoggerService } from '@logging/logger.service';
import { Global, Module } from '@nestjs/common';

@Global()
@Module({
  providers: [
    {
      provide: CustomLoggerService,
      useFactory: (configService: ConfigService) => new CustomLoggerService(configService),
      inject: [ConfigService],
    },
  ],
  exports: [CustomLoggerService],
})
export class LoggingModule {}

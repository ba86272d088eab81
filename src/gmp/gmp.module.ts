import { ConfigService } from '@config/config.service';
import { SocketGmpTransport } from '@gmp/gmp-transport';
import { GMP_TRANSPORT_FACTORY, SessionManagerService } from '@gmp/session-manager.service';
import { Module } from '@nestjs/common';
import { GmpTransportFactory } from '@types';

@Module({
  providers: [
    {
      provide: GMP_TRANSPORT_FACTORY,
      useFactory: (configService: ConfigService): GmpTransportFactory => {
        const connection = configService.getGmpConnectionConfig();
        return () => new SocketGmpTransport(connection);
      },
      inject: [ConfigService],
    },
    SessionManagerService,
  ],
  exports: [SessionManagerService],
})
export class GmpModule {}

import 'reflect-metadata';
import { AppModule } from '@/app.module';
import { ConfigService } from '@config/config.service';
import { CustomLoggerService } from '@logging/logger.service';
import { NestFactory } from '@nestjs/core';

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  // Don't exit the process
});

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  // Get our custom logger service
  const customLogger = app.get(CustomLoggerService);
  app.useLogger(customLogger);

  // Set global prefix
  app.setGlobalPrefix('api');

  const configService = app.get(ConfigService);
  const port = configService.getPort();
  const environment = configService.getEnvironment();
  const connection = configService.getGmpConnectionConfig();
  const engine = connection.type === 'unix' ? connection.socketPath : `${connection.host}:${connection.port} (TLS)`;

  await app.listen(port, '0.0.0.0');

  customLogger.logStartupInfo(port, environment, engine);

  // Handle graceful shutdown
  const shutdown = async () => {
    customLogger.logShutdownInfo();
    await app.close();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch(error => {
      console.error('Failed to shut down cleanly:', error);
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

bootstrap().catch(error => {
  console.error('Failed to start application:', error);
  process.exit(1);
});

import { ConfigService } from '@config/config.service';
import { withRetry } from '@common/utils/retry';
import { GmpSession } from '@gmp/gmp-session';
import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { GmpTransportFactory } from '@types';

export const GMP_TRANSPORT_FACTORY = Symbol('GMP_TRANSPORT_FACTORY');

/**
 * Hands out authenticated GMP sessions, one per operation, and makes sure each is closed
 */
@Injectable()
export class SessionManagerService implements OnModuleDestroy {
  private readonly logger = new Logger(SessionManagerService.name);
  private readonly activeSessions = new Set<GmpSession>();

  constructor(
    private readonly configService: ConfigService,
    @Inject(GMP_TRANSPORT_FACTORY) private readonly transportFactory: GmpTransportFactory,
  ) {}

  get activeSessionCount(): number {
    return this.activeSessions.size;
  }

  /**
   * Connect, negotiate the protocol version and log in. Connection failures are
   * retried with backoff; rejected credentials are not.
   */
  async acquireSession(): Promise<GmpSession> {
    const { maxAttempts, retryDelayMs } = this.configService.getRetryConfig();
    return withRetry(() => this.openSession(), { maxAttempts, retryDelayMs, operation: 'GMP session setup' });
  }

  releaseSession(session: GmpSession): void {
    session.close();
    if (this.activeSessions.delete(session)) {
      this.logger.debug(`Released GMP session ${session.id}`);
    }
  }

  /**
   * Run `operation` on a fresh session and release it on every exit path
   */
  async withSession<T>(operation: (session: GmpSession) => Promise<T>): Promise<T> {
    const session = await this.acquireSession();
    try {
      return await operation(session);
    } finally {
      this.releaseSession(session);
    }
  }

  onModuleDestroy(): void {
    if (this.activeSessions.size > 0) {
      this.logger.warn(`Closing ${this.activeSessions.size} GMP sessions on shutdown`);
    }
    for (const session of this.activeSessions) {
      this.releaseSession(session);
    }
  }

  private async openSession(): Promise<GmpSession> {
    const { timeoutMs } = this.configService.getGmpConnectionConfig();
    const transport = this.transportFactory();

    try {
      await transport.connect();
      const session = new GmpSession(transport, timeoutMs);
      const version = await session.negotiateVersion();
      await session.authenticate(this.configService.getGmpCredentials());

      this.activeSessions.add(session);
      this.logger.debug(`Opened GMP session ${session.id} (GMP ${version})`);
      return session;
    } catch (error) {
      transport.close();
      throw error;
    }
  }
}

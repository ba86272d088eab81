import { ConnectionError, TimeoutError, describeError } from '@common/utils/error-handler';
import { isCompleteDocument } from '@gmp/gmp-xml';
import { Logger } from '@nestjs/common';
import { GmpConnectionConfig, GmpTransport } from '@types';
import * as net from 'net';
import * as tls from 'tls';

/**
 * GMP over a Unix domain socket or a TLS connection to gvmd
 */
export class SocketGmpTransport implements GmpTransport {
  private readonly logger = new Logger(SocketGmpTransport.name);
  private socket: net.Socket | null = null;
  private busy = false;

  constructor(private readonly config: GmpConnectionConfig) {}

  get isOpen(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  private describeEndpoint(): string {
    return this.config.type === 'unix' ? this.config.socketPath : `${this.config.host}:${this.config.port}`;
  }

  connect(): Promise<void> {
    if (this.isOpen) return Promise.resolve();

    const endpoint = this.describeEndpoint();
    this.logger.debug(`Connecting to GMP endpoint ${endpoint}`);

    return new Promise<void>((resolve, reject) => {
      const socket =
        this.config.type === 'unix'
          ? net.createConnection({ path: this.config.socketPath })
          : tls.connect({
              host: this.config.host,
              port: this.config.port,
              rejectUnauthorized: this.config.rejectUnauthorized,
            });

      const timer = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(new TimeoutError(`Connecting to ${endpoint} timed out`, this.config.timeoutMs, { endpoint }));
      }, this.config.timeoutMs);

      const onReady = () => {
        cleanup();
        socket.setEncoding('utf8');
        // Stays for the life of the socket, also between requests
        socket.on('error', error => {
          this.logger.warn(`GMP connection to ${endpoint} failed: ${error.message}`);
          if (this.socket === socket) this.close();
        });
        this.socket = socket;
        resolve();
      };

      const onError = (error: Error) => {
        cleanup();
        socket.destroy();
        reject(new ConnectionError(`Cannot connect to ${endpoint}: ${error.message}`, { endpoint }));
      };

      const readyEvent = this.config.type === 'unix' ? 'connect' : 'secureConnect';
      const cleanup = () => {
        clearTimeout(timer);
        socket.off(readyEvent, onReady);
        socket.off('error', onError);
      };

      socket.once(readyEvent, onReady);
      socket.once('error', onError);
    });
  }

  request(xml: string, timeoutMs: number): Promise<string> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      return Promise.reject(new ConnectionError('GMP transport is not connected'));
    }
    if (this.busy) {
      return Promise.reject(new ConnectionError('GMP transport already has a request in flight'));
    }
    this.busy = true;

    return new Promise<string>((resolve, reject) => {
      let buffer = '';
      let settled = false;

      const finish = (error: Error | null, response?: string) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.off('data', onData);
        socket.off('error', onError);
        socket.off('close', onClose);
        this.busy = false;
        if (error) {
          // A half-read response leaves the stream unusable
          this.close();
          reject(error);
        } else {
          resolve(response ?? '');
        }
      };

      const timer = setTimeout(() => {
        finish(new TimeoutError(`GMP request timed out after ${timeoutMs}ms`, timeoutMs));
      }, timeoutMs);

      const onData = (chunk: string | Buffer) => {
        buffer += chunk.toString();
        if (isCompleteDocument(buffer)) {
          finish(null, buffer);
        }
      };

      const onError = (error: Error) => {
        finish(new ConnectionError(`GMP connection failed: ${error.message}`));
      };

      const onClose = () => {
        finish(new ConnectionError('GMP connection closed before a complete response was received'));
      };

      socket.on('data', onData);
      socket.once('error', onError);
      socket.once('close', onClose);

      socket.write(xml, error => {
        if (error) {
          finish(new ConnectionError(`Failed to send GMP command: ${describeError(error)}`));
        }
      });
    });
  }

  close(): void {
    if (!this.socket) return;
    const socket = this.socket;
    this.socket = null;
    socket.end();
    socket.destroy();
  }
}

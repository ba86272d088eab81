/**
 * Types for the GMP session lifecycle
 */

export type SessionState = 'connected' | 'authenticated' | 'invalidated' | 'closed';

/**
 * One byte stream to the manager. A transport carries at most one request at a time.
 */
export interface GmpTransport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  request(xml: string, timeoutMs: number): Promise<string>;
  close(): void;
}

export type GmpTransportFactory = () => GmpTransport;

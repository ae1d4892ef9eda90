import { randomUUID } from 'node:crypto';

export type SessionState = 'uninitialized' | 'initialized' | 'closed';

export interface ClientInfo {
  name: string;
  version?: string;
}

export class McpSession {
  readonly id = randomUUID();
  readonly createdAt = Date.now();
  lastSeenAt = this.createdAt;

  private current: SessionState = 'uninitialized';
  private negotiatedVersion: string | null = null;
  private client: ClientInfo | null = null;

  get state(): SessionState {
    return this.current;
  }

  get protocolVersion(): string | null {
    return this.negotiatedVersion;
  }

  get clientInfo(): ClientInfo | null {
    return this.client;
  }

  touch(): void {
    this.lastSeenAt = Date.now();
  }

  /** `initialize` may be repeated; every call lands in (or stays in) `initialized`. */
  initialize(protocolVersion: string, clientInfo: ClientInfo | null): void {
    if (this.current === 'closed') {
      throw new Error(`Session ${this.id} is closed`);
    }
    this.current = 'initialized';
    this.negotiatedVersion = protocolVersion;
    this.client = clientInfo;
  }

  close(): void {
    this.current = 'closed';
  }
}

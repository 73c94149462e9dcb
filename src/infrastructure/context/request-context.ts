import { AsyncLocalStorage } from 'async_hooks';
import { Injectable } from '@nestjs/common';

export interface RequestMetadata {
  requestId: string | null;
  /** Caller id forwarded by the gateway in `x-user-id`; there is no session handling here */
  userId: string | null;
  ipAddress: string | null;
  userAgent: string | null;
}

/**
 * Holds metadata of the HTTP request being served, for code that runs far
 * from the controller (the audit trail).
 */
@Injectable()
export class RequestContext {
  private readonly storage = new AsyncLocalStorage<RequestMetadata>();

  run<T>(metadata: RequestMetadata, callback: () => T): T {
    return this.storage.run(metadata, callback);
  }

  current(): RequestMetadata | null {
    return this.storage.getStore() ?? null;
  }
}

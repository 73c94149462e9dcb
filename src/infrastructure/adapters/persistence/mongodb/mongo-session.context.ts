import { AsyncLocalStorage } from 'async_hooks';
import { Injectable } from '@nestjs/common';
import { ClientSession } from 'mongoose';
import { DomainEvent } from '@domain/events';

/**
 * State of one unit of work: the transaction session (null when running
 * without transactions) and the domain events waiting for the commit.
 */
export interface SessionScope {
  readonly session: ClientSession | null;
  readonly pendingEvents: DomainEvent[];
}

/**
 * Carries the active unit of work across async calls so repositories join
 * its transaction without passing the session around.
 */
@Injectable()
export class MongoSessionContext {
  private readonly storage = new AsyncLocalStorage<SessionScope>();

  run<T>(scope: SessionScope, callback: () => Promise<T>): Promise<T> {
    return this.storage.run(scope, callback);
  }

  scope(): SessionScope | null {
    return this.storage.getStore() ?? null;
  }

  session(): ClientSession | null {
    return this.storage.getStore()?.session ?? null;
  }
}

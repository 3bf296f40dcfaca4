import type { AppDatabase } from '@infra/database/sqlite.client.js';

import { BookingRepository } from './booking.repo.js';
import { ItemRepository } from './item.repo.js';
import { SqliteStateRepository } from './state.repo.js';
import type { BusyRetryOptions } from './storage.util.js';
import { SyncTaskRepository } from './sync-task.repo.js';
import { UserRepository } from './user.repo.js';

export interface StoreOptions {
  stateTtlSeconds?: number;
  busyRetry?: BusyRetryOptions;
}

/** The single owner of persistent state; services receive it at construction. */
export class Store {
  readonly items: ItemRepository;
  readonly users: UserRepository;
  readonly bookings: BookingRepository;
  readonly outbox: SyncTaskRepository;
  readonly states: SqliteStateRepository;

  constructor(
    readonly db: AppDatabase,
    options: StoreOptions = {},
  ) {
    this.items = new ItemRepository(db);
    this.users = new UserRepository(db);
    this.bookings = new BookingRepository(db, options.busyRetry);
    this.outbox = new SyncTaskRepository(db);
    this.states = new SqliteStateRepository(db, options.stateTtlSeconds);
  }
}

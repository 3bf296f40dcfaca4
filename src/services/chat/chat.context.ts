import type { BookingService } from '@services/booking/booking.service.js';
import type { StateManager } from '@services/conversation/state.manager.js';
import type { ItemService } from '@services/items/item.service.js';
import type { UserService } from '@services/users/user.service.js';

import type { Clock } from '@utils/time.js';

import type { ChatUser } from './chat.transport.js';
import type { Messenger } from './messenger.js';

/** Manual mirror operations offered to managers. */
export interface SyncActions {
  syncAllBookings(signal?: AbortSignal): Promise<number>;
  syncScheduleNow(signal?: AbortSignal): Promise<void>;
}

export interface ChatSettings {
  timezone: string;
  managersContacts: readonly string[];
  itemsPageSize: number;
  bookingsPageSize: number;
  updateTimeoutMs: number;
  /** Days ahead listed under "all bookings". */
  allBookingsDays: number;
}

export interface ChatDeps {
  messenger: Messenger;
  bookings: BookingService;
  users: UserService;
  items: ItemService;
  states: StateManager;
  sync: SyncActions;
  settings: ChatSettings;
  clock: Clock;
}

/** The sender of the update being handled. */
export interface Session {
  chatId: number;
  userId: number;
  isManager: boolean;
  user: ChatUser;
  signal: AbortSignal;
}

import { NotFoundError } from '@core/errors/not-found.error.js';
import { BOOKING_STATUSES, type Booking, type BookingAction, type BookingStatus } from '@core/interfaces/booking.types.js';

import { logger } from '@utils/logger.js';
import { formatPhoneForDisplay } from '@utils/phone.js';
import { addDays, todayKey } from '@utils/time.js';

import { cb } from '../callback.grammar.js';
import type { ChatDeps, Session } from '../chat.context.js';
import type { InlineKeyboard } from '../chat.transport.js';
import { bookingActions } from '../keyboards.js';
import { paginate, renderPage } from '../pagination.js';
import {
  bookingCard,
  bookingLine,
  itemLine,
  MANAGER_ACK,
  ownerNotice,
  STATUS_LABELS,
  TEXT,
  userBookingLine,
} from '../texts.js';
import { showMainMenu } from './common.js';

const STATS_PERIODS = [
  { label: 'Сегодня', days: 1 },
  { label: '7 дней', days: 7 },
  { label: '30 дней', days: 30 },
] as const;

function countByStatus(list: readonly Booking[]): Record<BookingStatus, number> {
  const out: Record<BookingStatus, number> = {
    pending: 0,
    confirmed: 0,
    changed: 0,
    rescheduled: 0,
    canceled: 0,
    completed: 0,
  };
  for (const b of list) out[b.status] += 1;
  return out;
}

/**
 * Everything a manager does outside the booking wizard: booking lists and
 * cards, card actions, statistics, exports and manual mirror syncs. The
 * read-only menu entries shared with users live here too.
 */
export class ManagerDesk {
  constructor(private readonly deps: ChatDeps) {}

  async showAllBookings(s: Session, page: number, messageId?: number): Promise<void> {
    const tz = this.deps.settings.timezone;
    const today = todayKey(tz, this.deps.clock);
    const list = await this.deps.bookings.getBookingsByDateRange(
      today,
      addDays(today, this.deps.settings.allBookingsDays, tz),
    );
    if (list.length === 0) {
      await this.deps.messenger.text(s.chatId, TEXT.noBookings);
      return;
    }
    const view = renderPage(paginate(list, page, this.deps.settings.bookingsPageSize), {
      title: `👨‍💼 Все заявки (${list.length})`,
      line: bookingLine,
      pageData: (n) => cb.page('bookings_page', n),
      button: (b: Booking) => ({ text: `№${b.id} ${STATUS_LABELS[b.status]}`, data: cb.showBooking(b.id) }),
    });
    await this.sendOrEdit(s, view.text, view.keyboard, messageId);
  }

  /** Managers get the card with action buttons; the owner gets a plain card. */
  async showBookingCard(s: Session, bookingId: number): Promise<void> {
    const booking = await this.deps.bookings.getBooking(bookingId);
    if (s.isManager) {
      await this.deps.messenger.inline(s.chatId, bookingCard(booking), bookingActions(booking));
      return;
    }
    if (booking.userId !== s.userId) throw new NotFoundError(`Booking ${bookingId} not found`);
    await this.deps.messenger.text(s.chatId, bookingCard(booking));
  }

  /**
   * Applies a card button against the version the booking has now; a
   * concurrent change between two clicks surfaces as ConcurrentModification.
   * Returns the callback acknowledgement.
   */
  async onAction(s: Session, action: BookingAction, bookingId: number, messageId: number): Promise<string> {
    const current = await this.deps.bookings.getBooking(bookingId);
    if (action === 'change_item') {
      await this.offerItems(s, current, messageId);
      return 'Выберите новую позицию';
    }

    const { bookings } = this.deps;
    const handlers: Record<Exclude<BookingAction, 'change_item'>, () => Promise<Booking>> = {
      confirm: () => bookings.confirmBooking(current.id, current.version, s.userId),
      reject: () => bookings.rejectBooking(current.id, current.version, s.userId),
      complete: () => bookings.completeBooking(current.id, current.version, s.userId),
      reopen: () => bookings.reopenBooking(current.id, current.version, s.userId),
      reschedule: () => bookings.rescheduleBooking(current.id, current.version, s.userId),
    };
    const updated = await handlers[action]();
    await this.afterAction(s, action, updated, messageId);
    return MANAGER_ACK[action];
  }

  async onChangeTo(s: Session, bookingId: number, itemId: number, messageId: number): Promise<string> {
    const current = await this.deps.bookings.getBooking(bookingId);
    const updated = await this.deps.bookings.changeBookingItem(current.id, current.version, itemId, s.userId);
    await this.afterAction(s, 'change_item', updated, messageId);
    return MANAGER_ACK.change_item;
  }

  async onCall(s: Session, bookingId: number): Promise<void> {
    const booking = await this.deps.bookings.getBooking(bookingId);
    const phone = booking.phone ? formatPhoneForDisplay(booking.phone) : '—';
    await this.deps.messenger.text(s.chatId, `📞 ${booking.userName}: ${phone}`);
  }

  async stats(s: Session): Promise<void> {
    const tz = this.deps.settings.timezone;
    const today = todayKey(tz, this.deps.clock);
    const [all, active7, active30] = await Promise.all([
      this.deps.users.getAllUsers(),
      this.deps.users.getActiveUsers(7),
      this.deps.users.getActiveUsers(30),
    ]);

    const lines = [
      '📊 Статистика',
      '',
      `👥 Пользователей: ${all.length}`,
      `🟢 Активных за 7 дней: ${active7.length}`,
      `🟢 Активных за 30 дней: ${active30.length}`,
    ];
    for (const period of STATS_PERIODS) {
      const list = await this.deps.bookings.getBookingsByDateRange(addDays(today, 1 - period.days, tz), today);
      const counts = countByStatus(list);
      lines.push('', `📅 ${period.label}: ${list.length}`);
      for (const status of BOOKING_STATUSES) {
        if (counts[status] > 0) lines.push(`   ${STATUS_LABELS[status]}: ${counts[status]}`);
      }
    }

    await this.deps.messenger.inline(s.chatId, lines.join('\n'), [
      [{ text: '📥 Выгрузить пользователей', data: cb.exportUsers }],
    ]);
  }

  async exportUsers(s: Session): Promise<void> {
    let file: string;
    try {
      file = await this.deps.users.exportUsers();
    } catch (err) {
      logger.error('[chat] users export failed', { userId: s.userId, err });
      await this.deps.messenger.text(s.chatId, TEXT.exportFailed);
      return;
    }
    await this.deps.messenger.document(s.chatId, file, '👥 Пользователи');
  }

  async syncBookings(s: Session): Promise<void> {
    await this.runSync(s, TEXT.syncBookingsDone, async () => {
      await this.deps.sync.syncAllBookings(s.signal);
    });
  }

  async syncSchedule(s: Session): Promise<void> {
    await this.runSync(s, TEXT.syncScheduleDone, () => this.deps.sync.syncScheduleNow(s.signal));
  }

  async contacts(s: Session): Promise<void> {
    const contacts = this.deps.settings.managersContacts;
    const text = contacts.length > 0 ? ['📞 Контакты менеджеров:', '', ...contacts].join('\n') : TEXT.noContacts;
    await showMainMenu(this.deps, s, text);
  }

  async assortment(s: Session): Promise<void> {
    const items = await this.deps.items.getItems();
    if (items.length === 0) {
      await showMainMenu(this.deps, s, TEXT.noItems);
      return;
    }
    await this.deps.messenger.text(s.chatId, ['💼 Ассортимент:', '', ...items.map(itemLine)].join('\n'));
  }

  async myBookings(s: Session, page: number, messageId?: number): Promise<void> {
    const list = await this.deps.users.getUserBookings(s.userId);
    if (list.length === 0) {
      await this.deps.messenger.text(s.chatId, TEXT.noBookings);
      return;
    }
    const view = renderPage(paginate(list, page, this.deps.settings.bookingsPageSize), {
      title: `📊 Мои заявки (${list.length})`,
      line: userBookingLine,
      pageData: (n) => cb.page('my_bookings_page', n),
      button: (b: Booking) => ({ text: `№${b.id}`, data: cb.showBooking(b.id) }),
    });
    await this.sendOrEdit(s, view.text, view.keyboard, messageId);
  }

  private async offerItems(s: Session, booking: Booking, messageId: number): Promise<void> {
    const items = (await this.deps.items.getItems()).filter((i) => i.id !== booking.itemId);
    if (items.length === 0) {
      await this.deps.messenger.text(s.chatId, TEXT.noItems);
      return;
    }
    const keyboard: InlineKeyboard = items.map((i) => [{ text: i.name, data: cb.changeTo(booking.id, i.id) }]);
    keyboard.push([{ text: '⬅️ Назад', data: cb.showBooking(booking.id) }]);
    await this.deps.messenger.edit(s.chatId, messageId, `${bookingCard(booking)}\n\n✏️ Выберите новую позицию:`, keyboard);
  }

  private async afterAction(s: Session, action: BookingAction, updated: Booking, messageId: number): Promise<void> {
    await this.deps.messenger.edit(s.chatId, messageId, bookingCard(updated), bookingActions(updated));
    if (updated.userId !== s.userId) {
      await this.deps.messenger.text(updated.userId, ownerNotice(action, updated));
    }
  }

  private async runSync(s: Session, done: string, fn: () => Promise<void>): Promise<void> {
    await this.deps.messenger.text(s.chatId, TEXT.syncStarted);
    try {
      await fn();
    } catch (err) {
      logger.error('[chat] manual sync failed', { userId: s.userId, err });
      await this.deps.messenger.text(s.chatId, TEXT.syncFailed);
      return;
    }
    await this.deps.messenger.text(s.chatId, done);
  }

  private async sendOrEdit(s: Session, text: string, keyboard: InlineKeyboard, messageId?: number): Promise<void> {
    if (messageId !== undefined) {
      await this.deps.messenger.edit(s.chatId, messageId, text, keyboard);
    } else {
      await this.deps.messenger.inline(s.chatId, text, keyboard);
    }
  }
}

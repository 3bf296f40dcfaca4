import { isActiveStatus } from '@core/interfaces/booking.types.js';
import type { Item } from '@core/interfaces/item.types.js';

import type { StepOf } from '@services/conversation/state.types.js';

import { formatDayKey, parseDisplayDate, todayKey } from '@utils/time.js';

import type { ChatDeps, Session } from '../chat.context.js';
import { NAV, SCHEDULE_KEYBOARD } from '../keyboards.js';
import { BUTTONS, TEXT } from '../texts.js';
import { findActiveItem, showItemsPage } from './common.js';
import type { UserBookingFlow } from './user-booking.flow.js';

export const SCHEDULE_DAYS = 30;

type ScheduleStep = StepOf<'schedule_select_item' | 'view_schedule' | 'waiting_specific_date'>;

/** Read-only availability views: a 30-day grid per item and a single-date lookup. */
export class ScheduleFlow {
  constructor(
    private readonly deps: ChatDeps,
    private readonly booking: UserBookingFlow,
  ) {}

  async start(s: Session): Promise<void> {
    if (await showItemsPage(this.deps, s, 'schedule_items_page', 0)) {
      await this.deps.states.set(s.userId, { step: 'schedule_select_item', page: 0 });
    }
  }

  async onItemsPage(s: Session, page: number, messageId: number): Promise<void> {
    await this.deps.states.set(s.userId, { step: 'schedule_select_item', page });
    await showItemsPage(this.deps, s, 'schedule_items_page', page, messageId);
  }

  async onSelectItem(s: Session, itemId: number, messageId: number): Promise<string | undefined> {
    const item = await findActiveItem(this.deps, s, itemId);
    if (!item) return undefined;
    await this.deps.states.set(s.userId, { step: 'view_schedule', item_id: item.id });
    await this.deps.messenger.edit(
      s.chatId,
      messageId,
      `✅ Вы выбрали: ${item.name}\n\nТеперь выберите период для просмотра расписания:`,
    );
    await this.showMenu(s, item);
    return `Выбрано: ${item.name}`;
  }

  async prompt(s: Session, step: ScheduleStep): Promise<void> {
    switch (step.step) {
      case 'schedule_select_item':
        await showItemsPage(this.deps, s, 'schedule_items_page', step.page ?? 0);
        return;
      case 'view_schedule': {
        const item = await findActiveItem(this.deps, s, step.item_id);
        if (item) await this.showMenu(s, item);
        return;
      }
      case 'waiting_specific_date':
        await this.deps.messenger.reply(s.chatId, TEXT.pickScheduleDate, NAV);
        return;
    }
  }

  async onInput(s: Session, step: ScheduleStep, text: string): Promise<void> {
    switch (step.step) {
      case 'schedule_select_item':
        await this.prompt(s, step);
        return;
      case 'view_schedule':
        await this.onMenu(s, step, text);
        return;
      case 'waiting_specific_date':
        await this.onSpecificDate(s, step, text);
        return;
    }
  }

  private async showMenu(s: Session, item: Item): Promise<void> {
    await this.deps.messenger.reply(s.chatId, `📅 Расписание для ${item.name}\n\nВыберите период:`, SCHEDULE_KEYBOARD);
  }

  private async onMenu(s: Session, step: StepOf<'view_schedule'>, text: string): Promise<void> {
    switch (text) {
      case BUTTONS.thirtyDays:
        await this.showGrid(s, step.item_id);
        return;
      case BUTTONS.pickDate:
        await this.deps.states.set(s.userId, { step: 'waiting_specific_date', item_id: step.item_id });
        await this.deps.messenger.reply(s.chatId, TEXT.pickScheduleDate, NAV);
        return;
      case BUTTONS.bookThisItem:
        await this.booking.onSelectItem(s, step.item_id);
        return;
      default:
        await this.prompt(s, step);
    }
  }

  private async showGrid(s: Session, itemId: number): Promise<void> {
    const item = await findActiveItem(this.deps, s, itemId);
    if (!item) return;
    const today = todayKey(this.deps.settings.timezone, this.deps.clock);
    const days = await this.deps.bookings.getAvailability(item.id, today, SCHEDULE_DAYS);
    const lines = days.map((d) =>
      d.available > 0
        ? `✅ ${formatDayKey(d.date)}: свободно ${d.available} из ${item.totalQuantity}`
        : `❌ ${formatDayKey(d.date)}: занято`,
    );
    await this.deps.messenger.text(s.chatId, [`📅 ${item.name} на ${SCHEDULE_DAYS} дней:`, '', ...lines].join('\n'));
  }

  private async onSpecificDate(s: Session, step: StepOf<'waiting_specific_date'>, text: string): Promise<void> {
    const date = parseDisplayDate(text, this.deps.settings.timezone);
    if (!date) {
      await this.deps.messenger.text(s.chatId, TEXT.badDate);
      return;
    }
    const item = await findActiveItem(this.deps, s, step.item_id);
    if (!item) return;

    const booked = await this.deps.bookings.getBookedCount(item.id, date);
    const free = Math.max(0, item.totalQuantity - booked);
    const lines = [`📅 ${item.name} на ${formatDayKey(date)}: свободно ${free} из ${item.totalQuantity}`];
    if (s.isManager && booked > 0) {
      const daily = await this.deps.bookings.getDailyBookings(date, date);
      for (const b of (daily[date] ?? []).filter((x) => x.itemId === item.id && isActiveStatus(x.status))) {
        lines.push(`• №${b.id} ${b.userName}`);
      }
    }

    await this.deps.states.set(s.userId, { step: 'view_schedule', item_id: item.id });
    await this.deps.messenger.reply(s.chatId, lines.join('\n'), SCHEDULE_KEYBOARD);
  }
}

import type { StepOf } from '@services/conversation/state.types.js';

import { normalizePhone } from '@utils/phone.js';
import { sanitizeInput, sanitizeName } from '@utils/sanitize.js';
import { parseDisplayDate } from '@utils/time.js';

import type { ChatDeps, Session } from '../chat.context.js';
import { COMMENT_KEYBOARD, DATE_TYPE_KEYBOARD, MANAGER_CONFIRM_KEYBOARD, NAV } from '../keyboards.js';
import { BUTTONS, managerResult, managerSummary, TEXT } from '../texts.js';
import { findActiveItem, showItemsPage, showMainMenu } from './common.js';

export type ManagerStep = StepOf<
  | 'manager_waiting_client_name'
  | 'manager_waiting_client_phone'
  | 'manager_waiting_item_selection'
  | 'manager_waiting_date_type'
  | 'manager_waiting_single_date'
  | 'manager_waiting_start_date'
  | 'manager_waiting_end_date'
  | 'manager_waiting_comment'
  | 'manager_confirm_booking'
>;

/** Booking on behalf of a client: one date or a range, created as confirmed. */
export class ManagerBookingFlow {
  constructor(private readonly deps: ChatDeps) {}

  async start(s: Session): Promise<void> {
    await this.deps.states.set(s.userId, { step: 'manager_waiting_client_name', is_manager_booking: true });
    await this.deps.messenger.reply(s.chatId, TEXT.managerIntro, NAV);
  }

  async prompt(s: Session, step: ManagerStep): Promise<void> {
    const { messenger } = this.deps;
    switch (step.step) {
      case 'manager_waiting_client_name':
        await messenger.reply(s.chatId, TEXT.managerIntro, NAV);
        return;
      case 'manager_waiting_client_phone':
        await messenger.reply(s.chatId, TEXT.managerEnterPhone, NAV);
        return;
      case 'manager_waiting_item_selection':
        await showItemsPage(this.deps, s, 'manager_items_page', step.page ?? 0);
        return;
      case 'manager_waiting_date_type':
        await messenger.inline(s.chatId, TEXT.managerDateType, DATE_TYPE_KEYBOARD);
        return;
      case 'manager_waiting_single_date':
        await messenger.reply(s.chatId, TEXT.managerSingleDate, NAV);
        return;
      case 'manager_waiting_start_date':
        await messenger.reply(s.chatId, TEXT.managerStartDate, NAV);
        return;
      case 'manager_waiting_end_date':
        await messenger.reply(s.chatId, TEXT.managerEndDate, NAV);
        return;
      case 'manager_waiting_comment':
        await this.askComment(s, step.dates.length);
        return;
      case 'manager_confirm_booking':
        await this.showSummary(s, step);
        return;
    }
  }

  async onItemsPage(s: Session, page: number, messageId: number): Promise<void> {
    const step = await this.deps.states.get(s.userId);
    if (step.step !== 'manager_waiting_item_selection') {
      await this.deps.messenger.text(s.chatId, TEXT.sessionExpired);
      return;
    }
    await this.deps.states.set(s.userId, { ...step, page });
    await showItemsPage(this.deps, s, 'manager_items_page', page, messageId);
  }

  async onSelectItem(s: Session, itemId: number, messageId: number): Promise<string | undefined> {
    const step = await this.deps.states.get(s.userId);
    if (step.step !== 'manager_waiting_item_selection') {
      await this.deps.messenger.text(s.chatId, TEXT.sessionExpired);
      return undefined;
    }
    const item = await findActiveItem(this.deps, s, itemId);
    if (!item) return undefined;
    await this.deps.states.set(s.userId, {
      step: 'manager_waiting_date_type',
      is_manager_booking: true,
      client_name: step.client_name,
      client_phone: step.client_phone,
      item_id: item.id,
    });
    await this.deps.messenger.edit(s.chatId, messageId, `✅ Вы выбрали: ${item.name}`);
    await this.deps.messenger.inline(s.chatId, TEXT.managerDateType, DATE_TYPE_KEYBOARD);
    return `Выбрано: ${item.name}`;
  }

  async onDateType(s: Session, dateType: 'single' | 'range'): Promise<void> {
    const step = await this.deps.states.get(s.userId);
    if (step.step !== 'manager_waiting_date_type') {
      await this.deps.messenger.text(s.chatId, TEXT.sessionExpired);
      return;
    }
    const { client_name, client_phone, item_id } = step;
    const base = { is_manager_booking: true as const, client_name, client_phone, item_id };
    if (dateType === 'single') {
      await this.deps.states.set(s.userId, { step: 'manager_waiting_single_date', ...base, date_type: 'single' });
      await this.deps.messenger.reply(s.chatId, TEXT.managerSingleDate, NAV);
    } else {
      await this.deps.states.set(s.userId, { step: 'manager_waiting_start_date', ...base, date_type: 'range' });
      await this.deps.messenger.reply(s.chatId, TEXT.managerStartDate, NAV);
    }
  }

  async onInput(s: Session, step: ManagerStep, text: string, contactPhone?: string): Promise<void> {
    switch (step.step) {
      case 'manager_waiting_client_name':
        await this.onClientName(s, text);
        return;
      case 'manager_waiting_client_phone':
        await this.onClientPhone(s, step, contactPhone ?? text);
        return;
      case 'manager_waiting_item_selection':
      case 'manager_waiting_date_type':
        await this.prompt(s, step);
        return;
      case 'manager_waiting_single_date':
        await this.onSingleDate(s, step, text);
        return;
      case 'manager_waiting_start_date':
        await this.onStartDate(s, step, text);
        return;
      case 'manager_waiting_end_date':
        await this.onEndDate(s, step, text);
        return;
      case 'manager_waiting_comment':
        await this.onComment(s, step, text);
        return;
      case 'manager_confirm_booking':
        await this.onConfirm(s, step, text);
        return;
    }
  }

  private async onClientName(s: Session, text: string): Promise<void> {
    const name = sanitizeName(text);
    if (!name) {
      await this.deps.messenger.text(s.chatId, TEXT.badName);
      return;
    }
    await this.deps.states.set(s.userId, {
      step: 'manager_waiting_client_phone',
      is_manager_booking: true,
      client_name: name,
    });
    await this.deps.messenger.reply(s.chatId, TEXT.managerEnterPhone, NAV);
  }

  private async onClientPhone(s: Session, step: StepOf<'manager_waiting_client_phone'>, raw: string): Promise<void> {
    const phone = normalizePhone(raw);
    if (!phone) {
      await this.deps.messenger.text(s.chatId, TEXT.badPhone);
      return;
    }
    if (await showItemsPage(this.deps, s, 'manager_items_page', 0)) {
      await this.deps.states.set(s.userId, {
        step: 'manager_waiting_item_selection',
        is_manager_booking: true,
        client_name: step.client_name,
        client_phone: phone,
        page: 0,
      });
    }
  }

  private parseDate(text: string): string | null {
    return parseDisplayDate(text, this.deps.settings.timezone);
  }

  private async onSingleDate(s: Session, step: StepOf<'manager_waiting_single_date'>, text: string): Promise<void> {
    const date = this.parseDate(text);
    if (!date) {
      await this.deps.messenger.text(s.chatId, TEXT.badDate);
      return;
    }
    this.deps.bookings.validateDate(date);
    const { client_name, client_phone, item_id } = step;
    await this.deps.states.set(s.userId, {
      step: 'manager_waiting_comment',
      is_manager_booking: true,
      client_name,
      client_phone,
      item_id,
      date_type: 'single',
      dates: [date],
    });
    await this.askComment(s, 1);
  }

  private async onStartDate(s: Session, step: StepOf<'manager_waiting_start_date'>, text: string): Promise<void> {
    const date = this.parseDate(text);
    if (!date) {
      await this.deps.messenger.text(s.chatId, TEXT.badDate);
      return;
    }
    this.deps.bookings.validateDate(date);
    await this.deps.states.set(s.userId, { ...step, step: 'manager_waiting_end_date', start_date: date });
    await this.deps.messenger.reply(s.chatId, TEXT.managerEndDate, NAV);
  }

  private async onEndDate(s: Session, step: StepOf<'manager_waiting_end_date'>, text: string): Promise<void> {
    const end = this.parseDate(text);
    if (!end) {
      await this.deps.messenger.text(s.chatId, TEXT.badDate);
      return;
    }
    const dates = this.deps.bookings.validateRange(step.start_date, end);
    const { client_name, client_phone, item_id } = step;
    await this.deps.states.set(s.userId, {
      step: 'manager_waiting_comment',
      is_manager_booking: true,
      client_name,
      client_phone,
      item_id,
      date_type: 'range',
      dates,
    });
    await this.askComment(s, dates.length);
  }

  private async askComment(s: Session, days: number): Promise<void> {
    const text =
      days > 1
        ? `💬 Введите комментарий к заявке (будет применен ко всем ${days} дням):`
        : '💬 Введите комментарий к заявке:';
    await this.deps.messenger.reply(s.chatId, text, COMMENT_KEYBOARD);
  }

  private async onComment(s: Session, step: StepOf<'manager_waiting_comment'>, text: string): Promise<void> {
    const comment = text === BUTTONS.noComment ? '' : sanitizeInput(text);
    const next: StepOf<'manager_confirm_booking'> = { ...step, step: 'manager_confirm_booking', comment };
    await this.deps.states.set(s.userId, next);
    await this.showSummary(s, next);
  }

  private async showSummary(s: Session, step: StepOf<'manager_confirm_booking'>): Promise<void> {
    const item = await findActiveItem(this.deps, s, step.item_id);
    if (!item) return;
    const text = managerSummary({
      clientName: step.client_name,
      clientPhone: step.client_phone,
      itemName: item.name,
      dates: step.dates,
      comment: step.comment,
    });
    await this.deps.messenger.reply(s.chatId, text, MANAGER_CONFIRM_KEYBOARD);
  }

  private async onConfirm(s: Session, step: StepOf<'manager_confirm_booking'>, text: string): Promise<void> {
    if (text !== BUTTONS.confirmManager) {
      await this.deps.messenger.text(s.chatId, TEXT.managerConfirmPrompt);
      return;
    }
    const result = await this.deps.bookings.createManagerBookings(
      {
        managerId: s.userId,
        clientName: step.client_name,
        clientPhone: step.client_phone,
        itemId: step.item_id,
        comment: step.comment,
      },
      step.dates,
    );
    await this.deps.states.reset(s.userId);
    await showMainMenu(this.deps, s, managerResult(result.created, result.failed));
  }
}

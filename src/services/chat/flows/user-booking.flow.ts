import type { StepOf } from '@services/conversation/state.types.js';

import { logger } from '@utils/logger.js';
import { normalizePhone } from '@utils/phone.js';
import { sanitizeName } from '@utils/sanitize.js';
import { parseDisplayDate } from '@utils/time.js';

import type { ChatDeps, Session } from '../chat.context.js';
import { CONFIRM_KEYBOARD, NAV, PHONE_KEYBOARD } from '../keyboards.js';
import { bookingCreated, BUTTONS, itemSelected, TEXT, userSummary } from '../texts.js';
import { findActiveItem, showItemsPage, showMainMenu } from './common.js';

type UserStep = StepOf<'select_item' | 'waiting_date' | 'enter_name' | 'phone_number' | 'confirmation'>;

/** End-user capture: item, date, name, phone, confirmation. */
export class UserBookingFlow {
  constructor(private readonly deps: ChatDeps) {}

  async start(s: Session): Promise<void> {
    if (await showItemsPage(this.deps, s, 'items_page', 0)) {
      await this.deps.states.set(s.userId, { step: 'select_item', page: 0 });
    }
  }

  async onItemsPage(s: Session, page: number, messageId: number): Promise<void> {
    await this.deps.states.set(s.userId, { step: 'select_item', page });
    await showItemsPage(this.deps, s, 'items_page', page, messageId);
  }

  async onSelectItem(s: Session, itemId: number, messageId?: number): Promise<string | undefined> {
    const item = await findActiveItem(this.deps, s, itemId);
    if (!item) return undefined;
    await this.deps.states.set(s.userId, { step: 'waiting_date', item_id: item.id });
    if (messageId !== undefined) await this.deps.messenger.edit(s.chatId, messageId, `✅ Вы выбрали: ${item.name}`);
    await this.deps.messenger.reply(s.chatId, itemSelected(item), NAV);
    return `Выбрано: ${item.name}`;
  }

  async prompt(s: Session, step: UserStep): Promise<void> {
    const { messenger } = this.deps;
    switch (step.step) {
      case 'select_item':
        await showItemsPage(this.deps, s, 'items_page', step.page ?? 0);
        return;
      case 'waiting_date':
        await messenger.reply(s.chatId, TEXT.enterDate, NAV);
        return;
      case 'enter_name':
        await messenger.reply(s.chatId, TEXT.enterName, NAV);
        return;
      case 'phone_number':
        await messenger.reply(s.chatId, TEXT.enterPhone, PHONE_KEYBOARD);
        return;
      case 'confirmation':
        await this.showSummary(s, step);
        return;
    }
  }

  async onInput(s: Session, step: UserStep, text: string, contactPhone?: string): Promise<void> {
    switch (step.step) {
      case 'select_item':
        await this.prompt(s, step);
        return;
      case 'waiting_date':
        await this.onDate(s, step, text);
        return;
      case 'enter_name':
        await this.onName(s, step, text);
        return;
      case 'phone_number':
        await this.onPhone(s, step, contactPhone ?? text);
        return;
      case 'confirmation':
        await this.onConfirm(s, step, text);
        return;
    }
  }

  private async onDate(s: Session, step: StepOf<'waiting_date'>, text: string): Promise<void> {
    const date = parseDisplayDate(text, this.deps.settings.timezone);
    if (!date) {
      await this.deps.messenger.text(s.chatId, TEXT.badDate);
      return;
    }
    this.deps.bookings.validateDate(date);
    if (!(await this.deps.bookings.checkAvailability(step.item_id, date))) {
      await this.deps.messenger.text(s.chatId, TEXT.dateTaken);
      return;
    }
    await this.deps.states.set(s.userId, { step: 'enter_name', item_id: step.item_id, date });
    await this.deps.messenger.reply(s.chatId, TEXT.enterName, NAV);
  }

  private async onName(s: Session, step: StepOf<'enter_name'>, text: string): Promise<void> {
    const name = sanitizeName(text);
    if (!name) {
      await this.deps.messenger.text(s.chatId, TEXT.badName);
      return;
    }
    await this.deps.states.set(s.userId, { step: 'phone_number', item_id: step.item_id, date: step.date, user_name: name });
    await this.deps.messenger.reply(s.chatId, TEXT.enterPhone, PHONE_KEYBOARD);
  }

  private async onPhone(s: Session, step: StepOf<'phone_number'>, raw: string): Promise<void> {
    const phone = normalizePhone(raw);
    if (!phone) {
      await this.deps.messenger.text(s.chatId, TEXT.badPhone);
      return;
    }
    try {
      await this.deps.users.updatePhone(s.userId, phone);
    } catch (err) {
      logger.warn('[chat] could not store user phone', { userId: s.userId, err });
    }
    const next: StepOf<'confirmation'> = {
      step: 'confirmation',
      item_id: step.item_id,
      date: step.date,
      user_name: step.user_name,
      phone,
    };
    await this.deps.states.set(s.userId, next);
    await this.showSummary(s, next);
  }

  private async showSummary(s: Session, step: StepOf<'confirmation'>): Promise<void> {
    const item = await findActiveItem(this.deps, s, step.item_id);
    if (!item) return;
    const text = userSummary({ itemName: item.name, date: step.date, userName: step.user_name, phone: step.phone });
    await this.deps.messenger.reply(s.chatId, text, CONFIRM_KEYBOARD);
  }

  private async onConfirm(s: Session, step: StepOf<'confirmation'>, text: string): Promise<void> {
    if (text !== BUTTONS.confirm) {
      await this.deps.messenger.text(s.chatId, TEXT.confirmPrompt);
      return;
    }
    const item = await findActiveItem(this.deps, s, step.item_id);
    if (!item) return;

    const booking = await this.deps.bookings.createBooking({
      userId: s.userId,
      userName: step.user_name,
      userNickname: s.user.username ?? '',
      phone: step.phone,
      itemId: item.id,
      itemName: item.name,
      date: step.date,
      comment: '',
    });
    await this.deps.states.reset(s.userId);
    await showMainMenu(this.deps, s, bookingCreated(booking));
  }
}

import {
  ConcurrentModificationError,
  DateTooFarError,
  NotAvailableError,
  PastDateError,
} from '@core/errors/booking.errors.js';
import { BusinessRuleError } from '@core/errors/business-rule.error.js';
import { NotFoundError } from '@core/errors/not-found.error.js';
import { ValidationError } from '@core/errors/validation.error.js';

import type { ConversationStep } from '@services/conversation/state.types.js';

import { logger } from '@utils/logger.js';
import { incrementCounter } from '@utils/metrics.js';

import { parseCallback, type CallbackEvent } from './callback.grammar.js';
import type { ChatDeps, Session } from './chat.context.js';
import type { ChatUpdate } from './chat.transport.js';
import { resetToMainMenu, showMainMenu } from './flows/common.js';
import { isItemCommand, ItemCommands } from './flows/item-commands.js';
import { ManagerBookingFlow } from './flows/manager-booking.flow.js';
import { ManagerDesk } from './flows/manager-desk.js';
import { ScheduleFlow } from './flows/schedule.flow.js';
import { UserBookingFlow } from './flows/user-booking.flow.js';
import { BUTTONS, dateTooFar, TEXT } from './texts.js';

type MessageUpdate = Extract<ChatUpdate, { kind: 'message' }>;
type CallbackUpdate = Extract<ChatUpdate, { kind: 'callback' }>;

const RESET_WORDS = new Set(['/start', 'сброс', 'reset']);
const MANAGER_CARD_RE = /^\/manager_booking_(\d+)$/;

/** Rejects once `signal` aborts; settles with `work` otherwise. */
async function untilAborted(work: Promise<void>, signal: AbortSignal): Promise<void> {
  if (signal.aborted) throw signal.reason;
  const aborted = new Promise<never>((_, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
  void aborted.catch(() => undefined);
  await Promise.race([work, aborted]);
}

/**
 * Entry point for every chat update: filtering, throttling, profile upsert,
 * then dispatch to the flow owning the command, button, callback or step.
 */
export class ChatOrchestrator {
  readonly userFlow: UserBookingFlow;
  readonly managerFlow: ManagerBookingFlow;
  readonly schedule: ScheduleFlow;
  readonly desk: ManagerDesk;
  readonly itemCommands: ItemCommands;

  constructor(private readonly deps: ChatDeps) {
    this.userFlow = new UserBookingFlow(deps);
    this.managerFlow = new ManagerBookingFlow(deps);
    this.schedule = new ScheduleFlow(deps, this.userFlow);
    this.desk = new ManagerDesk(deps);
    this.itemCommands = new ItemCommands(deps);
  }

  /** Never throws: failures are logged, counted and the update dropped. */
  async handleUpdate(update: ChatUpdate, rootSignal?: AbortSignal): Promise<void> {
    const deadline = AbortSignal.timeout(this.deps.settings.updateTimeoutMs);
    const signal = rootSignal ? AbortSignal.any([rootSignal, deadline]) : deadline;
    incrementCounter('updates_processed');
    try {
      await untilAborted(this.process(update, signal), signal);
    } catch (err) {
      incrementCounter('update_errors');
      logger.error('[chat] update failed', { kind: update.kind, userId: update.from.id, err });
    }
  }

  private async process(update: ChatUpdate, signal: AbortSignal): Promise<void> {
    const { users, states, messenger } = this.deps;
    const userId = update.from.id;
    if (users.isBlacklisted(userId)) {
      logger.debug('[chat] blacklisted sender dropped', { userId });
      return;
    }

    const isManager = users.isManager(userId);
    if (!(await states.allow(userId, isManager))) {
      if (update.kind === 'callback') {
        await messenger.answer(update.id, TEXT.throttled);
      } else {
        await messenger.text(update.chatId, TEXT.throttled);
      }
      return;
    }

    await users.saveUser({
      telegramId: userId,
      username: update.from.username,
      firstName: update.from.firstName,
      lastName: update.from.lastName,
      languageCode: update.from.languageCode,
    });

    const session: Session = { chatId: update.chatId, userId, isManager, user: update.from, signal };
    if (update.kind === 'callback') {
      await this.onCallback(session, update);
    } else {
      await this.onMessage(session, update);
    }
  }

  private async onMessage(s: Session, update: MessageUpdate): Promise<void> {
    try {
      await this.dispatchMessage(s, update);
    } catch (err) {
      await this.replyError(s, err);
    }
  }

  private async onCallback(s: Session, update: CallbackUpdate): Promise<void> {
    let ack: string | undefined;
    try {
      ack = await this.dispatchCallback(s, parseCallback(update.data), update.messageId);
    } catch (err) {
      await this.replyError(s, err);
    } finally {
      await this.deps.messenger.answer(update.id, ack);
    }
  }

  private async dispatchMessage(s: Session, update: MessageUpdate): Promise<void> {
    const text = update.text?.trim() ?? '';

    if (!update.contactPhone) {
      if (RESET_WORDS.has(text.toLowerCase().replace(/@\S+$/, ''))) {
        await resetToMainMenu(this.deps, s, TEXT.welcome);
        return;
      }
      if (text.startsWith('/')) {
        await this.onCommand(s, text);
        return;
      }
      if (await this.onButton(s, text)) return;
    }

    const step = await this.deps.states.get(s.userId);
    await this.onStepInput(s, step, text, update.contactPhone);
  }

  private async onCommand(s: Session, text: string): Promise<void> {
    const [head = '', ...rest] = text.split(/\s+/);
    const command = head.replace(/@\S+$/, '').toLowerCase();
    const args = rest.join(' ');

    if (isItemCommand(command)) {
      await this.itemCommands.handle(s, command, args);
      return;
    }
    const card = MANAGER_CARD_RE.exec(command);
    if (card) {
      await this.desk.showBookingCard(s, Number(card[1]));
      return;
    }
    switch (command) {
      case '/start_booking':
        if (await this.managersOnly(s)) await this.managerFlow.start(s);
        return;
      case '/get_all':
        if (await this.managersOnly(s)) await this.desk.showAllBookings(s, 0);
        return;
      case '/stats':
        if (await this.managersOnly(s)) await this.desk.stats(s);
        return;
      default:
        await showMainMenu(this.deps, s, TEXT.unknownCommand);
    }
  }

  /** Global reply-keyboard buttons; returns false when `text` is not one. */
  private async onButton(s: Session, text: string): Promise<boolean> {
    switch (text) {
      case BUTTONS.cancel:
        await resetToMainMenu(this.deps, s, TEXT.cancelled);
        return true;
      case BUTTONS.back: {
        const prev = await this.deps.states.back(s.userId);
        await this.prompt(s, prev);
        return true;
      }
      case BUTTONS.createBooking:
        await this.userFlow.start(s);
        return true;
      case BUTTONS.schedule:
        await this.schedule.start(s);
        return true;
      case BUTTONS.assortment:
        await this.desk.assortment(s);
        return true;
      case BUTTONS.myBookings:
        await this.desk.myBookings(s, 0);
        return true;
      case BUTTONS.contacts:
        await this.desk.contacts(s);
        return true;
      case BUTTONS.allBookings:
        if (await this.managersOnly(s)) await this.desk.showAllBookings(s, 0);
        return true;
      case BUTTONS.managerBooking:
        if (await this.managersOnly(s)) await this.managerFlow.start(s);
        return true;
      case BUTTONS.syncBookings:
        if (await this.managersOnly(s)) await this.desk.syncBookings(s);
        return true;
      case BUTTONS.syncSchedule:
        if (await this.managersOnly(s)) await this.desk.syncSchedule(s);
        return true;
      case BUTTONS.stats:
        if (await this.managersOnly(s)) await this.desk.stats(s);
        return true;
      default:
        return false;
    }
  }

  private async onStepInput(s: Session, step: ConversationStep, text: string, contactPhone?: string): Promise<void> {
    switch (step.step) {
      case 'main_menu':
        await showMainMenu(this.deps, s, TEXT.unknownCommand);
        return;
      case 'select_item':
      case 'waiting_date':
      case 'enter_name':
      case 'phone_number':
      case 'confirmation':
        await this.userFlow.onInput(s, step, text, contactPhone);
        return;
      case 'schedule_select_item':
      case 'view_schedule':
      case 'waiting_specific_date':
        await this.schedule.onInput(s, step, text);
        return;
      default:
        if (!(await this.managersOnly(s))) {
          await this.deps.states.reset(s.userId);
          return;
        }
        await this.managerFlow.onInput(s, step, text, contactPhone);
    }
  }

  private async prompt(s: Session, step: ConversationStep): Promise<void> {
    switch (step.step) {
      case 'main_menu':
        await showMainMenu(this.deps, s);
        return;
      case 'select_item':
      case 'waiting_date':
      case 'enter_name':
      case 'phone_number':
      case 'confirmation':
        await this.userFlow.prompt(s, step);
        return;
      case 'schedule_select_item':
      case 'view_schedule':
      case 'waiting_specific_date':
        await this.schedule.prompt(s, step);
        return;
      default:
        await this.managerFlow.prompt(s, step);
    }
  }

  private async dispatchCallback(s: Session, event: CallbackEvent, messageId: number): Promise<string | undefined> {
    switch (event.type) {
      case 'back_to_main':
      case 'back_to_main_from_schedule':
        await resetToMainMenu(this.deps, s);
        return undefined;
      case 'items_page':
        await this.userFlow.onItemsPage(s, event.page, messageId);
        return undefined;
      case 'select_item':
        return this.userFlow.onSelectItem(s, event.itemId, messageId);
      case 'schedule_items_page':
        await this.schedule.onItemsPage(s, event.page, messageId);
        return undefined;
      case 'schedule_select_item':
        return this.schedule.onSelectItem(s, event.itemId, messageId);
      case 'show_booking':
        await this.desk.showBookingCard(s, event.bookingId);
        return undefined;
      case 'my_bookings_page':
        await this.desk.myBookings(s, event.page, messageId);
        return undefined;
      case 'unknown':
        logger.debug('[chat] unknown callback', { data: event.data });
        return TEXT.unknownCallback;
    }

    if (!(await this.managersOnly(s))) return undefined;
    switch (event.type) {
      case 'manager_items_page':
        await this.managerFlow.onItemsPage(s, event.page, messageId);
        return undefined;
      case 'manager_select_item':
        return this.managerFlow.onSelectItem(s, event.itemId, messageId);
      case 'manager_date_type':
        await this.managerFlow.onDateType(s, event.dateType);
        return undefined;
      case 'booking_action':
        return this.desk.onAction(s, event.action, event.bookingId, messageId);
      case 'change_to':
        return this.desk.onChangeTo(s, event.bookingId, event.itemId, messageId);
      case 'call_booking':
        await this.desk.onCall(s, event.bookingId);
        return undefined;
      case 'bookings_page':
        await this.desk.showAllBookings(s, event.page, messageId);
        return undefined;
      case 'export_users':
        await this.desk.exportUsers(s);
        return undefined;
    }
  }

  private async managersOnly(s: Session): Promise<boolean> {
    if (s.isManager) return true;
    await this.deps.messenger.text(s.chatId, TEXT.managersOnly);
    return false;
  }

  /** Maps domain failures to chat replies; anything else propagates to the update guard. */
  private async replyError(s: Session, err: unknown): Promise<void> {
    const { messenger } = this.deps;
    if (err instanceof NotAvailableError) {
      await resetToMainMenu(this.deps, s, TEXT.notAvailable);
    } else if (err instanceof PastDateError) {
      await resetToMainMenu(this.deps, s, TEXT.pastDate);
    } else if (err instanceof DateTooFarError) {
      await messenger.text(s.chatId, dateTooFar(err.maxDays));
    } else if (err instanceof ConcurrentModificationError) {
      await messenger.text(s.chatId, TEXT.concurrent);
    } else if (err instanceof NotFoundError) {
      await messenger.text(s.chatId, TEXT.bookingNotFound);
    } else if (err instanceof ValidationError || err instanceof BusinessRuleError) {
      await messenger.text(s.chatId, err.message);
    } else {
      await messenger.text(s.chatId, TEXT.internalError);
      throw err;
    }
  }
}

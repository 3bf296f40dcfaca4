import { canTransition, type Booking } from '@core/interfaces/booking.types.js';

import { cb } from './callback.grammar.js';
import type { InlineButton, InlineKeyboard, ReplyKeyboard } from './chat.transport.js';
import { BUTTONS } from './texts.js';

export function mainMenu(isManager: boolean): ReplyKeyboard {
  const rows: ReplyKeyboard = [
    [{ text: BUTTONS.createBooking }],
    [{ text: BUTTONS.schedule }, { text: BUTTONS.assortment }],
    [{ text: BUTTONS.myBookings }, { text: BUTTONS.contacts }],
  ];
  if (isManager) {
    rows.push(
      [{ text: BUTTONS.allBookings }, { text: BUTTONS.managerBooking }],
      [{ text: BUTTONS.syncBookings }, { text: BUTTONS.syncSchedule }],
      [{ text: BUTTONS.stats }],
    );
  }
  return rows;
}

export const NAV: ReplyKeyboard = [[{ text: BUTTONS.back }, { text: BUTTONS.cancel }]];

export const PHONE_KEYBOARD: ReplyKeyboard = [[{ text: BUTTONS.sendContact, requestContact: true }], ...NAV];

export const CONFIRM_KEYBOARD: ReplyKeyboard = [[{ text: BUTTONS.confirm }], ...NAV];

export const MANAGER_CONFIRM_KEYBOARD: ReplyKeyboard = [
  [{ text: BUTTONS.confirmManager }, { text: BUTTONS.cancel }],
  [{ text: BUTTONS.back }],
];

export const COMMENT_KEYBOARD: ReplyKeyboard = [[{ text: BUTTONS.noComment }], ...NAV];

export const SCHEDULE_KEYBOARD: ReplyKeyboard = [
  [{ text: BUTTONS.bookThisItem }],
  [{ text: BUTTONS.thirtyDays }, { text: BUTTONS.pickDate }],
  ...NAV,
];

export const DATE_TYPE_KEYBOARD: InlineKeyboard = [
  [
    { text: '📅 Одна дата', data: cb.managerSingleDate },
    { text: '📆 Интервал дат', data: cb.managerDateRange },
  ],
];

/** Action buttons for a manager's booking card; only legal transitions are offered. */
export function bookingActions(b: Booking): InlineKeyboard {
  const rows: InlineKeyboard = [];
  const decide: InlineButton[] = [];
  if (canTransition(b.status, 'confirm')) decide.push({ text: '✅ Подтвердить', data: cb.action('confirm', b.id) });
  if (canTransition(b.status, 'reject')) decide.push({ text: '❌ Отклонить', data: cb.action('reject', b.id) });
  if (decide.length > 0) rows.push(decide);

  const close: InlineButton[] = [];
  if (canTransition(b.status, 'reopen')) close.push({ text: '🔄 Вернуть в работу', data: cb.action('reopen', b.id) });
  if (canTransition(b.status, 'complete')) close.push({ text: '🏁 Завершить', data: cb.action('complete', b.id) });
  if (close.length > 0) rows.push(close);

  if (canTransition(b.status, 'change_item')) {
    rows.push([{ text: '✏️ Изменить позицию', data: cb.action('change_item', b.id) }]);
  }
  if (canTransition(b.status, 'reschedule')) {
    rows.push([{ text: '🔄 Предложить выбрать другую дату', data: cb.action('reschedule', b.id) }]);
  }
  rows.push([{ text: '📞 Позвонить', data: cb.callBooking(b.id) }]);
  return rows;
}

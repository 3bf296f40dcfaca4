import type { Booking, BookingAction, BookingStatus } from '@core/interfaces/booking.types.js';
import type { Item } from '@core/interfaces/item.types.js';

import { formatPhoneForDisplay } from '@utils/phone.js';
import { formatDayKey } from '@utils/time.js';

export const BUTTONS = {
  createBooking: '📋 СОЗДАТЬ ЗАЯВКУ',
  schedule: '📅 Посмотреть расписание',
  assortment: '💼 Ассортимент',
  myBookings: '📊 Мои заявки',
  contacts: '📞 Контакты менеджеров',
  allBookings: '👨‍💼 Все заявки',
  managerBooking: '➕ Создать заявку (Менеджер)',
  syncBookings: '🔄 Синхронизировать бронирования',
  syncSchedule: '📅 Синхронизировать расписание',
  stats: '📊 Статистика',
  back: '⬅️ Назад',
  cancel: '❌ Отмена',
  sendContact: '📱 Отправить контакт',
  confirm: '✅ Подтвердить',
  confirmManager: '✅ Подтвердить создание',
  noComment: 'Без комментария',
  thirtyDays: '📅 30 дней',
  pickDate: '🗓 Выбрать дату',
  bookThisItem: '📋 СОЗДАТЬ ЗАЯВКУ НА ЭТУ ПОЗИЦИЮ',
} as const;

export const TEXT = {
  welcome: 'Добро пожаловать! Выберите действие в меню ниже.',
  mainMenu: 'Главное меню',
  cancelled: 'Действие отменено.',
  unknownCommand: 'Не понимаю команду. Воспользуйтесь меню.',
  managersOnly: 'Эта команда доступна только менеджерам.',
  throttled: 'Слишком много запросов. Подождите немного и попробуйте снова.',
  internalError: 'Произошла ошибка. Попробуйте позже.',
  noItems: 'Нет доступных позиций.',
  chooseItem: '🏢 Выберите позицию:',
  chooseScheduleItem: '🏢 Выберите позицию для просмотра расписания:',
  enterDate: 'Введите дату бронирования в формате ДД.ММ.ГГГГ (например, 25.12.2025):',
  badDate: 'Неверный формат даты. Используйте ДД.ММ.ГГГГ (например, 25.12.2025)',
  dateTaken: 'К сожалению, на эту дату нет свободных единиц. Выберите другую дату.',
  enterName: '👤 Введите ваше имя:',
  badName: 'Имя должно содержать от 2 до 150 символов.',
  enterPhone: '📱 Отправьте номер телефона или нажмите кнопку «📱 Отправить контакт».',
  badPhone: 'Неверный формат номера телефона. Введите номер в формате +7XXXXXXXXXX или 8XXXXXXXXXX',
  confirmPrompt: 'Нажмите «✅ Подтвердить» или «❌ Отмена».',
  managerIntro: '📋 Создание заявки от имени клиента\n\nВведите имя клиента:',
  managerEnterPhone: '📱 Введите телефон клиента:',
  managerDateType: '📅 Выберите тип бронирования:',
  managerSingleDate: '📅 Введите дату бронирования в формате ДД.ММ.ГГГГ (например, 25.12.2025):',
  managerStartDate: '📅 Введите начальную дату интервала в формате ДД.ММ.ГГГГ (например, 25.12.2025):',
  managerEndDate: '📅 Введите конечную дату интервала в формате ДД.ММ.ГГГГ:',
  managerConfirmPrompt: 'Нажмите «✅ Подтвердить создание» или «❌ Отмена».',
  sessionExpired: 'Сессия устарела. Начните заново.',
  noBookings: 'Заявок не найдено',
  noContacts: 'Контакты менеджеров не указаны.',
  bookingNotFound: 'Заявка не найдена',
  itemNotFound: 'Позиция не найдена',
  notAvailable: 'К сожалению, позиция стала недоступна. Попробуйте выбрать другую дату.',
  pastDate: 'Нельзя бронировать на прошедшие даты. Выберите будущую дату.',
  concurrent: 'Заявка была изменена другим менеджером. Обновите и попробуйте снова.',
  pickScheduleDate: 'Введите дату в формате ДД.ММ.ГГГГ:',
  syncStarted: '⏳ Синхронизация запущена...',
  syncBookingsDone: '✅ Бронирования синхронизированы',
  syncScheduleDone: '✅ Расписание синхронизировано',
  syncFailed: '❌ Ошибка синхронизации. Попробуйте позже.',
  exportFailed: '❌ Не удалось выгрузить пользователей.',
  unknownCallback: 'Неизвестная команда',
} as const;

export function dateTooFar(maxDays: number): string {
  return `Нельзя бронировать более чем на ${maxDays} дней вперед.`;
}

export const STATUS_LABELS: Record<BookingStatus, string> = {
  pending: '⏳ Ожидает подтверждения',
  confirmed: '✅ Подтверждена',
  changed: '🔄 Изменена',
  rescheduled: '📅 Перенос',
  canceled: '❌ Отменена',
  completed: '🏁 Завершена',
};

export function itemSelected(item: Item): string {
  return `✅ Вы выбрали: ${item.name}\n\n${TEXT.enterDate}`;
}

export function userSummary(input: { itemName: string; date: string; userName: string; phone: string }): string {
  return [
    '📋 Проверьте данные заявки:',
    '',
    `🏢 Позиция: ${input.itemName}`,
    `📅 Дата: ${formatDayKey(input.date)}`,
    `👤 Имя: ${input.userName}`,
    `📱 Телефон: ${formatPhoneForDisplay(input.phone)}`,
    '',
    'Всё верно?',
  ].join('\n');
}

export function bookingCreated(b: Booking): string {
  return `✅ Заявка №${b.id} создана!\n\nМенеджер свяжется с вами для подтверждения.`;
}

export function managerSummary(input: {
  clientName: string;
  clientPhone: string;
  itemName: string;
  dates: string[];
  comment: string;
}): string {
  const first = input.dates[0] ?? '';
  const last = input.dates[input.dates.length - 1] ?? first;
  const when =
    input.dates.length === 1
      ? `📅 Дата: ${formatDayKey(first)}`
      : `📅 Интервал: ${formatDayKey(first)} - ${formatDayKey(last)} (${input.dates.length} дней)`;
  return [
    '📋 Подтверждение заявки:',
    '',
    `👤 Клиент: ${input.clientName}`,
    `📱 Телефон: ${formatPhoneForDisplay(input.clientPhone)}`,
    `🏢 Позиция: ${input.itemName}`,
    when,
    `💬 Комментарий: ${input.comment || '—'}`,
  ].join('\n');
}

const FAILURE_REASONS: Record<string, string> = {
  NOT_AVAILABLE: 'недоступно',
  PAST_DATE: 'дата в прошлом',
  DATE_TOO_FAR: 'слишком далеко',
  CONCURRENT_MODIFICATION: 'конфликт изменений',
};

export function managerResult(created: Booking[], failed: { date: string; reason: string }[]): string {
  const lines = ['📊 Результат создания заявок:', ''];
  if (created.length > 0) {
    lines.push(`✅ Успешно создано: ${created.length}`);
    for (const b of created) lines.push(`   • ${formatDayKey(b.date)} (№${b.id})`);
  }
  if (failed.length > 0) {
    if (created.length > 0) lines.push('');
    lines.push(`❌ Не удалось создать: ${failed.length}`);
    for (const f of failed) lines.push(`   • ${formatDayKey(f.date)} (${FAILURE_REASONS[f.reason] ?? f.reason})`);
  }
  return lines.join('\n');
}

export function bookingCard(b: Booking): string {
  const lines = [
    `📋 Заявка №${b.id}`,
    '',
    `🏢 Позиция: ${b.itemName}`,
    `📅 Дата: ${formatDayKey(b.date)}`,
    `👤 Клиент: ${b.userName}${b.userNickname ? ` (@${b.userNickname})` : ''}`,
    `📱 Телефон: ${b.phone ? formatPhoneForDisplay(b.phone) : '—'}`,
  ];
  if (b.comment) lines.push(`💬 Комментарий: ${b.comment}`);
  lines.push(`📌 Статус: ${STATUS_LABELS[b.status]}`, `🔢 Версия: ${b.version}`);
  return lines.join('\n');
}

export function bookingLine(b: Booking): string {
  return `№${b.id} ${formatDayKey(b.date)} ${b.itemName} — ${b.userName}`;
}

export function userBookingLine(b: Booking): string {
  return `№${b.id} ${formatDayKey(b.date)} ${b.itemName} — ${STATUS_LABELS[b.status]}`;
}

/** Message to the booking owner after a manager action. */
export function ownerNotice(action: BookingAction, b: Booking): string {
  switch (action) {
    case 'confirm':
      return `✅ Ваша заявка на ${b.itemName} ${formatDayKey(b.date)} подтверждена!`;
    case 'reject':
      return '❌ К сожалению, ваша заявка была отклонена менеджером.';
    case 'complete':
      return `🏁 Ваша заявка №${b.id} завершена. Спасибо за использование наших услуг!`;
    case 'reopen':
      return `🔄 Ваша заявка №${b.id} возвращена в работу. Ожидайте подтверждения.`;
    case 'reschedule':
      return `🔄 Менеджер предложил выбрать другую дату для ${b.itemName}. Пожалуйста, создайте новую заявку.`;
    case 'change_item':
      return `🔄 В вашей заявке №${b.id} изменена позиция на: ${b.itemName}`;
  }
}

export const MANAGER_ACK: Record<BookingAction, string> = {
  confirm: '✅ Бронирование подтверждено',
  reject: '❌ Бронирование отменено',
  complete: '✅ Заявка завершена',
  reopen: '✅ Заявка возвращена в работу',
  reschedule: '✅ Клиенту предложено выбрать другую дату',
  change_item: '✅ Позиция успешно изменена',
};

export function reminder(b: Booking): string {
  return `Напоминание: завтра у вас бронь ${b.itemName} на ${formatDayKey(b.date)}. Статус: ${STATUS_LABELS[b.status]}`;
}

export function newBookingForManagers(b: Booking): string {
  return `🆕 Новая заявка\n\n${bookingCard(b)}`;
}

export function itemLine(item: Item): string {
  const description = item.description ? `\n   📝 ${item.description}` : '';
  return `• ${item.name} (${item.totalQuantity} шт.)${description}`;
}

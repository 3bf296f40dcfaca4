import { cb } from './callback.grammar.js';
import type { InlineButton, InlineKeyboard } from './chat.transport.js';

export const DEFAULT_ITEMS_PAGE_SIZE = 8;
export const DEFAULT_BOOKINGS_PAGE_SIZE = 5;

export interface Page<T> {
  entries: T[];
  /** 0-based, clamped into range. */
  page: number;
  totalPages: number;
  total: number;
}

export function paginate<T>(list: readonly T[], page: number, size: number): Page<T> {
  const perPage = Math.max(1, Math.trunc(size));
  const totalPages = Math.max(1, Math.ceil(list.length / perPage));
  const current = Math.min(Math.max(0, Math.trunc(page)), totalPages - 1);
  return {
    entries: list.slice(current * perPage, (current + 1) * perPage),
    page: current,
    totalPages,
    total: list.length,
  };
}

export interface PageViewOptions<T> {
  title: string;
  pageData: (page: number) => string;
  button: (entry: T) => InlineButton;
  /** Line rendered under the title for each entry on the page. */
  line?: (entry: T) => string;
  backData?: string;
  backText?: string;
}

export interface PageView {
  text: string;
  keyboard: InlineKeyboard;
}

export function renderPage<T>(page: Page<T>, options: PageViewOptions<T>): PageView {
  const parts = [options.title];
  if (page.totalPages > 1) parts.push(`Страница ${page.page + 1} из ${page.totalPages}`);
  if (options.line) {
    const lines = page.entries.map(options.line);
    if (lines.length > 0) parts.push(lines.join('\n'));
  }

  const keyboard: InlineKeyboard = page.entries.map((entry) => [options.button(entry)]);

  const nav: InlineButton[] = [];
  if (page.page > 0) nav.push({ text: '⬅️ Назад', data: options.pageData(page.page - 1) });
  if (page.page < page.totalPages - 1) nav.push({ text: 'Вперед ➡️', data: options.pageData(page.page + 1) });
  if (nav.length > 0) keyboard.push(nav);

  keyboard.push([{ text: options.backText ?? '⬅️ Назад в меню', data: options.backData ?? cb.backToMain }]);
  return { text: parts.join('\n\n'), keyboard };
}

import type { Item } from '@core/interfaces/item.types.js';

import { cb, type PagePrefix } from '../callback.grammar.js';
import type { ChatDeps, Session } from '../chat.context.js';
import { mainMenu } from '../keyboards.js';
import { paginate, renderPage } from '../pagination.js';
import { itemLine, TEXT } from '../texts.js';

export async function showMainMenu(deps: ChatDeps, s: Session, text: string = TEXT.mainMenu): Promise<void> {
  await deps.messenger.reply(s.chatId, text, mainMenu(s.isManager));
}

export async function resetToMainMenu(deps: ChatDeps, s: Session, text: string = TEXT.mainMenu): Promise<void> {
  await deps.states.reset(s.userId);
  await showMainMenu(deps, s, text);
}

type ItemPagePrefix = Extract<PagePrefix, 'items_page' | 'schedule_items_page' | 'manager_items_page'>;

const ITEM_PAGES: Record<ItemPagePrefix, { title: string; select: (id: number) => string; back: string }> = {
  items_page: { title: TEXT.chooseItem, select: (id) => cb.item('select_item', id), back: cb.backToMain },
  schedule_items_page: {
    title: TEXT.chooseScheduleItem,
    select: (id) => cb.item('schedule_select_item', id),
    back: cb.backToMainFromSchedule,
  },
  manager_items_page: { title: TEXT.chooseItem, select: (id) => cb.item('manager_select_item', id), back: cb.backToMain },
};

/**
 * Sends (or, with `messageId`, edits in place) one page of active items.
 * Returns false when there is nothing to choose from.
 */
export async function showItemsPage(
  deps: ChatDeps,
  s: Session,
  prefix: ItemPagePrefix,
  page: number,
  messageId?: number,
): Promise<boolean> {
  const items = await deps.items.getItems();
  if (items.length === 0) {
    await showMainMenu(deps, s, TEXT.noItems);
    return false;
  }
  const kind = ITEM_PAGES[prefix];
  const view = renderPage(paginate(items, page, deps.settings.itemsPageSize), {
    title: kind.title,
    line: itemLine,
    pageData: (n) => cb.page(prefix, n),
    button: (item: Item) => ({ text: item.name, data: kind.select(item.id) }),
    backData: kind.back,
  });
  if (messageId !== undefined) {
    await deps.messenger.edit(s.chatId, messageId, view.text, view.keyboard);
  } else {
    await deps.messenger.inline(s.chatId, view.text, view.keyboard);
  }
  return true;
}

/** Active item by id, or null after telling the sender it is gone. */
export async function findActiveItem(deps: ChatDeps, s: Session, itemId: number): Promise<Item | null> {
  const items = await deps.items.getItems();
  const item = items.find((i) => i.id === itemId) ?? null;
  if (!item) await deps.messenger.text(s.chatId, TEXT.itemNotFound);
  return item;
}

import { NotFoundError } from '@core/errors/not-found.error.js';
import type { Item } from '@core/interfaces/item.types.js';

import type { ChatDeps, Session } from '../chat.context.js';
import { itemLine, TEXT } from '../texts.js';

export const ITEM_COMMANDS = [
  '/add_item',
  '/edit_item',
  '/list_items',
  '/disable_item',
  '/set_item_order',
  '/move_item_up',
  '/move_item_down',
] as const;

export type ItemCommand = (typeof ITEM_COMMANDS)[number];

export function isItemCommand(command: string): command is ItemCommand {
  return ITEM_COMMANDS.some((c) => c === command);
}

const USAGE: Record<ItemCommand, string> = {
  '/add_item': 'Использование: /add_item <название> <количество>',
  '/edit_item': 'Использование: /edit_item <название> <количество>',
  '/list_items': 'Использование: /list_items',
  '/disable_item': 'Использование: /disable_item <название>',
  '/set_item_order': 'Использование: /set_item_order <название> <позиция>',
  '/move_item_up': 'Использование: /move_item_up <название>',
  '/move_item_down': 'Использование: /move_item_down <название>',
};

/** Splits "<name words> <number>" into its parts; null unless the last token is an integer. */
export function splitNameAndNumber(args: string): { name: string; value: number } | null {
  const tokens = args.trim().split(/\s+/).filter(Boolean);
  const last = tokens.pop();
  if (last === undefined || !/^-?\d+$/.test(last) || tokens.length === 0) return null;
  return { name: tokens.join(' '), value: Number(last) };
}

/** Manager-only catalogue commands. `args` is the text after the command word. */
export class ItemCommands {
  constructor(private readonly deps: ChatDeps) {}

  async handle(s: Session, command: ItemCommand, args: string): Promise<void> {
    if (!s.isManager) {
      await this.deps.messenger.text(s.chatId, TEXT.managersOnly);
      return;
    }
    try {
      const reply = await this.run(command, args.trim());
      await this.deps.messenger.text(s.chatId, reply);
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
      await this.deps.messenger.text(s.chatId, TEXT.itemNotFound);
    }
  }

  private async run(command: ItemCommand, args: string): Promise<string> {
    const { items } = this.deps;
    switch (command) {
      case '/list_items':
        return this.list();
      case '/add_item': {
        const parsed = splitNameAndNumber(args);
        if (!parsed) return USAGE[command];
        const item = await items.createItem({ name: parsed.name, totalQuantity: parsed.value });
        return `✅ Позиция добавлена: ${item.name} (${item.totalQuantity} шт.)`;
      }
      case '/edit_item': {
        const parsed = splitNameAndNumber(args);
        if (!parsed) return USAGE[command];
        const current = await items.getItemByName(parsed.name);
        const item = await items.updateItem(current.id, { totalQuantity: parsed.value });
        return `✅ Количество обновлено: ${item.name} (${item.totalQuantity} шт.)`;
      }
      case '/disable_item': {
        if (!args) return USAGE[command];
        const current = await items.getItemByName(args);
        await items.deactivateItem(current.id);
        return `✅ Позиция отключена: ${current.name}`;
      }
      case '/set_item_order': {
        const parsed = splitNameAndNumber(args);
        if (!parsed) return USAGE[command];
        const current = await items.getItemByName(parsed.name);
        return this.moved(await items.reorderItem(current.id, parsed.value));
      }
      case '/move_item_up':
      case '/move_item_down': {
        if (!args) return USAGE[command];
        const current = await items.getItemByName(args);
        const item =
          command === '/move_item_up' ? await items.moveItemUp(current.id) : await items.moveItemDown(current.id);
        return this.moved(item);
      }
    }
  }

  private async list(): Promise<string> {
    const list = await this.deps.items.getItems();
    if (list.length === 0) return TEXT.noItems;
    return ['📋 Позиции:', '', ...list.map((i) => `${i.sortOrder}. ${itemLine(i)}`)].join('\n');
  }

  private moved(item: Item): string {
    return `✅ ${item.name}: позиция ${item.sortOrder}`;
  }
}

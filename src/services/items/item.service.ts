import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { NotFoundError } from '@core/errors/not-found.error.js';
import { ValidationError } from '@core/errors/validation.error.js';
import type { Item, ItemPatch, NewItem } from '@core/interfaces/item.types.js';
import type { Store } from '@core/repositories/store.js';

import { logger } from '@utils/logger.js';
import { systemClock, todayKey, type Clock } from '@utils/time.js';

const ItemSeedSchema = z.array(
  z.object({
    name: z.string().trim().min(1),
    description: z.string().nullish(),
    total_quantity: z.number().int().positive(),
  }),
);

/** Reads an items seed file: a JSON array of `{name, description?, total_quantity}`. */
export async function loadItemsFile(file: string): Promise<NewItem[]> {
  const raw: unknown = JSON.parse(await readFile(file, 'utf8'));
  const parsed = ItemSeedSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid items file ${file}: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  return parsed.data.map((e) => ({ name: e.name, description: e.description ?? null, totalQuantity: e.total_quantity }));
}

export class ItemService {
  constructor(
    private readonly store: Store,
    private readonly timezone: string,
    private readonly clock: Clock = systemClock,
  ) {}

  async createItem(input: NewItem): Promise<Item> {
    if (input.totalQuantity <= 0) throw new ValidationError('Количество должно быть положительным числом.');
    const item = await this.store.items.create(input);
    logger.info('[items] created', { id: item.id, name: item.name, sortOrder: item.sortOrder });
    return item;
  }

  /** Capacity decreases are checked against bookings from today on. */
  async updateItem(id: number, patch: ItemPatch): Promise<Item> {
    if (patch.totalQuantity !== undefined && patch.totalQuantity <= 0) {
      throw new ValidationError('Количество должно быть положительным числом.');
    }
    const item = await this.store.items.update(id, patch, todayKey(this.timezone, this.clock));
    logger.info('[items] updated', { id, patch });
    return item;
  }

  async deactivateItem(id: number): Promise<void> {
    await this.store.items.deactivate(id);
    logger.info('[items] deactivated', { id });
  }

  async reorderItem(id: number, newOrder: number): Promise<Item> {
    return this.store.items.reorder(id, newOrder);
  }

  async moveItemUp(id: number): Promise<Item> {
    const item = await this.getItem(id);
    return this.store.items.reorder(id, item.sortOrder - 1);
  }

  async moveItemDown(id: number): Promise<Item> {
    const item = await this.getItem(id);
    return this.store.items.reorder(id, item.sortOrder + 1);
  }

  async getItem(id: number): Promise<Item> {
    const item = await this.store.items.findById(id);
    if (!item) throw new NotFoundError(`Item ${id} not found`);
    return item;
  }

  async getItemByName(name: string): Promise<Item> {
    const item = await this.store.items.findByName(name);
    if (!item) throw new NotFoundError(`Item "${name}" not found`);
    return item;
  }

  async getItems(): Promise<Item[]> {
    return this.store.items.listActive();
  }

  async syncItems(seed: NewItem[]): Promise<number> {
    const inserted = await this.store.items.syncSeed(seed);
    logger.info('[items] seed applied', { total: seed.length, inserted });
    return inserted;
  }
}

import { and, asc, eq, gte, inArray, sql } from 'drizzle-orm';

import { BusinessRuleError } from '@core/errors/business-rule.error.js';
import { NotFoundError } from '@core/errors/not-found.error.js';
import { ValidationError } from '@core/errors/validation.error.js';
import { ACTIVE_STATUSES } from '@core/interfaces/booking.types.js';
import type { Item, ItemPatch, NewItem } from '@core/interfaces/item.types.js';

import type { AppDatabase } from '@infra/database/sqlite.client.js';
import { bookings, items } from '@infra/database/schema.js';

import { isUniqueViolation, runStorage } from './storage.util.js';

export class ItemRepository {
  constructor(private readonly db: AppDatabase) {}

  async create(input: NewItem): Promise<Item> {
    return runStorage('create_item', () => {
      try {
        return this.db.transaction(
          (tx) => {
            const sortOrder =
              input.sortOrder ??
              (tx
                .select({ max: sql<number>`coalesce(max(${items.sortOrder}), 0)` })
                .from(items)
                .get()?.max ?? 0) + 1;
            const now = new Date();
            return tx
              .insert(items)
              .values({
                name: input.name,
                description: input.description ?? null,
                totalQuantity: input.totalQuantity,
                sortOrder,
                isActive: true,
                createdAt: now,
                updatedAt: now,
              })
              .returning()
              .get();
          },
          { behavior: 'immediate' },
        );
      } catch (err) {
        if (isUniqueViolation(err)) {
          throw new ValidationError(`Item "${input.name}" already exists`);
        }
        throw err;
      }
    });
  }

  /**
   * Applies a patch. A capacity decrease is refused when some date from
   * `fromDay` on already holds more active bookings than the new capacity.
   */
  async update(id: number, patch: ItemPatch, fromDay: string): Promise<Item> {
    return runStorage('update_item', () => {
      try {
        return this.db.transaction(
          (tx) => {
            const current = tx.select().from(items).where(eq(items.id, id)).get();
            if (!current) throw new NotFoundError(`Item ${id} not found`);

            if (patch.totalQuantity !== undefined && patch.totalQuantity < current.totalQuantity) {
              const overbooked = tx
                .select({ date: bookings.date, count: sql<number>`count(*)` })
                .from(bookings)
                .where(
                  and(
                    eq(bookings.itemId, id),
                    gte(bookings.date, fromDay),
                    inArray(bookings.status, [...ACTIVE_STATUSES]),
                  ),
                )
                .groupBy(bookings.date)
                .having(sql`count(*) > ${patch.totalQuantity}`)
                .all();
              if (overbooked.length > 0) {
                const dates = overbooked.map((r) => r.date).join(', ');
                throw new BusinessRuleError(
                  `Capacity ${patch.totalQuantity} is below existing bookings on: ${dates}`,
                );
              }
            }

            const updated = tx
              .update(items)
              .set({
                name: patch.name ?? current.name,
                description: patch.description === undefined ? current.description : patch.description,
                totalQuantity: patch.totalQuantity ?? current.totalQuantity,
                updatedAt: new Date(),
              })
              .where(eq(items.id, id))
              .returning()
              .get();
            if (!updated) throw new NotFoundError(`Item ${id} not found`);
            return updated;
          },
          { behavior: 'immediate' },
        );
      } catch (err) {
        if (isUniqueViolation(err)) {
          throw new ValidationError(`Item "${patch.name ?? id}" already exists`);
        }
        throw err;
      }
    });
  }

  async deactivate(id: number): Promise<void> {
    runStorage('deactivate_item', () => {
      const result = this.db
        .update(items)
        .set({ isActive: false, updatedAt: new Date() })
        .where(eq(items.id, id))
        .run();
      if (result.changes === 0) throw new NotFoundError(`Item ${id} not found`);
    });
  }

  async reorder(id: number, newOrder: number): Promise<Item> {
    const sortOrder = Math.max(1, Math.trunc(newOrder));
    return runStorage('reorder_item', () => {
      const updated = this.db
        .update(items)
        .set({ sortOrder, updatedAt: new Date() })
        .where(eq(items.id, id))
        .returning()
        .get();
      if (!updated) throw new NotFoundError(`Item ${id} not found`);
      return updated;
    });
  }

  async findById(id: number): Promise<Item | null> {
    return runStorage('get_item_by_id', () => this.db.select().from(items).where(eq(items.id, id)).get() ?? null);
  }

  /** Active item with this exact name. */
  async findByName(name: string): Promise<Item | null> {
    return runStorage(
      'get_item_by_name',
      () =>
        this.db
          .select()
          .from(items)
          .where(and(eq(items.name, name), eq(items.isActive, true)))
          .get() ?? null,
    );
  }

  async listActive(): Promise<Item[]> {
    return runStorage('list_active_items', () =>
      this.db
        .select()
        .from(items)
        .where(eq(items.isActive, true))
        .orderBy(asc(items.sortOrder), asc(items.name))
        .all(),
    );
  }

  /**
   * Inserts seed items missing by name and refreshes quantity and
   * description of the ones present. Returns the number of inserted rows.
   */
  async syncSeed(seed: NewItem[]): Promise<number> {
    return runStorage('sync_items', () =>
      this.db.transaction(
        (tx) => {
          let inserted = 0;
          let nextOrder =
            (tx
              .select({ max: sql<number>`coalesce(max(${items.sortOrder}), 0)` })
              .from(items)
              .get()?.max ?? 0) + 1;
          const now = new Date();
          for (const entry of seed) {
            const existing = tx
              .select()
              .from(items)
              .where(and(eq(items.name, entry.name), eq(items.isActive, true)))
              .get();
            if (existing) {
              tx.update(items)
                .set({
                  totalQuantity: entry.totalQuantity,
                  description: entry.description ?? existing.description,
                  updatedAt: now,
                })
                .where(eq(items.id, existing.id))
                .run();
              continue;
            }
            tx.insert(items)
              .values({
                name: entry.name,
                description: entry.description ?? null,
                totalQuantity: entry.totalQuantity,
                sortOrder: entry.sortOrder ?? nextOrder,
                isActive: true,
                createdAt: now,
                updatedAt: now,
              })
              .run();
            nextOrder += 1;
            inserted += 1;
          }
          return inserted;
        },
        { behavior: 'immediate' },
      ),
    );
  }
}

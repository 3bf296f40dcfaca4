import type { items } from '@infra/database/schema.js';

export type Item = typeof items.$inferSelect;

export interface NewItem {
  name: string;
  description?: string | null;
  totalQuantity: number;
  sortOrder?: number;
}

export interface ItemPatch {
  name?: string;
  description?: string | null;
  totalQuantity?: number;
}

import { Router } from 'express';

import type { ItemService } from '@services/items/item.service.js';

export function createItemRoutes(items: ItemService): Router {
  const router = Router();
  router.get('/items', async (_req, res, next) => {
    try {
      const list = await items.getItems();
      res.json({
        items: list.map((i) => ({
          id: i.id,
          name: i.name,
          description: i.description,
          total_quantity: i.totalQuantity,
          sort_order: i.sortOrder,
        })),
      });
    } catch (e) {
      next(e);
    }
  });
  return router;
}

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';

import { NotFoundError } from '@core/errors/not-found.error.js';
import type { ItemAvailability } from '@core/interfaces/booking.types.js';

import type { AvailabilityService } from '@services/booking/availability.service.js';

import { parseDayKey } from '@utils/time.js';

const csvList = z.preprocess(
  (v) =>
    typeof v === 'string'
      ? v
          .split(',')
          .map((s) => s.trim())
          .filter(Boolean)
      : v,
  z.array(z.string().trim().min(1)).min(1),
);

const BulkQuerySchema = z.object({ items: csvList, dates: csvList });

export interface BulkResult {
  item_name: string;
  date: string;
  available: boolean;
  booked_count: number;
  total: number;
}

function bulkInput(req: Request): unknown {
  return req.method === 'POST' ? req.body : req.query;
}

export function createAvailabilityRoutes(availability: AvailabilityService, timezone: string): Router {
  const router = Router();

  const bulk = async (req: Request, res: Response): Promise<void> => {
    const parsed = BulkQuerySchema.safeParse(bulkInput(req));
    if (!parsed.success) {
      res.status(400).json({ message: 'Both items and dates must be non-empty lists' });
      return;
    }
    const dates: string[] = [];
    for (const raw of parsed.data.dates) {
      const date = parseDayKey(raw, timezone);
      if (!date) {
        res.status(400).json({ message: `Invalid date "${raw}", expected YYYY-MM-DD` });
        return;
      }
      dates.push(date);
    }

    const results: BulkResult[] = [];
    for (const itemName of parsed.data.items) {
      for (const date of dates) {
        let found: ItemAvailability;
        try {
          found = await availability.itemAvailabilityByName(itemName, date);
        } catch (err) {
          if (err instanceof NotFoundError) break;
          throw err;
        }
        results.push({
          item_name: found.itemName,
          date,
          available: found.available,
          booked_count: found.bookedCount,
          total: found.total,
        });
      }
    }
    res.json({ results });
  };

  router.get('/availability/bulk', async (req, res, next) => {
    try {
      await bulk(req, res);
    } catch (e) {
      next(e);
    }
  });

  router.post('/availability/bulk', async (req, res, next) => {
    try {
      await bulk(req, res);
    } catch (e) {
      next(e);
    }
  });

  router.get('/availability/:itemName', async (req, res, next) => {
    try {
      const raw = typeof req.query.date === 'string' ? req.query.date : '';
      const date = parseDayKey(raw, timezone);
      if (!date) {
        res.status(400).json({ message: 'Query parameter "date" must be YYYY-MM-DD' });
        return;
      }
      const found = await availability.itemAvailabilityByName(req.params.itemName, date);
      res.json({ available: found.available, booked_count: found.bookedCount, total: found.total });
    } catch (e) {
      next(e);
    }
  });

  return router;
}

import { once } from 'node:events';
import type { Server } from 'node:http';

import { config } from '@config/env.config';

import { MemoryStateRepository, type StateRepository } from '@core/repositories/state.repo.js';
import { Store } from '@core/repositories/store.js';

import { openDatabase } from '@infra/database/sqlite.client.js';
import { HttpMirrorSink } from '@infra/mirror/http-mirror.sink.js';
import { connectRedis, createRedisClient, disconnectRedis, type RedisClient } from '@infra/redis/redis.client.js';
import { keyValueFromRedis, RedisStateRepository } from '@infra/redis/redis-state.repo.js';
import { TelegrafTransport } from '@infra/telegram/telegraf.transport.js';

import { TokenBucketLimiter } from '@middleware/rate-limit.middleware.js';

import { BookingService } from '@services/booking/booking.service.js';
import { readBookingRules } from '@services/booking/config.defaults.js';
import { ChatOrchestrator } from '@services/chat/chat.orchestrator.js';
import { Messenger } from '@services/chat/messenger.js';
import { ManagerNotifier } from '@services/chat/notifications.js';
import { DEFAULT_BOOKINGS_PAGE_SIZE, DEFAULT_ITEMS_PAGE_SIZE } from '@services/chat/pagination.js';
import { FailoverStateRepository } from '@services/conversation/failover-state.repo.js';
import { StateManager } from '@services/conversation/state.manager.js';
import { EventBus } from '@services/events/event-bus.js';
import { ItemService, loadItemsFile } from '@services/items/item.service.js';
import { ReminderScheduler } from '@services/reminders/reminder.scheduler.js';
import { MemoryMirrorSink, type MirrorSink } from '@services/sync/mirror.sink.js';
import { SyncWorker } from '@services/sync/sync.worker.js';
import { UserService } from '@services/users/user.service.js';

import { logger } from '@utils/logger.js';
import { setGauge } from '@utils/metrics.js';

import { createApp } from './app.js';

const ACTIVE_USERS_REFRESH_MS = 5 * 60 * 1000;
const UPDATE_TIMEOUT_MS = 30_000;
const ALL_BOOKINGS_DAYS = 30;

async function buildStateRepository(store: Store): Promise<{ repo: StateRepository; redis?: RedisClient }> {
  if (!config.REDIS_URL) return { repo: store.states };
  const redis = createRedisClient(config.REDIS_URL);
  const fallback = new MemoryStateRepository(config.STATE_TTL_SECONDS);
  try {
    await connectRedis(redis);
  } catch (err) {
    logger.warn('[bootstrap] redis unavailable at startup, using memory state until it recovers', { err });
  }
  const primary = new RedisStateRepository(keyValueFromRedis(redis), config.STATE_TTL_SECONDS);
  return { repo: new FailoverStateRepository(primary, fallback), redis };
}

function buildSink(): MirrorSink {
  if (!config.MIRROR_URL) {
    logger.warn('[bootstrap] MIRROR_URL not set, mirroring into memory');
    return new MemoryMirrorSink();
  }
  return new HttpMirrorSink({
    url: config.MIRROR_URL,
    token: config.MIRROR_TOKEN,
    timeoutMs: config.MIRROR_TIMEOUT_MS,
    timezone: config.TIMEZONE,
  });
}

/** Runs `task` in the background; a rejection is logged, never left unhandled. */
function background(name: string, task: Promise<void>): Promise<void> {
  return task.catch((err: unknown) => {
    logger.error(`[bootstrap] ${name} crashed`, { err });
  });
}

async function bootstrap(): Promise<void> {
  const root = new AbortController();
  const database = openDatabase(config.DATABASE_PATH);
  const store = new Store(database.db, { stateTtlSeconds: config.STATE_TTL_SECONDS });
  const rules = readBookingRules();

  const items = new ItemService(store, config.TIMEZONE);
  if (config.ITEMS_FILE) {
    await items.syncItems(await loadItemsFile(config.ITEMS_FILE));
  }

  const { repo: stateRepo, redis } = await buildStateRepository(store);
  const states = new StateManager(stateRepo, {
    messages: config.BOT_RATE_LIMIT_MESSAGES,
    windowSeconds: config.BOT_RATE_LIMIT_WINDOW,
  });

  const events = new EventBus();
  const bookings = new BookingService(store, events, rules);
  const users = new UserService(
    store,
    { managers: config.MANAGERS, blacklist: config.BLACKLIST },
    { timezone: config.TIMEZONE, exportsPath: config.EXPORTS_PATH },
  );

  const worker = new SyncWorker(store, buildSink(), rules, {
    pollIntervalMs: config.SYNC_POLL_INTERVAL_MS,
    batchSize: config.SYNC_BATCH_SIZE,
    maxAttempts: config.SYNC_MAX_RETRIES,
    baseDelayMs: config.SYNC_BASE_DELAY_MS,
    maxDelayMs: config.SYNC_MAX_DELAY_MS,
  });
  const tasks: Promise<void>[] = [background('sync worker', worker.start(root.signal))];

  let transport: TelegrafTransport | undefined;
  if (config.TELEGRAM_BOT_TOKEN) {
    transport = new TelegrafTransport(config.TELEGRAM_BOT_TOKEN);
    const messenger = new Messenger(transport);
    const orchestrator = new ChatOrchestrator({
      messenger,
      bookings,
      users,
      items,
      states,
      sync: worker,
      settings: {
        timezone: config.TIMEZONE,
        managersContacts: config.MANAGERS_CONTACTS,
        itemsPageSize: config.BOT_PAGINATION_SIZE ?? DEFAULT_ITEMS_PAGE_SIZE,
        bookingsPageSize: config.BOT_PAGINATION_SIZE ?? DEFAULT_BOOKINGS_PAGE_SIZE,
        updateTimeoutMs: UPDATE_TIMEOUT_MS,
        allBookingsDays: ALL_BOOKINGS_DAYS,
      },
      clock: () => new Date(),
    });
    new ManagerNotifier(bookings, messenger, users.managerIds).attach(events);

    const reminders = new ReminderScheduler(store, messenger, {
      time: config.BOT_REMINDER_TIME,
      timezone: config.TIMEZONE,
    });
    tasks.push(
      background('telegram transport', transport.start((update) => orchestrator.handleUpdate(update, root.signal))),
      background('reminders', reminders.start(root.signal)),
    );
  } else {
    logger.warn('[bootstrap] TELEGRAM_BOT_TOKEN not set, chat transport disabled');
  }

  const refreshActiveUsers = async (): Promise<void> => {
    try {
      setGauge('active_users', (await users.getActiveUsers(30)).length);
    } catch (err) {
      logger.warn('[bootstrap] active users refresh failed', { err });
    }
  };
  await refreshActiveUsers();
  const gaugeTimer = setInterval(() => void refreshActiveUsers(), ACTIVE_USERS_REFRESH_MS);

  let server: Server | undefined;
  if (config.API_ENABLED) {
    const app = createApp({
      availability: bookings.availability,
      items,
      auth: {
        enabled: config.API_AUTH_ENABLED,
        headerKey: config.API_HEADER_KEY,
        headerExtra: config.API_HEADER_EXTRA,
        keys: config.API_KEYS,
      },
      limiter: new TokenBucketLimiter({ ratePerSecond: config.API_RATE_LIMIT_RPS, burst: config.API_RATE_LIMIT_BURST }),
      timezone: config.TIMEZONE,
    });
    server = app.listen(config.PORT);
    await once(server, 'listening');
    logger.info('[bootstrap] HTTP API listening', { port: config.PORT });
  }

  logger.info('[bootstrap] booking service up', { timezone: config.TIMEZONE, managers: config.MANAGERS.length });

  const shutdown = async (signal: string): Promise<void> => {
    if (root.signal.aborted) return;
    logger.info('[bootstrap] shutting down', { signal });
    root.abort();
    clearInterval(gaugeTimer);
    transport?.stop(signal);
    if (server) {
      server.close();
      await once(server, 'close');
    }
    await Promise.all(tasks);
    if (redis) await disconnectRedis(redis);
    database.close();
    logger.info('[bootstrap] bye');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error('[bootstrap] shutdown failed', { err });
        process.exitCode = 1;
      });
    });
  }
}

bootstrap().catch((err: unknown) => {
  logger.error('[bootstrap] fatal error', { err });
  process.exit(1);
});

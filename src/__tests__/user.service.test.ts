import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import * as XLSX from 'xlsx';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { NotFoundError } from '@core/errors/not-found.error.js';
import type { Store } from '@core/repositories/store.js';

import { UserService } from '@services/users/user.service.js';

import { createTestStore, fixedClock, NOW, seedItem, TZ, type TestStore } from '@test/utils/fixtures.js';

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

describe('UserService', () => {
  let handle: TestStore;
  let store: Store;
  let exportsPath: string;
  let users: UserService;

  beforeEach(async () => {
    handle = createTestStore();
    store = handle.store;
    exportsPath = await mkdtemp(path.join(tmpdir(), 'users-export-'));
    users = new UserService(
      store,
      { managers: [1], blacklist: [666] },
      { timezone: TZ, exportsPath },
      fixedClock(),
    );
  });

  afterEach(async () => {
    handle.close();
    await rm(exportsPath, { recursive: true, force: true });
  });

  it('takes role flags from configuration, not from the profile', async () => {
    const manager = await users.saveUser({ telegramId: 1, firstName: 'Анна' });
    const banned = await users.saveUser({ telegramId: 666, isManager: true });
    const client = await users.saveUser({ telegramId: 100, isBlacklisted: true });

    expect([manager.isManager, manager.isBlacklisted]).toEqual([true, false]);
    expect([banned.isManager, banned.isBlacklisted]).toEqual([false, true]);
    expect([client.isManager, client.isBlacklisted]).toEqual([false, false]);
    expect((await users.getManagers()).map((u) => u.telegramId)).toEqual([1]);
  });

  it('keeps a stored phone when a later profile has none', async () => {
    await users.saveUser({ telegramId: 100, firstName: 'Иван' });
    await users.updatePhone(100, '79991234567');
    await users.saveUser({ telegramId: 100, firstName: 'Иван', username: 'ivan' });

    const user = await users.getUser(100);
    expect(user.phone).toBe('79991234567');
    expect(user.username).toBe('ivan');
  });

  it('raises NotFoundError for an unknown user', async () => {
    await expect(users.getUser(42)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('lists users active within the window', async () => {
    await users.saveUser({ telegramId: 100 });
    await users.saveUser({ telegramId: 200 });
    await store.users.touchActivity(100, new Date(NOW.getTime() - 2 * DAY_MS));
    await store.users.touchActivity(200, new Date(NOW.getTime() - 10 * DAY_MS));

    const active = await users.getActiveUsers(7);

    expect(active.map((u) => u.telegramId)).toEqual([100]);
  });

  it('returns bookings from two weeks back onwards, newest date first', async () => {
    const boat = await seedItem(store, 'Лодка', 5);
    const book = (userId: number, date: string) =>
      store.bookings.createWithLock({
        userId,
        userName: 'Иван',
        userNickname: '',
        phone: '',
        itemId: boat.id,
        itemName: boat.name,
        date,
        comment: '',
      });
    await book(100, '2025-05-26');
    await book(100, '2025-05-27');
    await book(100, '2025-06-20');
    await book(200, '2025-06-12');

    const history = await users.getUserBookings(100);

    expect(history.map((b) => b.date)).toEqual(['2025-06-20', '2025-05-27']);
  });

  it('exports users to an xlsx workbook', async () => {
    await users.saveUser({ telegramId: 1, firstName: 'Анна', username: 'anna' });
    await users.saveUser({ telegramId: 100, firstName: 'Иван', lastName: 'Петров' });
    await users.updatePhone(100, '79991234567');
    await store.users.touchActivity(1, new Date(NOW.getTime() - HOUR_MS));
    await store.users.touchActivity(100, NOW);

    const file = await users.exportUsers();

    expect(path.dirname(file)).toBe(exportsPath);
    expect(path.basename(file)).toBe(`users_20250610_${NOW.getTime()}.xlsx`);

    const wb = XLSX.read(await readFile(file), { type: 'buffer' });
    const sheet = wb.Sheets['Users'];
    expect(sheet).toBeDefined();
    if (!sheet) return;
    const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1 });

    expect(rows).toHaveLength(3);
    expect(rows[0]?.slice(0, 3)).toEqual(['ID', 'Telegram ID', 'Username']);
    const [, ivan, anna] = rows;
    expect([ivan?.[1], ivan?.[3], ivan?.[4], ivan?.[5], ivan?.[6]]).toEqual([
      100,
      'Иван',
      'Петров',
      '+7 (999) 123-45-67',
      'нет',
    ]);
    expect([anna?.[1], anna?.[2], anna?.[3], anna?.[6]]).toEqual([1, 'anna', 'Анна', 'да']);
  });
});

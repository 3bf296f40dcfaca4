import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import * as XLSX from 'xlsx';

import { NotFoundError } from '@core/errors/not-found.error.js';
import type { Booking } from '@core/interfaces/booking.types.js';
import type { User, UserProfile } from '@core/interfaces/user.types.js';
import type { Store } from '@core/repositories/store.js';

import { logger } from '@utils/logger.js';
import { formatPhoneForDisplay } from '@utils/phone.js';
import { addDays, formatTimestamp, systemClock, todayKey, type Clock } from '@utils/time.js';

export interface RoleLists {
  managers: readonly number[];
  blacklist: readonly number[];
}

export interface UserServiceOptions {
  timezone: string;
  exportsPath: string;
  /** How far back `getUserBookings` looks, in days. */
  historyDays?: number;
}

const EXPORT_HEADER = [
  'ID',
  'Telegram ID',
  'Username',
  'Имя',
  'Фамилия',
  'Телефон',
  'Менеджер',
  'Заблокирован',
  'Последняя активность',
  'Создан',
];

export class UserService {
  private readonly managers: ReadonlySet<number>;
  private readonly blacklist: ReadonlySet<number>;

  constructor(
    private readonly store: Store,
    roles: RoleLists,
    private readonly options: UserServiceOptions,
    private readonly clock: Clock = systemClock,
  ) {
    this.managers = new Set(roles.managers);
    this.blacklist = new Set(roles.blacklist);
  }

  isManager(telegramId: number): boolean {
    return this.managers.has(telegramId);
  }

  isBlacklisted(telegramId: number): boolean {
    return this.blacklist.has(telegramId);
  }

  get managerIds(): number[] {
    return [...this.managers];
  }

  /** Upserts the profile; role flags always come from configuration. */
  async saveUser(profile: UserProfile): Promise<User> {
    return this.store.users.upsert({
      ...profile,
      isManager: this.isManager(profile.telegramId),
      isBlacklisted: this.isBlacklisted(profile.telegramId),
    });
  }

  async touchActivity(telegramId: number): Promise<void> {
    await this.store.users.touchActivity(telegramId, this.clock());
  }

  async updatePhone(telegramId: number, phone: string): Promise<void> {
    await this.store.users.updatePhone(telegramId, phone);
  }

  async getUser(telegramId: number): Promise<User> {
    const user = await this.store.users.findByTelegramId(telegramId);
    if (!user) throw new NotFoundError(`User ${telegramId} not found`);
    return user;
  }

  async getAllUsers(): Promise<User[]> {
    return this.store.users.listAll();
  }

  async getManagers(): Promise<User[]> {
    return this.store.users.listByManagerFlag(true);
  }

  async getActiveUsers(days: number): Promise<User[]> {
    return this.store.users.listActiveSince(days, this.clock());
  }

  async getUserBookings(telegramId: number): Promise<Booking[]> {
    const since = addDays(
      todayKey(this.options.timezone, this.clock),
      -(this.options.historyDays ?? 14),
      this.options.timezone,
    );
    return this.store.bookings.listForUser(telegramId, since);
  }

  /** Writes every user to an .xlsx workbook under the exports directory; returns its path. */
  async exportUsers(): Promise<string> {
    const users = await this.store.users.listAll();
    const tz = this.options.timezone;
    const rows = users.map((u) => [
      u.id,
      u.telegramId,
      u.username ?? '',
      u.firstName ?? '',
      u.lastName ?? '',
      u.phone ? formatPhoneForDisplay(u.phone) : '',
      u.isManager ? 'да' : 'нет',
      u.isBlacklisted ? 'да' : 'нет',
      formatTimestamp(u.lastActivity, tz),
      formatTimestamp(u.createdAt, tz),
    ]);

    const wb = XLSX.utils.book_new();
    const ws = XLSX.utils.aoa_to_sheet([EXPORT_HEADER, ...rows]);
    XLSX.utils.book_append_sheet(wb, ws, 'Users');
    const buf: Buffer = XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });

    await mkdir(this.options.exportsPath, { recursive: true });
    const stamp = todayKey(tz, this.clock).replaceAll('-', '');
    const file = path.join(this.options.exportsPath, `users_${stamp}_${this.clock().getTime()}.xlsx`);
    await writeFile(file, buf);

    logger.info('[users] exported', { file, count: users.length });
    return file;
  }
}

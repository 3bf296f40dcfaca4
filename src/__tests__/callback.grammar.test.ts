import { describe, it, expect } from 'vitest';

import { cb, parseCallback } from '@services/chat/callback.grammar.js';
import { paginate, renderPage } from '@services/chat/pagination.js';

describe('parseCallback', () => {
  it('parses bare commands', () => {
    expect(parseCallback('back_to_main')).toEqual({ type: 'back_to_main' });
    expect(parseCallback('export_users')).toEqual({ type: 'export_users' });
    expect(parseCallback('manager_single_date')).toEqual({ type: 'manager_date_type', dateType: 'single' });
    expect(parseCallback('manager_date_range')).toEqual({ type: 'manager_date_type', dateType: 'range' });
  });

  it('parses prefixed pages, items and bookings', () => {
    expect(parseCallback('items_page:2')).toEqual({ type: 'items_page', page: 2 });
    expect(parseCallback('my_bookings_page:0')).toEqual({ type: 'my_bookings_page', page: 0 });
    expect(parseCallback('schedule_select_item:14')).toEqual({ type: 'schedule_select_item', itemId: 14 });
    expect(parseCallback('show_booking:7')).toEqual({ type: 'show_booking', bookingId: 7 });
  });

  it('parses booking actions including change_item', () => {
    expect(parseCallback('confirm_12')).toEqual({ type: 'booking_action', action: 'confirm', bookingId: 12 });
    expect(parseCallback('change_item_12')).toEqual({
      type: 'booking_action',
      action: 'change_item',
      bookingId: 12,
    });
  });

  it('parses change_to before the action pattern', () => {
    expect(parseCallback('change_to_12_3')).toEqual({ type: 'change_to', bookingId: 12, itemId: 3 });
  });

  it('reports anything else as unknown', () => {
    for (const data of ['', 'confirm_', 'delete_12', 'items_page:x', 'unknown_prefix:3']) {
      expect(parseCallback(data)).toEqual({ type: 'unknown', data });
    }
  });

  it('parses what the builders produce', () => {
    expect(parseCallback(cb.page('bookings_page', 4))).toEqual({ type: 'bookings_page', page: 4 });
    expect(parseCallback(cb.action('reschedule', 9))).toEqual({
      type: 'booking_action',
      action: 'reschedule',
      bookingId: 9,
    });
    expect(parseCallback(cb.callBooking(9))).toEqual({ type: 'call_booking', bookingId: 9 });
  });
});

describe('paginate', () => {
  const list = ['a', 'b', 'c', 'd', 'e'];

  it('slices pages and clamps out-of-range requests', () => {
    expect(paginate(list, 1, 2)).toEqual({ entries: ['c', 'd'], page: 1, totalPages: 3, total: 5 });
    expect(paginate(list, 9, 2).page).toBe(2);
    expect(paginate(list, -1, 2).page).toBe(0);
  });

  it('reports one page for an empty list', () => {
    expect(paginate([], 0, 5)).toEqual({ entries: [], page: 0, totalPages: 1, total: 0 });
  });
});

describe('renderPage', () => {
  const options = {
    title: 'Позиции',
    pageData: (page: number) => cb.page('items_page', page),
    button: (entry: string) => ({ text: entry, data: `pick:${entry}` }),
  };

  it('adds navigation only where a neighbour page exists', () => {
    const view = renderPage(paginate(['a', 'b', 'c'], 1, 1), options);

    expect(view.text).toBe('Позиции\n\nСтраница 2 из 3');
    expect(view.keyboard).toEqual([
      [{ text: 'b', data: 'pick:b' }],
      [
        { text: '⬅️ Назад', data: 'items_page:0' },
        { text: 'Вперед ➡️', data: 'items_page:2' },
      ],
      [{ text: '⬅️ Назад в меню', data: 'back_to_main' }],
    ]);
  });

  it('renders lines under the title on a single page', () => {
    const view = renderPage(paginate(['a', 'b'], 0, 5), { ...options, line: (e: string) => `• ${e}` });

    expect(view.text).toBe('Позиции\n\n• a\n• b');
    expect(view.keyboard).toHaveLength(3);
  });
});

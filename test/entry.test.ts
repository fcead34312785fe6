import { describe, it, expect } from 'vitest';
import { groupByMonth, type StoredEntry } from '../src/model/entry.js';

const make = (id: number, timestamp: number, date: string): StoredEntry => ({ id, timestamp, date, body: `entry ${id}` });

describe('groupByMonth', () => {
  it('groups by the month of the local date', () => {
    const groups = groupByMonth([
      make(1, 1675468740, '2023-02-03'),
      make(2, 1672560300, '2023-01-01'),
      make(3, 1675444500, '2023-02-03'),
    ]);

    expect(groups.map(g => [g.month, g.name])).toEqual([[1, 'January'], [2, 'February']]);
    expect(groups[1].entries.map(e => e.id)).toEqual([3, 1]);
  });

  it('returns nothing for no entries', () => {
    expect(groupByMonth([])).toEqual([]);
  });
});

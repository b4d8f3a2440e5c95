import { describe, expect, it } from 'vitest';

import { RecentIdWindow } from './recent-id-window';

describe('RecentIdWindow', (): void => {
  it('records new ids and reports repeats', (): void => {
    const window: RecentIdWindow<number> = new RecentIdWindow<number>(3);

    expect(window.add(100)).toBe(true);
    expect(window.add(100)).toBe(false);
    expect(window.has(100)).toBe(true);
    expect(window.size).toBe(1);
  });

  it('overwrites the oldest id once capacity is reached', (): void => {
    const window: RecentIdWindow<number> = new RecentIdWindow<number>(3);

    window.add(1);
    window.add(2);
    window.add(3);
    window.add(4);

    expect(window.size).toBe(3);
    expect(window.has(1)).toBe(false);
    expect(window.has(2)).toBe(true);
    expect(window.has(4)).toBe(true);
    expect(window.evicted).toBe(1);
  });

  it('never grows past capacity', (): void => {
    const window: RecentIdWindow<number> = new RecentIdWindow<number>(2000);

    for (let updateId: number = 1; updateId <= 5000; updateId += 1) {
      window.add(updateId);
      expect(window.size).toBeLessThanOrEqual(2000);
    }

    expect(window.has(3001)).toBe(true);
    expect(window.has(3000)).toBe(false);
  });

  it('accepts string ids and can be cleared', (): void => {
    const window: RecentIdWindow<string> = new RecentIdWindow<string>(2);

    window.add('cbq-1');
    window.clear();

    expect(window.size).toBe(0);
    expect(window.add('cbq-1')).toBe(true);
  });

  it('rejects a non-positive capacity', (): void => {
    expect((): RecentIdWindow<number> => new RecentIdWindow<number>(0)).toThrow(
      'RecentIdWindow capacity must be a positive integer, got 0',
    );
  });
});

import { describe, it, expect } from 'vitest';
import { Lazy, Session } from './session.js';

describe('Lazy', () => {
  it('should load once and share the result', async () => {
    const lazy = new Lazy<number>();
    let loads = 0;
    const load = async () => ++loads;

    const [a, b] = await Promise.all([lazy.get(load), lazy.get(load)]);

    expect([a, b]).toEqual([1, 1]);
    expect(loads).toBe(1);
    expect(lazy.loaded).toBe(true);
  });

  it('should forget a failed load', async () => {
    const lazy = new Lazy<string>();

    await expect(lazy.get(async () => { throw new Error('offline'); })).rejects.toThrow('offline');
    expect(lazy.loaded).toBe(false);
    expect(await lazy.get(async () => 'ok')).toBe('ok');
  });
});

describe('Session', () => {
  it('should keep one lazy value per filter and clear them all', async () => {
    const session = new Session();

    expect(session.filterJql('10')).toBe(session.filterJql('10'));
    await session.currentUser.get(async () => ({ displayName: 'Dana' }));

    session.clear();

    expect(session.currentUser.loaded).toBe(false);
    expect(session.filterJql('10').loaded).toBe(false);
  });
});

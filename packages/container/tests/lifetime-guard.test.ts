import { describe, expect, it, vi } from 'vitest';

import { LifetimeGuard } from '../src/core/lifetime-guard.js';
import { contract } from '../src/core/token.js';

const A = contract('A').id;
const B = contract('B').id;

describe('LifetimeGuard', () => {
  it('moves through constructing to constructed on a successful sync build', () => {
    const guard = new LifetimeGuard();
    expect(guard.state).toBe('unconstructed');

    guard.enter([A, B]);
    expect(guard.state).toBe('constructing');
    expect(guard.holder).toEqual([A, B]);
    expect(guard.isPending).toBe(false);

    guard.leave(true);
    expect(guard.state).toBe('constructed');
    expect(guard.holder).toEqual([]);
  });

  it('returns to unconstructed after a failed sync build', () => {
    const guard = new LifetimeGuard();
    guard.enter([A]);
    guard.leave(false);
    expect(guard.state).toBe('unconstructed');

    guard.enter([A]);
    expect(guard.state).toBe('constructing');
  });

  it('refuses to enter twice', () => {
    const guard = new LifetimeGuard();
    guard.enter([A]);
    expect(() => guard.enter([A])).toThrow('LifetimeGuard.enter() called while constructing');
  });

  it('copies the chain it is given', () => {
    const guard = new LifetimeGuard();
    const chain = [A];
    guard.enter(chain);
    chain.push(B);
    expect(guard.holder).toEqual([A]);
  });

  it('runs one async build for concurrent callers', async () => {
    const guard = new LifetimeGuard();
    const build = vi.fn(async () => ({ id: 1 }));

    const first = guard.acquire([A], build);
    const second = guard.acquire([B], build);

    expect(guard.isPending).toBe(true);
    expect(guard.state).toBe('constructing');
    expect(second).toBe(first);

    const [x, y] = await Promise.all([first, second]);
    expect(x).toBe(y);
    expect(build).toHaveBeenCalledTimes(1);
    expect(guard.state).toBe('constructed');
    expect(guard.isPending).toBe(false);
  });

  it('delivers a failure to every waiter and allows a retry', async () => {
    const guard = new LifetimeGuard();
    const failing = vi.fn(async () => {
      throw new Error('nope');
    });

    const first = guard.acquire([A], failing);
    const second = guard.acquire([A], failing);
    await expect(first).rejects.toThrow('nope');
    await expect(second).rejects.toThrow('nope');
    expect(failing).toHaveBeenCalledTimes(1);
    expect(guard.state).toBe('unconstructed');
    expect(guard.isPending).toBe(false);

    await expect(guard.acquire([A], async () => 'ok')).resolves.toBe('ok');
    expect(guard.state).toBe('constructed');
  });
});

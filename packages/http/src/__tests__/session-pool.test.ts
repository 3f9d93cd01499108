import { describe, expect, it, vi } from 'vitest';

import { SessionPool, type TransportFactory } from '../session-pool.js';

interface FakeTransport {
  closed: boolean;
  hostKey: string;
}

const createFactory = (closeError?: Error) => {
  const created: FakeTransport[] = [];
  const factory: TransportFactory<FakeTransport> = {
    close: vi.fn((transport: FakeTransport) => {
      transport.closed = true;
      return closeError ? Promise.reject(closeError) : Promise.resolve();
    }),
    create: vi.fn((hostKey: string) => {
      const transport = { closed: false, hostKey };
      created.push(transport);
      return transport;
    }),
  };
  return { created, factory };
};

const A = 'https://a.example.com';
const B = 'https://b.example.com';
const C = 'https://c.example.com';

describe('SessionPool', () => {
  it('reuses the transport for a host', async () => {
    const { factory } = createFactory();
    const pool = new SessionPool(factory, { maxSessions: 2 });

    const first = await pool.lease(A);
    await first.release();
    const second = await pool.lease(A);

    expect(second.transport).toBe(first.transport);
    expect(factory.create).toHaveBeenCalledTimes(1);
    expect(pool.size).toBe(1);
  });

  it('evicts the least recently used host when full', async () => {
    const { created, factory } = createFactory();
    const pool = new SessionPool(factory, { maxSessions: 2 });

    await (await pool.lease(A)).release();
    await (await pool.lease(B)).release();
    await (await pool.lease(A)).release();
    await (await pool.lease(C)).release();

    expect(pool.keys()).toEqual([A, C]);
    expect(pool.has(B)).toBe(false);
    expect(pool.size).toBe(2);
    expect(created.map((transport) => [transport.hostKey, transport.closed])).toEqual([
      [A, false],
      [B, true],
      [C, false],
    ]);
  });

  it('defers closing an evicted transport until its last lease is released', async () => {
    const { created, factory } = createFactory();
    const pool = new SessionPool(factory, { maxSessions: 1 });

    const first = await pool.lease(A);
    const second = await pool.lease(A);
    const other = await pool.lease(B);

    expect(pool.size).toBe(1);
    expect(created[0]?.closed).toBe(false);

    await first.release();
    await first.release();
    expect(created[0]?.closed).toBe(false);

    await second.release();
    expect(created[0]?.closed).toBe(true);
    expect(factory.close).toHaveBeenCalledTimes(1);

    await other.release();
  });

  it('closes every transport once, even when close is called twice', async () => {
    const { created, factory } = createFactory();
    const pool = new SessionPool(factory, { maxSessions: 4 });
    await (await pool.lease(A)).release();
    const held = await pool.lease(B);

    await Promise.all([pool.close(), pool.close()]);
    await pool.close();

    expect(created.every((transport) => transport.closed)).toBe(true);
    expect(factory.close).toHaveBeenCalledTimes(2);
    expect(pool.size).toBe(0);
    expect(pool.closed).toBe(true);

    await held.release();
    expect(factory.close).toHaveBeenCalledTimes(2);
  });

  it('refuses new leases after close', async () => {
    const { factory } = createFactory();
    const pool = new SessionPool(factory, { maxSessions: 1 });
    await pool.close();

    await expect(pool.lease(A)).rejects.toThrow('Session pool is closed');
  });

  it('logs rather than throws when a transport fails to close', async () => {
    const { factory } = createFactory(new Error('socket hang up'));
    const pool = new SessionPool(factory, { maxSessions: 1 });
    await (await pool.lease(A)).release();

    await expect(pool.close()).resolves.toBeUndefined();
  });

  it('rejects a non-positive capacity', () => {
    const { factory } = createFactory();

    expect(() => new SessionPool(factory, { maxSessions: 0 })).toThrow('maxSessions must be a positive integer');
  });
});

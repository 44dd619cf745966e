import { type LogEntry, ReentrantAccessError, createLogger } from '@ripplekit/core';
import { describe, expect, it } from 'vitest';
import { ExclusiveGuard } from '../exclusive-guard.js';

describe('ExclusiveGuard', () => {
  it('should return the section result and release the guard', () => {
    const guard = new ExclusiveGuard();
    let heldInside = false;

    const result = guard.run('compute', () => {
      heldInside = guard.isHeld;
      return 42;
    });

    expect(result).toBe(42);
    expect(heldInside).toBe(true);
    expect(guard.isHeld).toBe(false);
  });

  it('should release the guard when the section throws', () => {
    const guard = new ExclusiveGuard();

    expect(() =>
      guard.run('explode', () => {
        throw new Error('boom');
      })
    ).toThrow('boom');

    expect(guard.isHeld).toBe(false);
    expect(guard.run('after', () => 'ok')).toBe('ok');
  });

  it('should reject re-entry and log a warning', () => {
    const entries: LogEntry[] = [];
    const guard = new ExclusiveGuard({
      name: 'orders',
      logger: createLogger({ module: 'test', handler: (e) => entries.push(e) }),
    });

    let caught: unknown;
    guard.run('outer', () => {
      try {
        guard.run('inner', () => undefined);
      } catch (error) {
        caught = error;
      }
    });

    expect(caught).toBeInstanceOf(ReentrantAccessError);
    expect(caught).toMatchObject({ code: 'RIPPLE_C500', operation: 'inner', holder: 'outer' });
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'warn',
      message: 'Re-entrant access rejected',
      context: { guard: 'orders', operation: 'inner', holder: 'outer' },
    });
  });
});

import {
  DuplicateKeyError,
  KeyNotFoundError,
  type LogEntry,
  ObjectDisposedError,
  ObservableList,
  createLogger,
} from '@ripplekit/core';
import { describe, expect, it } from 'vitest';
import type { ViewEvent } from '../types.js';
import { ViewManager, createViewManager } from '../view-manager.js';

interface Order {
  id: string;
  status: 'open' | 'closed';
}

const orders = () =>
  new ObservableList<Order>([
    { id: 'o1', status: 'open' },
    { id: 'o2', status: 'closed' },
  ]);

describe('ViewManager', () => {
  it('should create and look up named views', () => {
    const manager = createViewManager();

    const view = manager.createView('ids', orders(), (o) => o.id);

    expect(manager).toBeInstanceOf(ViewManager);
    expect(manager.size).toBe(1);
    expect(manager.hasView('ids')).toBe(true);
    expect(manager.getView('ids')).toBe(view);
    expect(manager.getView('missing')).toBeUndefined();
    expect(view.toArray()).toEqual(['o1', 'o2']);
  });

  it('should reject a duplicate name', () => {
    const manager = createViewManager();
    manager.createView('ids', orders(), (o) => o.id);

    expect(() => manager.createView('ids', orders(), (o) => o.status)).toThrow(DuplicateKeyError);
    expect(manager.size).toBe(1);
  });

  it('should dispose a dropped view', () => {
    const manager = createViewManager();
    const view = manager.createView('ids', orders(), (o) => o.id);

    manager.dropView('ids');

    expect(view.isDisposed).toBe(true);
    expect(manager.hasView('ids')).toBe(false);
    expect(() => manager.dropView('ids')).toThrow(KeyNotFoundError);
  });

  it('should report stats for every view', () => {
    const manager = createViewManager();
    const open = manager.createView('open', orders(), (o) => o.id);
    open.attachFilter((o) => o.status === 'open');
    manager.createView('all', orders(), (o) => o.id);

    const stats = manager.stats();

    expect(stats.map((s) => [s.name, s.count, s.filtered])).toEqual([
      ['open', 1, true],
      ['all', 2, false],
    ]);
  });

  it('should emit lifecycle events until disposed', () => {
    const manager = createViewManager();
    const events: ViewEvent[] = [];
    let completed = false;
    manager.events().subscribe({ next: (e) => events.push(e), complete: () => (completed = true) });

    manager.createView('a', orders(), (o) => o.id);
    manager.createView('b', orders(), (o) => o.id);
    manager.dropView('a');
    manager.dispose();

    expect(events).toEqual([
      { type: 'view:created', name: 'a' },
      { type: 'view:created', name: 'b' },
      { type: 'view:dropped', name: 'a' },
      { type: 'view:dropped', name: 'b' },
    ]);
    expect(completed).toBe(true);
  });

  it('should keep working after disposeAll', () => {
    const manager = createViewManager();
    const view = manager.createView('a', orders(), (o) => o.id);

    manager.disposeAll();
    manager.createView('a', orders(), (o) => o.status);

    expect(view.isDisposed).toBe(true);
    expect(manager.size).toBe(1);
  });

  it('should refuse new views after dispose', () => {
    const manager = createViewManager();
    const view = manager.createView('a', orders(), (o) => o.id);

    manager.dispose();
    manager.dispose();

    expect(view.isDisposed).toBe(true);
    expect(manager.size).toBe(0);
    expect(() => manager.createView('b', orders(), (o) => o.id)).toThrow(ObjectDisposedError);
  });

  it('should log view lifecycle at debug level under child modules', () => {
    const entries: LogEntry[] = [];
    const manager = createViewManager({
      logger: createLogger({ module: 'views', level: 'debug', handler: (e) => entries.push(e) }),
    });

    manager.createView('ids', orders(), (o) => o.id);
    manager.dropView('ids');

    expect(entries.map((e) => [e.module, e.message])).toEqual([
      ['views:ids', 'refresh completed'],
      ['views', 'View created'],
      ['views:ids', 'View disposed'],
      ['views', 'View dropped'],
    ]);
  });
});

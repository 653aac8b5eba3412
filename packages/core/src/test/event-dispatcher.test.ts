/**
 * EventDispatcher Tests
 *
 * Verifies:
 * - Multi-listener support (.on / .off)
 * - Wildcard listener receives all events
 * - Sync and async (microtask) dispatch
 * - Listener isolation and onError
 * - Timestamped, frozen events
 * - Integration: record events via EventEmittingStorage, engine events via DataEngine
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { EventDispatcher, type DispatchedEvent } from '../impl/event-dispatcher';
import { EventEmittingStorage } from '../impl/event-emitting-storage';
import { MemoryStorageBackend } from '../impl/memory-storage';
import { DataEngine } from '../engine/data-engine';
import { TestHarness } from './harness';
import { usersModel } from './models';

const inserted = { namespace: 'default', model: 'users', id: 1, values: { name: 'Alice' } };

// ── Sync Mode Tests ─────────────────────────────────────────────

describe('EventDispatcher (sync)', () => {
  let dispatcher: EventDispatcher;

  beforeEach(() => {
    dispatcher = new EventDispatcher({ mode: 'sync' });
  });

  it('dispatches to a single listener', () => {
    const received: DispatchedEvent[] = [];
    dispatcher.on('record.inserted', e => received.push(e));

    dispatcher.onRecordInserted(inserted);

    expect(received).toHaveLength(1);
    expect(received[0].type).toBe('record.inserted');
    expect(received[0].model).toBe('users');
  });

  it('dispatches to multiple listeners on same event', () => {
    let a = 0, b = 0;
    dispatcher.on('record.deleted', () => { a++; });
    dispatcher.on('record.deleted', () => { b++; });

    dispatcher.onRecordDeleted({ namespace: 'default', model: 'users', id: 1 });

    expect(a).toBe(1);
    expect(b).toBe(1);
  });

  it('wildcard listener receives all events', () => {
    const all: string[] = [];
    dispatcher.on('*', e => all.push(e.type));

    dispatcher.onModelsLoaded({ models: ['users'] });
    dispatcher.onNamespaceChanged({ from: 'default', to: 'tenant_a' });
    dispatcher.onRecordInserted(inserted);

    expect(all).toEqual(['models.loaded', 'namespace.changed', 'record.inserted']);
  });

  it('adds timestamp to every event', () => {
    const received: DispatchedEvent[] = [];
    dispatcher.on('record.inserted', e => received.push(e));

    const before = Date.now();
    dispatcher.onRecordInserted(inserted);

    expect(received[0].timestamp).toBeGreaterThanOrEqual(before);
    expect(received[0].timestamp).toBeLessThanOrEqual(Date.now() + 10);
  });

  it('events are frozen (immutable)', () => {
    const received: DispatchedEvent[] = [];
    dispatcher.on('record.inserted', e => received.push(e));

    dispatcher.onRecordInserted(inserted);

    expect(Object.isFrozen(received[0])).toBe(true);
    expect(Reflect.set(received[0], 'model', 'tampered')).toBe(false);
  });

  it('unsubscribe function removes listener', () => {
    let count = 0;
    const unsub = dispatcher.on('record.inserted', () => { count++; });

    dispatcher.onRecordInserted(inserted);
    expect(count).toBe(1);

    unsub();
    dispatcher.onRecordInserted(inserted);
    expect(count).toBe(1);
  });

  it('off() removes listener', () => {
    let count = 0;
    const listener = () => { count++; };
    dispatcher.on('record.inserted', listener);

    dispatcher.onRecordInserted(inserted);
    dispatcher.off('record.inserted', listener);
    dispatcher.onRecordInserted(inserted);

    expect(count).toBe(1);
  });

  it('delivers to specific listeners before wildcards, in subscription order', () => {
    const order: string[] = [];
    dispatcher.on('*', () => { order.push('any'); });
    dispatcher.on('record.inserted', () => { order.push('first'); });
    dispatcher.on('record.inserted', () => { order.push('second'); });

    dispatcher.onRecordInserted(inserted);

    expect(order).toEqual(['first', 'second', 'any']);
  });

  it('off() of an unknown listener is a no-op', () => {
    let count = 0;
    dispatcher.on('record.inserted', () => { count++; });

    dispatcher.off('record.inserted', () => {});
    dispatcher.off('models.loaded', () => {});
    dispatcher.onRecordInserted(inserted);

    expect(count).toBe(1);
  });
});

// ── Listener Isolation ──────────────────────────────────────────

describe('EventDispatcher isolation', () => {
  it('throwing listener does not affect other listeners', () => {
    const dispatcher = new EventDispatcher({ mode: 'sync' });
    let reached = false;

    dispatcher.on('record.inserted', () => { throw new Error('boom'); });
    dispatcher.on('record.inserted', () => { reached = true; });

    dispatcher.onRecordInserted(inserted);

    expect(reached).toBe(true);
  });

  it('onError receives the error and the event', () => {
    const captured: Array<{ err: unknown; event: DispatchedEvent }> = [];
    const dispatcher = new EventDispatcher({
      mode: 'sync',
      onError: (err, event) => captured.push({ err, event }),
    });

    dispatcher.on('models.rejected', () => { throw new Error('bad listener'); });
    dispatcher.onModelsRejected({ model: 'bad', issues: [] });

    expect(captured).toHaveLength(1);
    expect(captured[0].err).toBeInstanceOf(Error);
    expect(captured[0].event.type).toBe('models.rejected');
    expect(captured[0].event.model).toBe('bad');
  });
});

// ── Async Mode Tests ────────────────────────────────────────────

describe('EventDispatcher (async)', () => {
  it('does not fire listeners synchronously', () => {
    const dispatcher = new EventDispatcher({ mode: 'async' });
    let count = 0;
    dispatcher.on('record.inserted', () => { count++; });

    dispatcher.onRecordInserted(inserted);

    expect(count).toBe(0);
  });

  it('fires listeners in order after flush()', async () => {
    const dispatcher = new EventDispatcher();
    const types: string[] = [];
    dispatcher.on('*', e => types.push(e.type));

    dispatcher.onRecordInserted(inserted);
    dispatcher.onRecordUpdated({ namespace: 'default', model: 'users', id: 1, changes: { name: 'Ann' } });
    dispatcher.onRecordDeleted({ namespace: 'default', model: 'users', id: 1 });
    await dispatcher.flush();

    expect(types).toEqual(['record.inserted', 'record.updated', 'record.deleted']);
  });
});

// ── Integration ─────────────────────────────────────────────────

describe('EventDispatcher + DataEngine integration', () => {
  it('captures the record lifecycle', async () => {
    const t = new TestHarness({ models: [usersModel] });

    await t.engine.create('users', { name: 'Alice', age: 30 });
    await t.engine.update('users', 1, { age: 31 });
    await t.engine.delete('users', 1);
    await t.engine.delete('users', 1);

    expect(t.events.map(e => e.type)).toEqual(['record.inserted', 'record.updated', 'record.deleted']);
    expect(t.events[0]).toMatchObject({ namespace: 'default', model: 'users', id: 1, values: { name: 'Alice', age: 30 } });
    expect(t.events[1]).toMatchObject({ id: 1, changes: { age: 31 } });
  });

  it('emits nothing for a rejected write', async () => {
    const t = new TestHarness({ models: [usersModel] });

    await t.engine.create('users', { name: 'Alice', age: 30 });
    await expect(t.engine.create('users', { name: 'Alice', age: 30 })).rejects.toThrow();

    expect(t.eventsOfType('record.inserted')).toHaveLength(1);
  });

  it('delivers async events after flush', async () => {
    const dispatcher = new EventDispatcher({ mode: 'async' });
    const events: DispatchedEvent[] = [];
    dispatcher.on('*', e => events.push(e));

    const engine = new DataEngine(new EventEmittingStorage(new MemoryStorageBackend(), dispatcher), [usersModel], {
      events: dispatcher,
    });

    engine.use('tenant_a');
    await engine.create('users', { name: 'Alice', age: 30 });
    await dispatcher.flush();

    expect(events.map(e => e.type)).toEqual(['namespace.changed', 'record.inserted']);
    expect(events[1].namespace).toBe('tenant_a');
  });
});

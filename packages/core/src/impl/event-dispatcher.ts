/**
 * EventDispatcher: event bus with multi-listener support,
 * async dispatch, listener isolation, and automatic timestamping.
 *
 * Implements the EventBus interface so it drops into DataEngine,
 * EventEmittingStorage, and anywhere else that accepts an EventBus.
 *
 * - Multiple listeners per event type via `.on(type, listener)`, delivered
 *   in subscription order, specific listeners before wildcards
 * - Wildcard `'*'` listener receives every event
 * - Async dispatch (queueMicrotask) by default; sync mode for tests
 * - Each listener runs in its own try/catch
 * - Every dispatched event has `type` and `timestamp` fields
 *
 * Usage:
 * ```typescript
 * const dispatcher = new EventDispatcher();
 *
 * const unsub = dispatcher.on('record.inserted', (e) => {
 *   console.log(e.model, e.id);
 * });
 *
 * // Audit everything
 * dispatcher.on('*', (e) => auditLog.append(e));
 *
 * const engine = new DataEngine(new EventEmittingStorage(backend, dispatcher), models, {
 *   events: dispatcher,
 * });
 *
 * unsub();
 * ```
 */

import type { EventBus } from '../interfaces/event-bus';
import { now } from '../utils';

// ── Event Types ─────────────────────────────────────────────────

/** All event type strings emitted by the system. */
export type EventType =
  // Registry
  | 'models.loaded'
  | 'models.rejected'
  // Engine
  | 'namespace.changed'
  // Records
  | 'record.inserted'
  | 'record.updated'
  | 'record.deleted';

/** Every dispatched event carries its type and a millisecond timestamp. */
export interface DispatchedEvent {
  readonly type: EventType;
  readonly timestamp: number;
  readonly [key: string]: unknown;
}

/** Listener callback signature. */
export type EventListener = (event: DispatchedEvent) => void;

// ── Options ─────────────────────────────────────────────────────

export interface EventDispatcherOptions {
  /**
   * Dispatch mode.
   * - `'async'` (default): listeners fire on the next microtask.
   * - `'sync'`: listeners fire inline, before the emitting call returns.
   */
  mode?: 'sync' | 'async';

  /**
   * Called when a listener throws. Without it, listener errors go nowhere.
   */
  onError?: (error: unknown, event: DispatchedEvent) => void;
}

// ── EventDispatcher ─────────────────────────────────────────────

export class EventDispatcher implements EventBus {
  private readonly _listeners = new Map<EventType | '*', readonly EventListener[]>();
  private readonly _mode: 'sync' | 'async';
  private readonly _onError?: (error: unknown, event: DispatchedEvent) => void;

  constructor(options: EventDispatcherOptions = {}) {
    this._mode = options.mode ?? 'async';
    this._onError = options.onError;
  }

  // ── EventBus ────────────────────────────────────────────────────

  readonly onModelsLoaded: NonNullable<EventBus['onModelsLoaded']> = e => this._dispatch('models.loaded', e);
  readonly onModelsRejected: NonNullable<EventBus['onModelsRejected']> = e => this._dispatch('models.rejected', e);
  readonly onNamespaceChanged: NonNullable<EventBus['onNamespaceChanged']> = e => this._dispatch('namespace.changed', e);
  readonly onRecordInserted: NonNullable<EventBus['onRecordInserted']> = e => this._dispatch('record.inserted', e);
  readonly onRecordUpdated: NonNullable<EventBus['onRecordUpdated']> = e => this._dispatch('record.updated', e);
  readonly onRecordDeleted: NonNullable<EventBus['onRecordDeleted']> = e => this._dispatch('record.deleted', e);

  // ── Subscriptions ───────────────────────────────────────────────

  /** Subscribe to one event type, or `'*'` for all. Returns the unsubscribe. */
  on(type: EventType | '*', listener: EventListener): () => void {
    this._listeners.set(type, [...(this._listeners.get(type) ?? []), listener]);
    return () => this.off(type, listener);
  }

  off(type: EventType | '*', listener: EventListener): void {
    const remaining = this._listeners.get(type)?.filter(l => l !== listener) ?? [];
    if (remaining.length > 0) this._listeners.set(type, remaining);
    else this._listeners.delete(type);
  }

  /** Resolves once queued microtask dispatches have run */
  async flush(): Promise<void> {
    await Promise.resolve();
    await Promise.resolve();
  }

  // ── Dispatch ────────────────────────────────────────────────────

  private _dispatch(type: EventType, payload: object): void {
    // listeners subscribed after this point miss the event
    const targets = [...(this._listeners.get(type) ?? []), ...(this._listeners.get('*') ?? [])];
    if (targets.length === 0) return;

    const event: DispatchedEvent = Object.freeze({ ...payload, type, timestamp: now() });
    const deliver = () => {
      for (const listener of targets) this._deliver(listener, event);
    };

    if (this._mode === 'sync') deliver();
    else queueMicrotask(deliver);
  }

  private _deliver(listener: EventListener, event: DispatchedEvent): void {
    try {
      listener(event);
    } catch (err) {
      this._onError?.(err, event);
    }
  }
}

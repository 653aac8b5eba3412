/**
 * Example 02: Namespaces & Events
 *
 * Demonstrates:
 * - Switching the active namespace with use()
 * - Per-call scopes with in()
 * - EventDispatcher + EventEmittingStorage for an audit trail
 */

import {
  DataEngine,
  EventDispatcher,
  EventEmittingStorage,
  MemoryStorageBackend,
  type ModelDefinition,
} from '@automap/core';

const notes: ModelDefinition = {
  name: 'notes',
  fields: [{ name: 'body', type: 'text' }],
};

async function main() {
  const backend = new MemoryStorageBackend();
  const dispatcher = new EventDispatcher({ mode: 'sync' });

  dispatcher.on('*', e => console.log(`[${e.type}]`, JSON.stringify(e)));

  const engine = new DataEngine(new EventEmittingStorage(backend, dispatcher), [notes], { events: dispatcher });

  await engine.create('notes', { body: 'in default' });

  engine.use('tenant_a');
  await engine.create('notes', { body: 'in tenant_a' });

  // A scope keeps its namespace whatever use() does later
  const archive = engine.in('archive');
  engine.use('default');
  await archive.create('notes', { body: 'archived' });

  for (const ns of await backend.namespaces()) {
    console.log(ns, await engine.in(ns).count('notes'));
  }
}

main().catch(console.error);

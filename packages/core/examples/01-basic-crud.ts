/**
 * Example 01: Basic CRUD
 *
 * Demonstrates:
 * - Registering model definitions
 * - create / get / update / delete
 * - Querying with operators, ordering and paging
 */

import { DataEngine, MemoryStorageBackend, type ModelDefinition } from '@automap/core';

const users: ModelDefinition = {
  name: 'users',
  timestamps: true,
  fields: [
    { name: 'name', type: 'text', unique: true },
    { name: 'age', type: 'integer' },
    { name: 'email', type: 'text', nullable: true },
  ],
};

async function main() {
  const engine = new DataEngine(new MemoryStorageBackend(), [users]);

  const alice = await engine.create('users', { name: 'Alice', age: 30 });
  await engine.create('users', { name: 'Bob', age: 25, email: 'bob@example.com' });
  await engine.create('users', { name: 'Carol', age: 41 });

  console.log('Created:', alice.$id, alice.createdAt);

  await engine.update('users', alice.$id, { age: 31 });
  console.log('Fetched:', await engine.get('users', alice.$id));

  // Everyone over 26, oldest first
  for await (const user of engine.query('users', { age: { gt: 26 } }, { orderBy: { field: 'age', direction: 'desc' } })) {
    console.log(`${user.name} (${user.age})`);
  }

  console.log('Without email:', await engine.count('users', { email: null }));

  await engine.delete('users', alice.$id);
  console.log('Remaining:', await engine.query('users').toArray());
}

main().catch(console.error);

/**
 * Test Models
 *
 * Predefined model definitions for engine tests.
 *
 * Models:
 * - usersModel: unique text name, required integer age, auto identifier
 * - postsModel: managed timestamps, boolean default
 * - accountsModel: text primary key, text default
 * - meetingsModel: timestamp field, nullable text
 * - notesModel: nullable text with a default
 * - Profile: typed handle with nullable and defaulted fields
 */
import type { ModelDefinition } from '../types/schema';
import { defineModel } from '../model/define-model';

export const usersModel: ModelDefinition = {
  name: 'users',
  fields: [
    { name: 'name', type: 'text', unique: true },
    { name: 'age', type: 'integer' },
  ],
};

export const postsModel: ModelDefinition = {
  name: 'posts',
  timestamps: true,
  fields: [
    { name: 'title', type: 'text' },
    { name: 'published', type: 'boolean', default: false },
  ],
};

export const accountsModel: ModelDefinition = {
  name: 'accounts',
  fields: [
    { name: 'handle', type: 'text', primary: true },
    { name: 'plan', type: 'text', default: 'free' },
  ],
};

export const meetingsModel: ModelDefinition = {
  name: 'meetings',
  fields: [
    { name: 'startsAt', type: 'timestamp' },
    { name: 'room', type: 'text', nullable: true },
  ],
};

export const notesModel: ModelDefinition = {
  name: 'notes',
  fields: [
    { name: 'body', type: 'text' },
    { name: 'tag', type: 'text', nullable: true, default: 'misc' },
  ],
};

export const Profile = defineModel({
  name: 'profiles',
  fields: [
    { name: 'name', type: 'text', unique: true },
    { name: 'age', type: 'integer' },
    { name: 'bio', type: 'text', nullable: true },
    { name: 'active', type: 'boolean', default: true },
  ],
} as const);

export const allModels = [usersModel, postsModel, accountsModel, meetingsModel, notesModel, Profile];

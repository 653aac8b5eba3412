import type { RecordId, StoredValues } from '../types/schema';
import type { SchemaIssue } from '../types/errors';

/**
 * Optional event publishing.
 * All methods are optional; subscribe only to what you need.
 *
 * Categories:
 * - Registry: models loaded, load rejected
 * - Engine: namespace switched
 * - Records: insert, update, delete (emitted by EventEmittingStorage)
 */
export interface EventBus {
  // ── Registry ──────────────────────────────────────────────────────

  /**
   * Emitted after a load swapped in a new set of schemas.
   */
  onModelsLoaded?(e: { models: string[] }): void;

  /**
   * Emitted when a load was refused; the previous schemas stay active.
   */
  onModelsRejected?(e: { model: string; issues: SchemaIssue[] }): void;

  // ── Engine ────────────────────────────────────────────────────────

  onNamespaceChanged?(e: { from: string; to: string }): void;

  // ── Records ───────────────────────────────────────────────────────

  onRecordInserted?(e: { namespace: string; model: string; id: RecordId; values: StoredValues }): void;

  onRecordUpdated?(e: { namespace: string; model: string; id: RecordId; changes: StoredValues }): void;

  onRecordDeleted?(e: { namespace: string; model: string; id: RecordId }): void;
}

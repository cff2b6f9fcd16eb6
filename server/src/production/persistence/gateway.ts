import type { ProgressSnapshot } from '../types.js';

export interface StoredProgress {
  id: string;
  entity_id: string;
  operation_type: string;
  /** Unvalidated snapshot as stored; run it through parseProgressSnapshot before use. */
  snapshot: unknown;
}

/**
 * Storage for progress snapshots, keyed by an opaque record id.
 * Failures are reported as `null`/`false`, never thrown; last write wins.
 */
export interface ProgressGateway {
  create(entityId: string, operationType: string, initialSnapshot: ProgressSnapshot): Promise<string | null>;
  load(recordId: string): Promise<StoredProgress | null>;
  save(recordId: string, snapshot: ProgressSnapshot): Promise<boolean>;
  delete(recordId: string): Promise<boolean>;
  /** Most recently written record for an entity. */
  findByEntity(entityId: string): Promise<string | null>;
}

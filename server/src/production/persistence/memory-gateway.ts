import { randomUUID } from 'node:crypto';
import type { ProgressSnapshot } from '../types.js';
import type { ProgressGateway, StoredProgress } from './gateway.js';

interface MemoryRow extends StoredProgress {
  snapshot: ProgressSnapshot;
  updated_seq: number;
}

/**
 * Process-local gateway. Snapshots are copied on the way in and out so a
 * caller can never alias stored state.
 */
export class InMemoryProgressGateway implements ProgressGateway {
  private readonly rows = new Map<string, MemoryRow>();
  private seq = 0;

  async create(entityId: string, operationType: string, initialSnapshot: ProgressSnapshot): Promise<string | null> {
    const id = randomUUID();
    this.rows.set(id, {
      id,
      entity_id: entityId,
      operation_type: operationType,
      snapshot: structuredClone(initialSnapshot),
      updated_seq: ++this.seq,
    });
    return id;
  }

  async load(recordId: string): Promise<StoredProgress | null> {
    const row = this.rows.get(recordId);
    if (!row) return null;
    return {
      id: row.id,
      entity_id: row.entity_id,
      operation_type: row.operation_type,
      snapshot: structuredClone(row.snapshot),
    };
  }

  async save(recordId: string, snapshot: ProgressSnapshot): Promise<boolean> {
    const row = this.rows.get(recordId);
    if (!row) return false;
    row.snapshot = structuredClone(snapshot);
    row.updated_seq = ++this.seq;
    return true;
  }

  async delete(recordId: string): Promise<boolean> {
    return this.rows.delete(recordId);
  }

  async findByEntity(entityId: string): Promise<string | null> {
    let latest: MemoryRow | undefined;
    for (const row of this.rows.values()) {
      if (row.entity_id !== entityId) continue;
      if (!latest || row.updated_seq > latest.updated_seq) latest = row;
    }
    return latest?.id ?? null;
  }

  get size(): number {
    return this.rows.size;
  }
}

/**
 * Supabase-backed progress gateway.
 *
 * One row per production run. The full snapshot lives in `progress_data`;
 * status, current_stage, error_count and completed_at are mirrored into
 * their own columns so dashboards can filter without unpacking JSON.
 *
 * Transient storage errors are retried; anything still failing is logged
 * and reported as `null`/`false`.
 */

import { z } from 'zod';
import type { SupabaseClient } from '@supabase/supabase-js';
import type { ProductionConfig } from '../../lib/config.js';
import logger, { type Logger } from '../../lib/logger.js';
import { StorageRequestError, withRetry, type RetryOptions } from '../../lib/retry.js';
import { getSupabaseAdmin } from '../../lib/supabase.js';
import { errorMessage } from '../errors.js';
import { StoredProgressRowSchema } from '../schemas.js';
import type { ProgressSnapshot } from '../types.js';
import type { ProgressGateway, StoredProgress } from './gateway.js';

export const DEFAULT_PROGRESS_TABLE = 'production_progress';

const IdRowSchema = z.object({ id: z.string() });
const IdRowsSchema = z.array(IdRowSchema);

interface StorageResponse {
  data: unknown;
  error: { message: string; code?: string } | null;
  status: number;
}

export interface SupabaseProgressGatewayOptions {
  client?: SupabaseClient;
  table?: string;
  snapshotVersion?: number;
  retry?: RetryOptions;
  logger?: Logger;
}

function mirroredColumns(snapshot: ProgressSnapshot) {
  return {
    status: snapshot.overall_status,
    current_stage: snapshot.current_stage,
    error_count: snapshot.error_count,
    completed_at: snapshot.completed_at,
  };
}

export class SupabaseProgressGateway implements ProgressGateway {
  private readonly table: string;
  private readonly snapshotVersion: number;
  private readonly retry: RetryOptions;
  private readonly log: Logger;
  private clientValue: SupabaseClient | undefined;

  constructor(options: SupabaseProgressGatewayOptions = {}) {
    this.clientValue = options.client;
    this.table = options.table ?? DEFAULT_PROGRESS_TABLE;
    this.snapshotVersion = options.snapshotVersion ?? 1;
    this.retry = options.retry ?? {};
    this.log = (options.logger ?? logger).child({ component: 'supabase-progress-gateway', table: this.table });
  }

  /** Gateway for the table, snapshot version and retry budget named in `config`. */
  static fromConfig(
    config: Pick<ProductionConfig, 'progressTable' | 'snapshotVersion' | 'persistenceMaxAttempts'>,
    options: Pick<SupabaseProgressGatewayOptions, 'client' | 'logger'> = {},
  ): SupabaseProgressGateway {
    return new SupabaseProgressGateway({
      ...options,
      table: config.progressTable,
      snapshotVersion: config.snapshotVersion,
      retry: { maxAttempts: config.persistenceMaxAttempts },
    });
  }

  private get client(): SupabaseClient {
    this.clientValue ??= getSupabaseAdmin();
    return this.clientValue;
  }

  async create(entityId: string, operationType: string, initialSnapshot: ProgressSnapshot): Promise<string | null> {
    try {
      const data = await this.request('create', () => this.client
        .from(this.table)
        .insert({
          entity_id: entityId,
          operation_type: operationType,
          ...mirroredColumns(initialSnapshot),
          progress_data: initialSnapshot,
          snapshot_version: this.snapshotVersion,
        })
        .select('id')
        .single());
      const { id } = IdRowSchema.parse(data);
      this.log.info({ entityId, operationType, recordId: id }, 'Progress record created');
      return id;
    } catch (err) {
      this.log.error({ entityId, operationType, error: errorMessage(err) }, 'Failed to create progress record');
      return null;
    }
  }

  async load(recordId: string): Promise<StoredProgress | null> {
    try {
      const data = await this.request('load', () => this.client
        .from(this.table)
        .select('id, entity_id, operation_type, progress_data')
        .eq('id', recordId)
        .maybeSingle());
      if (data == null) {
        this.log.warn({ recordId }, 'Progress record not found');
        return null;
      }
      const row = StoredProgressRowSchema.parse(data);
      return {
        id: row.id,
        entity_id: row.entity_id,
        operation_type: row.operation_type,
        snapshot: row.progress_data,
      };
    } catch (err) {
      this.log.error({ recordId, error: errorMessage(err) }, 'Failed to load progress record');
      return null;
    }
  }

  async save(recordId: string, snapshot: ProgressSnapshot): Promise<boolean> {
    try {
      const data = await this.request('save', () => this.client
        .from(this.table)
        .update({
          ...mirroredColumns(snapshot),
          progress_data: snapshot,
          snapshot_version: this.snapshotVersion,
          updated_at: new Date().toISOString(),
        })
        .eq('id', recordId)
        .select('id'));
      const updated = IdRowsSchema.parse(data ?? []);
      if (updated.length === 0) {
        this.log.warn({ recordId }, 'Progress record not found for update');
        return false;
      }
      return true;
    } catch (err) {
      this.log.error({ recordId, error: errorMessage(err) }, 'Failed to save progress record');
      return false;
    }
  }

  async delete(recordId: string): Promise<boolean> {
    try {
      const data = await this.request('delete', () => this.client
        .from(this.table)
        .delete()
        .eq('id', recordId)
        .select('id'));
      const deleted = IdRowsSchema.parse(data ?? []);
      if (deleted.length === 0) {
        this.log.warn({ recordId }, 'Progress record not found for deletion');
        return false;
      }
      this.log.info({ recordId }, 'Progress record deleted');
      return true;
    } catch (err) {
      this.log.error({ recordId, error: errorMessage(err) }, 'Failed to delete progress record');
      return false;
    }
  }

  async findByEntity(entityId: string): Promise<string | null> {
    try {
      const data = await this.request('findByEntity', () => this.client
        .from(this.table)
        .select('id')
        .eq('entity_id', entityId)
        .order('updated_at', { ascending: false })
        .limit(1)
        .maybeSingle());
      return data == null ? null : IdRowSchema.parse(data).id;
    } catch (err) {
      this.log.error({ entityId, error: errorMessage(err) }, 'Failed to look up progress record by entity');
      return null;
    }
  }

  private request(operation: string, run: () => PromiseLike<StorageResponse>): Promise<unknown> {
    return withRetry(async () => {
      const { data, error, status } = await run();
      if (error) {
        throw new StorageRequestError(error.message, { status, code: error.code ?? null });
      }
      return data;
    }, {
      ...this.retry,
      onRetry: (attempt, err) => {
        this.log.warn({ operation, attempt, error: err.message }, 'Retrying progress storage request');
        this.retry.onRetry?.(attempt, err);
      },
    });
  }
}

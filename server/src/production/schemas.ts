/**
 * Zod schemas for progress snapshots read back from persistence.
 *
 * Stored JSON is untrusted: rows may predate a field or have been edited by
 * hand. Numeric counters default to 0 and missing stage fields are filled so
 * a rebuilt tracker always sees a complete StageState.
 */

import { z } from 'zod';
import { PROCESSABLE_STAGES, STAGE_ORDER } from './stages.js';
import type { ProgressSnapshot, StageState, StageStateMap } from './types.js';

const StageStatusSchema = z.enum(['pending', 'in_progress', 'completed', 'failed', 'paused']);
const ProductionStageSchema = z.enum(STAGE_ORDER);

export const StageStateSchema = z.object({
  status: StageStatusSchema.default('pending'),
  start_time: z.string().nullable().default(null),
  end_time: z.string().nullable().default(null),
  duration: z.number().nonnegative().default(0),
  total_items: z.number().int().nonnegative().default(0),
  completed_items: z.number().int().nonnegative().default(0),
  avg_score: z.number().min(0).max(1).default(0),
  error_count: z.number().int().nonnegative().default(0),
  message: z.string().default(''),
});

export const StageHistoryEntrySchema = z.object({
  time: z.string(),
  stage: ProductionStageSchema,
  error: z.string(),
});

export const ProgressSnapshotSchema = z.object({
  current_stage: ProductionStageSchema,
  stages: z.record(z.string(), StageStateSchema),
  started_at: z.string().nullable().default(null),
  completed_at: z.string().nullable().default(null),
  stage_history: z.array(StageHistoryEntrySchema).default([]),
  error_count: z.number().int().nonnegative().default(0),
  paused_from_stage: z.string().nullable().default(null),
  overall_status: StageStatusSchema.default('pending'),
});

export const StoredProgressRowSchema = z.object({
  id: z.string(),
  entity_id: z.string(),
  operation_type: z.string(),
  progress_data: z.unknown(),
});

export type StoredProgressRow = z.infer<typeof StoredProgressRowSchema>;

export type SnapshotParseResult =
  | { success: true; data: ProgressSnapshot }
  | { success: false; issues: z.ZodIssue[] };

/**
 * Validates a stored snapshot. Stage keys that are not processable stages
 * are dropped rather than rejected.
 */
export function parseProgressSnapshot(raw: unknown): SnapshotParseResult {
  const result = ProgressSnapshotSchema.safeParse(raw);
  if (!result.success) {
    return { success: false, issues: result.error.issues };
  }

  const stages: StageStateMap = {};
  for (const stage of PROCESSABLE_STAGES) {
    const state: StageState | undefined = result.data.stages[stage];
    if (state) stages[stage] = state;
  }

  return { success: true, data: { ...result.data, stages } };
}

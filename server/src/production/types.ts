/**
 * Shared type definitions for content production.
 *
 * Progress state is plain, JSON-serializable data: timestamps are ISO
 * strings so a snapshot can be stored and reloaded without conversion.
 */

import type {
  OverallStatus,
  ProcessableStage,
  ProductionStage,
  StageStatus,
} from './stages.js';

// ─── Progress state ──────────────────────────────────────────────────

export interface StageState {
  status: StageStatus;
  start_time: string | null;
  end_time: string | null;
  /** Seconds between start_time and end_time; 0 until the stage completes. */
  duration: number;
  total_items: number;
  completed_items: number;
  avg_score: number;
  error_count: number;
  message: string;
}

export interface StageHistoryEntry {
  time: string;
  stage: ProductionStage;
  error: string;
}

export type StageStateMap = Partial<Record<ProcessableStage, StageState>>;

/** The shape written to and read from a ProgressGateway. */
export interface ProgressSnapshot {
  current_stage: ProductionStage;
  stages: StageStateMap;
  started_at: string | null;
  completed_at: string | null;
  stage_history: StageHistoryEntry[];
  error_count: number;
  // Free-form on purpose: a stored marker may name a stage this build no longer knows.
  paused_from_stage: string | null;
  overall_status: OverallStatus;
}

export interface ProgressRecord extends ProgressSnapshot {
  entity_id: string;
  operation_type: string;
}

export interface ProgressSummary extends ProgressRecord {
  progress_percentage: number;
  duration: number;
}

export interface StageProgressUpdate {
  completed_items?: number | null;
  avg_score?: number | null;
  message?: string | null;
  error_increment?: number;
}

// ─── Content carried between stages ──────────────────────────────────

export interface Topic {
  id: string;
  title: string;
  category: string;
  summary?: string;
  keywords?: string[];
}

export interface ResearchResult {
  key_findings: string[];
  sources: string[];
  outline: string[];
}

export interface Article {
  id: string;
  title: string;
  body: string;
  word_count: number;
  platform?: string;
}

export interface ReviewResult {
  approved: boolean;
  overall_score: number;
  suggestions: string[];
}

/**
 * One unit of work as it moves down the pipeline. Each stage adds its
 * output; `scores` keeps the gate score each stage assigned.
 */
export interface ProductionItem {
  topic: Topic;
  research?: ResearchResult;
  draft?: Article;
  styled?: Article;
  review?: ReviewResult;
  scores: Partial<Record<ProcessableStage, number>>;
}

export interface TopicRequest {
  category: string;
  index: number;
  count: number;
}

export interface SeedParams {
  category: string;
  count: number;
  /** Skips discovery when set: this topic is the only item entering research. */
  topic?: Topic;
  platform?: string;
}

// ─── Stage executors ─────────────────────────────────────────────────

export interface StageContext {
  entity_id: string;
  stage: ProcessableStage;
  /** Zero-based position of the item within this stage. */
  index: number;
  total: number;
  platform?: string;
}

export interface StageOutcome<R> {
  result: R;
  /** Feedback score in [0, 1]. */
  average_score: number;
}

/**
 * Performs the actual work of one stage. Expected per-item failures should
 * come back as a low score; a thrown error drops the item, and a thrown
 * StageAbortError (or any error from prepare) fails the whole run.
 */
export interface StageExecutor<I, R> {
  prepare?(items: readonly I[], context: Omit<StageContext, 'index'>): Promise<void>;
  execute(item: I, context: StageContext): Promise<StageOutcome<R>>;
}

export interface ProductionExecutors {
  topic_discovery: StageExecutor<TopicRequest, Topic>;
  topic_research: StageExecutor<ProductionItem, ResearchResult>;
  article_writing: StageExecutor<ProductionItem, Article>;
  style_adaptation: StageExecutor<ProductionItem, Article>;
  article_review: StageExecutor<ProductionItem, ReviewResult>;
}

/**
 * Human or automatic review of one stage result. Returns the score the
 * quality gate should use in place of the executor's own.
 */
export type FeedbackProvider = (
  stage: ProcessableStage,
  item: ProductionItem | TopicRequest,
  result: unknown,
  proposedScore: number,
) => Promise<number>;

// ─── Events and reports ──────────────────────────────────────────────

export type ProductionEventBody =
  | { type: 'stage_start'; stage: ProcessableStage; total_items: number }
  | { type: 'stage_complete'; stage: ProcessableStage; accepted: number; processed: number; avg_score: number }
  | { type: 'item_accepted'; stage: ProcessableStage; index: number; score: number }
  | { type: 'item_rejected'; stage: ProcessableStage; index: number; score: number }
  | { type: 'item_error'; stage: ProcessableStage; index: number; error: string }
  | { type: 'pipeline_paused'; stage: ProductionStage }
  | { type: 'pipeline_empty'; stage: ProcessableStage }
  | { type: 'pipeline_complete'; accepted: number }
  | { type: 'pipeline_error'; stage: ProductionStage; error: string };

/** Every event carries the weighted progress at the moment it was emitted. */
export type ProductionEvent = ProductionEventBody & { progress_percentage: number };

export type ProductionEmitter = (event: ProductionEvent) => void;

export interface StageReport {
  processed: number;
  accepted: number;
  errors: number;
  avg_score: number;
  duration_ms: number;
}

export interface RunReport {
  production_id: string | null;
  entity_id: string;
  status: OverallStatus | 'not_started';
  stages: Partial<Record<ProcessableStage, StageReport>>;
  final_items: ProductionItem[];
  error_log: StageHistoryEntry[];
}

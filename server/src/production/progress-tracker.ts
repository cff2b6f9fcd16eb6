/**
 * Progress Tracker
 *
 * In-memory state machine for one production run. Owns the stage map,
 * overall status, pause marker and error history of a single entity, and
 * is the only component allowed to change them. Pure state — persistence
 * goes through getStateForPersistence() and a ProgressGateway.
 *
 * Overall status moves pending → in_progress → completed | failed | paused,
 * and paused → in_progress on resume. completed and failed are absorbing:
 * mutations against them are ignored with a warning and report `false`.
 * A paused run takes no stage transitions until resumeProcess().
 */

import { createRunLogger, type Logger } from '../lib/logger.js';
import { InvariantViolationError } from './errors.js';
import {
  articleProductionCatalog,
  isProcessableStage,
  nextStageOf,
  type OverallStatus,
  type ProcessableStage,
  type ProductionStage,
  type StageCatalog,
} from './stages.js';
import type {
  ProgressRecord,
  ProgressSnapshot,
  ProgressSummary,
  StageHistoryEntry,
  StageProgressUpdate,
  StageState,
  StageStateMap,
} from './types.js';

export interface ProgressTrackerOptions {
  catalog?: StageCatalog;
  /** Snapshot previously returned by getStateForPersistence(). */
  initialState?: ProgressSnapshot;
  logger?: Logger;
  now?: () => Date;
}

const DEFAULT_FAILURE_MESSAGE = 'Process failed at this stage.';

function emptyStageState(): StageState {
  return {
    status: 'pending',
    start_time: null,
    end_time: null,
    duration: 0,
    total_items: 0,
    completed_items: 0,
    avg_score: 0,
    error_count: 0,
    message: '',
  };
}

function parseTime(value: string | null): number | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export class ProgressTracker {
  readonly entityId: string;
  readonly catalog: StageCatalog;

  private currentStageValue: ProductionStage;
  private readonly stages: StageStateMap;
  private startedAt: string | null;
  private completedAt: string | null;
  private readonly history: StageHistoryEntry[];
  private errorCountValue: number;
  private pausedFromStageValue: string | null;
  private overallStatusValue: OverallStatus;

  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(entityId: string, options: ProgressTrackerOptions = {}) {
    this.entityId = entityId;
    this.catalog = options.catalog ?? articleProductionCatalog();
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createRunLogger(entityId, { operationType: this.catalog.operationType });

    const initial = options.initialState;
    if (initial) {
      const copy = structuredClone(initial);
      this.currentStageValue = copy.current_stage;
      this.stages = copy.stages;
      this.startedAt = copy.started_at;
      this.completedAt = copy.completed_at;
      this.history = copy.stage_history;
      this.pausedFromStageValue = copy.paused_from_stage;
      this.overallStatusValue = copy.overall_status;
      this.errorCountValue = 0;

      // Every catalog stage must have a state, even for snapshots written before it existed.
      for (const stage of this.catalog.stages) {
        if (!this.stages[stage]) {
          this.log.warn({ stage }, 'Snapshot missing stage state, initializing as pending');
          this.stages[stage] = emptyStageState();
        }
      }
      this.recomputeErrorCount();
    } else {
      this.currentStageValue = this.catalog.stages[0];
      this.stages = {};
      for (const stage of this.catalog.stages) {
        this.stages[stage] = emptyStageState();
      }
      this.startedAt = this.timestamp();
      this.completedAt = null;
      this.history = [];
      this.errorCountValue = 0;
      this.pausedFromStageValue = null;
      this.overallStatusValue = 'pending';
    }
  }

  static fromSnapshot(
    entityId: string,
    snapshot: ProgressSnapshot,
    options: Omit<ProgressTrackerOptions, 'initialState'> = {},
  ): ProgressTracker {
    return new ProgressTracker(entityId, { ...options, initialState: snapshot });
  }

  // ─── Read accessors ────────────────────────────────────────────────

  get operationType(): string {
    return this.catalog.operationType;
  }

  get currentStage(): ProductionStage {
    return this.currentStageValue;
  }

  get overallStatus(): OverallStatus {
    return this.overallStatusValue;
  }

  get errorCount(): number {
    return this.errorCountValue;
  }

  get pausedFromStage(): string | null {
    return this.pausedFromStageValue;
  }

  get stageHistory(): readonly StageHistoryEntry[] {
    return this.history.map((entry) => ({ ...entry }));
  }

  get isTerminal(): boolean {
    return this.overallStatusValue === 'completed' || this.overallStatusValue === 'failed';
  }

  /** Stage resumeProcess() would continue at; undefined when nothing is left to run. */
  get resumeStage(): ProcessableStage | undefined {
    return this.markedResumeStage() ?? this.firstUnfinishedStage();
  }

  stageState(stage: ProcessableStage): Readonly<StageState> | undefined {
    const state = this.stages[stage];
    return state ? { ...state } : undefined;
  }

  /** Weighted completion in [0, 100]. */
  get progressPercentage(): number {
    if (this.overallStatusValue === 'completed') return 100;
    let total = 0;
    for (const stage of this.catalog.stages) {
      const state = this.stages[stage];
      const weight = this.catalog.weights[stage] ?? 0;
      if (!state) continue;

      let stageProgress = 0;
      if (state.status === 'completed') {
        stageProgress = 1;
      } else if (state.status === 'in_progress' && state.total_items > 0) {
        stageProgress = state.completed_items / state.total_items;
      }
      total += stageProgress * weight;
    }
    return clamp(total * 100, 0, 100);
  }

  /** Seconds from start to completion, or to now while the run is open. */
  get totalDuration(): number {
    const start = parseTime(this.startedAt);
    if (start === null) return 0;
    const end = parseTime(this.completedAt) ?? this.now().getTime();
    return (end - start) / 1000;
  }

  // ─── Stage transitions ─────────────────────────────────────────────

  startStage(stage: ProcessableStage, totalItems = 0): boolean {
    if (this.rejectInactive('startStage', stage)) return false;

    const state = this.stages[stage];
    if (!state) {
      this.log.warn({ stage }, 'Attempted to start a stage outside this pipeline');
      return false;
    }

    this.currentStageValue = stage;
    state.status = 'in_progress';
    state.start_time = this.timestamp();
    state.end_time = null;
    state.duration = 0;
    state.total_items = Math.max(0, Math.floor(totalItems));
    state.completed_items = 0;
    state.avg_score = 0;
    this.overallStatusValue = 'in_progress';
    this.pausedFromStageValue = null;

    this.log.info({ stage, totalItems: state.total_items }, 'Stage started');
    return true;
  }

  /** Applies only the fields that are set. */
  updateStageProgress(stage: ProcessableStage, update: StageProgressUpdate): boolean {
    if (this.rejectInactive('updateStageProgress', stage)) return false;

    const state = this.stages[stage];
    if (!state) {
      this.log.warn({ stage }, 'Attempted to update a stage outside this pipeline');
      return false;
    }

    if (update.completed_items != null) {
      const completed = clamp(Math.floor(update.completed_items), 0, state.total_items);
      if (completed !== update.completed_items) {
        this.log.warn(
          { stage, requested: update.completed_items, total: state.total_items },
          'completed_items out of range, clamped',
        );
      }
      state.completed_items = completed;
    }
    if (update.avg_score != null) {
      state.avg_score = clamp(update.avg_score, 0, 1);
    }
    if (update.message != null) {
      state.message = update.message;
    }
    const increment = update.error_increment ?? 0;
    if (increment > 0) {
      state.error_count += increment;
      this.recomputeErrorCount();
    }
    return true;
  }

  /**
   * Marks `stage` completed and advances to its successor, or completes the
   * process after the last stage. A stage outside the catalog fails the run
   * and throws InvariantViolationError.
   */
  completeStage(stage: ProcessableStage): boolean {
    if (this.rejectInactive('completeStage', stage)) return false;

    const state = this.stages[stage];
    const next = nextStageOf(this.catalog, stage);
    if (!state || next === undefined) {
      const message = `Internal error: stage ${stage} is not part of the ${this.operationType} pipeline`;
      this.log.error({ stage }, message);
      this.failProcess(message);
      throw new InvariantViolationError(message, stage);
    }

    const endTime = this.timestamp();
    state.status = 'completed';
    state.end_time = endTime;
    const start = parseTime(state.start_time);
    state.duration = start === null ? 0 : (Date.parse(endTime) - start) / 1000;

    this.log.info({ stage, duration: state.duration }, 'Stage completed');

    if (next === null) {
      this.completeProcess();
      return true;
    }

    this.currentStageValue = next;
    const nextState = this.stages[next];
    if (nextState && nextState.status !== 'completed') {
      nextState.status = 'pending';
    }
    return true;
  }

  completeProcess(): boolean {
    if (this.rejectTerminal('completeProcess')) return false;

    this.currentStageValue = 'completed';
    this.overallStatusValue = 'completed';
    this.completedAt = this.timestamp();
    this.pausedFromStageValue = null;
    this.log.info({ duration: this.totalDuration }, 'Production process completed');
    return true;
  }

  /** Fails the run, marking the active stage failed and recording the message. */
  failProcess(errorMessage?: string): boolean {
    if (this.rejectTerminal('failProcess')) return false;

    const activeStage = this.currentStageValue;
    const message = errorMessage ?? DEFAULT_FAILURE_MESSAGE;

    if (isProcessableStage(activeStage)) {
      const state = this.stages[activeStage];
      if (state) {
        state.status = 'failed';
        state.message = message;
        state.error_count += 1;
      }
    }
    this.history.push({ time: this.timestamp(), stage: activeStage, error: message });
    this.recomputeErrorCount();

    this.currentStageValue = 'failed';
    this.overallStatusValue = 'failed';
    this.completedAt = this.timestamp();
    this.pausedFromStageValue = null;

    this.log.error({ stage: activeStage, error: message }, 'Production process failed');
    return true;
  }

  pauseProcess(): boolean {
    if (this.overallStatusValue !== 'pending' && this.overallStatusValue !== 'in_progress') {
      this.log.warn({ status: this.overallStatusValue }, 'Cannot pause process in this status');
      return false;
    }

    const activeStage = this.currentStageValue;
    this.pausedFromStageValue = activeStage;
    this.overallStatusValue = 'paused';
    if (isProcessableStage(activeStage)) {
      const state = this.stages[activeStage];
      if (state) state.status = 'paused';
    }

    this.log.info({ stage: activeStage }, 'Production process paused');
    return true;
  }

  /**
   * Resumes at the stage recorded when pausing. If that marker no longer
   * names an unfinished stage, resumes at the first stage that is not
   * completed. With nothing left to resume the run fails and
   * InvariantViolationError is thrown.
   */
  resumeProcess(): boolean {
    if (this.overallStatusValue !== 'paused') {
      this.log.warn({ status: this.overallStatusValue }, 'Cannot resume process in this status');
      return false;
    }

    let resumeStage = this.markedResumeStage();
    if (!resumeStage) {
      resumeStage = this.firstUnfinishedStage();
      this.log.warn(
        { pausedFromStage: this.pausedFromStageValue, resumeStage: resumeStage ?? null },
        'Pause marker does not name an unfinished stage, resuming at first unfinished stage',
      );
    }

    if (!resumeStage) {
      const message = 'Internal error: no unfinished stage to resume';
      this.failProcess(message);
      throw new InvariantViolationError(message);
    }

    const state = this.stages[resumeStage];
    if (state) state.status = 'in_progress';
    this.currentStageValue = resumeStage;
    this.overallStatusValue = 'in_progress';
    this.pausedFromStageValue = null;

    this.log.info({ stage: resumeStage }, 'Production process resumed');
    return true;
  }

  /**
   * Appends an error to the history. When a stage is given its error count
   * is incremented as well.
   */
  addErrorLog(stage: ProcessableStage | null, error: string): boolean {
    if (this.rejectTerminal('addErrorLog', stage ?? undefined)) return false;

    this.history.push({
      time: this.timestamp(),
      stage: stage ?? this.currentStageValue,
      error,
    });

    if (stage) {
      const state = this.stages[stage];
      if (state) state.error_count += 1;
    }
    this.recomputeErrorCount();
    return true;
  }

  // ─── Serialization ─────────────────────────────────────────────────

  getStateForPersistence(): ProgressSnapshot {
    return {
      current_stage: this.currentStageValue,
      stages: structuredClone(this.stages),
      started_at: this.startedAt,
      completed_at: this.completedAt,
      stage_history: this.history.map((entry) => ({ ...entry })),
      error_count: this.errorCountValue,
      paused_from_stage: this.pausedFromStageValue,
      overall_status: this.overallStatusValue,
    };
  }

  getRecord(): ProgressRecord {
    return {
      entity_id: this.entityId,
      operation_type: this.operationType,
      ...this.getStateForPersistence(),
    };
  }

  getSummary(): ProgressSummary {
    return {
      ...this.getRecord(),
      progress_percentage: this.progressPercentage,
      duration: this.totalDuration,
    };
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private timestamp(): string {
    return this.now().toISOString();
  }

  private recomputeErrorCount(): void {
    this.errorCountValue = this.catalog.stages.reduce(
      (total, stage) => total + (this.stages[stage]?.error_count ?? 0),
      0,
    );
  }

  private rejectTerminal(operation: string, stage?: ProcessableStage): boolean {
    if (!this.isTerminal) return false;
    this.log.warn({ operation, stage, status: this.overallStatusValue }, 'Ignoring mutation of a finished process');
    return true;
  }

  private rejectInactive(operation: string, stage: ProcessableStage): boolean {
    if (this.rejectTerminal(operation, stage)) return true;
    if (this.overallStatusValue !== 'paused') return false;
    this.log.warn({ operation, stage, status: 'paused' }, 'Ignoring stage transition while paused');
    return true;
  }

  private markedResumeStage(): ProcessableStage | undefined {
    const marker = this.pausedFromStageValue;
    if (isProcessableStage(marker) && this.stages[marker] && this.stages[marker]?.status !== 'completed') {
      return marker;
    }
    return undefined;
  }

  private firstUnfinishedStage(): ProcessableStage | undefined {
    return this.catalog.stages.find((stage) => this.stages[stage]?.status !== 'completed');
  }
}

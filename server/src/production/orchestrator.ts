/**
 * Pipeline Orchestrator
 *
 * Drives one production run through topic discovery → research → writing →
 * style adaptation → review. Items are processed one at a time; each
 * stage's accepted outputs, in order, become the next stage's inputs.
 *
 * The orchestrator does no content work itself. Stage executors do the
 * work, the quality gate decides what moves on, and the ProgressTracker
 * records every transition. Each stage boundary is written through to the
 * ProgressGateway before the run continues.
 *
 * Failure handling:
 *   - an item that throws is logged, counted and dropped; the stage goes on
 *   - an error from a stage as a whole (prepare, StageAbortError, invariant
 *     violations) fails the run and is rethrown to the caller
 *   - a stage that accepts nothing stops the run without failing it
 *
 * A pause, whether asked for through requestPause() or made directly on the
 * tracker, is honoured at the next item or stage boundary. A stage paused
 * part-way keeps its inputs and runs again from the start on resume.
 */

import { DEFAULT_PRODUCTION_CONFIG, type ProductionConfig } from '../lib/config.js';
import { createRunLogger, type Logger } from '../lib/logger.js';
import {
  PersistenceError,
  ProductionError,
  RunInProgressError,
  StageAbortError,
  errorMessage,
} from './errors.js';
import type { ProgressGateway } from './persistence/gateway.js';
import { ProgressFactory } from './progress-factory.js';
import type { ProgressTracker } from './progress-tracker.js';
import { meanScore, normalizeScore, passesQualityGate } from './quality-gate.js';
import {
  ARTICLE_PRODUCTION,
  articleProductionCatalog,
  isProcessableStage,
  type ProcessableStage,
} from './stages.js';
import type {
  FeedbackProvider,
  ProductionEmitter,
  ProductionEventBody,
  ProductionExecutors,
  ProductionItem,
  ProgressSummary,
  RunReport,
  SeedParams,
  StageContext,
  StageExecutor,
  StageReport,
  TopicRequest,
} from './types.js';

/** The settings that shape a run; storage settings belong to the gateway. */
export type OrchestratorConfig = Pick<ProductionConfig, 'qualityGateThreshold' | 'stageWeights'>;

export interface PipelineOrchestratorOptions {
  entityId: string;
  executors: ProductionExecutors;
  gateway: ProgressGateway;
  config?: Partial<OrchestratorConfig>;
  /** Human or automatic reviewer whose score replaces the executor's. */
  feedback?: FeedbackProvider;
  emit?: ProductionEmitter;
  logger?: Logger;
  now?: () => Date;
}

export interface ResumeOptions {
  /** Inputs for the resumed stage; defaults to the items held when the run paused. */
  items?: ProductionItem[];
  /** Needed when resuming at topic discovery in a fresh orchestrator. */
  seed?: SeedParams;
}

interface ScoredResult<R> {
  result: R;
  score: number;
}

const SUPPLIED_TOPIC_MESSAGE = 'Topic supplied by caller';

export class PipelineOrchestrator {
  readonly entityId: string;

  private readonly executors: ProductionExecutors;
  private readonly config: OrchestratorConfig;
  private readonly factory: ProgressFactory;
  private readonly feedback?: FeedbackProvider;
  private readonly emitter?: ProductionEmitter;
  private readonly log: Logger;

  private tracker: ProgressTracker | null = null;
  private recordId: string | null = null;
  private running = false;
  private pauseRequested = false;
  private seed: SeedParams | null = null;
  private heldItems: ProductionItem[] = [];
  private finalItems: ProductionItem[] = [];
  private stageReports: Partial<Record<ProcessableStage, StageReport>> = {};

  constructor(options: PipelineOrchestratorOptions) {
    this.entityId = options.entityId;
    this.executors = options.executors;
    this.config = {
      qualityGateThreshold: options.config?.qualityGateThreshold ?? DEFAULT_PRODUCTION_CONFIG.qualityGateThreshold,
      stageWeights: options.config?.stageWeights ?? DEFAULT_PRODUCTION_CONFIG.stageWeights,
    };
    this.feedback = options.feedback;
    this.emitter = options.emit;
    this.log = options.logger ?? createRunLogger(options.entityId, { component: 'pipeline-orchestrator' });
    this.factory = new ProgressFactory(options.gateway, {
      catalogs: [articleProductionCatalog(this.config.stageWeights)],
      now: options.now,
    });
  }

  /**
   * Rebuilds an orchestrator around a stored run so it can be resumed.
   * `null` when the record is missing, invalid or belongs to another entity.
   */
  static async restore(options: PipelineOrchestratorOptions, recordId: string): Promise<PipelineOrchestrator | null> {
    const orchestrator = new PipelineOrchestrator(options);
    const tracker = await orchestrator.factory.load(recordId);
    if (!tracker) return null;
    if (tracker.entityId !== options.entityId) {
      orchestrator.log.warn({ recordId, storedEntityId: tracker.entityId }, 'Stored progress belongs to another entity');
      return null;
    }
    orchestrator.tracker = tracker;
    orchestrator.recordId = recordId;
    return orchestrator;
  }

  get progressTracker(): ProgressTracker | null {
    return this.tracker;
  }

  get progressRecordId(): string | null {
    return this.recordId;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Runs the whole pipeline and returns the items that passed every stage.
   * An empty array means the run stopped early: either a stage accepted
   * nothing or a pause was honoured (see getProgressSummary().overall_status).
   */
  async run(seed: SeedParams): Promise<ProductionItem[]> {
    this.enter();
    try {
      const created = await this.factory.create(this.entityId, ARTICLE_PRODUCTION);
      if (!created) {
        throw new PersistenceError(`Could not create progress record for entity ${this.entityId}`);
      }

      this.tracker = created.tracker;
      this.recordId = created.recordId;
      this.seed = seed;
      this.heldItems = [];
      this.finalItems = [];
      this.stageReports = {};

      this.log.info({ recordId: created.recordId, category: seed.category, count: seed.count }, 'Production run started');
      return await this.drive(created.tracker.catalog.stages[0], []);
    } finally {
      this.running = false;
    }
  }

  /** Continues a paused run at the stage the tracker resumes to. */
  async resume(options: ResumeOptions = {}): Promise<ProductionItem[]> {
    this.enter();
    try {
      const tracker = this.requireTracker();
      if (tracker.overallStatus !== 'paused') {
        throw new ProductionError(`Cannot resume a run in status ${tracker.overallStatus}`, tracker.currentStage);
      }

      const target = tracker.resumeStage;
      const inputs = options.items ?? this.heldItems;
      if (target && target !== 'topic_discovery' && inputs.length === 0) {
        throw new ProductionError(
          `Resuming at ${target} needs the items carried into it; pass them as resume({ items })`,
          target,
        );
      }

      this.pauseRequested = false;
      if (options.seed) this.seed = options.seed;

      try {
        tracker.resumeProcess();
      } catch (err) {
        await this.failRun(err);
        throw err;
      }
      await this.persist('resume');

      const stage = tracker.currentStage;
      if (!isProcessableStage(stage)) {
        throw new ProductionError(`Resumed at non-processable stage ${stage}`, stage);
      }

      this.log.info({ stage }, 'Production run resumed');
      return await this.drive(stage, inputs);
    } finally {
      this.running = false;
    }
  }

  /** Asks the run to pause before its next stage starts. In-flight items are not interrupted. */
  requestPause(): void {
    this.pauseRequested = true;
    this.log.info({ running: this.running }, 'Pause requested');
  }

  getProgressSummary(): ProgressSummary | null {
    return this.tracker?.getSummary() ?? null;
  }

  getRunReport(): RunReport {
    return {
      production_id: this.recordId,
      entity_id: this.entityId,
      status: this.tracker?.overallStatus ?? 'not_started',
      stages: { ...this.stageReports },
      final_items: [...this.finalItems],
      error_log: this.tracker ? [...this.tracker.stageHistory] : [],
    };
  }

  // ─── Stage loop ────────────────────────────────────────────────────

  private async drive(from: ProcessableStage, items: ProductionItem[]): Promise<ProductionItem[]> {
    const tracker = this.requireTracker();
    const stages = tracker.catalog.stages;
    let carried = items;

    for (const stage of stages.slice(Math.max(stages.indexOf(from), 0))) {
      if (tracker.stageState(stage)?.status === 'completed') continue;

      if (this.pauseRequested || tracker.overallStatus === 'paused') {
        return this.holdForResume(carried);
      }

      const inputs = carried;
      try {
        carried = await this.executeStage(stage, inputs);
      } catch (err) {
        await this.failRun(err);
        throw err;
      }

      if (tracker.overallStatus === 'paused') {
        // A stage that finished before the pause hands on its outputs; one cut short reruns on its inputs.
        return this.holdForResume(tracker.stageState(stage)?.status === 'completed' ? carried : inputs);
      }

      if (carried.length === 0 && tracker.overallStatus !== 'completed') {
        this.log.warn({ stage }, 'No items passed the quality gate, stopping run');
        this.pauseRequested = false;
        this.finalItems = [];
        this.emit({ type: 'pipeline_empty', stage });
        return [];
      }
    }

    this.pauseRequested = false;
    this.finalItems = carried;
    this.log.info({ accepted: carried.length, duration: tracker.totalDuration }, 'Production run completed');
    this.emit({ type: 'pipeline_complete', accepted: carried.length });
    return carried;
  }

  private executeStage(stage: ProcessableStage, items: ProductionItem[]): Promise<ProductionItem[]> {
    switch (stage) {
      case 'topic_discovery':
        return this.discoverTopics();
      case 'topic_research':
        return this.processItems(stage, items, this.executors.topic_research,
          (item, research) => ({ ...item, research }));
      case 'article_writing':
        return this.processItems(stage, items, this.executors.article_writing,
          (item, draft) => ({ ...item, draft }));
      case 'style_adaptation':
        return this.processItems(stage, items, this.executors.style_adaptation,
          (item, styled) => ({ ...item, styled }));
      case 'article_review':
        return this.processItems(stage, items, this.executors.article_review,
          (item, review) => ({ ...item, review }),
          (review) => review.approved);
    }
  }

  private async discoverTopics(): Promise<ProductionItem[]> {
    const seed = this.seed;
    if (!seed) {
      throw new ProductionError('Topic discovery needs seed parameters', 'topic_discovery');
    }

    if (seed.topic) {
      return this.acceptSuppliedTopic(seed.topic);
    }

    const requests: TopicRequest[] = Array.from({ length: Math.max(0, Math.floor(seed.count)) }, (_, index) => ({
      category: seed.category,
      index,
      count: seed.count,
    }));
    return this.processItems('topic_discovery', requests, this.executors.topic_discovery,
      (_request, topic) => ({ topic, scores: {} }));
  }

  private async acceptSuppliedTopic(topic: ProductionItem['topic']): Promise<ProductionItem[]> {
    const tracker = this.requireTracker();
    const stage = 'topic_discovery';
    const startedAt = Date.now();

    tracker.startStage(stage, 1);
    await this.persist(`start:${stage}`);
    this.emit({ type: 'stage_start', stage, total_items: 1 });
    if (tracker.overallStatus === 'paused') return [];

    tracker.updateStageProgress(stage, { completed_items: 1, avg_score: 1, message: SUPPLIED_TOPIC_MESSAGE });
    tracker.completeStage(stage);
    this.stageReports[stage] = { processed: 1, accepted: 1, errors: 0, avg_score: 1, duration_ms: Date.now() - startedAt };
    await this.persist(`complete:${stage}`);
    this.emit({ type: 'stage_complete', stage, accepted: 1, processed: 1, avg_score: 1 });

    return [{ topic, scores: { [stage]: 1 } }];
  }

  /**
   * Runs every input through the stage executor in order and returns the
   * merged items that passed the gate (and `approve`, when given).
   */
  private async processItems<I extends ProductionItem | TopicRequest, R>(
    stage: ProcessableStage,
    inputs: readonly I[],
    executor: StageExecutor<I, R>,
    merge: (input: I, result: R) => ProductionItem,
    approve?: (result: R) => boolean,
  ): Promise<ProductionItem[]> {
    const tracker = this.requireTracker();
    const startedAt = Date.now();
    const total = inputs.length;

    tracker.startStage(stage, total);
    await this.persist(`start:${stage}`);
    this.emit({ type: 'stage_start', stage, total_items: total });

    const baseContext = { entity_id: this.entityId, stage, total, platform: this.seed?.platform };
    if (executor.prepare) {
      await executor.prepare(inputs, baseContext);
    }

    const accepted: ProductionItem[] = [];
    const scores: number[] = [];
    let errors = 0;

    for (const [index, input] of inputs.entries()) {
      if (tracker.overallStatus === 'paused') break;

      const scored = await this.scoreItem(stage, input, executor, { ...baseContext, index });
      if (!scored) {
        errors += 1;
        continue;
      }

      scores.push(scored.score);
      tracker.updateStageProgress(stage, { completed_items: scores.length });

      const passed = passesQualityGate(scored.score, this.config.qualityGateThreshold)
        && (approve?.(scored.result) ?? true);
      if (passed) {
        const merged = merge(input, scored.result);
        accepted.push({ ...merged, scores: { ...merged.scores, [stage]: scored.score } });
        this.emit({ type: 'item_accepted', stage, index, score: scored.score });
      } else {
        this.log.debug({ stage, index, score: scored.score }, 'Item rejected by quality gate');
        this.emit({ type: 'item_rejected', stage, index, score: scored.score });
      }
    }

    if (tracker.overallStatus === 'paused') {
      this.log.info({ stage, processed: scores.length, total }, 'Paused part-way through stage, it will rerun on resume');
      return [];
    }

    const avgScore = meanScore(scores);
    tracker.updateStageProgress(stage, {
      completed_items: scores.length,
      avg_score: avgScore,
      message: `${accepted.length} of ${total} items passed the quality gate`,
    });
    tracker.completeStage(stage);
    this.stageReports[stage] = {
      processed: scores.length,
      accepted: accepted.length,
      errors,
      avg_score: avgScore,
      duration_ms: Date.now() - startedAt,
    };
    await this.persist(`complete:${stage}`);

    this.log.info({ stage, processed: scores.length, accepted: accepted.length, errors }, 'Stage finished');
    this.emit({ type: 'stage_complete', stage, accepted: accepted.length, processed: scores.length, avg_score: avgScore });
    return accepted;
  }

  /** `null` when the item failed; the failure is already recorded. */
  private async scoreItem<I extends ProductionItem | TopicRequest, R>(
    stage: ProcessableStage,
    input: I,
    executor: StageExecutor<I, R>,
    context: StageContext,
  ): Promise<ScoredResult<R> | null> {
    try {
      const outcome = await executor.execute(input, context);
      let score = this.checkedScore(stage, context.index, outcome.average_score, 'executor');
      if (this.feedback) {
        score = this.checkedScore(stage, context.index, await this.feedback(stage, input, outcome.result, score), 'feedback');
      }
      return { result: outcome.result, score };
    } catch (err) {
      if (err instanceof StageAbortError) throw err;

      const message = `Item ${context.index + 1}/${context.total} failed in ${stage}: ${errorMessage(err)}`;
      this.requireTracker().addErrorLog(stage, message);
      this.log.warn({ stage, index: context.index, error: errorMessage(err) }, 'Stage item failed');
      this.emit({ type: 'item_error', stage, index: context.index, error: errorMessage(err) });
      return null;
    }
  }

  private checkedScore(stage: ProcessableStage, index: number, raw: number, source: string): number {
    const { score, adjusted } = normalizeScore(raw);
    if (adjusted) {
      this.log.warn({ stage, index, raw, score, source }, 'Score outside [0, 1], clamped');
    }
    return score;
  }

  // ─── Boundaries ────────────────────────────────────────────────────

  /** Pauses the tracker unless it already is, and keeps `carried` for resume(). */
  private async holdForResume(carried: ProductionItem[]): Promise<ProductionItem[]> {
    const tracker = this.requireTracker();
    this.pauseRequested = false;
    this.heldItems = carried;

    if (tracker.overallStatus !== 'paused' && !tracker.pauseProcess()) return [];
    await this.persist('pause');
    this.emit({ type: 'pipeline_paused', stage: tracker.currentStage });
    return [];
  }

  private async failRun(err: unknown): Promise<void> {
    const tracker = this.requireTracker();
    const activeStage = tracker.currentStage;
    const message = errorMessage(err);
    this.pauseRequested = false;

    // Invariant violations have already failed the tracker.
    if (!tracker.isTerminal) {
      tracker.failProcess(message);
    }
    this.emit({ type: 'pipeline_error', stage: activeStage, error: message });

    try {
      await this.persist('fail');
    } catch (persistErr) {
      this.log.error({ error: errorMessage(persistErr) }, 'Could not persist failed run');
    }
  }

  private async persist(reason: string): Promise<void> {
    if (!this.tracker || !this.recordId) return;
    const saved = await this.factory.save(this.recordId, this.tracker);
    if (!saved) {
      this.log.warn({ reason, recordId: this.recordId }, 'Progress snapshot not saved, continuing with in-memory state');
    }
  }

  private emit(event: ProductionEventBody): void {
    if (!this.emitter) return;
    const progress = this.tracker?.progressPercentage ?? 0;
    try {
      this.emitter({ ...event, progress_percentage: progress });
    } catch (err) {
      this.log.warn({ type: event.type, error: errorMessage(err) }, 'Progress listener threw');
    }
  }

  private enter(): void {
    if (this.running) throw new RunInProgressError(this.entityId);
    this.running = true;
  }

  private requireTracker(): ProgressTracker {
    if (!this.tracker) throw new ProductionError('No production run has been started');
    return this.tracker;
  }
}

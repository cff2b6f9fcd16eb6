/**
 * Stage catalog — the fixed, ordered list of production stages and their
 * progress weights.
 *
 * Order matters: it defines the successor relation used when a stage
 * completes. The terminal meta-stages are never processed and never have a
 * stage state of their own.
 */

export const PROCESSABLE_STAGES = [
  'topic_discovery',
  'topic_research',
  'article_writing',
  'style_adaptation',
  'article_review',
] as const;

export const TERMINAL_STAGES = ['completed', 'failed', 'paused'] as const;

export type ProcessableStage = (typeof PROCESSABLE_STAGES)[number];
export type TerminalStage = (typeof TERMINAL_STAGES)[number];
export type ProductionStage = ProcessableStage | TerminalStage;

export const STAGE_ORDER = [...PROCESSABLE_STAGES, ...TERMINAL_STAGES] as const;

export type StageStatus = 'pending' | 'in_progress' | 'completed' | 'failed' | 'paused';
export type OverallStatus = 'pending' | 'in_progress' | 'completed' | 'failed' | 'paused';

export type StageWeights = Readonly<Partial<Record<ProcessableStage, number>>>;

export const DEFAULT_STAGE_WEIGHTS = {
  topic_discovery: 0.1,
  topic_research: 0.2,
  article_writing: 0.3,
  style_adaptation: 0.2,
  article_review: 0.2,
} as const satisfies Record<ProcessableStage, number>;

export const ARTICLE_PRODUCTION = 'article_production';

// Float sums of decimal weights land a few ulps away from 1.
const WEIGHT_SUM_TOLERANCE = 1e-9;

export class StageCatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StageCatalogError';
  }
}

export interface StageCatalog {
  readonly operationType: string;
  readonly stages: readonly ProcessableStage[];
  readonly weights: StageWeights;
}

export function isProcessableStage(value: unknown): value is ProcessableStage {
  return typeof value === 'string' && (PROCESSABLE_STAGES as readonly string[]).includes(value);
}

export function isProductionStage(value: unknown): value is ProductionStage {
  return typeof value === 'string' && (STAGE_ORDER as readonly string[]).includes(value);
}

export function sumWeights(weights: StageWeights): number {
  return Object.values(weights).reduce<number>((total, w) => total + (w ?? 0), 0);
}

/**
 * Throws StageCatalogError unless `weights` has exactly one non-negative
 * entry per stage and the entries sum to 1.
 */
export function assertValidWeights(stages: readonly ProcessableStage[], weights: StageWeights): void {
  const keys = Object.keys(weights);
  const missing = stages.filter((stage) => weights[stage] === undefined);
  const extra = keys.filter((key) => !stages.some((stage) => stage === key));
  if (missing.length > 0 || extra.length > 0) {
    throw new StageCatalogError(
      `Stage weights must cover exactly [${stages.join(', ')}]`
        + (missing.length > 0 ? `; missing: ${missing.join(', ')}` : '')
        + (extra.length > 0 ? `; unexpected: ${extra.join(', ')}` : ''),
    );
  }

  for (const stage of stages) {
    const weight = weights[stage] ?? 0;
    if (!Number.isFinite(weight) || weight < 0) {
      throw new StageCatalogError(`Stage weight for ${stage} must be a non-negative number, got ${weight}`);
    }
  }

  const total = sumWeights(weights);
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new StageCatalogError(`Stage weights must sum to 1.0, got ${total}`);
  }
}

export function defineStageCatalog(
  operationType: string,
  stages: readonly ProcessableStage[],
  weights: StageWeights,
): StageCatalog {
  if (stages.length === 0) {
    throw new StageCatalogError(`Catalog ${operationType} has no stages`);
  }
  if (new Set(stages).size !== stages.length) {
    throw new StageCatalogError(`Catalog ${operationType} lists a stage more than once`);
  }
  const ordered = PROCESSABLE_STAGES.filter((stage) => stages.includes(stage));
  if (ordered.some((stage, i) => stage !== stages[i])) {
    throw new StageCatalogError(`Catalog ${operationType} must keep pipeline order`);
  }
  assertValidWeights(stages, weights);
  return Object.freeze({
    operationType,
    stages: Object.freeze([...stages]),
    weights: Object.freeze({ ...weights }),
  });
}

export function articleProductionCatalog(weights: StageWeights = DEFAULT_STAGE_WEIGHTS): StageCatalog {
  return defineStageCatalog(ARTICLE_PRODUCTION, PROCESSABLE_STAGES, weights);
}

/**
 * Successor of `stage` in the catalog.
 * `null` when `stage` is the last stage; `undefined` when it is not in the catalog.
 */
export function nextStageOf(catalog: StageCatalog, stage: ProcessableStage): ProcessableStage | null | undefined {
  const index = catalog.stages.indexOf(stage);
  if (index === -1) return undefined;
  return catalog.stages[index + 1] ?? null;
}

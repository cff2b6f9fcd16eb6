import { z } from 'zod';
import {
  DEFAULT_STAGE_WEIGHTS,
  PROCESSABLE_STAGES,
  StageCatalogError,
  assertValidWeights,
  type StageWeights,
} from '../production/stages.js';
import { DEFAULT_PROGRESS_TABLE } from '../production/persistence/supabase-gateway.js';

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid production configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export interface ProductionConfig {
  /** Inclusive: an item scoring exactly this value passes. */
  qualityGateThreshold: number;
  stageWeights: StageWeights;
  snapshotVersion: number;
  progressTable: string;
  persistenceMaxAttempts: number;
}

export const DEFAULT_QUALITY_GATE_THRESHOLD = 0.7;

export const DEFAULT_PRODUCTION_CONFIG: ProductionConfig = Object.freeze({
  qualityGateThreshold: DEFAULT_QUALITY_GATE_THRESHOLD,
  stageWeights: DEFAULT_STAGE_WEIGHTS,
  snapshotVersion: 1,
  progressTable: DEFAULT_PROGRESS_TABLE,
  persistenceMaxAttempts: 3,
});

const optionalNumber = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : Number(value)));

const StageWeightsSchema = z.record(z.enum(PROCESSABLE_STAGES), z.number());

const EnvSchema = z.object({
  QUALITY_GATE_THRESHOLD: optionalNumber.pipe(z.number().min(0).max(1).optional()),
  STAGE_WEIGHTS: z.string().optional(),
  PROGRESS_SNAPSHOT_VERSION: optionalNumber.pipe(z.number().int().positive().optional()),
  PROGRESS_TABLE: z.string().trim().min(1).optional(),
  PERSISTENCE_MAX_ATTEMPTS: optionalNumber.pipe(z.number().int().positive().optional()),
});

function parseStageWeights(raw: string, issues: string[]): StageWeights | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    issues.push('STAGE_WEIGHTS: must be a JSON object');
    return undefined;
  }

  const result = StageWeightsSchema.safeParse(parsed);
  if (!result.success) {
    issues.push(...result.error.issues.map((issue) => `STAGE_WEIGHTS: ${issue.message}`));
    return undefined;
  }

  try {
    assertValidWeights(PROCESSABLE_STAGES, result.data);
  } catch (err) {
    if (!(err instanceof StageCatalogError)) throw err;
    issues.push(`STAGE_WEIGHTS: ${err.message}`);
    return undefined;
  }
  return result.data;
}

/**
 * Builds a ProductionConfig from environment variables.
 * Throws ConfigError listing every invalid key.
 */
export function loadProductionConfig(env: NodeJS.ProcessEnv = process.env): ProductionConfig {
  const issues: string[] = [];
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    issues.push(...result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
    throw new ConfigError(issues);
  }

  const vars = result.data;
  const stageWeights = vars.STAGE_WEIGHTS === undefined
    ? DEFAULT_PRODUCTION_CONFIG.stageWeights
    : parseStageWeights(vars.STAGE_WEIGHTS, issues);

  if (issues.length > 0 || stageWeights === undefined) {
    throw new ConfigError(issues);
  }

  return {
    qualityGateThreshold: vars.QUALITY_GATE_THRESHOLD ?? DEFAULT_PRODUCTION_CONFIG.qualityGateThreshold,
    stageWeights,
    snapshotVersion: vars.PROGRESS_SNAPSHOT_VERSION ?? DEFAULT_PRODUCTION_CONFIG.snapshotVersion,
    progressTable: vars.PROGRESS_TABLE ?? DEFAULT_PRODUCTION_CONFIG.progressTable,
    persistenceMaxAttempts: vars.PERSISTENCE_MAX_ATTEMPTS ?? DEFAULT_PRODUCTION_CONFIG.persistenceMaxAttempts,
  };
}

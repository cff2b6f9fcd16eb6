/**
 * Content production core: stage catalog, progress tracking, persistence
 * gateways and the pipeline orchestrator.
 */

export * from './production/stages.js';
export * from './production/types.js';
export * from './production/errors.js';
export * from './production/quality-gate.js';
export { parseProgressSnapshot, ProgressSnapshotSchema, StageStateSchema } from './production/schemas.js';
export { ProgressTracker, type ProgressTrackerOptions } from './production/progress-tracker.js';
export { ProgressFactory, type CreatedProgress, type ProgressFactoryOptions } from './production/progress-factory.js';
export {
  PipelineOrchestrator,
  type OrchestratorConfig,
  type PipelineOrchestratorOptions,
  type ResumeOptions,
} from './production/orchestrator.js';
export type { ProgressGateway, StoredProgress } from './production/persistence/gateway.js';
export { InMemoryProgressGateway } from './production/persistence/memory-gateway.js';
export {
  SupabaseProgressGateway,
  DEFAULT_PROGRESS_TABLE,
  type SupabaseProgressGatewayOptions,
} from './production/persistence/supabase-gateway.js';
export {
  ConfigError,
  DEFAULT_PRODUCTION_CONFIG,
  DEFAULT_QUALITY_GATE_THRESHOLD,
  loadProductionConfig,
  type ProductionConfig,
} from './lib/config.js';
export { createRunLogger, type Logger } from './lib/logger.js';

/**
 * Progress Factory
 *
 * Creates, rebuilds and stores ProgressTrackers through a ProgressGateway.
 * Each operation type maps to its own stage catalog; `article_production`
 * is registered by default.
 */

import logger, { createRunLogger, type Logger } from '../lib/logger.js';
import type { ProgressGateway } from './persistence/gateway.js';
import { ProgressTracker } from './progress-tracker.js';
import { parseProgressSnapshot } from './schemas.js';
import { ARTICLE_PRODUCTION, articleProductionCatalog, type StageCatalog } from './stages.js';

export interface CreatedProgress {
  recordId: string;
  tracker: ProgressTracker;
}

export interface ProgressFactoryOptions {
  catalogs?: readonly StageCatalog[];
  logger?: Logger;
  now?: () => Date;
}

export class ProgressFactory {
  private readonly gateway: ProgressGateway;
  private readonly catalogs = new Map<string, StageCatalog>();
  private readonly log: Logger;
  private readonly now?: () => Date;

  constructor(gateway: ProgressGateway, options: ProgressFactoryOptions = {}) {
    this.gateway = gateway;
    this.log = options.logger ?? logger.child({ component: 'progress-factory' });
    this.now = options.now;
    for (const catalog of options.catalogs ?? [articleProductionCatalog()]) {
      this.register(catalog);
    }
  }

  /** Registers (or replaces) the catalog for an operation type. */
  register(catalog: StageCatalog): void {
    this.catalogs.set(catalog.operationType, catalog);
  }

  catalogFor(operationType: string): StageCatalog | undefined {
    return this.catalogs.get(operationType);
  }

  get operationTypes(): string[] {
    return [...this.catalogs.keys()];
  }

  /**
   * Builds a fresh tracker and stores its initial snapshot.
   * `null` when the operation type is unknown or the record could not be created.
   */
  async create(entityId: string, operationType: string = ARTICLE_PRODUCTION): Promise<CreatedProgress | null> {
    const catalog = this.catalogs.get(operationType);
    if (!catalog) {
      this.log.warn({ entityId, operationType }, 'Unsupported operation type for progress tracking');
      return null;
    }

    const tracker = new ProgressTracker(entityId, {
      catalog,
      logger: createRunLogger(entityId, { operationType }),
      now: this.now,
    });
    const recordId = await this.gateway.create(entityId, operationType, tracker.getStateForPersistence());
    if (!recordId) {
      this.log.error({ entityId, operationType }, 'Failed to save initial progress state');
      return null;
    }

    this.log.info({ entityId, operationType, recordId }, 'Progress created');
    return { recordId, tracker };
  }

  /** Rebuilds the tracker stored under `recordId`; `null` if missing, invalid or of an unknown type. */
  async load(recordId: string): Promise<ProgressTracker | null> {
    const stored = await this.gateway.load(recordId);
    if (!stored) {
      this.log.warn({ recordId }, 'Progress record not found');
      return null;
    }

    const catalog = this.catalogs.get(stored.operation_type);
    if (!catalog) {
      this.log.warn({ recordId, operationType: stored.operation_type }, 'Cannot rebuild progress of unsupported type');
      return null;
    }

    const parsed = parseProgressSnapshot(stored.snapshot);
    if (!parsed.success) {
      this.log.error(
        { recordId, issues: parsed.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
        'Stored progress snapshot is invalid',
      );
      return null;
    }

    return ProgressTracker.fromSnapshot(stored.entity_id, parsed.data, {
      catalog,
      logger: createRunLogger(stored.entity_id, { operationType: catalog.operationType }),
      now: this.now,
    });
  }

  async save(recordId: string, tracker: ProgressTracker): Promise<boolean> {
    const saved = await this.gateway.save(recordId, tracker.getStateForPersistence());
    if (!saved) {
      this.log.error({ recordId, entityId: tracker.entityId }, 'Failed to update progress record');
    }
    return saved;
  }

  delete(recordId: string): Promise<boolean> {
    return this.gateway.delete(recordId);
  }

  findByEntity(entityId: string): Promise<string | null> {
    return this.gateway.findByEntity(entityId);
  }
}

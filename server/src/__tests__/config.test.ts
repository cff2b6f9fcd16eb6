import { describe, expect, it } from 'vitest';
import { ConfigError, DEFAULT_PRODUCTION_CONFIG, loadProductionConfig } from '../lib/config.js';
import { DEFAULT_STAGE_WEIGHTS } from '../production/stages.js';

const EVEN_WEIGHTS = {
  topic_discovery: 0.2,
  topic_research: 0.2,
  article_writing: 0.2,
  style_adaptation: 0.2,
  article_review: 0.2,
};

function configError(env: NodeJS.ProcessEnv): ConfigError {
  try {
    loadProductionConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected loadProductionConfig to throw');
}

describe('loadProductionConfig', () => {
  it('falls back to defaults when nothing is set', () => {
    expect(loadProductionConfig({})).toEqual({
      qualityGateThreshold: 0.7,
      stageWeights: DEFAULT_STAGE_WEIGHTS,
      snapshotVersion: 1,
      progressTable: 'production_progress',
      persistenceMaxAttempts: 3,
    });
    expect(DEFAULT_PRODUCTION_CONFIG.qualityGateThreshold).toBe(0.7);
  });

  it('treats blank values as unset', () => {
    expect(loadProductionConfig({ QUALITY_GATE_THRESHOLD: '  ' }).qualityGateThreshold).toBe(0.7);
  });

  it('reads every variable', () => {
    const config = loadProductionConfig({
      QUALITY_GATE_THRESHOLD: '0.8',
      STAGE_WEIGHTS: JSON.stringify(EVEN_WEIGHTS),
      PROGRESS_SNAPSHOT_VERSION: '2',
      PROGRESS_TABLE: 'article_progress',
      PERSISTENCE_MAX_ATTEMPTS: '5',
    });

    expect(config).toEqual({
      qualityGateThreshold: 0.8,
      stageWeights: EVEN_WEIGHTS,
      snapshotVersion: 2,
      progressTable: 'article_progress',
      persistenceMaxAttempts: 5,
    });
  });

  it('rejects a threshold outside [0, 1]', () => {
    const err = configError({ QUALITY_GATE_THRESHOLD: '1.5' });
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0]).toMatch(/^QUALITY_GATE_THRESHOLD: /);
  });

  it('rejects a non-numeric threshold', () => {
    expect(() => loadProductionConfig({ QUALITY_GATE_THRESHOLD: 'high' })).toThrow(ConfigError);
  });

  it('rejects a non-positive retry count', () => {
    const err = configError({ PERSISTENCE_MAX_ATTEMPTS: '0' });
    expect(err.issues[0]).toMatch(/^PERSISTENCE_MAX_ATTEMPTS: /);
  });

  it('rejects stage weights that are not JSON', () => {
    expect(configError({ STAGE_WEIGHTS: 'even' }).issues).toEqual(['STAGE_WEIGHTS: must be a JSON object']);
  });

  it('rejects stage weights that do not sum to 1', () => {
    const err = configError({ STAGE_WEIGHTS: JSON.stringify({ ...EVEN_WEIGHTS, article_review: 0.5 }) });
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0]).toMatch(/^STAGE_WEIGHTS: Stage weights must sum to 1\.0, got 1\.3/);
  });

  it('rejects stage weights for an unknown stage', () => {
    const err = configError({ STAGE_WEIGHTS: JSON.stringify({ ...EVEN_WEIGHTS, publishing: 0 }) });
    expect(err.issues[0]).toMatch(/^STAGE_WEIGHTS: /);
  });

  it('names every invalid key in the message', () => {
    const err = configError({ QUALITY_GATE_THRESHOLD: '2', PROGRESS_SNAPSHOT_VERSION: '-1' });
    expect(err.issues).toHaveLength(2);
    expect(err.message).toMatch(/^Invalid production configuration: /);
    expect(err.message).toContain('QUALITY_GATE_THRESHOLD');
    expect(err.message).toContain('PROGRESS_SNAPSHOT_VERSION');
  });
});

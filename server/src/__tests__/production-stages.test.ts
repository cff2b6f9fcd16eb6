import { describe, expect, it } from 'vitest';
import {
  DEFAULT_STAGE_WEIGHTS,
  PROCESSABLE_STAGES,
  STAGE_ORDER,
  StageCatalogError,
  articleProductionCatalog,
  defineStageCatalog,
  isProcessableStage,
  isProductionStage,
  nextStageOf,
  sumWeights,
} from '../production/stages.js';
import { meanScore, normalizeScore, passesQualityGate } from '../production/quality-gate.js';

describe('stage catalog', () => {
  it('orders processable stages before the terminal meta-stages', () => {
    expect(STAGE_ORDER).toEqual([
      'topic_discovery',
      'topic_research',
      'article_writing',
      'style_adaptation',
      'article_review',
      'completed',
      'failed',
      'paused',
    ]);
  });

  it('default weights sum to 1', () => {
    expect(sumWeights(DEFAULT_STAGE_WEIGHTS)).toBeCloseTo(1, 9);
    expect(Object.keys(DEFAULT_STAGE_WEIGHTS)).toEqual([...PROCESSABLE_STAGES]);
  });

  it('returns the successor, null after the last stage, undefined outside the catalog', () => {
    const catalog = articleProductionCatalog();
    expect(nextStageOf(catalog, 'topic_discovery')).toBe('topic_research');
    expect(nextStageOf(catalog, 'style_adaptation')).toBe('article_review');
    expect(nextStageOf(catalog, 'article_review')).toBeNull();

    const refresh = defineStageCatalog('article_refresh', ['article_writing', 'article_review'], {
      article_writing: 0.5,
      article_review: 0.5,
    });
    expect(nextStageOf(refresh, 'topic_discovery')).toBeUndefined();
    expect(nextStageOf(refresh, 'article_writing')).toBe('article_review');
  });

  it('rejects weights that do not sum to 1', () => {
    expect(() => articleProductionCatalog({
      topic_discovery: 0.1,
      topic_research: 0.2,
      article_writing: 0.3,
      style_adaptation: 0.2,
      article_review: 0.1,
    })).toThrow('Stage weights must sum to 1.0');
  });

  it('rejects weights missing a stage or naming an extra one', () => {
    expect(() => defineStageCatalog('partial', ['topic_research', 'article_writing'], {
      topic_research: 1,
    })).toThrow(StageCatalogError);
    expect(() => defineStageCatalog('extra', ['article_writing'], {
      article_writing: 0.5,
      article_review: 0.5,
    })).toThrow('unexpected: article_review');
  });

  it('rejects negative weights', () => {
    expect(() => defineStageCatalog('negative', ['article_writing', 'article_review'], {
      article_writing: 1.5,
      article_review: -0.5,
    })).toThrow('must be a non-negative number');
  });

  it('rejects catalogs out of pipeline order or with duplicates', () => {
    expect(() => defineStageCatalog('reversed', ['article_review', 'article_writing'], {
      article_writing: 0.5,
      article_review: 0.5,
    })).toThrow('must keep pipeline order');
    expect(() => defineStageCatalog('dup', ['article_review', 'article_review'], {
      article_review: 1,
    })).toThrow('more than once');
    expect(() => defineStageCatalog('empty', [], {})).toThrow('has no stages');
  });

  it('recognises stage names', () => {
    expect(isProcessableStage('article_writing')).toBe(true);
    expect(isProcessableStage('completed')).toBe(false);
    expect(isProcessableStage(42)).toBe(false);
    expect(isProductionStage('paused')).toBe(true);
    expect(isProductionStage('publishing')).toBe(false);
  });
});

describe('quality gate', () => {
  it('accepts a score exactly at the threshold', () => {
    expect(passesQualityGate(0.7, 0.7)).toBe(true);
    expect(passesQualityGate(0.6999, 0.7)).toBe(false);
    expect(passesQualityGate(0.7000001, 0.7)).toBe(true);
  });

  it('clamps out-of-range scores and flags the adjustment', () => {
    expect(normalizeScore(0.42)).toEqual({ score: 0.42, adjusted: false });
    expect(normalizeScore(1.3)).toEqual({ score: 1, adjusted: true });
    expect(normalizeScore(-0.1)).toEqual({ score: 0, adjusted: true });
    expect(normalizeScore(Number.NaN)).toEqual({ score: 0, adjusted: true });
  });

  it('averages scores, treating an empty list as 0', () => {
    expect(meanScore([])).toBe(0);
    expect(meanScore([0.5, 1])).toBe(0.75);
  });
});

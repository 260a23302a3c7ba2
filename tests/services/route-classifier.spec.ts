import { describe, expect, it } from 'vitest';
import { ROUTE_RULES, RouteClassifier } from '../../src/services/route-classifier.js';
import { MULTIMODAL, REASONING } from '../harness/fixtures.js';

describe('RouteClassifier', () => {
  const classifier = new RouteClassifier(REASONING, MULTIMODAL);

  it('sends anything with an image to the multimodal model', () => {
    const decision = classifier.classify('prove this theorem', true);

    expect(decision.targetModel.canonicalId).toBe(MULTIMODAL.canonicalId);
    expect(decision.confidence).toBe(0.99);
    expect(decision.source).toBe('shortcut');
    expect(decision.probabilities).toEqual({
      [REASONING.canonicalId]: 0.01,
      [MULTIMODAL.canonicalId]: 0.99,
    });
    expect(decision.rankedCandidates).toEqual([MULTIMODAL.canonicalId, REASONING.canonicalId]);
  });

  it('prefers multimodal keywords over reasoning keywords', () => {
    const decision = classifier.classify('Explain why this PHOTO looks blurry', false);

    expect(decision.targetModel.role).toBe('multimodal');
    expect(decision.confidence).toBe(0.85);
    expect(decision.probabilities[REASONING.canonicalId]).toBe(0.15);
  });

  it('routes reasoning keywords to the reasoning model', () => {
    const decision = classifier.classify('Derive the closed form', false);

    expect(decision.targetModel.canonicalId).toBe(REASONING.canonicalId);
    expect(decision.confidence).toBe(0.88);
    expect(decision.source).toBe('shortcut');
    expect(decision.probabilities).toEqual({
      [REASONING.canonicalId]: 0.88,
      [MULTIMODAL.canonicalId]: 0.12,
    });
    expect(decision.rankedCandidates).toEqual([REASONING.canonicalId, MULTIMODAL.canonicalId]);
  });

  it('matches keywords as substrings', () => {
    expect(classifier.classify('weekly analytics digest', false).confidence).toBe(0.88);
    expect(classifier.classify('imagery for the landing page', false).targetModel.role).toBe('multimodal');
  });

  it('falls back to the reasoning model with the fixed split', () => {
    const decision = classifier.classify('hello there', false);

    expect(decision.targetModel.canonicalId).toBe(REASONING.canonicalId);
    expect(decision.confidence).toBe(0.65);
    expect(decision.source).toBe('mlp_compat');
    expect(decision.probabilities).toEqual({
      [REASONING.canonicalId]: 0.65,
      [MULTIMODAL.canonicalId]: 0.35,
    });
  });

  it('keeps every rule distribution normalised', () => {
    for (const rule of ROUTE_RULES) {
      expect(rule.probabilities.reasoning + rule.probabilities.multimodal, rule.name).toBeCloseTo(1, 10);
      expect(rule.probabilities[rule.target], rule.name).toBe(rule.confidence);
    }
  });

  it('throws when a custom rule table has no catch-all', () => {
    const strict = new RouteClassifier(REASONING, MULTIMODAL, ROUTE_RULES.slice(0, 1));
    expect(() => strict.classify('plain text', false)).toThrow('Route rule table has no fallback rule.');
  });
});

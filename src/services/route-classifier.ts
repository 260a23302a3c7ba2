import type { ModelIdentity, ModelRole, RouteDecision, RouteDecisionSource } from '../types/dispatch.js';

export const MULTIMODAL_KEYWORDS: readonly string[] = ['image', 'photo', 'picture', 'vision', 'audio', 'video'];

export const REASONING_KEYWORDS: readonly string[] = [
  'reason',
  'analy',
  'proof',
  'derive',
  'step',
  'logic',
  'math',
  'explain why',
];

export interface ClassifierInput {
  /** Already lowercased. */
  text: string;
  hasImage: boolean;
}

export interface RouteRule {
  name: string;
  matches: (input: ClassifierInput) => boolean;
  target: ModelRole;
  confidence: number;
  source: RouteDecisionSource;
  /** Fixed distribution over the two roles; sums to 1. */
  probabilities: Readonly<Record<ModelRole, number>>;
}

// Substring containment, not whole words: 'analy' also matches 'analytics'.
function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => text.includes(keyword));
}

/**
 * Ordered routing rules. The first matching rule wins, so order is priority:
 * image presence, multimodal keywords, reasoning keywords, then the fallback.
 */
export const ROUTE_RULES: readonly RouteRule[] = [
  {
    name: 'image_attached',
    matches: (input) => input.hasImage,
    target: 'multimodal',
    confidence: 0.99,
    source: 'shortcut',
    probabilities: { reasoning: 0.01, multimodal: 0.99 },
  },
  {
    name: 'multimodal_keyword',
    matches: (input) => containsAny(input.text, MULTIMODAL_KEYWORDS),
    target: 'multimodal',
    confidence: 0.85,
    source: 'shortcut',
    probabilities: { reasoning: 0.15, multimodal: 0.85 },
  },
  {
    name: 'reasoning_keyword',
    matches: (input) => containsAny(input.text, REASONING_KEYWORDS),
    target: 'reasoning',
    confidence: 0.88,
    source: 'shortcut',
    probabilities: { reasoning: 0.88, multimodal: 0.12 },
  },
  {
    // Fixed split kept under its historical label; no learned model sits behind it.
    name: 'default_fallback',
    matches: () => true,
    target: 'reasoning',
    confidence: 0.65,
    source: 'mlp_compat',
    probabilities: { reasoning: 0.65, multimodal: 0.35 },
  },
];

export class RouteClassifier {
  readonly #reasoning: Readonly<ModelIdentity>;
  readonly #multimodal: Readonly<ModelIdentity>;
  readonly #rules: readonly RouteRule[];

  constructor(
    reasoning: Readonly<ModelIdentity>,
    multimodal: Readonly<ModelIdentity>,
    rules: readonly RouteRule[] = ROUTE_RULES,
  ) {
    this.#reasoning = reasoning;
    this.#multimodal = multimodal;
    this.#rules = rules;
  }

  classify(text: string, hasImage: boolean): RouteDecision {
    const input: ClassifierInput = { text: text.toLowerCase(), hasImage };
    const rule = this.#rules.find((candidate) => candidate.matches(input));
    if (!rule) {
      throw new Error('Route rule table has no fallback rule.');
    }
    return this.#toDecision(rule);
  }

  #toDecision(rule: RouteRule): RouteDecision {
    const target = rule.target === 'multimodal' ? this.#multimodal : this.#reasoning;
    const other = rule.target === 'multimodal' ? this.#reasoning : this.#multimodal;

    return {
      targetModel: target,
      confidence: rule.confidence,
      source: rule.source,
      probabilities: {
        [this.#reasoning.canonicalId]: rule.probabilities.reasoning,
        [this.#multimodal.canonicalId]: rule.probabilities.multimodal,
      },
      rankedCandidates: [target.canonicalId, other.canonicalId],
    };
  }
}

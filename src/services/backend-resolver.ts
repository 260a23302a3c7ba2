import type { ModelIdentity, ModelList } from '../types/dispatch.js';
import { UnknownModelError } from '../types/errors.js';

/**
 * Maps a model id or alias onto the backend that serves it.
 *
 * Matching is exact and case-sensitive against the four configured names.
 * The two identities are fixed at construction and never change.
 */
export class BackendResolver {
  readonly reasoning: Readonly<ModelIdentity>;
  readonly multimodal: Readonly<ModelIdentity>;

  constructor(reasoning: ModelIdentity, multimodal: ModelIdentity) {
    this.reasoning = Object.freeze({ ...reasoning });
    this.multimodal = Object.freeze({ ...multimodal });
  }

  /** Returns the backend endpoint, or null when the name is not known. */
  resolve(modelName: string): string | null {
    return this.identify(modelName)?.backendEndpoint ?? null;
  }

  /** Like {@link resolve} but throws {@link UnknownModelError}. */
  resolveOrThrow(modelName: string): string {
    const endpoint = this.resolve(modelName);
    if (endpoint === null) {
      throw new UnknownModelError(modelName, this.validModelNames());
    }
    return endpoint;
  }

  identify(modelName: string): Readonly<ModelIdentity> | null {
    if (modelName === this.reasoning.canonicalId || modelName === this.reasoning.alias) {
      return this.reasoning;
    }
    if (modelName === this.multimodal.canonicalId || modelName === this.multimodal.alias) {
      return this.multimodal;
    }
    return null;
  }

  /** Short alias for a canonical id; aliases themselves are not accepted here. */
  aliasFor(canonicalId: string): string | null {
    if (canonicalId === this.reasoning.canonicalId) {
      return this.reasoning.alias;
    }
    if (canonicalId === this.multimodal.canonicalId) {
      return this.multimodal.alias;
    }
    return null;
  }

  isMultimodal(modelName: string): boolean {
    return this.identify(modelName)?.role === 'multimodal';
  }

  /** Reasoning id, reasoning alias, multimodal id, multimodal alias. */
  validModelNames(): string[] {
    return [
      this.reasoning.canonicalId,
      this.reasoning.alias,
      this.multimodal.canonicalId,
      this.multimodal.alias,
    ];
  }

  listModels(): ModelList {
    return {
      object: 'list',
      data: [
        { id: this.reasoning.canonicalId, object: 'model', owned_by: 'nvidia' },
        { id: this.reasoning.alias, object: 'model', owned_by: 'local' },
        { id: this.multimodal.canonicalId, object: 'model', owned_by: 'nvidia' },
        { id: this.multimodal.alias, object: 'model', owned_by: 'local' },
      ],
    };
  }
}

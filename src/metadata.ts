/**
 * Model Metadata
 *
 * Static knowledge about model capabilities. The provider is constructed
 * and passed explicitly; tests hand in their own implementation.
 */

export type QualityTier = 'frontier' | 'standard' | 'economy';

export interface ModelInfo {
  id: string;
  contextWindow: number;
  qualityTier: QualityTier;
  /** Produces long chain-of-thought output */
  supportsReasoning: boolean;
}

export interface MetadataProvider {
  getModelInfo(modelId: string): ModelInfo | undefined;
}

const STATIC_REGISTRY: ModelInfo[] = [
  { id: 'openai/gpt-4o', contextWindow: 128000, qualityTier: 'frontier', supportsReasoning: false },
  { id: 'openai/gpt-4o-mini', contextWindow: 128000, qualityTier: 'economy', supportsReasoning: false },
  { id: 'openai/gpt-5.1', contextWindow: 400000, qualityTier: 'frontier', supportsReasoning: true },
  { id: 'openai/o1', contextWindow: 200000, qualityTier: 'frontier', supportsReasoning: true },
  { id: 'openai/o1-mini', contextWindow: 128000, qualityTier: 'standard', supportsReasoning: true },
  { id: 'anthropic/claude-opus-4.5', contextWindow: 200000, qualityTier: 'frontier', supportsReasoning: true },
  { id: 'anthropic/claude-opus-4-5-20250514', contextWindow: 200000, qualityTier: 'frontier', supportsReasoning: true },
  { id: 'anthropic/claude-3.5-sonnet', contextWindow: 200000, qualityTier: 'frontier', supportsReasoning: false },
  { id: 'anthropic/claude-3.5-haiku', contextWindow: 200000, qualityTier: 'economy', supportsReasoning: false },
  { id: 'google/gemini-3-pro-preview', contextWindow: 1000000, qualityTier: 'frontier', supportsReasoning: true },
  { id: 'google/gemini-1.5-pro', contextWindow: 2000000, qualityTier: 'standard', supportsReasoning: false },
  { id: 'google/gemini-2.0-flash-001', contextWindow: 1000000, qualityTier: 'economy', supportsReasoning: false },
  { id: 'x-ai/grok-4', contextWindow: 256000, qualityTier: 'frontier', supportsReasoning: true },
  { id: 'deepseek/deepseek-r1', contextWindow: 64000, qualityTier: 'standard', supportsReasoning: true }
];

export class StaticRegistryProvider implements MetadataProvider {
  private models: Map<string, ModelInfo>;

  constructor(entries: ModelInfo[] = STATIC_REGISTRY) {
    this.models = new Map(entries.map(e => [e.id, e]));
  }

  getModelInfo(modelId: string): ModelInfo | undefined {
    return this.models.get(modelId);
  }
}

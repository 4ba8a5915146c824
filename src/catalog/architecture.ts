export const MODEL_ARCHITECTURES = [
  'llama',
  'mistral',
  'qwen',
  'gpt2',
  'gptj',
  'gpt_neox',
  'gemma',
  'olmo',
  'phi',
  'deepseek',
  'unknown',
] as const;

export type ModelArchitecture = typeof MODEL_ARCHITECTURES[number];

export function isModelArchitecture(value: unknown): value is ModelArchitecture {
  return typeof value === 'string' && MODEL_ARCHITECTURES.some(architecture => architecture === value);
}

const ARCHITECTURE_KEYWORDS: Array<{ keywords: string[]; architecture: ModelArchitecture }> = [
  { keywords: ['llama'], architecture: 'llama' },
  { keywords: ['mistral'], architecture: 'mistral' },
  { keywords: ['qwen'], architecture: 'qwen' },
  { keywords: ['gpt2', 'gpt-2'], architecture: 'gpt2' },
  { keywords: ['gptj', 'gpt-j'], architecture: 'gptj' },
  { keywords: ['pythia', 'gpt-neox', 'gpt_neox'], architecture: 'gpt_neox' },
  { keywords: ['gemma'], architecture: 'gemma' },
  { keywords: ['olmo'], architecture: 'olmo' },
  { keywords: ['phi'], architecture: 'phi' },
  { keywords: ['deepseek'], architecture: 'deepseek' },
];

function matchKeywords(text: string): ModelArchitecture | undefined {
  const lower = text.toLowerCase();
  for (const { keywords, architecture } of ARCHITECTURE_KEYWORDS) {
    if (keywords.some(keyword => lower.includes(keyword))) {
      return architecture;
    }
  }
  return undefined;
}

/**
 * Guesses the architecture family from the model id, then from the
 * deployment's serialized config (`model_type`).
 */
export function detectArchitecture(modelId: string, configJson?: string): ModelArchitecture {
  const fromId = matchKeywords(modelId);
  if (fromId) return fromId;

  if (configJson) {
    try {
      const parsed: unknown = JSON.parse(configJson);
      if (typeof parsed === 'object' && parsed !== null && 'model_type' in parsed && typeof parsed.model_type === 'string') {
        return matchKeywords(parsed.model_type) || 'unknown';
      }
    } catch {
      return 'unknown';
    }
  }

  return 'unknown';
}

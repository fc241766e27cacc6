import { BinaryCritic } from './binary.js';
import { NumericCritic } from './numeric.js';
import { SimilarityCritic } from './similarity.js';

export type {
  BaseCritic,
  CriticKind,
  CriticOptions,
  CriticResult,
  SimilarityRegistry,
  SimilarityStrategy,
} from './types.js';
export { BinaryCritic } from './binary.js';
export { NumericCritic, type NumericCriticOptions } from './numeric.js';
export { SimilarityCritic, type SimilarityCriticOptions } from './similarity.js';
export { ToolSelectionCritic, TOOL_SELECTION_FIELD } from './tool-selection.js';
export {
  BUILTIN_SIMILARITY_STRATEGIES,
  createSimilarityRegistry,
  cosineSimilarity,
  jaccardSimilarity,
} from './similarity/index.js';

export type Critic = BinaryCritic | NumericCritic | SimilarityCritic;

export const CRITIC_KINDS = ['binary', 'numeric', 'similarity'] as const;

export function describeCritic(critic: Critic): string {
  switch (critic.kind) {
    case 'binary':
      return `binary(${critic.field}, weight=${critic.weight})`;
    case 'numeric':
      return `numeric(${critic.field}, weight=${critic.weight}, range=[${critic.valueRange.join(', ')}], threshold=${critic.matchThreshold})`;
    case 'similarity':
      return `similarity(${critic.field}, weight=${critic.weight}, metric=${critic.metric}, threshold=${critic.similarityThreshold})`;
    default: {
      const unreachable: never = critic;
      return unreachable;
    }
  }
}

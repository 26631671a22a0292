/**
 * Core types for Weasel evolution
 */

export interface WeaselConfig {
  // Target
  phrase: string;
  charSet: string;

  // Selection pressure
  iterations: number; // Mutations tried per generation
  mutationRate: number; // Percent chance per character, 1-100

  // Reproducibility
  seed: string | null;
}

export interface Candidate {
  id: string;
  parentId: string | null;
  generation: number | null; // null for the random start string
  text: string;
  score: number; // Positions matching the phrase
}

export type RunStatus = 'initializing' | 'evaluating' | 'converged' | 'failed';

interface StepDetails {
  best: Readonly<Candidate>;
  improvement: number; // score gained over the previous best
  mutationsTried: number;
}

export type GenerationResult =
  | (StepDetails & { label: 'Start'; generation: null })
  | (StepDetails & { label: 'Gen'; generation: number });

export interface EvolutionState {
  config: Readonly<WeaselConfig>;
  generation: number; // Next generation number to run
  best: Readonly<Candidate> | null;
  lineage: string[];
  totalMutations: number;
  startedAt: string;
  status: RunStatus;
}

export interface EvolutionResult {
  champion: Readonly<Candidate>;
  generations: number;
  totalMutations: number;
  initialScore: number;
  finalScore: number;
  lineage: string[]; // ids from start string to champion
  totalTimeMs: number;
}

export type ProgressCallback = (result: GenerationResult) => void;

// Default configuration
export const DEFAULT_CHAR_SET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ abcdefghijklmnopqrstuvwxyz!?.';

export const DEFAULT_CONFIG: Omit<WeaselConfig, 'phrase'> = {
  charSet: DEFAULT_CHAR_SET,
  iterations: 100,
  mutationRate: 5,
  seed: null,
};

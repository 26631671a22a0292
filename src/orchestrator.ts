/**
 * Evolution Orchestrator
 *
 * Controls the Weasel loop:
 * 1. Generate a random start string and score it
 * 2. For each generation:
 *    a. Mutate the current best `iterations` times
 *    b. Score every variant against the phrase
 *    c. Keep the first variant with the highest score, if it beats the best
 *    d. Check convergence
 * 3. Return the champion
 *
 * The best score never decreases: a variant is only adopted on strict
 * improvement.
 */

import { nanoid } from 'nanoid';
import type {
  Candidate,
  EvolutionResult,
  EvolutionState,
  GenerationResult,
  ProgressCallback,
  WeaselConfig,
} from './types.js';
import { resolveConfig, type WeaselOptions } from './config.js';
import { charLength, missingChars, toCharSet, toChars } from './charset.js';
import { isMatch, scoreCandidate } from './evaluator.js';
import { generateRandomString, mutateString } from './mutations/mutator.js';
import { createRandomSource, type RandomSource } from './random.js';

export interface OrchestratorOptions {
  random?: RandomSource; // Overrides the source derived from config.seed
  onProgress?: ProgressCallback;
  log?: (message: string) => void; // Diagnostics, never progress lines
}

export class Orchestrator {
  private config: Readonly<WeaselConfig>;
  private random: RandomSource;
  private state: EvolutionState;
  private onProgress: ProgressCallback | null;
  private log: (message: string) => void;
  private phraseChars: readonly string[];
  private chars: readonly string[];

  constructor(config: Readonly<WeaselConfig>, options: OrchestratorOptions = {}) {
    this.config = config;
    this.random = options.random ?? createRandomSource(config.seed);
    this.onProgress = options.onProgress ?? null;
    this.log = options.log ?? (() => {});
    this.phraseChars = toChars(config.phrase);
    this.chars = toCharSet(config.charSet);
    this.state = this.freshState();
  }

  private freshState(): EvolutionState {
    return {
      config: this.config,
      generation: 0,
      best: null,
      lineage: [],
      totalMutations: 0,
      startedAt: new Date().toISOString(),
      status: 'initializing',
    };
  }

  /**
   * Set progress callback for real-time updates
   */
  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  /**
   * Run the loop until the best candidate equals the phrase. Each call is a
   * new run numbered from generation 0.
   */
  evolve(): EvolutionResult {
    const startTime = Date.now();
    this.state = this.freshState();

    try {
      const { phrase, charSet, iterations, mutationRate } = this.config;
      this.log(
        `Evolving ${charLength(phrase)} characters ` +
          `(iterations=${iterations}, mutation rate=${mutationRate}%)`
      );

      const missing = missingChars(phrase, charSet);
      if (missing.length > 0) {
        this.log(`Character set lacks ${JSON.stringify(missing.join(''))}; the run cannot converge`);
      }

      const start = this.initialize();
      let best = start;

      while (this.state.status === 'evaluating') {
        best = this.runGeneration(best);
      }

      this.log(
        `Converged after ${this.state.generation} generations ` +
          `and ${this.state.totalMutations} mutations`
      );

      return {
        champion: best,
        generations: this.state.generation,
        totalMutations: this.state.totalMutations,
        initialScore: start.score,
        finalScore: best.score,
        lineage: [...this.state.lineage],
        totalTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      this.state.status = 'failed';
      throw error;
    }
  }

  /**
   * Create and announce the random start candidate
   */
  private initialize(): Readonly<Candidate> {
    const text = generateRandomString(this.phraseChars.length, this.chars, this.random);

    const start = this.createCandidate(text, null, null);
    this.adopt(start);
    this.state.status = 'evaluating';

    this.emit({
      label: 'Start',
      generation: null,
      best: start,
      improvement: 0,
      mutationsTried: 0,
    });

    return start;
  }

  /**
   * Run a single generation from the previous best
   */
  private runGeneration(previous: Readonly<Candidate>): Readonly<Candidate> {
    const { phrase, iterations, mutationRate } = this.config;
    const generation = this.state.generation;
    const baseChars = toChars(previous.text);
    let best = previous;

    for (let i = 0; i < iterations; i++) {
      const text = mutateString(baseChars, this.chars, mutationRate, this.random);
      const score = scoreCandidate(text, this.phraseChars);

      // Strictly better only: the first variant reaching a score keeps it
      if (score > best.score) {
        best = this.createCandidate(text, previous.id, generation, score);
      }
    }

    this.state.totalMutations += iterations;
    this.state.generation = generation + 1;

    if (best !== previous) {
      this.adopt(best);
      this.log(`New best: ${best.score}/${this.phraseChars.length} (+${best.score - previous.score})`);
    }

    if (isMatch(best.text, phrase)) {
      this.state.status = 'converged';
    }

    this.emit({
      label: 'Gen',
      generation,
      best,
      improvement: best.score - previous.score,
      mutationsTried: iterations,
    });

    return best;
  }

  private createCandidate(
    text: string,
    parentId: string | null,
    generation: number | null,
    score: number = scoreCandidate(text, this.phraseChars)
  ): Readonly<Candidate> {
    return Object.freeze({
      id: nanoid(10),
      parentId,
      generation,
      text,
      score,
    });
  }

  private adopt(candidate: Readonly<Candidate>): void {
    this.state.best = candidate;
    this.state.lineage.push(candidate.id);
  }

  private emit(result: GenerationResult): void {
    if (this.onProgress) {
      this.onProgress(result);
    }
  }

  /**
   * Get current state
   */
  getState(): EvolutionState {
    return { ...this.state, lineage: [...this.state.lineage] };
  }
}

/**
 * Validate options and run a whole evolution
 */
export function runWeasel(
  options: WeaselOptions,
  onProgress?: ProgressCallback,
  log?: (message: string) => void
): EvolutionResult {
  const config = resolveConfig(options);
  const orchestrator = new Orchestrator(config, { onProgress, log });
  return orchestrator.evolve();
}

/**
 * Render a progress step as printed by the CLI
 */
export function formatGeneration(result: GenerationResult): string {
  if (result.label === 'Start') {
    return `Start: ${result.best.text}`;
  }
  return `Gen ${result.generation}: ${result.best.text}`;
}

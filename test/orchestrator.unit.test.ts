import { describe, expect, it } from 'vitest';

import { resolveConfig } from '../src/config.js';
import { ConfigurationError, EmptyCharsetError } from '../src/errors.js';
import { formatGeneration, Orchestrator, runWeasel } from '../src/orchestrator.js';
import type { RandomSource } from '../src/random.js';
import type { GenerationResult, WeaselConfig } from '../src/types.js';
import { scriptedRandom } from './helpers.js';

function collect(options: Partial<WeaselConfig>, random?: RandomSource) {
  const steps: GenerationResult[] = [];
  const orchestrator = new Orchestrator(resolveConfig(options), {
    random,
    onProgress: (step) => steps.push(step),
  });
  const result = orchestrator.evolve();
  return { steps, lines: steps.map(formatGeneration), result, orchestrator };
}

describe('Orchestrator', () => {
  it('converges on a phrase built from its own alphabet', () => {
    const { lines, result } = collect({
      phrase: 'GO',
      charSet: 'GO',
      iterations: 50,
      mutationRate: 100,
      seed: 'test-seed',
    });

    expect(lines[0]).toMatch(/^Start: [GO]{2}$/);
    expect(lines[lines.length - 1]).toMatch(/^Gen \d+: GO$/);
    lines.slice(1).forEach((line, n) => {
      expect(line.startsWith(`Gen ${n}: `)).toBe(true);
    });
    expect(result.champion.text).toBe('GO');
    expect(result.finalScore).toBe(2);
    expect(result.generations).toBe(lines.length - 1);
    expect(result.totalMutations).toBe(50 * result.generations);
  });

  it('never lets the best score regress', () => {
    const { steps } = collect({
      phrase: 'HELLO',
      charSet: 'EHLO',
      iterations: 20,
      mutationRate: 20,
      seed: 'monotonic',
    });

    for (let i = 1; i < steps.length; i++) {
      const previous = steps[i - 1].best;
      const current = steps[i].best;
      expect(current.score).toBeGreaterThanOrEqual(previous.score);
      expect(steps[i].improvement).toBe(current.score - previous.score);
      if (steps[i].improvement === 0) {
        expect(current.id).toBe(previous.id);
      }
    }
    expect(steps[steps.length - 1].best.text).toBe('HELLO');
  });

  it('keeps the first variant reaching the best score', () => {
    // Start "BB"; generation 0 tries "AB" then "BA"; generation 1 tries "AA" twice
    const random = scriptedRandom([
      0.9, 0.9,
      0.5, 0.1, 0.5, 0.9,
      0.5, 0.9, 0.5, 0.1,
      0.5, 0.1, 0.5, 0.1,
      0.5, 0.1, 0.5, 0.1,
    ]);
    const { lines, result, steps } = collect(
      { phrase: 'AA', charSet: 'AB', iterations: 2, mutationRate: 100 },
      random
    );

    expect(lines).toEqual(['Start: BB', 'Gen 0: AB', 'Gen 1: AA']);
    expect(result.lineage).toEqual(steps.map((step) => step.best.id));
    expect(result.champion.parentId).toBe(steps[1].best.id);
    expect(result.champion.generation).toBe(1);
    expect(steps[0].best.parentId).toBeNull();
    expect(result.initialScore).toBe(0);
  });

  it('still runs one generation when the start string already matches', () => {
    const { lines } = collect({ phrase: 'A', charSet: 'A', iterations: 1, mutationRate: 1 });
    expect(lines).toEqual(['Start: A', 'Gen 0: A']);
  });

  it('converges with a single low-rate mutation per generation', () => {
    const { lines } = collect({
      phrase: 'AB',
      charSet: 'AB',
      iterations: 1,
      mutationRate: 1,
      seed: 'slow',
    });
    expect(lines[lines.length - 1]).toMatch(/^Gen \d+: AB$/);
  });

  it('replays a seeded run exactly', () => {
    const options = { phrase: 'Weasel', iterations: 30, mutationRate: 10, seed: 'test-seed' };
    expect(collect(options).lines).toEqual(collect(options).lines);
  });

  it('fails on an empty character set and marks the run failed', () => {
    const steps: GenerationResult[] = [];
    const orchestrator = new Orchestrator(resolveConfig({ phrase: 'AB', charSet: '' }), {
      onProgress: (step) => steps.push(step),
    });

    expect(() => orchestrator.evolve()).toThrow(EmptyCharsetError);
    expect(orchestrator.getState().status).toBe('failed');
    expect(steps).toEqual([]);
  });

  it('reports diagnostics through the log option', () => {
    const messages: string[] = [];
    const orchestrator = new Orchestrator(
      resolveConfig({ phrase: 'A', charSet: 'A', iterations: 1, mutationRate: 1 }),
      { log: (message) => messages.push(message) }
    );
    orchestrator.evolve();

    expect(messages).toEqual([
      'Evolving 1 characters (iterations=1, mutation rate=1%)',
      'Converged after 1 generations and 1 mutations',
    ]);
  });

  it('uses a progress callback set after construction', () => {
    const lines: string[] = [];
    const orchestrator = new Orchestrator(
      resolveConfig({ phrase: 'A', charSet: 'A', iterations: 1, mutationRate: 1 })
    );
    orchestrator.setProgressCallback((step) => lines.push(formatGeneration(step)));
    orchestrator.evolve();

    expect(lines).toEqual(['Start: A', 'Gen 0: A']);
    expect(orchestrator.getState().status).toBe('converged');
  });

  it('numbers every evolve() call from generation 0', () => {
    const lines: string[] = [];
    const orchestrator = new Orchestrator(
      resolveConfig({ phrase: 'A', charSet: 'A', iterations: 1, mutationRate: 1 }),
      { onProgress: (step) => lines.push(formatGeneration(step)) }
    );

    const first = orchestrator.evolve();
    const second = orchestrator.evolve();

    expect(lines).toEqual(['Start: A', 'Gen 0: A', 'Start: A', 'Gen 0: A']);
    expect(first.generations).toBe(1);
    expect(second.generations).toBe(1);
    expect(second.totalMutations).toBe(1);
    expect(second.lineage).toHaveLength(1);
    expect(second.lineage).not.toContain(first.lineage[0]);
  });
});

describe('formatGeneration', () => {
  it('renders start and generation steps', () => {
    const best = { id: 'test-id', parentId: null, generation: null, text: 'GO', score: 2 };
    expect(formatGeneration({ label: 'Start', generation: null, best, improvement: 0, mutationsTried: 0 })).toBe(
      'Start: GO'
    );
    expect(formatGeneration({ label: 'Gen', generation: 3, best, improvement: 0, mutationsTried: 10 })).toBe(
      'Gen 3: GO'
    );
  });
});

describe('runWeasel', () => {
  it('uses the defaults for options passed as undefined', () => {
    const result = runWeasel({ phrase: 'GO', charSet: 'GO', mutationRate: undefined, seed: 'test-seed' });
    expect(result.champion.text).toBe('GO');
  });

  it('validates before running', () => {
    expect(() => runWeasel({ phrase: 'GO', mutationRate: 0 })).toThrow(ConfigurationError);
  });

  it('returns the champion', () => {
    const result = runWeasel({ phrase: 'GO', charSet: 'GO', iterations: 50, mutationRate: 100 });
    expect(result.champion.text).toBe('GO');
  });
});

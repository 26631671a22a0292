/**
 * Weasel evolution
 *
 * Evolves a random string into a target phrase through per-character
 * mutation and strict-improvement selection.
 */

export { Orchestrator, runWeasel, formatGeneration } from './orchestrator.js';
export type { OrchestratorOptions } from './orchestrator.js';
export { countMatchingChars, scoreCandidate, isMatch } from './evaluator.js';
export { generateRandomString, mutateString } from './mutations/mutator.js';
export { validateConfig, resolveConfig } from './config.js';
export type { ConfigResult, WeaselOptions } from './config.js';
export { createRandomSource, defaultRandom, pickIndex, rollPercent } from './random.js';
export type { RandomSource } from './random.js';
export { toChars, toCharSet, resolveCharSet, charLength, missingChars } from './charset.js';
export { runCli, runMain, parseCliArgs, VERSION } from './cli.js';
export type { CliIO } from './cli.js';
export * from './errors.js';
export * from './types.js';

// Default export for convenience
import { Orchestrator } from './orchestrator.js';
export default Orchestrator;

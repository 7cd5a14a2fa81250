/**
 * Evaluation framework for comparing language models on a fixed test set.
 */

export * from './core';
export { ModelEval, runEvaluationCLI, DEFAULT_OUTPUT_PREFIX } from './model-evals';
export type { ModelEvalOptions, ModelEvalSummary } from './model-evals';

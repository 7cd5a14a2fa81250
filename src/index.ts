/**
 * Norwegian LLM benchmark harness.
 *
 * Sends a curated set of prompts to several models behind a local inference API and stores
 * the responses as a JSON snapshot and a tab-separated table.
 */

export * from './evals';
export * from './exceptions';
export {
  NORWEGIAN_MODELS,
  INTERNATIONAL_MODELS,
  DEFAULT_MODEL_CATALOG,
  ModelCatalogConfig,
  ModelSpecConfig,
  createModelCatalog,
  loadModelCatalog,
} from './config/models';
export type { ModelCatalog } from './config/models';
export { resolveModelSelection, hasConflictingSelection } from './config/selection';
export type { ModelSelectionFlags } from './config/selection';

/**
 * Model catalogs compared by the harness.
 *
 * The built-in catalog pairs Norwegian-tuned models with international baselines of similar
 * size. A JSON file with the same shape can replace it at run time.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError, describeError } from '../exceptions';
import type { ModelSpec } from '../evals/core/types';

/**
 * Configuration schema for one model entry.
 */
export const ModelSpecConfig = z.object({
  displayName: z.string().min(1),
  backendId: z.string().min(1),
});

/**
 * Configuration schema for a catalog file.
 */
export const ModelCatalogConfig = z.object({
  norwegian: z.array(ModelSpecConfig),
  international: z.array(ModelSpecConfig),
});

export interface ModelCatalog {
  readonly norwegian: readonly ModelSpec[];
  readonly international: readonly ModelSpec[];
}

function freezeGroup(models: readonly ModelSpec[]): readonly ModelSpec[] {
  return Object.freeze(models.map((model) => Object.freeze({ ...model })));
}

/**
 * Build an immutable catalog from its two groups.
 */
export function createModelCatalog(
  norwegian: readonly ModelSpec[],
  international: readonly ModelSpec[]
): ModelCatalog {
  return Object.freeze({
    norwegian: freezeGroup(norwegian),
    international: freezeGroup(international),
  });
}

export const NORWEGIAN_MODELS: readonly ModelSpec[] = freezeGroup([
  { displayName: 'NB-Llama-3.2-3B', backendId: 'hf.co/NbAiLab/nb-llama-3.2-3B-Q4_K_M-GGUF:latest' },
]);

export const INTERNATIONAL_MODELS: readonly ModelSpec[] = freezeGroup([
  { displayName: 'Llama-3.2-3B', backendId: 'llama3.2:3b' },
  { displayName: 'Mistral-7B', backendId: 'mistral:7b' },
  { displayName: 'Llama-3.1-8B', backendId: 'llama3.1:8b' },
]);

export const DEFAULT_MODEL_CATALOG: ModelCatalog = createModelCatalog(NORWEGIAN_MODELS, INTERNATIONAL_MODELS);

/**
 * Load a catalog from a JSON file.
 *
 * @param filePath - Path to a JSON document `{ "norwegian": [...], "international": [...] }`
 * @throws {ConfigurationError} If the file cannot be read or does not match the schema
 */
export async function loadModelCatalog(filePath: string): Promise<ModelCatalog> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to load model catalog ${filePath}: ${describeError(error)}`, {
      cause: error,
    });
  }

  const result = ModelCatalogConfig.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid model catalog ${filePath}: ${details.join('; ')}`);
  }

  return createModelCatalog(result.data.norwegian, result.data.international);
}

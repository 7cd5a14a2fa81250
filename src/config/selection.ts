/**
 * Resolution of the models taking part in a run.
 */

import type { ModelSpec } from '../evals/core/types';
import type { ModelCatalog } from './models';

export interface ModelSelectionFlags {
  norwegianOnly: boolean;
  internationalOnly: boolean;
}

/**
 * Resolve the ordered model list for a run.
 *
 * Norwegian-only takes precedence when both flags are set. With neither flag the Norwegian
 * group comes first, followed by the international group.
 */
export function resolveModelSelection(flags: ModelSelectionFlags, catalog: ModelCatalog): ModelSpec[] {
  if (flags.norwegianOnly) {
    return [...catalog.norwegian];
  }
  if (flags.internationalOnly) {
    return [...catalog.international];
  }
  return [...catalog.norwegian, ...catalog.international];
}

/**
 * True when both exclusive flags are set, in which case only the Norwegian group runs.
 */
export function hasConflictingSelection(flags: ModelSelectionFlags): boolean {
  return flags.norwegianOnly && flags.internationalOnly;
}

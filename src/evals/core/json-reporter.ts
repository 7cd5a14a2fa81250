/**
 * JSON snapshot persistence for evaluation runs.
 *
 * The snapshot is rewritten in full after every completed test case. Each write goes to a
 * temporary file that is then renamed over the target, so readers only ever see a complete
 * document.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { DatasetError, OutputError, describeError } from '../../exceptions';
import { parseResponseEntry, renderResponseEntry } from './outcome';
import { EvaluationRun, QueryOutcome, SnapshotWriter } from './types';

/**
 * On-disk shape of one test-case bundle.
 */
export const SnapshotTest = z.object({
  id: z.string(),
  question: z.string(),
  category: z.string(),
  responses: z.record(z.string()),
});

/**
 * On-disk shape of the snapshot document.
 */
export const SnapshotDocument = z.object({
  timestamp: z.string(),
  models: z.array(z.string()),
  tests: z.array(SnapshotTest),
});

export type SnapshotDocument = z.infer<typeof SnapshotDocument>;

/**
 * Convert a run to its serialized form, rendering outcomes as response strings.
 */
export function toSnapshotDocument(run: EvaluationRun): SnapshotDocument {
  return {
    timestamp: run.timestamp,
    models: [...run.models],
    tests: run.tests.map((test) => {
      const responses: Record<string, string> = {};
      for (const [modelName, outcome] of Object.entries(test.responses)) {
        responses[modelName] = renderResponseEntry(outcome);
      }
      return {
        id: test.id,
        question: test.question,
        category: test.category,
        responses,
      };
    }),
  };
}

/**
 * Serialize a run as indented JSON with non-ASCII characters kept literally.
 */
export function formatSnapshot(run: EvaluationRun): string {
  return `${JSON.stringify(toSnapshotDocument(run), null, 2)}\n`;
}

/**
 * Writes the run snapshot to `<prefix>.json`.
 */
export class JsonSnapshotWriter implements SnapshotWriter {
  readonly path: string;

  /**
   * @param outputPrefix - Output path without extension
   */
  constructor(outputPrefix: string) {
    this.path = `${outputPrefix}.json`;
  }

  /**
   * Replace the snapshot with the current state of the run.
   *
   * @throws {OutputError} If the snapshot cannot be written
   */
  async write(run: EvaluationRun): Promise<void> {
    const tempPath = `${this.path}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.path), { recursive: true });
      await fs.writeFile(tempPath, formatSnapshot(run), 'utf-8');
      await fs.rename(tempPath, this.path);
    } catch (error) {
      throw new OutputError(`Failed to write snapshot ${this.path}: ${describeError(error)}`, this.path, {
        cause: error,
      });
    }
  }
}

/**
 * Read a snapshot back, classifying each stored response.
 *
 * @throws {DatasetError} If the file cannot be read or is not a snapshot document
 */
export async function loadSnapshot(snapshotPath: string): Promise<EvaluationRun> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(snapshotPath, 'utf-8'));
  } catch (error) {
    throw new DatasetError(`Failed to read snapshot ${snapshotPath}: ${describeError(error)}`, { cause: error });
  }

  const document = SnapshotDocument.safeParse(parsed);
  if (!document.success) {
    throw new DatasetError(`Invalid snapshot ${snapshotPath}: ${document.error.issues[0]?.message ?? 'unknown'}`);
  }

  return {
    timestamp: document.data.timestamp,
    models: document.data.models,
    tests: document.data.tests.map((test) => {
      const responses: Record<string, QueryOutcome> = {};
      for (const [modelName, entry] of Object.entries(test.responses)) {
        responses[modelName] = parseResponseEntry(entry);
      }
      return { id: test.id, question: test.question, category: test.category, responses };
    }),
  };
}

/**
 * Tab-separated export of evaluation runs for spreadsheet import.
 *
 * Model responses routinely contain commas and line breaks, so the table uses tabs as the
 * column separator and flattens tabs and line breaks inside cells to spaces.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { OutputError, describeError } from '../../exceptions';
import { renderResponseEntry } from './outcome';
import { EvaluationRun, ResultsReporter } from './types';

/** Maximum code points kept from each response cell. */
export const MAX_RESPONSE_CELL_LENGTH = 500;

const FIXED_COLUMNS = ['ID', 'Category', 'Question'];

/**
 * Replace every tab and line-break character with a single space.
 */
export function sanitizeCell(value: string): string {
  return value.replace(/[\t\r\n]/g, ' ');
}

/**
 * Keep the first `limit` code points, never splitting a surrogate pair.
 */
export function truncateCell(value: string, limit: number = MAX_RESPONSE_CELL_LENGTH): string {
  return Array.from(value).slice(0, limit).join('');
}

/**
 * Render a run as tab-separated rows, header first.
 */
export function formatTsv(run: EvaluationRun): string {
  const rows: string[][] = [[...FIXED_COLUMNS, ...run.models]];

  for (const test of run.tests) {
    const row = [sanitizeCell(test.id), sanitizeCell(test.category), sanitizeCell(test.question)];
    for (const modelName of run.models) {
      const outcome = test.responses[modelName];
      const entry = outcome === undefined ? '' : renderResponseEntry(outcome);
      row.push(truncateCell(sanitizeCell(entry)));
    }
    rows.push(row);
  }

  return rows.map((row) => `${row.join('\t')}\n`).join('');
}

/**
 * Writes the run table to `<prefix>.csv`.
 */
export class TsvResultsReporter implements ResultsReporter {
  readonly path: string;

  /**
   * @param outputPrefix - Output path without extension
   */
  constructor(outputPrefix: string) {
    this.path = `${outputPrefix}.csv`;
  }

  /**
   * @throws {OutputError} If the table cannot be written
   */
  async save(run: EvaluationRun): Promise<string> {
    try {
      await fs.mkdir(path.dirname(this.path), { recursive: true });
      await fs.writeFile(this.path, formatTsv(run), 'utf-8');
    } catch (error) {
      throw new OutputError(`Failed to write table ${this.path}: ${describeError(error)}`, this.path, {
        cause: error,
      });
    }
    return this.path;
  }
}

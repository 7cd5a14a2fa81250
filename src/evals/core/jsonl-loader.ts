/**
 * JSONL test-case loader for model evaluation.
 *
 * Reads one JSON record per non-blank line and normalizes it to a {@link TestCase}. Any
 * malformed line aborts the load; nothing is skipped except blank lines.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import { DatasetError, describeError } from '../../exceptions';
import { TestCase, TestCaseLoader } from './types';

export const DEFAULT_TEST_ID = 'unknown';
export const DEFAULT_CATEGORY = 'general';

/**
 * Schema for a raw record as it appears in the file.
 *
 * `q` is accepted as a short alias of `question`. A null field counts as absent.
 */
export const RawTestCase = z.object({
  id: z.union([z.string(), z.number()]).nullish(),
  question: z.string().nullish(),
  q: z.string().nullish(),
  category: z.string().nullish(),
});

export type RawTestCase = z.infer<typeof RawTestCase>;

/**
 * Normalize a raw record to the standard TestCase format.
 *
 * @throws {Error} If neither `question` nor `q` holds a non-empty string
 */
export function normalizeTestCase(raw: RawTestCase): TestCase {
  const question = raw.question || raw.q;
  if (!question) {
    throw new Error('Missing question or q field');
  }

  return {
    id: raw.id === undefined || raw.id === null ? DEFAULT_TEST_ID : String(raw.id),
    question,
    category: raw.category ?? DEFAULT_CATEGORY,
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Loads test cases from JSONL files.
 */
export class JsonlTestCaseLoader implements TestCaseLoader {
  /**
   * Load test cases from a JSONL file.
   *
   * @param path - Path to the JSONL file
   * @returns Test cases in file order
   *
   * @throws {DatasetError} If the file cannot be read
   * @throws {DatasetError} If any non-blank line is not a valid test-case record
   */
  async load(path: string): Promise<TestCase[]> {
    let content: string;
    try {
      content = await fs.readFile(path, 'utf-8');
    } catch (error) {
      throw new DatasetError(`Dataset file not found or unreadable: ${path} (${describeError(error)})`, {
        cause: error,
      });
    }

    const testCases: TestCase[] = [];
    const lines = content.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (!line) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        throw new DatasetError(`Invalid JSON in dataset at line ${i + 1}: ${describeError(error)}`, {
          cause: error,
        });
      }

      const record = RawTestCase.safeParse(parsed);
      if (!record.success) {
        throw new DatasetError(`Invalid test case at line ${i + 1}: ${formatIssues(record.error)}`);
      }

      try {
        testCases.push(normalizeTestCase(record.data));
      } catch (error) {
        throw new DatasetError(`Invalid test case at line ${i + 1}: ${describeError(error)}`);
      }
    }

    console.info(`Loaded ${testCases.length} test cases from ${path}`);
    return testCases;
  }
}

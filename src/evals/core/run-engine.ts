/**
 * Sequential run engine for model evaluation.
 *
 * Queries every model with every test case, one request at a time, and rewrites the snapshot
 * after each test case completes.
 */

import { describeOutcome } from './outcome';
import {
  EvaluationRun,
  InferenceClient,
  ModelSpec,
  RunProgressEvent,
  SnapshotWriter,
  TestCase,
  TestCaseResult,
} from './types';

export type ProgressListener = (event: RunProgressEvent) => void;

/**
 * Default progress listener printing one line per completed query.
 */
export function logProgress(event: RunProgressEvent): void {
  if (event.type === 'query_complete') {
    console.log(
      `[${event.current}/${event.total}] ${event.testId}: ${event.modelName}... ${describeOutcome(event.outcome)}`
    );
  }
}

/**
 * Runs model evaluations sequentially.
 */
export class SequentialRunEngine {
  private readonly client: InferenceClient;
  private readonly snapshotWriter: SnapshotWriter;
  private readonly onProgress: ProgressListener;
  private readonly now: () => Date;

  /**
   * @param client - Client used for every query
   * @param snapshotWriter - Writer receiving the run after each completed test case
   * @param onProgress - Listener for progress events
   * @param now - Clock used for the run timestamp
   */
  constructor(
    client: InferenceClient,
    snapshotWriter: SnapshotWriter,
    onProgress: ProgressListener = logProgress,
    now: () => Date = () => new Date()
  ) {
    this.client = client;
    this.snapshotWriter = snapshotWriter;
    this.onProgress = onProgress;
    this.now = now;
  }

  /**
   * Run every test case against every model.
   *
   * @param testCases - Test cases in query order
   * @param models - Models in query order
   * @returns The completed run
   *
   * @throws {OutputError} If a snapshot cannot be written
   */
  async run(testCases: readonly TestCase[], models: readonly ModelSpec[]): Promise<EvaluationRun> {
    const run: EvaluationRun = {
      timestamp: this.now().toISOString(),
      models: models.map((model) => model.displayName),
      tests: [],
    };

    const total = testCases.length * models.length;
    let current = 0;

    for (const testCase of testCases) {
      const result: TestCaseResult = {
        id: testCase.id,
        question: testCase.question,
        category: testCase.category,
        responses: {},
      };

      for (const model of models) {
        current += 1;
        const outcome = await this.client.query(model.backendId, testCase.question);
        result.responses[model.displayName] = outcome;
        this.onProgress({
          type: 'query_complete',
          current,
          total,
          testId: testCase.id,
          modelName: model.displayName,
          outcome,
        });
      }

      // Only completed bundles enter the run, so every snapshot holds whole test cases.
      run.tests.push(result);
      await this.snapshotWriter.write(run);
      this.onProgress({
        type: 'test_complete',
        completedTests: run.tests.length,
        totalTests: testCases.length,
        testId: testCase.id,
      });
    }

    if (testCases.length === 0) {
      await this.snapshotWriter.write(run);
    }

    return run;
  }
}

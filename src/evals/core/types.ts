/**
 * Core types and protocols for model evaluation runs.
 *
 * This module defines the data models shared by the loader, inference client, run engine and
 * reporters, together with the interfaces each of those components implements.
 */

/**
 * A single evaluation prompt with its metadata.
 */
export interface TestCase {
  /** Identifier of the test case, `"unknown"` when the record carries none. */
  readonly id: string;
  /** Prompt sent to every model. */
  readonly question: string;
  /** Free-form grouping label, `"general"` when the record carries none. */
  readonly category: string;
}

/**
 * A named reference to one model served by the inference backend.
 */
export interface ModelSpec {
  /** Name used as the column and response key in every artifact. */
  readonly displayName: string;
  /** Model identifier understood by the inference backend. */
  readonly backendId: string;
}

/**
 * Result of querying one model with one prompt.
 */
export type QueryOutcome =
  | { kind: 'success'; text: string }
  | { kind: 'no_response' }
  | { kind: 'timeout' }
  | { kind: 'error'; message: string };

/**
 * Responses of every model for one test case.
 */
export interface TestCaseResult extends TestCase {
  /** Mapping of model display names to their outcome. */
  responses: Record<string, QueryOutcome>;
}

/**
 * The full result set of one invocation.
 */
export interface EvaluationRun {
  /** ISO-8601 time the run started. */
  timestamp: string;
  /** Display names of the participating models, in query order. */
  models: string[];
  /** Completed test-case bundles, in file order. */
  tests: TestCaseResult[];
}

/**
 * Progress notification emitted by the run engine.
 */
export type RunProgressEvent =
  | {
      type: 'query_complete';
      current: number;
      total: number;
      testId: string;
      modelName: string;
      outcome: QueryOutcome;
    }
  | {
      type: 'test_complete';
      completedTests: number;
      totalTests: number;
      testId: string;
    };

/**
 * Protocol for loading test cases.
 */
export interface TestCaseLoader {
  /**
   * Load test cases from path, preserving file order.
   */
  load(path: string): Promise<TestCase[]>;
}

/**
 * Protocol for querying a model.
 *
 * Implementations never reject: every failure is reported as a {@link QueryOutcome}.
 */
export interface InferenceClient {
  query(backendId: string, prompt: string): Promise<QueryOutcome>;
}

/**
 * Protocol for persisting the in-progress run after each completed test case.
 */
export interface SnapshotWriter {
  /** Path of the snapshot document. */
  readonly path: string;
  write(run: EvaluationRun): Promise<void>;
}

/**
 * Protocol for exporting a finished run.
 */
export interface ResultsReporter {
  /**
   * Save the run and return the path written.
   */
  save(run: EvaluationRun): Promise<string>;
}

/**
 * Model evaluation runner.
 *
 * Wires the test-case loader, inference client, run engine and reporters into one run and
 * prints the run banner and summary.
 */

import { JsonlTestCaseLoader } from './core/jsonl-loader';
import { InferenceSettingsInput, OllamaInferenceClient, normalizeBaseUrl } from './core/inference-client';
import { JsonSnapshotWriter } from './core/json-reporter';
import { ProgressListener, SequentialRunEngine, logProgress } from './core/run-engine';
import { TsvResultsReporter } from './core/tsv-reporter';
import { EvaluationRun, InferenceClient, ModelSpec, TestCaseLoader } from './core/types';
import { DEFAULT_MODEL_CATALOG, ModelCatalog, loadModelCatalog } from '../config/models';
import { hasConflictingSelection, resolveModelSelection } from '../config/selection';

export const DEFAULT_OUTPUT_PREFIX = 'eval_results';

const RULE = '='.repeat(60);

/**
 * Options for a single evaluation run.
 */
export interface ModelEvalOptions {
  /** Path to the JSONL test-case file. */
  testsPath: string;
  /** Models to query, in order. */
  models: readonly ModelSpec[];
  /** Output path without extension. */
  outputPrefix?: string;
  /** Client used for every query; an Ollama client built from `inference` when omitted. */
  client?: InferenceClient;
  /** Settings for the default client. */
  inference?: InferenceSettingsInput;
  /** Loader for the test-case file. */
  loader?: TestCaseLoader;
  /** Listener for progress events. */
  onProgress?: ProgressListener;
}

/**
 * Summary of a finished run.
 */
export interface ModelEvalSummary {
  run: EvaluationRun;
  snapshotPath: string;
  tablePath: string;
  totalQueries: number;
}

/**
 * Class for running model evaluations.
 */
export class ModelEval {
  private readonly testsPath: string;
  private readonly models: readonly ModelSpec[];
  private readonly outputPrefix: string;
  private readonly client: InferenceClient;
  private readonly loader: TestCaseLoader;
  private readonly onProgress: ProgressListener;

  constructor(options: ModelEvalOptions) {
    this.testsPath = options.testsPath;
    this.models = options.models;
    this.outputPrefix = options.outputPrefix ?? DEFAULT_OUTPUT_PREFIX;
    this.client = options.client ?? new OllamaInferenceClient(options.inference);
    this.loader = options.loader ?? new JsonlTestCaseLoader();
    this.onProgress = options.onProgress ?? logProgress;
  }

  /**
   * Load the test cases, query every model and write both artifacts.
   *
   * @throws {DatasetError} If the test-case file is unreadable or malformed
   * @throws {OutputError} If an artifact cannot be written
   */
  async run(): Promise<ModelEvalSummary> {
    const testCases = await this.loader.load(this.testsPath);
    const modelNames = this.models.map((model) => model.displayName);
    const totalQueries = testCases.length * this.models.length;

    console.log(RULE);
    console.log('Norwegian LLM Evaluation');
    console.log(RULE);
    console.log(`Tests: ${testCases.length}`);
    console.log(`Models: ${modelNames.join(', ')}`);
    console.log(`Total queries: ${totalQueries}`);
    console.log(RULE);
    console.info(
      `event="evaluation_start" tests=${testCases.length} models="${modelNames.join(', ')}" output="${this.outputPrefix}"`
    );

    const snapshotWriter = new JsonSnapshotWriter(this.outputPrefix);
    const engine = new SequentialRunEngine(this.client, snapshotWriter, this.onProgress);
    const run = await engine.run(testCases, this.models);

    const tableReporter = new TsvResultsReporter(this.outputPrefix);
    const tablePath = await tableReporter.save(run);

    console.log(RULE);
    console.log(`Results saved to ${snapshotWriter.path}`);
    console.log(`Table saved to ${tablePath} (tab-separated)`);
    console.log(`Tested ${testCases.length} questions x ${this.models.length} models = ${totalQueries} responses`);
    console.log(RULE);
    console.info(`event="evaluation_complete" queries=${totalQueries} snapshot="${snapshotWriter.path}"`);

    return { run, snapshotPath: snapshotWriter.path, tablePath, totalQueries };
  }
}

/**
 * CLI entry point for running evaluations.
 *
 * @param args - Command line arguments
 */
export async function runEvaluationCLI(args: {
  testsPath: string;
  outputPrefix?: string;
  norwegianOnly?: boolean;
  internationalOnly?: boolean;
  modelsConfigPath?: string | null;
  baseUrl?: string | null;
  timeoutSeconds?: number | null;
}): Promise<ModelEvalSummary> {
  const catalog: ModelCatalog = args.modelsConfigPath
    ? await loadModelCatalog(args.modelsConfigPath)
    : DEFAULT_MODEL_CATALOG;

  const flags = {
    norwegianOnly: Boolean(args.norwegianOnly),
    internationalOnly: Boolean(args.internationalOnly),
  };
  if (hasConflictingSelection(flags)) {
    console.warn('Warning: both --norwegian-only and --international-only given; running Norwegian models only.');
  }

  const inference: InferenceSettingsInput = {};
  const baseUrl = args.baseUrl || process.env.OLLAMA_HOST;
  if (baseUrl) {
    inference.baseUrl = normalizeBaseUrl(baseUrl);
  }
  if (args.timeoutSeconds) {
    inference.timeoutMs = args.timeoutSeconds * 1000;
  }

  const evaluator = new ModelEval({
    testsPath: args.testsPath,
    models: resolveModelSelection(flags, catalog),
    outputPrefix: args.outputPrefix || DEFAULT_OUTPUT_PREFIX,
    inference,
  });

  return evaluator.run();
}

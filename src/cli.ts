#!/usr/bin/env node

/**
 * Command-line entry point for the Norwegian LLM benchmark.
 *
 * Usage:
 *   norsk-llm-bench --tests <tests.jsonl> [--output <prefix>] [--norwegian-only | --international-only]
 *   norsk-llm-bench --help
 */

import { runEvaluationCLI, DEFAULT_OUTPUT_PREFIX } from './evals/model-evals';

/**
 * Command line arguments interface.
 */
export interface CliArgs {
  tests?: string;
  output?: string;
  norwegianOnly: boolean;
  internationalOnly: boolean;
  modelsConfig?: string;
  baseUrl?: string;
  timeoutSeconds?: number;
  help: boolean;
}

/**
 * Raised for malformed command lines.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('-')) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

/**
 * Parse command line arguments.
 *
 * @param argv - Command line arguments, including the node and script entries.
 * @returns Parsed arguments.
 * @throws {UsageError} On unknown flags, missing values or a non-positive timeout.
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { norwegianOnly: false, internationalOnly: false, help: false };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--tests' || arg === '-t') {
      args.tests = requireValue(argv, ++i, arg);
    } else if (arg === '--output' || arg === '-o') {
      args.output = requireValue(argv, ++i, arg);
    } else if (arg === '--norwegian-only') {
      args.norwegianOnly = true;
    } else if (arg === '--international-only') {
      args.internationalOnly = true;
    } else if (arg === '--models-config') {
      args.modelsConfig = requireValue(argv, ++i, arg);
    } else if (arg === '--base-url') {
      args.baseUrl = requireValue(argv, ++i, arg);
    } else if (arg === '--timeout') {
      const raw = requireValue(argv, ++i, arg);
      const value = Number(raw);
      if (!Number.isInteger(value) || value <= 0) {
        throw new UsageError(`--timeout must be a positive integer number of seconds, got: ${raw}`);
      }
      args.timeoutSeconds = value;
    } else {
      throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  return args;
}

/**
 * Display help information.
 */
function showHelp(): void {
  console.log('Norwegian LLM Evaluation');
  console.log('');
  console.log('Usage: norsk-llm-bench --tests <path> [options]');
  console.log('');
  console.log('Options:');
  console.log('  --tests, -t <path>         JSONL file of test questions (required)');
  console.log(`  --output, -o <prefix>      Output file prefix (default: ${DEFAULT_OUTPUT_PREFIX})`);
  console.log('  --norwegian-only           Only test Norwegian models');
  console.log('  --international-only       Only test international models');
  console.log('  --models-config <path>     JSON model catalog replacing the built-in one');
  console.log('  --base-url <url>           Inference server URL (default: $OLLAMA_HOST or http://localhost:11434)');
  console.log('  --timeout <seconds>        Per-query timeout (default: 300)');
  console.log('  --help, -h                 Show this help message');
  console.log('');
  console.log('Outputs:');
  console.log('  <prefix>.json              Full results, rewritten after every question');
  console.log('  <prefix>.csv               Tab-separated table for spreadsheet import');
  console.log('');
  console.log('Examples:');
  console.log('  norsk-llm-bench --tests data/example_tests.jsonl');
  console.log('  norsk-llm-bench -t tests.jsonl -o results/run1 --international-only');
}

/**
 * Handle an evaluation run.
 *
 * @param args - Parsed command line arguments.
 */
async function handleRunCommand(args: CliArgs): Promise<void> {
  if (!args.tests) {
    console.error('Error: --tests is required');
    console.error('');
    console.error('Usage: norsk-llm-bench --tests <path> [--output <prefix>] [--norwegian-only] [--international-only]');
    process.exit(2);
    return;
  }

  try {
    await runEvaluationCLI({
      testsPath: args.tests,
      outputPrefix: args.output || DEFAULT_OUTPUT_PREFIX,
      norwegianOnly: args.norwegianOnly,
      internationalOnly: args.internationalOnly,
      modelsConfigPath: args.modelsConfig || null,
      baseUrl: args.baseUrl || null,
      timeoutSeconds: args.timeoutSeconds || null,
    });
  } catch (error) {
    console.error('Evaluation failed:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

/**
 * Main entry point for the CLI.
 *
 * @param argv - Optional list of arguments for testing or programmatic use.
 */
export function main(argv: string[] = process.argv): void {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    console.error(`ERROR: ${error instanceof Error ? error.message : error}`);
    console.error('Use --help for usage information');
    process.exit(2);
    return;
  }

  if (args.help) {
    showHelp();
    process.exit(0);
    return;
  }

  handleRunCommand(args).catch((error) => {
    console.error('Unexpected error during evaluation:', error);
    process.exit(1);
  });
}

// Run CLI if this file is executed directly
if (require.main === module) {
  main();
}

/**
 * Core evaluation components.
 *
 * This module exports the core evaluation framework components including
 * types, the loader, the inference client, the run engine and the reporters.
 */

export * from './types';
export * from './outcome';
export * from './jsonl-loader';
export * from './inference-client';
export * from './run-engine';
export * from './json-reporter';
export * from './tsv-reporter';

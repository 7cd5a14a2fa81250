import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { SequentialRunEngine, logProgress } from '../../../evals/core/run-engine';
import { JsonSnapshotWriter } from '../../../evals/core/json-reporter';
import type {
  EvaluationRun,
  InferenceClient,
  ModelSpec,
  QueryOutcome,
  RunProgressEvent,
  SnapshotWriter,
  TestCase,
} from '../../../evals/core/types';

const FIXED_NOW = new Date('2026-01-15T10:00:00.000Z');

const testCases: TestCase[] = [
  { id: 't1', question: 'Hva er hovedstaden i Norge?', category: 'geo' },
  { id: 't2', question: 'Hvem skrev Peer Gynt?', category: 'litteratur' },
  { id: 't3', question: 'Hva er 7 x 8?', category: 'matte' },
];

const models: ModelSpec[] = [
  { displayName: 'A', backendId: 'a-id' },
  { displayName: 'B', backendId: 'b-id' },
];

/**
 * Snapshot writer keeping a deep copy of every write.
 */
class RecordingSnapshotWriter implements SnapshotWriter {
  readonly path = 'memory.json';
  readonly writes: EvaluationRun[] = [];

  async write(run: EvaluationRun): Promise<void> {
    this.writes.push(structuredClone(run));
  }
}

const answeringClient = (answer: (backendId: string, prompt: string) => QueryOutcome): InferenceClient => ({
  query: vi.fn(async (backendId: string, prompt: string) => answer(backendId, prompt)),
});

describe('SequentialRunEngine', () => {
  const events: RunProgressEvent[] = [];
  const onProgress = (event: RunProgressEvent) => {
    events.push(event);
  };

  beforeEach(() => {
    events.length = 0;
  });

  it('queries every model for every test case in order', async () => {
    const calls: string[] = [];
    const client = answeringClient((backendId, prompt) => {
      calls.push(`${backendId}|${prompt}`);
      return { kind: 'success', text: `${backendId} svarer` };
    });
    const writer = new RecordingSnapshotWriter();

    const run = await new SequentialRunEngine(client, writer, onProgress, () => FIXED_NOW).run(testCases, models);

    expect(calls).toEqual([
      'a-id|Hva er hovedstaden i Norge?',
      'b-id|Hva er hovedstaden i Norge?',
      'a-id|Hvem skrev Peer Gynt?',
      'b-id|Hvem skrev Peer Gynt?',
      'a-id|Hva er 7 x 8?',
      'b-id|Hva er 7 x 8?',
    ]);
    expect(run.timestamp).toBe('2026-01-15T10:00:00.000Z');
    expect(run.models).toEqual(['A', 'B']);
    expect(run.tests.map((t) => t.id)).toEqual(['t1', 't2', 't3']);
    expect(run.tests[0].responses).toEqual({
      A: { kind: 'success', text: 'a-id svarer' },
      B: { kind: 'success', text: 'b-id svarer' },
    });
  });

  it('writes a snapshot after each test case holding only completed bundles', async () => {
    const client = answeringClient(() => ({ kind: 'success', text: 'ok' }));
    const writer = new RecordingSnapshotWriter();

    await new SequentialRunEngine(client, writer, onProgress, () => FIXED_NOW).run(testCases, models);

    expect(writer.writes).toHaveLength(3);
    writer.writes.forEach((snapshot, index) => {
      expect(snapshot.tests).toHaveLength(index + 1);
      for (const bundle of snapshot.tests) {
        expect(Object.keys(bundle.responses)).toEqual(['A', 'B']);
      }
    });
  });

  it('records failure outcomes without stopping the run', async () => {
    const client = answeringClient((backendId) =>
      backendId === 'b-id' ? { kind: 'error', message: 'refused' } : { kind: 'timeout' }
    );
    const writer = new RecordingSnapshotWriter();

    const run = await new SequentialRunEngine(client, writer, onProgress, () => FIXED_NOW).run(testCases, models);

    expect(run.tests).toHaveLength(3);
    expect(run.tests[2].responses).toEqual({
      A: { kind: 'timeout' },
      B: { kind: 'error', message: 'refused' },
    });
  });

  it('emits progress for every query and every completed test case', async () => {
    const client = answeringClient(() => ({ kind: 'success', text: 'ok' }));

    await new SequentialRunEngine(client, new RecordingSnapshotWriter(), onProgress, () => FIXED_NOW).run(
      testCases.slice(0, 1),
      models
    );

    expect(events).toEqual([
      {
        type: 'query_complete',
        current: 1,
        total: 2,
        testId: 't1',
        modelName: 'A',
        outcome: { kind: 'success', text: 'ok' },
      },
      {
        type: 'query_complete',
        current: 2,
        total: 2,
        testId: 't1',
        modelName: 'B',
        outcome: { kind: 'success', text: 'ok' },
      },
      { type: 'test_complete', completedTests: 1, totalTests: 1, testId: 't1' },
    ]);
  });

  it('writes an empty snapshot when there are no test cases', async () => {
    const client = answeringClient(() => ({ kind: 'success', text: 'ok' }));
    const writer = new RecordingSnapshotWriter();

    const run = await new SequentialRunEngine(client, writer, onProgress, () => FIXED_NOW).run([], models);

    expect(run.tests).toEqual([]);
    expect(writer.writes).toEqual([{ timestamp: '2026-01-15T10:00:00.000Z', models: ['A', 'B'], tests: [] }]);
    expect(client.query).not.toHaveBeenCalled();
  });

  it('produces bundles with empty responses when there are no models', async () => {
    const client = answeringClient(() => ({ kind: 'success', text: 'ok' }));
    const writer = new RecordingSnapshotWriter();

    const run = await new SequentialRunEngine(client, writer, onProgress, () => FIXED_NOW).run(testCases, []);

    expect(run.models).toEqual([]);
    expect(run.tests.map((t) => t.responses)).toEqual([{}, {}, {}]);
    expect(client.query).not.toHaveBeenCalled();
  });

  it('propagates snapshot write failures', async () => {
    const client = answeringClient(() => ({ kind: 'success', text: 'ok' }));
    const writer: SnapshotWriter = {
      path: 'broken.json',
      write: vi.fn(async () => {
        throw new Error('disk full');
      }),
    };

    await expect(
      new SequentialRunEngine(client, writer, onProgress, () => FIXED_NOW).run(testCases, models)
    ).rejects.toThrow('disk full');
    expect(writer.write).toHaveBeenCalledTimes(1);
  });
});

describe('SequentialRunEngine with the JSON snapshot writer', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'bench-engine-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('leaves exactly the completed test cases on disk when the run dies mid-test', async () => {
    const client: InferenceClient = {
      query: vi.fn(async (backendId: string, prompt: string): Promise<QueryOutcome> => {
        if (prompt === 'Hva er 7 x 8?' && backendId === 'b-id') {
          throw new Error('process killed');
        }
        return { kind: 'success', text: `${backendId}: ${prompt}` };
      }),
    };
    const writer = new JsonSnapshotWriter(path.join(dir, 'eval_results'));

    await expect(
      new SequentialRunEngine(client, writer, () => {}, () => FIXED_NOW).run(testCases, models)
    ).rejects.toThrow('process killed');

    const snapshot = JSON.parse(await fs.readFile(writer.path, 'utf-8'));
    expect(snapshot.tests).toHaveLength(2);
    expect(snapshot.tests.map((t: { id: string }) => t.id)).toEqual(['t1', 't2']);
    for (const bundle of snapshot.tests) {
      expect(Object.keys(bundle.responses)).toEqual(['A', 'B']);
    }
  });
});

describe('logProgress', () => {
  it('prints one line per completed query', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    logProgress({
      type: 'query_complete',
      current: 3,
      total: 8,
      testId: 't2',
      modelName: 'Mistral-7B',
      outcome: { kind: 'timeout' },
    });
    logProgress({ type: 'test_complete', completedTests: 2, totalTests: 4, testId: 't2' });

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith('[3/8] t2: Mistral-7B... timeout');
    logSpy.mockRestore();
  });
});

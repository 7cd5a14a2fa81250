/**
 * Inference client for a local Ollama-compatible generate endpoint.
 *
 * The request goes through the OpenAI SDK's transport with retries disabled, so each query is a
 * single attempt bounded by the configured timeout. Every failure is returned as a
 * {@link QueryOutcome}; `query` never rejects.
 *
 * An error status with a JSON body is read like any other reply, so a body without a
 * `response` field is a missing response. Only unreadable replies and failed connections are
 * recorded as errors.
 */

import { OpenAI, APIConnectionTimeoutError, APIError } from 'openai';
import { z } from 'zod';
import { ConfigurationError, describeError } from '../../exceptions';
import { InferenceClient, QueryOutcome } from './types';

export const DEFAULT_BASE_URL = 'http://localhost:11434';
export const GENERATE_PATH = '/api/generate';

/**
 * Settings governing every generate request.
 */
export const InferenceSettings = z.object({
  /** Base URL of the inference server, without the API path. */
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  /** Hard cap on generated tokens, guarding against runaway generation. */
  numPredict: z.number().int().positive().default(250),
  /** Sampling temperature. */
  temperature: z.number().min(0).default(0.7),
  /** Per-request timeout in milliseconds. */
  timeoutMs: z.number().int().positive().default(300_000),
});

export type InferenceSettings = z.infer<typeof InferenceSettings>;
export type InferenceSettingsInput = z.input<typeof InferenceSettings>;

/**
 * Validate settings, filling defaults.
 *
 * @throws {ConfigurationError} If any setting is out of range
 */
export function resolveInferenceSettings(input: InferenceSettingsInput = {}): InferenceSettings {
  const result = InferenceSettings.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid inference settings: ${details.join('; ')}`);
  }
  return result.data;
}

/**
 * Accept `host:port` as well as a full URL, as the `OLLAMA_HOST` convention allows.
 */
export function normalizeBaseUrl(value: string): string {
  const trimmed = value.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

/**
 * Body of a non-streaming generate request.
 */
export interface GenerateRequest {
  model: string;
  prompt: string;
  stream: false;
  options: {
    num_predict: number;
    temperature: number;
  };
}

const GenerateResponse = z.object({
  response: z.string().optional().catch(undefined),
});

/**
 * The part of the OpenAI client this module relies on.
 */
export type GenerateTransport = Pick<OpenAI, 'post'>;

/**
 * Queries models through the local generate endpoint.
 */
export class OllamaInferenceClient implements InferenceClient {
  private readonly settings: InferenceSettings;
  private readonly transport: GenerateTransport;

  /**
   * @param settings - Request settings; defaults apply to omitted fields
   * @param transport - Client used to send requests, built from `settings.baseUrl` when omitted
   */
  constructor(settings: InferenceSettingsInput = {}, transport?: GenerateTransport) {
    this.settings = resolveInferenceSettings(settings);
    this.transport =
      transport ??
      new OpenAI({
        // The local server ignores credentials, but the SDK requires a key.
        apiKey: 'ollama',
        baseURL: this.settings.baseUrl,
        maxRetries: 0,
        timeout: this.settings.timeoutMs,
      });
  }

  /**
   * Build the request body for one query.
   */
  buildRequest(backendId: string, prompt: string): GenerateRequest {
    return {
      model: backendId,
      prompt,
      stream: false,
      options: {
        num_predict: this.settings.numPredict,
        temperature: this.settings.temperature,
      },
    };
  }

  async query(backendId: string, prompt: string): Promise<QueryOutcome> {
    try {
      const payload: unknown = await this.transport.post(GENERATE_PATH, {
        body: this.buildRequest(backendId, prompt),
        timeout: this.settings.timeoutMs,
        maxRetries: 0,
      });
      return interpretPayload(payload);
    } catch (error) {
      if (error instanceof APIConnectionTimeoutError) {
        return { kind: 'timeout' };
      }
      if (error instanceof APIError && error.status !== undefined && error.error !== undefined) {
        // The SDK keeps only the `error` member of a JSON error body.
        return interpretPayload({ error: error.error });
      }
      return { kind: 'error', message: describeError(error) };
    }
  }
}

/**
 * Map a decoded response body to an outcome.
 */
export function interpretPayload(payload: unknown): QueryOutcome {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    return { kind: 'error', message: 'Malformed response payload: expected a JSON object' };
  }

  const parsed = GenerateResponse.parse(payload);
  if (parsed.response === undefined) {
    return { kind: 'no_response' };
  }
  return { kind: 'success', text: parsed.response };
}

import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import { performance } from 'node:perf_hooks';
import pino from 'pino';
import { config, type TaskSettings } from '../config';
import type { CompletionModel, CompletionRequest, TaskType } from '../types';
import {
  AuthError,
  BadRequestError,
  ConfigurationError,
  RateLimitExceededError,
  TransientNetworkError,
  describeError
} from './errors';
import { metrics } from './metrics';

const log = pino({ name: 'llm-adapter', level: config.logLevel });

interface TogetherCompletionBody {
  model: string;
  prompt: string;
  max_tokens: number;
  temperature: number;
  top_p: number;
  repetition_penalty: number;
  stop: string[];
}

export interface TogetherModelOptions {
  apiKey: string | undefined;
  baseUrl?: string;
  timeoutMs?: number;
  maxTokens?: number;
  stop?: readonly string[];
  tasks?: Readonly<Record<TaskType, TaskSettings>>;
  adapter?: AxiosAdapter;
}

export function createTogetherClient(
  apiKey: string,
  baseUrl: string,
  timeoutMs: number,
  adapter?: AxiosAdapter
): AxiosInstance {
  return axios.create({
    baseURL: baseUrl,
    timeout: timeoutMs,
    headers: {
      Authorization: `Bearer ${apiKey}`,
      'Content-Type': 'application/json'
    },
    // status codes are classified by the adapter, not thrown by axios
    validateStatus: () => true,
    adapter
  });
}

export class TogetherCompletionModel implements CompletionModel {
  readonly provider = 'together';
  readonly baseUrl: string;
  private readonly client: AxiosInstance;
  private readonly maxTokens: number;
  private readonly stop: string[];
  private readonly tasks: Readonly<Record<TaskType, TaskSettings>>;

  constructor(options: TogetherModelOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError('TOGETHER_API_KEY environment variable is not set');
    }
    this.baseUrl = options.baseUrl ?? config.llm.baseUrl;
    this.maxTokens = options.maxTokens ?? config.llm.maxTokens;
    this.stop = [...(options.stop ?? config.llm.stop)];
    this.tasks = options.tasks ?? config.tasks;
    this.client = createTogetherClient(
      options.apiKey,
      this.baseUrl,
      options.timeoutMs ?? config.llm.timeoutMs,
      options.adapter
    );
  }

  async complete(request: CompletionRequest): Promise<string> {
    const body = this.buildBody(request);
    const start = performance.now();
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.post<unknown>('/completions', body);
    } catch (err) {
      metrics.latencyLlm.observe({ task: request.taskType }, performance.now() - start);
      log.warn({ err: describeError(err), task: request.taskType }, 'together call error');
      throw new TransientNetworkError(`Network error calling completion API: ${describeError(err)}`, undefined, err);
    }
    metrics.latencyLlm.observe({ task: request.taskType }, performance.now() - start);

    if (response.status === 200) {
      return parseCompletionText(response.data);
    }
    throw mapErrorResponse(response);
  }

  private buildBody(request: CompletionRequest): TogetherCompletionBody {
    const settings = this.tasks[request.taskType];
    return {
      model: settings.model,
      prompt: request.prompt,
      max_tokens: this.maxTokens,
      temperature: settings.temperature,
      top_p: settings.topP,
      repetition_penalty: settings.repetitionPenalty,
      stop: this.stop
    };
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

export function parseCompletionText(data: unknown): string {
  const choices = isRecord(data) ? data.choices : undefined;
  const first: unknown = Array.isArray(choices) ? choices[0] : undefined;
  const text = isRecord(first) ? first.text : undefined;
  if (typeof text !== 'string') {
    throw new TransientNetworkError('Completion response did not contain choices[0].text', 200);
  }
  return text.trim();
}

/**
 * Reads Retry-After as delay seconds or an HTTP date. Negative or unreadable
 * values give `fallbackSeconds`; every result is capped at `maxSeconds`.
 */
export function parseRetryAfter(
  raw: unknown,
  fallbackSeconds: number,
  now: number = Date.now(),
  maxSeconds: number = config.rateLimit.maxRetryAfterSeconds
): number {
  const cap = (seconds: number) => Math.min(seconds, maxSeconds);
  if (typeof raw === 'number') {
    return Number.isFinite(raw) && raw >= 0 ? cap(raw) : fallbackSeconds;
  }
  if (typeof raw !== 'string' || !raw.trim()) {
    return fallbackSeconds;
  }
  const seconds = Number(raw.trim());
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? cap(seconds) : fallbackSeconds;
  }
  const date = Date.parse(raw);
  if (!Number.isNaN(date)) {
    return cap(Math.max(0, Math.ceil((date - now) / 1000)));
  }
  return fallbackSeconds;
}

function stringifyBody(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

function mapErrorResponse(response: AxiosResponse<unknown>): Error {
  const body = stringifyBody(response.data);
  switch (response.status) {
    case 429: {
      const retryAfter = parseRetryAfter(response.headers['retry-after'], config.rateLimit.defaultRetryAfterSeconds);
      return new RateLimitExceededError(retryAfter);
    }
    case 401:
      return new AuthError();
    case 400:
      return new BadRequestError(body);
    default:
      return new TransientNetworkError(
        `API request failed with status ${response.status}: ${body}`,
        response.status
      );
  }
}

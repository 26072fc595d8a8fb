import pino from 'pino';
import { config } from '../config';
import { systemClock, type Clock } from '../lib/clock';
import type { RateWindow } from '../state/rate-window';
import type { CompletionModel, CompletionRequest } from '../types';
import {
  CompletionError,
  RateLimitExceededError,
  TransientNetworkError,
  describeError
} from './errors';
import { metrics } from './metrics';
import type { ProgressReporter } from './progress';

const log = pino({ name: 'dispatcher', level: config.logLevel });

export interface DispatcherDeps {
  model: CompletionModel;
  rateWindow: RateWindow;
  clock?: Clock;
  progress?: ProgressReporter;
  maxAttempts?: number;
  backoffBaseMs?: number;
}

/**
 * Sends completion requests through a shared RateWindow. Transient failures
 * are retried with exponential backoff; 429, 401 and 400 are not.
 */
export class Dispatcher {
  private readonly model: CompletionModel;
  private readonly rateWindow: RateWindow;
  private readonly clock: Clock;
  private readonly progress?: ProgressReporter;
  private readonly maxAttempts: number;
  private readonly backoffBaseMs: number;

  constructor(deps: DispatcherDeps) {
    this.model = deps.model;
    this.rateWindow = deps.rateWindow;
    this.clock = deps.clock ?? systemClock;
    this.progress = deps.progress;
    this.maxAttempts = deps.maxAttempts ?? config.rateLimit.maxAttempts;
    this.backoffBaseMs = deps.backoffBaseMs ?? 1000;
  }

  get provider(): string {
    return this.model.provider;
  }

  async dispatch(request: CompletionRequest): Promise<string> {
    for (let attempt = 1; ; attempt += 1) {
      await this.rateWindow.admit();
      this.progress?.report('Making API request...');

      try {
        const text = await this.model.complete(request);
        metrics.dispatchAttempts.inc({ task: request.taskType, outcome: 'success' });
        return text;
      } catch (err) {
        if (err instanceof RateLimitExceededError) {
          metrics.dispatchAttempts.inc({ task: request.taskType, outcome: 'rate_limited' });
          await this.coolDown(err);
          throw err;
        }

        if (err instanceof CompletionError && !(err instanceof TransientNetworkError)) {
          metrics.dispatchAttempts.inc({ task: request.taskType, outcome: err.code.toLowerCase() });
          log.error({ task: request.taskType, code: err.code, status: err.statusCode }, err.message);
          throw err;
        }

        metrics.dispatchAttempts.inc({ task: request.taskType, outcome: 'transient' });
        const failure = err instanceof TransientNetworkError
          ? err
          : new TransientNetworkError(describeError(err), undefined, err);

        if (attempt >= this.maxAttempts) {
          log.error(
            { task: request.taskType, chunk: request.chunkIndex + 1, attempts: attempt, err: failure.message },
            `Failed to make API request after ${attempt} attempts`
          );
          throw failure;
        }

        const waitMs = 2 ** attempt * this.backoffBaseMs;
        log.warn({ task: request.taskType, attempt, waitMs, err: failure.message }, 'completion request failed, retrying');
        this.progress?.report(`Request failed, retrying in ${waitMs / 1000} seconds...`);
        await this.clock.sleep(waitMs);
      }
    }
  }

  private async coolDown(err: RateLimitExceededError): Promise<void> {
    metrics.rateLimitWaits.inc({ reason: 'server' });
    log.warn({ retryAfterSeconds: err.retryAfterSeconds }, 'rate limit exceeded by server');
    this.progress?.report(`Rate limit exceeded. Waiting ${err.retryAfterSeconds} seconds...`);
    this.rateWindow.reset();
    await this.clock.sleep(err.retryAfterSeconds * 1000);
  }
}

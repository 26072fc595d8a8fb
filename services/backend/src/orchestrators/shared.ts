import type { Config } from '../config';
import type { Dispatcher } from '../services/dispatcher';
import { AuthError, describeError } from '../services/errors';
import type { ProgressReporter } from '../services/progress';
import type { CompletionRequest, DebugPayload, TaskType } from '../types';

export interface OrchestratorDeps {
  dispatcher: Dispatcher;
  config: Config;
  progress?: ProgressReporter;
}

export const buildRequest = (
  taskType: TaskType,
  prompt: string,
  chunkIndex: number,
  totalChunks: number
): CompletionRequest => ({ taskType, prompt, chunkIndex, totalChunks });

/** Auth failures end the task: no later request can succeed with the same credential. */
export const rethrowIfFatal = (err: unknown): void => {
  if (err instanceof AuthError) {
    throw err;
  }
};

export const toDebugPayload = (rawOutputs: string[], err?: unknown): DebugPayload => {
  const payload: DebugPayload = { kind: 'debug', rawOutputs };
  if (err !== undefined) {
    payload.error = describeError(err);
  }
  return payload;
};

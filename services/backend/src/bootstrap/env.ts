import { config } from '../config';
import { ConfigurationError } from '../services/errors';
import { FakeCompletionModel } from '../services/llmAdapter.fake';
import { TogetherCompletionModel } from '../services/llmAdapter.together';
import type { CompletionModel } from '../types';

export type ProviderName = 'together' | 'fake';

export interface BackendEnvConfig {
  provider: ProviderName;
  apiKey?: string;
}

type Env = Record<string, string | undefined>;

const requireEnv = (env: Env, name: string): string => {
  const value = env[name];
  if (!value) {
    throw new ConfigurationError(`${name} environment variable is not set`);
  }
  return value;
};

const parseProvider = (value: string | undefined): ProviderName => {
  if (!value || value === 'together') {
    return 'together';
  }
  if (value === 'fake') {
    return 'fake';
  }
  throw new ConfigurationError(`LLM_PROVIDER must be "together" or "fake" (received ${value})`);
};

export const loadBackendEnv = (env: Env = process.env): BackendEnvConfig => {
  const provider = parseProvider(env.LLM_PROVIDER);
  if (provider === 'fake') {
    return { provider };
  }
  return { provider, apiKey: requireEnv(env, 'TOGETHER_API_KEY') };
};

export const createCompletionModel = (envConfig: BackendEnvConfig): CompletionModel => {
  if (envConfig.provider === 'fake') {
    return new FakeCompletionModel();
  }
  return new TogetherCompletionModel({
    apiKey: envConfig.apiKey,
    baseUrl: config.llm.baseUrl,
    timeoutMs: config.llm.timeoutMs,
    maxTokens: config.llm.maxTokens
  });
};

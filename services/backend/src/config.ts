import type { AdaptationLineMode, ReadingLevel, TaskType } from './types';

const DEFAULT_CORS = ['http://localhost:3000'];
const DEFAULT_MODEL = 'meta-llama/Llama-3.3-70B-Instruct-Turbo';

function resolveCorsOrigins(raw?: string | null): string[] {
  if (!raw) return DEFAULT_CORS;
  return raw.split(',').map((s) => s.trim()).filter(Boolean);
}

function resolveLineMode(raw?: string): AdaptationLineMode {
  return raw === 'all-lines' ? 'all-lines' : 'first-line';
}

export interface TaskSettings {
  model: string;
  temperature: number;
  topP: number;
  repetitionPenalty: number;
  chunkSize: number;
}

export interface ReadingLevelSettings {
  complexityThreshold: number;
}

function taskSettings(envPrefix: string, chunkSize: number): TaskSettings {
  return {
    model: process.env[`${envPrefix}_MODEL`] ?? process.env.LLM_MODEL ?? DEFAULT_MODEL,
    temperature: Number(process.env[`${envPrefix}_TEMPERATURE`] ?? 0.7),
    topP: Number(process.env[`${envPrefix}_TOP_P`] ?? 0.9),
    repetitionPenalty: Number(process.env[`${envPrefix}_REPETITION_PENALTY`] ?? 1.1),
    chunkSize
  };
}

const tasks: Record<TaskType, TaskSettings> = {
  summarizer: taskSettings('SUMMARIZER', 2000),
  level_adapter: taskSettings('LEVEL_ADAPTER', 2048),
  flashcard_gen: taskSettings('FLASHCARD_GEN', 2048)
};

const readingLevels: Record<ReadingLevel, ReadingLevelSettings> = {
  Beginner: { complexityThreshold: 0.3 },
  Intermediate: { complexityThreshold: 0.6 },
  Expert: { complexityThreshold: 0.9 }
};

export const config = {
  port: Number(process.env.PORT ?? 8080),
  logLevel: process.env.LOG_LEVEL ?? 'info',
  corsOrigins: resolveCorsOrigins(process.env.CORS_ORIGINS ?? DEFAULT_CORS.join(',')),
  llm: {
    baseUrl: process.env.LLM_BASE_URL ?? 'https://api.together.xyz/v1',
    maxTokens: Number(process.env.LLM_MAX_TOKENS ?? 2048),
    timeoutMs: Number(process.env.LLM_TIMEOUT_MS ?? 60000),
    stop: ['</s>', 'Human:', 'Assistant:']
  },
  rateLimit: {
    requestsPerMinute: Number(process.env.RATE_LIMIT_RPM ?? 60),
    windowMs: 60_000,
    minIntervalMs: Number(process.env.RATE_LIMIT_MIN_INTERVAL_MS ?? 1000),
    defaultRetryAfterSeconds: 60,
    maxRetryAfterSeconds: 300,
    maxAttempts: 3,
    progressThrottleMs: 500
  },
  tasks,
  flashcards: {
    defaultNumCards: 5,
    maxQuestionLength: 150,
    maxAnswerLength: 300,
    maxCardsPerRequest: 3
  },
  readingLevels,
  adaptation: {
    defaultLevel: 'Intermediate',
    lineMode: resolveLineMode(process.env.ADAPTATION_LINE_MODE),
    complexityTolerance: 0.2,
    complexityNormalization: { maxSentenceLength: 35, maxWordLength: 10 }
  }
} as const;

export type Config = typeof config;

import pino from 'pino';
import { config as defaultConfig, type Config } from './config';
import { formatFlashcards } from './extractors/flashcards';
import { systemClock, type Clock } from './lib/clock';
import { FlashcardGenerator } from './orchestrators/flashcard-generator';
import { LevelAdapter } from './orchestrators/level-adapter';
import { Summarizer } from './orchestrators/summarizer';
import { Dispatcher } from './services/dispatcher';
import { AuthError, describeError } from './services/errors';
import { metrics } from './services/metrics';
import { ProgressReporter } from './services/progress';
import { RateWindow } from './state/rate-window';
import type {
  CompletionModel,
  FlashcardOutcome,
  ProgressObserver,
  SummaryOutcome,
  TaskType
} from './types';

const log = pino({ name: 'orchestrator', level: defaultConfig.logLevel });

export interface PipelineDeps {
  model: CompletionModel;
  config?: Config;
  clock?: Clock;
  observer?: ProgressObserver;
}

export interface ProcessTextResult {
  summary: SummaryOutcome | null;
  flashcards: FlashcardOutcome;
  /** The cards as numbered Q/A text; empty when there are none. */
  flashcardsText: string;
  errors: string[];
}

export interface ModelInfo {
  apiProvider: string;
  baseUrl: string;
  availableModels: TaskType[];
  modelConfigs: Config['tasks'];
  rateLimit: string;
}

export interface Pipeline {
  rateWindow: RateWindow;
  dispatcher: Dispatcher;
  progress: ProgressReporter;
  summarizer: Summarizer;
  levelAdapter: LevelAdapter;
  flashcards: FlashcardGenerator;
  processText(text: string): Promise<ProcessTextResult>;
  modelInfo(): ModelInfo;
}

/**
 * Builds every task orchestrator around one RateWindow and Dispatcher so
 * that concurrent tasks draw from the same request quota.
 */
export function createPipeline(deps: PipelineDeps): Pipeline {
  const config = deps.config ?? defaultConfig;
  const clock = deps.clock ?? systemClock;
  const progress = new ProgressReporter(deps.observer, clock, config.rateLimit.progressThrottleMs);

  const rateWindow = new RateWindow({
    quota: config.rateLimit.requestsPerMinute,
    windowMs: config.rateLimit.windowMs,
    minIntervalMs: config.rateLimit.minIntervalMs,
    clock,
    onWait(waitMs, reason) {
      if (reason === 'quota') {
        metrics.rateLimitWaits.inc({ reason });
        log.info({ waitMs }, 'request quota reached, waiting');
        progress.report(`Rate limit reached, waiting ${(waitMs / 1000).toFixed(1)} seconds...`);
      }
    }
  });

  const dispatcher = new Dispatcher({
    model: deps.model,
    rateWindow,
    clock,
    progress,
    maxAttempts: config.rateLimit.maxAttempts
  });

  const orchestratorDeps = { dispatcher, config, progress };
  const summarizer = new Summarizer(orchestratorDeps);
  const levelAdapter = new LevelAdapter(orchestratorDeps);
  const flashcards = new FlashcardGenerator(orchestratorDeps);

  async function processText(text: string): Promise<ProcessTextResult> {
    const errors: string[] = [];
    let summary: SummaryOutcome | null = null;

    progress.announce('Generating summary...', 0.3);
    try {
      summary = await summarizer.summarize(text);
      progress.announce('Summary generated', 0.6);
    } catch (err) {
      if (err instanceof AuthError) throw err;
      log.error({ err: describeError(err) }, 'error generating summary');
      errors.push(`Error generating summary: ${describeError(err)}`);
    }

    let flashcardOutcome: FlashcardOutcome = { kind: 'cards', cards: [] };
    if (summary?.kind === 'summary' && summary.text) {
      progress.announce('Generating flashcards...', 0.9);
      try {
        flashcardOutcome = await flashcards.generate(summary.text);
      } catch (err) {
        if (err instanceof AuthError) throw err;
        log.error({ err: describeError(err) }, 'error generating flashcards');
        errors.push(`Error generating flashcards: ${describeError(err)}`);
      }
    }

    progress.announce('Processing complete!', 1);
    const flashcardsText = flashcardOutcome.kind === 'cards' ? formatFlashcards(flashcardOutcome.cards) : '';
    return { summary, flashcards: flashcardOutcome, flashcardsText, errors };
  }

  function modelInfo(): ModelInfo {
    return {
      apiProvider: dispatcher.provider,
      baseUrl: config.llm.baseUrl,
      availableModels: ['summarizer', 'level_adapter', 'flashcard_gen'],
      modelConfigs: config.tasks,
      rateLimit: `${config.rateLimit.requestsPerMinute} requests per minute`
    };
  }

  return {
    rateWindow,
    dispatcher,
    progress,
    summarizer,
    levelAdapter,
    flashcards,
    processText,
    modelInfo
  };
}

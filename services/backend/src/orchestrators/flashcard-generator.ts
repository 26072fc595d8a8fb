import pino from 'pino';
import { config as defaultConfig } from '../config';
import { extractFlashcards } from '../extractors/flashcards';
import { chunkText } from '../lib/text/chunker';
import { previewText } from '../lib/text/format-output';
import { createFlashcardPrompt } from '../prompts';
import { describeError } from '../services/errors';
import { metrics } from '../services/metrics';
import type { CompletionRequest, Flashcard, FlashcardOutcome } from '../types';
import { buildRequest, rethrowIfFatal, toDebugPayload, type OrchestratorDeps } from './shared';

const log = pino({ name: 'flashcard-gen', level: defaultConfig.logLevel });

interface GenerationRun {
  cards: Flashcard[];
  fingerprints: Set<string>;
  rawOutputs: string[];
  requests: number;
}

export class FlashcardGenerator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async generate(
    text: string,
    numCards: number = this.deps.config.flashcards.defaultNumCards
  ): Promise<FlashcardOutcome> {
    const { config } = this.deps;
    const run: GenerationRun = { cards: [], fingerprints: new Set(), rawOutputs: [], requests: 0 };
    if (numCards <= 0) {
      return { kind: 'cards', cards: [] };
    }

    const chunks = chunkText(text, config.tasks.flashcard_gen.chunkSize);
    for (const chunk of chunks) {
      const remaining = numCards - run.cards.length;
      if (remaining <= 0) {
        break;
      }
      const toRequest = Math.min(remaining, config.flashcards.maxCardsPerRequest);
      log.info({ chunk: chunk.index + 1, total: chunks.length, toRequest }, 'requesting flashcards');
      this.deps.progress?.report(
        `Generating flashcards (part ${chunk.index + 1} of ${chunks.length})...`,
        run.cards.length / numCards
      );

      await this.requestCards(
        run,
        buildRequest('flashcard_gen', createFlashcardPrompt(chunk.text, toRequest), chunk.index, chunks.length),
        remaining
      );
    }

    if (run.cards.length === 0 && text.trim()) {
      log.warn({ chunks: chunks.length }, 'no flashcards generated from chunks, retrying with the whole text');
      await this.requestCards(run, buildRequest('flashcard_gen', createFlashcardPrompt(text, numCards), 0, 1), numCards);
    }

    if (run.cards.length === 0 && run.requests > 0) {
      log.error({ requests: run.requests, completions: run.rawOutputs.length }, 'no parseable flashcards, returning raw outputs');
      return toDebugPayload(
        run.rawOutputs,
        run.rawOutputs.length > 0 ? 'No completion contained a parseable flashcard' : 'Every flashcard request failed'
      );
    }

    metrics.flashcardsGenerated.inc(run.cards.length);
    return { kind: 'cards', cards: run.cards };
  }

  private async requestCards(run: GenerationRun, request: CompletionRequest, limit: number): Promise<void> {
    run.requests += 1;
    let raw: string;
    try {
      raw = await this.deps.dispatcher.dispatch(request);
    } catch (err) {
      rethrowIfFatal(err);
      log.warn({ chunk: request.chunkIndex + 1, err: describeError(err) }, 'flashcard request failed, skipping chunk');
      return;
    }
    run.rawOutputs.push(raw);

    if (!raw) {
      log.warn({ chunk: request.chunkIndex + 1 }, 'model returned an empty completion, skipping chunk');
      return;
    }

    try {
      const { cards, duplicates, incomplete } = extractFlashcards(raw, {
        fingerprints: run.fingerprints,
        limit,
        maxQuestionLength: this.deps.config.flashcards.maxQuestionLength,
        maxAnswerLength: this.deps.config.flashcards.maxAnswerLength
      });
      if (duplicates > 0 || incomplete > 0) {
        log.info({ chunk: request.chunkIndex + 1, duplicates, incomplete }, 'skipped flashcards');
      }
      run.cards.push(...cards);
    } catch (err) {
      metrics.extractionFailures.inc({ task: 'flashcard_gen' });
      log.warn({ err: describeError(err), raw: previewText(raw, 200) }, 'flashcards could not be parsed');
    }
  }
}

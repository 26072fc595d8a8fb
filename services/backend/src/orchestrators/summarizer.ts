import pino from 'pino';
import { config as defaultConfig } from '../config';
import { extractPartialSummary, extractSummary } from '../extractors/summary';
import { chunkText } from '../lib/text/chunker';
import { previewText } from '../lib/text/format-output';
import {
  createChunkSummaryPrompt,
  createCombiningSummaryPrompt,
  createSummaryPrompt
} from '../prompts';
import { describeError } from '../services/errors';
import { metrics } from '../services/metrics';
import type { SummaryOutcome, TextChunk } from '../types';
import { buildRequest, rethrowIfFatal, toDebugPayload, type OrchestratorDeps } from './shared';

const log = pino({ name: 'summarizer', level: defaultConfig.logLevel });

const emptySummary = (): SummaryOutcome => ({ kind: 'summary', summary: '', highlights: [], text: '' });

/**
 * Summary plus key highlights. Long inputs are summarized chunk by chunk and
 * the partial summaries are summarized once more.
 */
export class Summarizer {
  constructor(private readonly deps: OrchestratorDeps) {}

  async summarize(text: string): Promise<SummaryOutcome> {
    const chunks = chunkText(text, this.deps.config.tasks.summarizer.chunkSize);
    if (chunks.length === 0) {
      return emptySummary();
    }
    if (chunks.length === 1) {
      return this.summarizeSingle(chunks[0]);
    }
    return this.summarizeChunks(chunks);
  }

  private async summarizeSingle(chunk: TextChunk): Promise<SummaryOutcome> {
    const prompt = createSummaryPrompt(chunk.text);
    log.info({ promptLength: prompt.length }, 'requesting single-pass summary');

    let raw: string;
    try {
      raw = await this.deps.dispatcher.dispatch(buildRequest('summarizer', prompt, 0, 1));
    } catch (err) {
      rethrowIfFatal(err);
      log.error({ err: describeError(err) }, 'summary request failed');
      return toDebugPayload([], err);
    }

    try {
      return { kind: 'summary', ...extractSummary(raw) };
    } catch (err) {
      metrics.extractionFailures.inc({ task: 'summarizer' });
      log.warn({ err: describeError(err), raw: previewText(raw, 200) }, 'summary could not be extracted');
      return toDebugPayload([raw], err);
    }
  }

  private async summarizeChunks(chunks: TextChunk[]): Promise<SummaryOutcome> {
    const total = chunks.length;
    const rawOutputs: string[] = [];
    const partials: string[] = [];

    for (const chunk of chunks) {
      this.deps.progress?.report(`Summarizing part ${chunk.index + 1} of ${total}...`, chunk.index / (total + 1));
      const prompt = createChunkSummaryPrompt(chunk.text, chunk.index, total);

      let raw: string;
      try {
        raw = await this.deps.dispatcher.dispatch(buildRequest('summarizer', prompt, chunk.index, total + 1));
      } catch (err) {
        rethrowIfFatal(err);
        log.warn({ chunk: chunk.index + 1, total, err: describeError(err) }, 'chunk summary failed, skipping chunk');
        continue;
      }
      rawOutputs.push(raw);

      try {
        partials.push(extractPartialSummary(raw));
      } catch (err) {
        metrics.extractionFailures.inc({ task: 'summarizer' });
        log.warn({ chunk: chunk.index + 1, total, err: describeError(err) }, 'chunk summary empty, skipping chunk');
      }
    }

    if (partials.length === 0) {
      log.error({ total }, 'no chunk produced a usable summary');
      return toDebugPayload(rawOutputs, 'No chunk produced a usable summary');
    }

    const degraded = (): SummaryOutcome => {
      const summary = partials.join(' ');
      return { kind: 'summary', summary, highlights: [], text: summary };
    };

    this.deps.progress?.report('Combining partial summaries...', total / (total + 1));
    const combiningPrompt = createCombiningSummaryPrompt(partials.join('\n'));
    let raw: string;
    try {
      raw = await this.deps.dispatcher.dispatch(buildRequest('summarizer', combiningPrompt, total, total + 1));
    } catch (err) {
      rethrowIfFatal(err);
      log.warn({ err: describeError(err) }, 'combining pass failed, returning partial summaries');
      return degraded();
    }

    try {
      return { kind: 'summary', ...extractSummary(raw) };
    } catch (err) {
      metrics.extractionFailures.inc({ task: 'summarizer' });
      log.warn({ err: describeError(err), raw: previewText(raw, 200) }, 'combined summary could not be extracted');
      return degraded();
    }
  }
}

import pino from 'pino';
import { config as defaultConfig } from '../config';
import { extractAdaptedText } from '../extractors/adapted';
import { extractKeyConcepts } from '../extractors/concepts';
import { chunkText } from '../lib/text/chunker';
import { calculateTextComplexity } from '../lib/text/complexity';
import { formatModelOutput, previewText } from '../lib/text/format-output';
import { createKeyConceptsPrompt, createLevelPrompt } from '../prompts';
import { describeError } from '../services/errors';
import { metrics } from '../services/metrics';
import type { AdaptationOutcome, KeyConceptsOutcome, ReadingLevel } from '../types';
import { buildRequest, rethrowIfFatal, toDebugPayload, type OrchestratorDeps } from './shared';

const log = pino({ name: 'level-adapter', level: defaultConfig.logLevel });

export class LevelAdapter {
  constructor(private readonly deps: OrchestratorDeps) {}

  async adapt(
    text: string,
    level: ReadingLevel = this.deps.config.adaptation.defaultLevel
  ): Promise<AdaptationOutcome> {
    const { config } = this.deps;
    const { lineMode } = config.adaptation;
    const chunks = chunkText(text, config.tasks.level_adapter.chunkSize);
    const rawOutputs: string[] = [];
    const adapted: string[] = [];

    for (const chunk of chunks) {
      this.deps.progress?.report(`Adapting part ${chunk.index + 1} of ${chunks.length}...`, chunk.index / chunks.length);

      let raw: string;
      try {
        raw = await this.deps.dispatcher.dispatch(
          buildRequest('level_adapter', createLevelPrompt(chunk.text, level), chunk.index, chunks.length)
        );
      } catch (err) {
        rethrowIfFatal(err);
        log.warn({ chunk: chunk.index + 1, err: describeError(err) }, 'adaptation request failed, skipping chunk');
        continue;
      }
      rawOutputs.push(raw);

      try {
        const extraction = extractAdaptedText(raw, { lineMode });
        if (extraction.droppedLines > 0) {
          log.warn(
            { chunk: chunk.index + 1, droppedLines: extraction.droppedLines, lineMode },
            'adapted chunk truncated to its first line'
          );
        }
        if (extraction.usedRawFallback) {
          log.warn({ chunk: chunk.index + 1, raw: previewText(raw) }, 'no line survived cleaning, using raw output');
        }
        adapted.push(extraction.text);
      } catch (err) {
        metrics.extractionFailures.inc({ task: 'level_adapter' });
        log.warn({ chunk: chunk.index + 1, err: describeError(err) }, 'adapted chunk empty, skipping chunk');
      }
    }

    if (chunks.length > 0 && adapted.length === 0) {
      log.error({ level }, 'all adapted chunks were empty, returning raw outputs');
      return toDebugPayload(rawOutputs, 'All adapted chunks were empty');
    }

    const finalText = formatModelOutput(adapted.join(' '));
    const complexity = calculateTextComplexity(finalText, config.adaptation.complexityNormalization);
    const targetComplexity = config.readingLevels[level].complexityThreshold;
    const withinTolerance = Math.abs(complexity - targetComplexity) <= config.adaptation.complexityTolerance;

    if (!withinTolerance) {
      log.warn(
        { complexity, targetComplexity, level },
        'adapted text complexity is not close to target, returning best attempt'
      );
    }

    return { kind: 'adapted', text: finalText, level, complexity, targetComplexity, withinTolerance };
  }

  async getKeyConcepts(text: string): Promise<KeyConceptsOutcome> {
    let raw: string;
    try {
      raw = await this.deps.dispatcher.dispatch(
        buildRequest('level_adapter', createKeyConceptsPrompt(text), 0, 1)
      );
    } catch (err) {
      rethrowIfFatal(err);
      log.error({ err: describeError(err) }, 'key concept request failed');
      return toDebugPayload([], err);
    }

    try {
      return { kind: 'concepts', concepts: extractKeyConcepts(raw) };
    } catch (err) {
      metrics.extractionFailures.inc({ task: 'level_adapter' });
      return toDebugPayload([raw], err);
    }
  }
}

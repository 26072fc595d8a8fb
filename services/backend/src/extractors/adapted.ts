import { cleanLines, stripTags, type LineRule } from '../lib/text/boilerplate-filter';
import { ExtractionFailure } from '../services/errors';
import type { AdaptationLineMode } from '../types';

export interface AdaptedTextOptions {
  lineMode?: AdaptationLineMode;
  rules?: readonly LineRule[];
}

export interface AdaptedTextExtraction {
  text: string;
  /** Surviving lines discarded because of `first-line` mode. */
  droppedLines: number;
  usedRawFallback: boolean;
}

export const extractAdaptedText = (
  raw: string,
  options: AdaptedTextOptions = {}
): AdaptedTextExtraction => {
  const lineMode = options.lineMode ?? 'first-line';
  const { lines } = cleanLines(stripTags(raw), options.rules);

  if (lines.length === 0) {
    if (!raw.trim()) {
      throw new ExtractionFailure('Adapted completion was empty', raw);
    }
    return { text: raw, droppedLines: 0, usedRawFallback: true };
  }

  if (lineMode === 'all-lines') {
    return { text: lines.join(' '), droppedLines: 0, usedRawFallback: false };
  }

  return { text: lines[0], droppedLines: lines.length - 1, usedRawFallback: false };
};

import { cleanLines, stripTags, type LineRule } from '../lib/text/boilerplate-filter';
import { ExtractionFailure } from '../services/errors';
import type { SummaryResult } from '../types';

export interface SummaryExtractionOptions {
  rules?: readonly LineRule[];
  maxHighlights?: number;
}

const SUMMARY_HEADER = /^summary:\s*/i;
const HIGHLIGHTS_HEADER = /^key highlights:\s*/i;
const BULLET = /^(?:\*|-|•)/;

type Phase = 'before' | 'summary' | 'highlights';

export const formatSummary = (summary: string, highlights: string[]): string =>
  highlights.length > 0
    ? `Summary:\n${summary}\n\nKey Highlights:\n${highlights.join('\n')}`
    : summary;

/**
 * Pulls the first "Summary:" section and the first "Key Highlights:" bullet
 * list out of a completion. Anything after them, including a repeated
 * "Summary:" section, is ignored.
 */
export const extractSummary = (
  raw: string,
  options: SummaryExtractionOptions = {}
): SummaryResult => {
  const maxHighlights = options.maxHighlights ?? 4;
  const { lines } = cleanLines(stripTags(raw), options.rules);

  let phase: Phase = 'before';
  const summaryParts: string[] = [];
  const highlights: string[] = [];

  for (const line of lines) {
    if (SUMMARY_HEADER.test(line)) {
      if (phase !== 'before') {
        break;
      }
      phase = 'summary';
      const inline = line.replace(SUMMARY_HEADER, '').trim();
      if (inline) {
        summaryParts.push(inline);
      }
      continue;
    }

    if (HIGHLIGHTS_HEADER.test(line)) {
      if (phase === 'highlights') {
        break;
      }
      phase = 'highlights';
      continue;
    }

    if (phase === 'highlights') {
      if (!BULLET.test(line)) {
        break;
      }
      highlights.push(line);
      if (highlights.length >= maxHighlights) {
        break;
      }
      continue;
    }

    if (phase === 'summary') {
      summaryParts.push(line);
    }
  }

  const summary = summaryParts.join(' ').trim();
  if (!summary && highlights.length === 0) {
    throw new ExtractionFailure('No "Summary:" section found in completion', raw);
  }

  return { summary, highlights, text: formatSummary(summary, highlights) };
};

/** Cleans a per-chunk summary, which is requested without section headers. */
export const extractPartialSummary = (raw: string, rules?: readonly LineRule[]): string => {
  const { lines } = cleanLines(stripTags(raw), rules);
  const text = lines
    .map((line) => line.replace(SUMMARY_HEADER, '').trim())
    .filter((line) => line.length > 0)
    .join(' ');
  if (!text) {
    throw new ExtractionFailure('Partial summary was empty after cleaning', raw);
  }
  return text;
};

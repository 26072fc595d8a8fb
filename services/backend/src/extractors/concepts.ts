import { cleanLines, stripTags, type LineRule } from '../lib/text/boilerplate-filter';
import { ExtractionFailure } from '../services/errors';
import type { KeyConcepts } from '../types';

const LEADING_MARKERS = /^(?:[-*•]|\d+[.)])\s*/;

export const extractKeyConcepts = (raw: string, rules?: readonly LineRule[]): KeyConcepts => {
  const concepts: KeyConcepts = {};

  for (const line of cleanLines(stripTags(raw), rules).lines) {
    const separator = line.indexOf(':');
    if (separator === -1) {
      continue;
    }
    const concept = line.slice(0, separator).replace(LEADING_MARKERS, '').replace(/\*/g, '').trim();
    const explanation = line.slice(separator + 1).replace(/^\*+/, '').trim();
    if (concept && explanation) {
      concepts[concept] = explanation;
    }
  }

  if (Object.keys(concepts).length === 0) {
    throw new ExtractionFailure('No "concept: explanation" lines found in completion', raw);
  }
  return concepts;
};

import { cleanLines, type LineRule } from '../lib/text/boilerplate-filter';
import { formatModelOutput } from '../lib/text/format-output';
import { ExtractionFailure } from '../services/errors';
import type { Flashcard } from '../types';

export interface FlashcardExtractionOptions {
  /** Fingerprints already emitted in this run; extended in place. */
  fingerprints: Set<string>;
  maxQuestionLength: number;
  maxAnswerLength: number;
  limit?: number;
  rules?: readonly LineRule[];
}

export interface FlashcardExtraction {
  cards: Flashcard[];
  duplicates: number;
  incomplete: number;
}

const QUESTION_MARKER = 'Question:';
const ANSWER_MARKER = 'Answer:';
const MARKUP_CHARS = /[>*<]+/g;

export const fingerprintCard = (question: string, answer: string): string =>
  JSON.stringify([question.toLowerCase(), answer.toLowerCase()]);

export const cleanCardText = (value: string, rules?: readonly LineRule[]): string =>
  cleanLines(value.replace(MARKUP_CHARS, ''), rules).lines.join(' ').trim();

export const extractFlashcards = (
  raw: string,
  options: FlashcardExtractionOptions
): FlashcardExtraction => {
  const segments = raw.split(QUESTION_MARKER).slice(1);
  if (segments.length === 0) {
    throw new ExtractionFailure(`No "${QUESTION_MARKER}" marker found in completion`, raw);
  }

  const cards: Flashcard[] = [];
  let duplicates = 0;
  let incomplete = 0;

  for (const segment of segments) {
    if (options.limit !== undefined && cards.length >= options.limit) {
      break;
    }

    const answerAt = segment.indexOf(ANSWER_MARKER);
    if (answerAt === -1) {
      incomplete += 1;
      continue;
    }

    const question = cleanCardText(segment.slice(0, answerAt), options.rules);
    const answer = cleanCardText(segment.slice(answerAt + ANSWER_MARKER.length), options.rules);
    if (!question || !answer) {
      incomplete += 1;
      continue;
    }

    const fingerprint = fingerprintCard(question, answer);
    if (options.fingerprints.has(fingerprint)) {
      duplicates += 1;
      continue;
    }
    options.fingerprints.add(fingerprint);

    cards.push({
      question: formatModelOutput(question, options.maxQuestionLength),
      answer: formatModelOutput(answer, options.maxAnswerLength)
    });
  }

  return { cards, duplicates, incomplete };
};

export const formatFlashcards = (cards: Flashcard[]): string =>
  cards
    .map((card, index) => `Card ${index + 1}:\nQ: ${card.question}\nA: ${card.answer}\n\n`)
    .join('');

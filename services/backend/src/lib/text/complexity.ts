export interface ComplexityNormalization {
  maxSentenceLength: number;
  maxWordLength: number;
}

export interface ComplexityBreakdown {
  averageSentenceLength: number;
  averageWordLength: number;
  score: number;
}

const SENTENCE_SPLIT = /[.!?]+/;
const NON_WORD_CHARS = /[^\p{L}\p{N}]/gu;

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

export const analyzeTextComplexity = (
  text: string,
  normalization: ComplexityNormalization
): ComplexityBreakdown => {
  const words = text
    .split(/\s+/)
    .map((word) => word.replace(NON_WORD_CHARS, ''))
    .filter((word) => word.length > 0);

  if (words.length === 0) {
    return { averageSentenceLength: 0, averageWordLength: 0, score: 0 };
  }

  const sentenceCount = Math.max(
    1,
    text.split(SENTENCE_SPLIT).filter((sentence) => sentence.trim().length > 0).length
  );
  const averageSentenceLength = words.length / sentenceCount;
  const averageWordLength = words.reduce((sum, word) => sum + word.length, 0) / words.length;

  const sentenceScore = clamp01(averageSentenceLength / normalization.maxSentenceLength);
  const wordScore = clamp01(averageWordLength / normalization.maxWordLength);

  return {
    averageSentenceLength,
    averageWordLength,
    score: clamp01((sentenceScore + wordScore) / 2),
  };
};

/** Score in [0, 1]: mean of normalized sentence length and normalized word length. */
export const calculateTextComplexity = (
  text: string,
  normalization: ComplexityNormalization
): number => analyzeTextComplexity(text, normalization).score;

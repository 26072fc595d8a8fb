import type { TextChunk } from '../../types';

const PARAGRAPH_BREAK = '\n\n';
const SENTENCE_BREAK = '. ';

interface ChunkUnit {
  text: string;
  /** Placed before the unit when it is not the first one in its chunk. */
  separator: string;
}

const splitSentences = (paragraph: string): ChunkUnit[] => {
  const pieces = paragraph
    .split(SENTENCE_BREAK)
    .map((piece) => piece.trim())
    .filter((piece) => piece.length > 0);

  return pieces.map((piece, index) => ({
    text: index < pieces.length - 1 ? `${piece}.` : piece,
    separator: index === 0 ? PARAGRAPH_BREAK : ' ',
  }));
};

const toUnits = (text: string, maxLength: number): ChunkUnit[] => {
  const units: ChunkUnit[] = [];

  for (const rawParagraph of text.replace(/\r\n/g, '\n').split(PARAGRAPH_BREAK)) {
    const paragraph = rawParagraph.trim();
    if (!paragraph) {
      continue;
    }

    if (paragraph.length > maxLength) {
      units.push(...splitSentences(paragraph));
    } else {
      units.push({ text: paragraph, separator: PARAGRAPH_BREAK });
    }
  }

  return units;
};

/**
 * Splits text into chunks of at most `maxLength` characters, keeping
 * paragraphs together and falling back to sentences for oversized paragraphs.
 * A single sentence longer than `maxLength` is emitted as its own chunk.
 * Empty input yields no chunks.
 */
export const chunkText = (text: string, maxLength: number): TextChunk[] => {
  if (!Number.isFinite(maxLength) || maxLength <= 0) {
    throw new Error(`maxLength must be a positive number (received ${maxLength})`);
  }

  const chunks: TextChunk[] = [];
  let current = '';

  const flush = () => {
    if (current) {
      chunks.push({ index: chunks.length, text: current });
      current = '';
    }
  };

  for (const unit of toUnits(text, maxLength)) {
    if (!current) {
      current = unit.text;
      continue;
    }

    const candidateLength = current.length + unit.separator.length + unit.text.length;
    if (candidateLength <= maxLength) {
      current = `${current}${unit.separator}${unit.text}`;
    } else {
      flush();
      current = unit.text;
    }
  }

  flush();
  return chunks;
};

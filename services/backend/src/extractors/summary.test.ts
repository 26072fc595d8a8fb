import { describe, expect, it } from 'vitest';
import { ExtractionFailure } from '../services/errors';
import { extractPartialSummary, extractSummary, formatSummary } from './summary';

describe('extractSummary', () => {
  it('collects the summary section and the bullet highlights', () => {
    const raw = [
      'Here is a possible summary:',
      'Summary: Cells divide.',
      'They grow first.',
      'Key Highlights:',
      '- Mitosis splits nuclei',
      '* Growth precedes division',
      'Some trailing note',
      'Summary: Second section'
    ].join('\n');

    const result = extractSummary(raw);

    expect(result.summary).toBe('Cells divide. They grow first.');
    expect(result.highlights).toEqual(['- Mitosis splits nuclei', '* Growth precedes division']);
    expect(result.text).toBe(
      'Summary:\nCells divide. They grow first.\n\nKey Highlights:\n- Mitosis splits nuclei\n* Growth precedes division'
    );
  });

  it('keeps only the first of two summary sections', () => {
    const result = extractSummary('Summary: First.\nSummary: Second.');
    expect(result).toEqual({ summary: 'First.', highlights: [], text: 'First.' });
  });

  it('returns the bare summary when there are no highlights', () => {
    expect(extractSummary('Summary:\nOnly text here.').text).toBe('Only text here.');
  });

  it('stops at the highlight limit', () => {
    const bullets = ['- one', '- two', '- three', '- four', '- five'];
    const result = extractSummary(['Summary: S.', 'Key Highlights:', ...bullets].join('\n'));
    expect(result.highlights).toEqual(['- one', '- two', '- three', '- four']);
  });

  it('strips markup tags before matching headers', () => {
    expect(extractSummary('<p>Summary: Tagged.</p>').summary).toBe('Tagged.');
  });

  it('fails when the completion has no summary section', () => {
    expect(() => extractSummary('I apologize, I cannot do that.')).toThrow(ExtractionFailure);
    expect(() => extractSummary('Plain prose without headers.')).toThrow('No "Summary:" section found in completion');
  });
});

describe('extractPartialSummary', () => {
  it('joins cleaned lines and drops a stray header', () => {
    expect(extractPartialSummary('Summary: part one.\nMore detail.')).toBe('part one. More detail.');
  });

  it('fails on boilerplate-only output', () => {
    expect(() => extractPartialSummary('Please provide the text.')).toThrow(ExtractionFailure);
  });
});

describe('formatSummary', () => {
  it('renders headers only when there are highlights', () => {
    expect(formatSummary('S.', ['- a'])).toBe('Summary:\nS.\n\nKey Highlights:\n- a');
    expect(formatSummary('S.', [])).toBe('S.');
  });
});

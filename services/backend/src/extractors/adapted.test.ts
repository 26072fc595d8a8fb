import { describe, expect, it } from 'vitest';
import { extractAdaptedText } from './adapted';

const raw = 'Here is a possible rewrite:\nCells split in two.\nThey do this to grow.';

describe('extractAdaptedText', () => {
  it('keeps the first surviving line by default', () => {
    expect(extractAdaptedText(raw)).toEqual({ text: 'Cells split in two.', droppedLines: 1, usedRawFallback: false });
  });

  it('joins every surviving line in all-lines mode', () => {
    expect(extractAdaptedText(raw, { lineMode: 'all-lines' })).toEqual({
      text: 'Cells split in two. They do this to grow.',
      droppedLines: 0,
      usedRawFallback: false
    });
  });

  it('falls back to the raw completion when cleaning removes everything', () => {
    expect(extractAdaptedText('Output only the text')).toEqual({
      text: 'Output only the text',
      droppedLines: 0,
      usedRawFallback: true
    });
  });

  it('fails on a blank completion', () => {
    expect(() => extractAdaptedText('   ')).toThrow('Adapted completion was empty');
  });
});

import { describe, expect, it } from 'vitest';
import { extractKeyConcepts } from './concepts';

describe('extractKeyConcepts', () => {
  it('reads concept: explanation lines and strips list markers', () => {
    const raw = ['1. Mitosis: cell division', '- **Osmosis**: water movement', 'no separator line', 'Empty:'].join('\n');

    expect(extractKeyConcepts(raw)).toEqual({
      Mitosis: 'cell division',
      Osmosis: 'water movement'
    });
  });

  it('fails when no line has a concept', () => {
    expect(() => extractKeyConcepts('nothing here')).toThrow('No "concept: explanation" lines found in completion');
  });
});

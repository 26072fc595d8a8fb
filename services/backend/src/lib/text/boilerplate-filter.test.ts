import { describe, expect, it } from 'vitest';
import { cleanLines, DEFAULT_LINE_RULES, findMatchingRule, isBoilerplateLine, prefixRule, stripTags } from './boilerplate-filter';

describe('boilerplate filter', () => {
  it('matches meta-comment prefixes case-insensitively', () => {
    expect(isBoilerplateLine('Here is a possible rewrite:')).toBe(true);
    expect(isBoilerplateLine('I APOLOGIZE for the confusion')).toBe(true);
    expect(isBoilerplateLine('The cell divides twice.')).toBe(false);
  });

  it('reports the first rule that matches', () => {
    expect(findMatchingRule('```json')?.id).toBe('code-fence');
    expect(findMatchingRule('---')?.id).toBe('separator');
    expect(findMatchingRule('Please provide the text')?.id).toBe('meta:please provide');
  });

  it('drops blank and boilerplate lines and trims the rest', () => {
    const result = cleanLines('  First line  \n\nNow create a summary\r\n```\nSecond line');
    expect(result.lines).toEqual(['First line', 'Second line']);
    expect(result.removedFragments).toEqual(['Now create a summary', '```']);
  });

  it('accepts a custom rule list', () => {
    const rules = [...DEFAULT_LINE_RULES, prefixRule('note', 'note:')];
    expect(cleanLines('Note: skip me\nkeep me', rules).lines).toEqual(['keep me']);
    expect(cleanLines('Note: skip me\nkeep me').lines).toEqual(['Note: skip me', 'keep me']);
  });

  it('strips markup tags', () => {
    expect(stripTags('<b>Bold</b> and <i>italic</i>')).toBe('Bold and italic');
  });
});

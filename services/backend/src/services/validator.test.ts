import { describe, expect, it } from 'vitest';
import { formatErrors, parseBody, RequestValidationError, validators } from './validator';

describe('request validation', () => {
  it('returns the body when it matches the schema', () => {
    const body = { text: 'Cells.', num_cards: 3 };
    expect(parseBody(validators.flashcards, body)).toBe(body);
  });

  it('collects every violation', () => {
    let caught: unknown;
    try {
      parseBody(validators.flashcards, { text: '', num_cards: 21 });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(RequestValidationError);
    expect(caught).toMatchObject({
      details: ['/text must NOT have fewer than 1 characters', '/num_cards must be <= 20']
    });
  });

  it('formats a missing error list as empty', () => {
    expect(formatErrors(null)).toEqual([]);
  });
});

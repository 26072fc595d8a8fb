import { describe, expect, it } from 'vitest';
import { ManualClock } from '../__tests__/utils/manual-clock';
import { createPipeline } from '../orchestrator';
import { AuthError } from '../services/errors';
import { FakeCompletionModel, type FakeOutcome } from '../services/llmAdapter.fake';
import { createHandlers, runHandler } from './index';

const handlersFor = (script?: FakeOutcome[]) => {
  const model = script ? new FakeCompletionModel(script) : new FakeCompletionModel();
  return createHandlers(createPipeline({ model, clock: new ManualClock() }));
};

describe('routes', () => {
  it('returns the summary outcome', async () => {
    const handlers = handlersFor(['Summary: Short.']);

    expect(await runHandler(handlers.summarize, { text: 'Cells divide.' })).toEqual({
      status: 200,
      body: { kind: 'summary', summary: 'Short.', highlights: [], text: 'Short.' }
    });
  });

  it('passes the level and card count through', async () => {
    const handlers = handlersFor(['Simple words.', 'Question: Q?\nAnswer: A.']);

    expect(await runHandler(handlers.adapt, { text: 'Hard words.', level: 'Beginner' })).toMatchObject({
      status: 200,
      body: { kind: 'adapted', text: 'Simple words.', level: 'Beginner' }
    });
    expect(await runHandler(handlers.flashcards, { text: 'Cells.', num_cards: 1 })).toEqual({
      status: 200,
      body: { kind: 'cards', cards: [{ question: 'Q?', answer: 'A.' }] }
    });
  });

  it('returns key concepts', async () => {
    const handlers = handlersFor(['Mitosis: cell division']);

    expect(await runHandler(handlers.concepts, { text: 'Cells.' })).toEqual({
      status: 200,
      body: { kind: 'concepts', concepts: { Mitosis: 'cell division' } }
    });
  });

  it('runs the whole pipeline', async () => {
    const result = await runHandler(handlersFor().process, { text: 'Cells divide.' });

    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({ summary: { kind: 'summary' }, flashcards: { kind: 'cards' }, errors: [] });
  });

  it.each([
    ['a missing field', {}, [". must have required property 'text'"]],
    ['a non-object body', null, ['. must be object']],
    ['an unknown field', { text: 'x', extra: true }, ['. must NOT have additional properties']]
  ])('rejects %s with 400', async (_case, body, details) => {
    expect(await runHandler(handlersFor().summarize, body)).toEqual({
      status: 400,
      body: { error: 'Invalid request body', details }
    });
  });

  it('rejects an unknown reading level and an out of range card count', async () => {
    const handlers = handlersFor();

    expect(await runHandler(handlers.adapt, { text: 'x', level: 'Advanced' })).toEqual({
      status: 400,
      body: { error: 'Invalid request body', details: ['/level must be equal to one of the allowed values'] }
    });
    expect(await runHandler(handlers.flashcards, { text: 'x', num_cards: 0 })).toEqual({
      status: 400,
      body: { error: 'Invalid request body', details: ['/num_cards must be >= 1'] }
    });
  });

  it('maps auth failures to 401', async () => {
    expect(await runHandler(handlersFor([new AuthError()]).summarize, { text: 'Cells.' })).toEqual({
      status: 401,
      body: { error: 'Invalid API key. Please check your TOGETHER_API_KEY.' }
    });
  });

  it('hides unexpected errors behind a 500', async () => {
    const failing = async () => {
      throw new Error('database exploded at /srv/app.ts:12');
    };

    expect(await runHandler(failing, {})).toEqual({ status: 500, body: { error: 'Internal server error' } });
  });

  describe('papers', () => {
    it('recognizes an arXiv source but does not process it yet', async () => {
      expect(await runHandler(handlersFor().papers, { source: 'arXiv:2101.00001v2' })).toEqual({
        status: 501,
        body: {
          error: 'Paper processing is not implemented yet',
          reference: { provider: 'arxiv', id: '2101.00001', version: 'v2' }
        }
      });
    });

    it('rejects sources that are not arXiv papers', async () => {
      expect(await runHandler(handlersFor().papers, { source: 'https://example.com/paper' })).toEqual({
        status: 400,
        body: {
          error: 'Invalid request body',
          details: ['.source is not an arXiv identifier or arxiv.org URL: https://example.com/paper']
        }
      });
    });

    it('checks the callback URL format', async () => {
      expect(await runHandler(handlersFor().papers, { source: '2101.00001', callback_url: 'not a url' })).toEqual({
        status: 400,
        body: { error: 'Invalid request body', details: ['/callback_url must match format "uri"'] }
      });
    });
  });
});

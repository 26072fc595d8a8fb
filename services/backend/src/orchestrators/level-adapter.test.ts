import { describe, expect, it } from 'vitest';
import { orchestratorHarness, THREE_CHUNK_TEXT } from '../__tests__/utils/harness';
import { testConfig } from '../__tests__/utils/test-config';
import { AuthError } from '../services/errors';
import { LevelAdapter } from './level-adapter';

const SIMPLE = 'The cat sat. The dog ran.';
const SIMPLE_SCORE = (3 / 35 + 0.3) / 2;

describe('LevelAdapter.adapt', () => {
  it('keeps the first surviving line and scores it against the level target', async () => {
    const { model, deps } = orchestratorHarness([`Here is a possible rewrite:\n${SIMPLE}\nExtra line`]);

    const outcome = await new LevelAdapter(deps).adapt('Felines were seated. Canines departed.');

    expect(outcome).toMatchObject({
      kind: 'adapted',
      text: SIMPLE,
      level: 'Intermediate',
      targetComplexity: 0.6,
      withinTolerance: false
    });
    if (outcome.kind !== 'adapted') throw new Error('expected adapted text');
    expect(outcome.complexity).toBeCloseTo(SIMPLE_SCORE, 10);
    expect(model.calls[0].taskType).toBe('level_adapter');
  });

  it('reports text within tolerance of the beginner target', async () => {
    const { deps } = orchestratorHarness([SIMPLE]);

    const outcome = await new LevelAdapter(deps).adapt('Felines were seated.', 'Beginner');

    expect(outcome).toMatchObject({ kind: 'adapted', level: 'Beginner', targetComplexity: 0.3, withinTolerance: true });
  });

  it('adapts each chunk and joins the results in order', async () => {
    const { model, deps } = orchestratorHarness(['A one.', 'B two.', 'C three.'], testConfig(20));

    const outcome = await new LevelAdapter(deps).adapt(THREE_CHUNK_TEXT, 'Expert');

    expect(outcome).toMatchObject({ kind: 'adapted', text: 'A one. B two. C three.', level: 'Expert' });
    expect(model.calls.map((call) => call.chunkIndex)).toEqual([0, 1, 2]);
  });

  it('returns the raw outputs when every chunk comes back empty', async () => {
    const { deps } = orchestratorHarness(['', '  ', ''], testConfig(20));

    expect(await new LevelAdapter(deps).adapt(THREE_CHUNK_TEXT)).toEqual({
      kind: 'debug',
      rawOutputs: ['', '', ''],
      error: 'All adapted chunks were empty'
    });
  });

  it('returns empty adapted text for empty input without a request', async () => {
    const { model, deps } = orchestratorHarness([]);

    expect(await new LevelAdapter(deps).adapt('')).toEqual({
      kind: 'adapted',
      text: '',
      level: 'Intermediate',
      complexity: 0,
      targetComplexity: 0.6,
      withinTolerance: false
    });
    expect(model.calls).toHaveLength(0);
  });

  it('propagates auth failures', async () => {
    const { deps } = orchestratorHarness([new AuthError()]);

    await expect(new LevelAdapter(deps).adapt('Some text.')).rejects.toBeInstanceOf(AuthError);
  });
});

describe('LevelAdapter.getKeyConcepts', () => {
  it('returns the parsed concepts', async () => {
    const { model, deps } = orchestratorHarness(['Mitosis: cell division\nOsmosis: water movement']);

    expect(await new LevelAdapter(deps).getKeyConcepts('Cells.')).toEqual({
      kind: 'concepts',
      concepts: { Mitosis: 'cell division', Osmosis: 'water movement' }
    });
    expect(model.calls).toHaveLength(1);
  });

  it('returns the raw output when nothing parses', async () => {
    const { deps } = orchestratorHarness(['nothing']);

    expect(await new LevelAdapter(deps).getKeyConcepts('Cells.')).toEqual({
      kind: 'debug',
      rawOutputs: ['nothing'],
      error: 'No "concept: explanation" lines found in completion'
    });
  });
});

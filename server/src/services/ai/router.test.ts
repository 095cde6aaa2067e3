import { describe, it, expect } from 'vitest';
import { ModelFailoverRunner } from './router.js';
import { fakeModel, failingModel, silentLogger } from '../../testing/fakes.js';

describe('ModelFailoverRunner', () => {
  it('returns the first successful reply', async () => {
    const primary = fakeModel('primary', ['first']);
    const secondary = fakeModel('secondary', ['second']);
    const runner = new ModelFailoverRunner([primary, secondary], silentLogger);

    const result = await runner.run({ text: 'hello' });

    expect(result).toEqual({ ok: true, text: 'first', model: 'primary', attempts: [] });
    expect(secondary.prompts).toHaveLength(0);
  });

  it('fails over to the next candidate after an error', async () => {
    const primary = fakeModel('primary', [new Error('quota exceeded')]);
    const secondary = fakeModel('secondary', ['Mwaramutse|Good morning']);
    const runner = new ModelFailoverRunner([primary, secondary], silentLogger);

    const result = await runner.run({ text: 'phrase please' });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.model).toBe('secondary');
      expect(result.text).toBe('Mwaramutse|Good morning');
      expect(result.attempts).toEqual([{ model: 'primary', error: 'quota exceeded' }]);
    }
    expect(primary.prompts).toEqual([{ text: 'phrase please' }]);
    expect(secondary.prompts).toEqual([{ text: 'phrase please' }]);
  });

  it('reports failure when every candidate fails', async () => {
    const runner = new ModelFailoverRunner([failingModel('a'), failingModel('b')], silentLogger);

    const result = await runner.run({ text: 'anything' });

    expect(result.ok).toBe(false);
    expect(result.attempts.map(attempt => attempt.model)).toEqual(['a', 'b']);
  });

  it('reports failure without candidates', async () => {
    const runner = new ModelFailoverRunner([], silentLogger);
    expect(runner.hasCandidates).toBe(false);
    expect(await runner.run({ text: 'anything' })).toEqual({ ok: false, attempts: [] });
  });

  it('uses an explicit candidate list over the default one', async () => {
    const fallback = fakeModel('explicit', ['from explicit']);
    const runner = new ModelFailoverRunner([failingModel('default')], silentLogger);

    const result = await runner.run({ text: 'x' }, [fallback]);

    expect(result.ok && result.text).toBe('from explicit');
  });
});

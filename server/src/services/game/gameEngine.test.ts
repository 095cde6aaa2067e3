import { describe, it, expect } from 'vitest';
import { GameEngine, RIDDLE_ANNOUNCEMENT_ID } from './gameEngine.js';
import { ChallengeGenerator } from './challengeGenerator.js';
import { AnswerEvaluator } from './answerEvaluator.js';
import { RiddleHintService } from './hintService.js';
import { RiddleBank } from './riddleBank.js';
import { SampleImageLibrary } from './sampleImages.js';
import { StoryEngine } from './storyEngine.js';
import { createInitialState } from './stateService.js';
import { ModelFailoverRunner } from '../ai/router.js';
import type { ModelInvoker } from '../ai/types.js';
import { MemoryRepository } from '../store/gameRepository.js';
import { makeSeededRng } from '../../utils/random.js';
import { fakeModel, failingModel, recordingLogger, silentLogger } from '../../testing/fakes.js';
import type { Logger } from '../../utils/logger.js';

function createEngine(
  models: ModelInvoker[] = [failingModel()],
  repository = new MemoryRepository(),
  logger: Logger = silentLogger
): GameEngine {
  const random = makeSeededRng(7);
  const runner = new ModelFailoverRunner(models, silentLogger);
  return new GameEngine({
    repository,
    generator: new ChallengeGenerator({
      runner,
      riddles: new RiddleBank([{ riddle: "Inshyushyu y'umusambi", answer: 'amazi' }], random),
      images: new SampleImageLibrary('missing-image-dir', random),
      stories: new StoryEngine(runner),
      random,
    }),
    evaluator: new AnswerEvaluator(runner),
    hints: new RiddleHintService(runner),
    random,
    logger,
  });
}

async function revealedRiddle(engine: GameEngine, sessionId: string): Promise<string> {
  await engine.nextChallenge(sessionId);
  const riddle = await engine.soma(sessionId);
  if (!riddle.ok) {
    throw new Error(riddle.error.message);
  }
  return riddle.value.challenge_id;
}

describe('GameEngine', () => {
  it('plays a riddle and turns its answer into a themed challenge', async () => {
    const model = fakeModel('m', ['Amazi ni meza|The water is good']);
    const engine = createEngine([model]);
    const { session_id: sessionId } = await engine.createSession('sakwe');

    const announcement = await engine.nextChallenge(sessionId);
    expect(announcement).toEqual({
      ok: true,
      value: {
        challenge_id: RIDDLE_ANNOUNCEMENT_ID,
        challenge_type: 'gusakuza_init',
        source_text: 'Sakwe sakwe!',
        context: "Reply with 'soma' to get the riddle.",
        difficulty: 1,
      },
    });

    const riddle = await engine.soma(sessionId);
    if (!riddle.ok) throw new Error('expected a riddle');
    expect(riddle.value.challenge_type).toBe('gusakuza');
    expect(riddle.value.source_text).toBe("Inshyushyu y'umusambi");
    expect(riddle.value.context).toBe('Igisakuzo');
    expect(riddle.value).not.toHaveProperty('target_text');

    const submission = await engine.submitAnswer(sessionId, riddle.value.challenge_id, 'Amazi.');
    if (!submission.ok) throw new Error('expected a submission');
    expect(submission.value).toMatchObject({
      message: 'Correct!',
      is_correct: true,
      correct_answer: 'amazi',
      score_awarded: 10,
      new_total_score: 10,
      lives: 3,
      score: 10,
      game_over: false,
    });

    const themed = await engine.nextChallenge(sessionId);
    if (!themed.ok) throw new Error('expected a themed challenge');
    expect(themed.value.challenge_type).toBe('themed_translation');
    expect(themed.value.source_text).toBe('Amazi ni meza');
    expect(themed.value.context).toBe('Theme word: amazi');

    const state = await engine.getState(sessionId);
    expect(state.ok && state.value.thematic_words).toEqual([]);
    expect(model.prompts).toHaveLength(1);
  });

  it('refuses soma without a pending riddle', async () => {
    const engine = createEngine();
    const { session_id: sessionId } = await engine.createSession('sakwe');

    expect(await engine.soma(sessionId)).toEqual({
      ok: false,
      error: { kind: 'precondition_failed', message: 'No pending riddle.' },
    });
  });

  it('takes a life for a wrong riddle answer', async () => {
    const engine = createEngine();
    const { session_id: sessionId } = await engine.createSession('sakwe');
    const challengeId = await revealedRiddle(engine, sessionId);

    const submission = await engine.submitAnswer(sessionId, challengeId, 'umuriro');

    expect(submission.ok && submission.value).toMatchObject({
      message: 'Incorrect.',
      is_correct: false,
      feedback: 'Not quite. The expected answer was: amazi',
      lives: 2,
      score: 0,
    });
    const state = await engine.getState(sessionId);
    expect(state.ok && state.value.incorrect_answers).toEqual(['umuriro']);
  });

  it('reveals the answer on a give-up and keeps every life', async () => {
    const engine = createEngine();
    const { session_id: sessionId } = await engine.createSession('sakwe');
    const challengeId = await revealedRiddle(engine, sessionId);

    const submission = await engine.submitAnswer(sessionId, challengeId, 'Ngicyo');

    expect(submission.ok && submission.value).toMatchObject({
      message: 'You gave up. The correct answer was: amazi',
      is_correct: false,
      lives: 3,
      score: 0,
      game_over: false,
    });
  });

  it('scores a challenge only once', async () => {
    const engine = createEngine();
    const { session_id: sessionId } = await engine.createSession('sakwe');
    const challengeId = await revealedRiddle(engine, sessionId);

    await engine.submitAnswer(sessionId, challengeId, 'amazi');
    const repeat = await engine.submitAnswer(sessionId, challengeId, 'amazi');

    expect(repeat).toEqual({
      ok: false,
      error: { kind: 'precondition_failed', message: 'Challenge already answered.' },
    });
    const state = await engine.getState(sessionId);
    expect(state.ok && state.value.score).toBe(10);
    expect(state.ok && state.value.thematic_words).toEqual(['amazi']);
    expect(await engine.totalScore()).toBe(10);
  });

  it('lets the player retry after a wrong answer', async () => {
    const engine = createEngine();
    const { session_id: sessionId } = await engine.createSession('sakwe');
    const challengeId = await revealedRiddle(engine, sessionId);

    await engine.submitAnswer(sessionId, challengeId, 'umuriro');
    const retry = await engine.submitAnswer(sessionId, challengeId, 'amazi');

    expect(retry.ok && retry.value).toMatchObject({ is_correct: true, lives: 2, score: 10 });
  });

  it('does not find challenges from another session', async () => {
    const engine = createEngine();
    const first = await engine.createSession('sakwe');
    const second = await engine.createSession('sakwe');
    const challengeId = await revealedRiddle(engine, first.session_id);

    const notFound = { ok: false, error: { kind: 'not_found', message: 'Challenge not found.' } };
    expect(await engine.submitAnswer(second.session_id, challengeId, 'amazi')).toEqual(notFound);
    expect(await engine.submitAnswer(first.session_id, 'no-such-challenge', 'amazi')).toEqual(notFound);
  });

  it('reports unknown sessions', async () => {
    const engine = createEngine();

    expect(await engine.getState('nope')).toEqual({
      ok: false,
      error: { kind: 'not_found', message: 'Session not found.' },
    });
    expect(await engine.nextChallenge('nope')).toEqual({
      ok: false,
      error: { kind: 'not_found', message: 'Session not found.' },
    });
  });

  it('reports image mode without images', async () => {
    const engine = createEngine();
    const { session_id: sessionId } = await engine.createSession('image');

    expect(await engine.nextChallenge(sessionId)).toEqual({
      ok: false,
      error: { kind: 'resource_unavailable', message: 'No images found in the missing-image-dir directory.' },
    });
  });

  it('gives a letter hint when no model answers', async () => {
    const engine = createEngine();
    const { session_id: sessionId } = await engine.createSession('sakwe');
    const challengeId = await revealedRiddle(engine, sessionId);

    expect(await engine.hint(sessionId, challengeId)).toEqual({
      ok: true,
      value: { challenge_id: challengeId, hint: 'The answer starts with "A" and has 5 letters.' },
    });
  });

  it('saves feedback for stored challenges only', async () => {
    const engine = createEngine();
    const { session_id: sessionId } = await engine.createSession('sakwe');
    const challengeId = await revealedRiddle(engine, sessionId);

    const saved = await engine.saveFeedback(challengeId, 4, 'Nice riddle');
    expect(saved.ok && saved.value).toMatchObject({ challenge_id: challengeId, rating: 4, comment: 'Nice riddle' });

    expect(await engine.saveFeedback('missing', 3)).toEqual({
      ok: false,
      error: { kind: 'not_found', message: 'Challenge not found.' },
    });
  });

  it('consumes each theme word once under concurrent requests', async () => {
    const repository = new MemoryRepository();
    const sessionId = await repository.createSession({
      ...createInitialState('translation'),
      thematic_words: ['amazi', 'inka'],
    });
    const engine = createEngine([fakeModel('m', ['Amazi ni meza|The water is good', 'Inka irarisha|The cow grazes'])], repository);

    const [first, second] = await Promise.all([engine.nextChallenge(sessionId), engine.nextChallenge(sessionId)]);

    expect(first.ok && first.value.context).toBe('Theme word: amazi');
    expect(second.ok && second.value.context).toBe('Theme word: inka');
    const state = await repository.getSession(sessionId);
    expect(state?.thematic_words).toEqual([]);
  });

  it('logs when a static challenge stands in for a model one', async () => {
    const log = recordingLogger();
    const engine = createEngine([failingModel()], new MemoryRepository(), log);
    const { session_id: sessionId } = await engine.createSession('translation');

    const challenge = await engine.nextChallenge(sessionId);

    expect(challenge.ok).toBe(true);
    expect(log.entries).toContain(`INFO [Game] Session ${sessionId} got a static translation challenge`);
  });

  it('does not log a fallback for a model challenge', async () => {
    const log = recordingLogger();
    const engine = createEngine([fakeModel('m', ['Thank you|Murakoze', 'Akabando|Walking stick'])], new MemoryRepository(), log);
    const { session_id: sessionId } = await engine.createSession('translation');

    await engine.nextChallenge(sessionId);

    expect(log.entries.some(entry => entry.includes('got a static'))).toBe(false);
  });

  it('totals the score across sessions', async () => {
    const engine = createEngine();
    for (const mode of ['sakwe', 'sakwe'] as const) {
      const { session_id: sessionId } = await engine.createSession(mode);
      const challengeId = await revealedRiddle(engine, sessionId);
      await engine.submitAnswer(sessionId, challengeId, 'amazi');
    }

    expect(await engine.totalScore()).toBe(20);
  });
});

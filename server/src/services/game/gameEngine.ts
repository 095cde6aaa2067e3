import {
  Challenge,
  ChallengeView,
  Difficulty,
  GameMode,
  GameSessionState,
  HintView,
  SubmissionView,
  toDifficulty,
} from '../../../../shared/types/index.js';
import { ChallengeGenerator } from './challengeGenerator.js';
import { AnswerEvaluator } from './answerEvaluator.js';
import { RiddleHintService } from './hintService.js';
import { applyAnswer, createInitialState } from './stateService.js';
import type { Feedback, GameRepository, StoredChallenge } from '../store/gameRepository.js';
import { KeyedLock } from '../../utils/keyedLock.js';
import { Random, defaultRandom } from '../../utils/random.js';
import { GameError, Result, gameError, ok, err } from '../../utils/result.js';
import defaultLogger, { Logger } from '../../utils/logger.js';

export const RIDDLE_ANNOUNCEMENT_ID = 'gusakuza_init';

export interface GameEngineDeps {
  repository: GameRepository;
  generator: ChallengeGenerator;
  evaluator: AnswerEvaluator;
  hints: RiddleHintService;
  random?: Random;
  logger?: Logger;
}

export interface ChallengeOptions {
  difficulty?: number;
  gameMode?: GameMode;
}

export interface SessionView {
  session_id: string;
  state: GameSessionState;
}

function toView(id: string, challenge: Challenge): ChallengeView {
  return {
    challenge_id: id,
    challenge_type: challenge.challenge_type,
    source_text: challenge.source_text,
    context: challenge.context,
    difficulty: challenge.difficulty,
  };
}

/**
 * Runs one game request at a time per session: load the state, call the
 * generator or evaluator, write the state back.
 */
export class GameEngine {
  private readonly repository: GameRepository;
  private readonly generator: ChallengeGenerator;
  private readonly evaluator: AnswerEvaluator;
  private readonly hints: RiddleHintService;
  private readonly random: Random;
  private readonly logger: Logger;
  private readonly locks = new KeyedLock();

  constructor(deps: GameEngineDeps) {
    this.repository = deps.repository;
    this.generator = deps.generator;
    this.evaluator = deps.evaluator;
    this.hints = deps.hints;
    this.random = deps.random ?? defaultRandom;
    this.logger = deps.logger ?? defaultLogger;
  }

  async createSession(gameMode?: GameMode): Promise<SessionView> {
    const state = createInitialState(gameMode);
    const sessionId = await this.repository.createSession(state);
    this.logger.info('Game', `Created session ${sessionId} in ${state.game_mode} mode`);
    return { session_id: sessionId, state };
  }

  async getState(sessionId: string): Promise<Result<GameSessionState, GameError>> {
    const state = await this.repository.getSession(sessionId);
    return state ? ok(state) : err(gameError('not_found', 'Session not found.'));
  }

  /**
   * Generate the next challenge. A riddle announcement is not stored; its
   * riddle waits in `pending_riddle` until `soma`.
   */
  async nextChallenge(sessionId: string, options: ChallengeOptions = {}): Promise<Result<ChallengeView, GameError>> {
    return this.locks.run(sessionId, async () => {
      const state = await this.repository.getSession(sessionId);
      if (!state) {
        return err(gameError('not_found', 'Session not found.'));
      }

      if (options.gameMode) {
        state.game_mode = options.gameMode;
      }
      if (options.difficulty !== undefined) {
        state.difficulty = toDifficulty(options.difficulty);
      }
      const difficulty: Difficulty = state.difficulty;

      const outcome = await this.generator.generate({ difficulty, gameMode: state.game_mode, state });
      await this.repository.saveSession(sessionId, outcome.state);
      if (outcome.usedFallback) {
        this.logger.info('Game', `Session ${sessionId} got a static ${state.game_mode} challenge`);
      }

      if (!outcome.result.ok) {
        this.logger.warn('Game', `No challenge for session ${sessionId}: ${outcome.result.error.message}`);
        return outcome.result;
      }

      const challenge = outcome.result.value;
      if (challenge.challenge_type === 'gusakuza_init') {
        return ok(toView(RIDDLE_ANNOUNCEMENT_ID, challenge));
      }

      const stored = await this.repository.saveChallenge(sessionId, challenge);
      return ok(toView(stored.id, stored));
    });
  }

  async soma(sessionId: string): Promise<Result<ChallengeView, GameError>> {
    return this.locks.run(sessionId, async () => {
      const state = await this.repository.getSession(sessionId);
      if (!state) {
        return err(gameError('not_found', 'Session not found.'));
      }

      const reveal = this.generator.revealRiddle(state);
      if (!reveal.result.ok) {
        return reveal.result;
      }

      const stored = await this.repository.saveChallenge(sessionId, reveal.result.value);
      await this.repository.saveSession(sessionId, reveal.state);
      return ok(toView(stored.id, stored));
    });
  }

  async submitAnswer(
    sessionId: string,
    challengeId: string,
    userAnswer: string
  ): Promise<Result<SubmissionView, GameError>> {
    return this.locks.run(sessionId, async () => {
      const state = await this.repository.getSession(sessionId);
      if (!state) {
        return err(gameError('not_found', 'Session not found.'));
      }

      const challenge = await this.findChallenge(sessionId, challengeId);
      if (!challenge.ok) {
        return challenge;
      }
      if (challenge.value.resolved) {
        return err(gameError('precondition_failed', 'Challenge already answered.'));
      }

      const evaluation = await this.evaluator.evaluate({
        userAnswer,
        targetText: challenge.value.target_text,
        challengeType: challenge.value.challenge_type,
      });

      const transition = applyAnswer(state, { challenge: challenge.value, userAnswer, evaluation }, this.random);

      await this.repository.saveSubmission({
        session_id: sessionId,
        challenge_id: challengeId,
        user_answer: userAnswer,
        is_correct: evaluation.is_correct,
        score: transition.scoreAwarded,
      });
      if (evaluation.is_correct || evaluation.gave_up) {
        await this.repository.resolveChallenge(challengeId);
      }
      await this.repository.saveSession(sessionId, transition.state);

      if (transition.gameOver) {
        this.logger.info('Game', `Session ${sessionId} ran out of lives`);
      }

      return ok({
        message: transition.message,
        is_correct: evaluation.is_correct,
        feedback: evaluation.feedback,
        correct_answer: challenge.value.target_text,
        score_awarded: transition.scoreAwarded,
        new_total_score: await this.repository.getTotalScore(),
        lives: transition.state.lives,
        score: transition.state.score,
        game_mode: transition.state.game_mode,
        difficulty: transition.state.difficulty,
        game_over: transition.gameOver,
      });
    });
  }

  async hint(sessionId: string, challengeId: string): Promise<Result<HintView, GameError>> {
    const challenge = await this.findChallenge(sessionId, challengeId);
    if (!challenge.ok) {
      return challenge;
    }

    const hint = await this.hints.hint(challenge.value);
    return hint.ok ? ok({ challenge_id: challengeId, hint: hint.value }) : hint;
  }

  async saveFeedback(challengeId: string, rating: number, comment?: string): Promise<Result<Feedback, GameError>> {
    const challenge = await this.repository.getChallenge(challengeId);
    if (!challenge) {
      return err(gameError('not_found', 'Challenge not found.'));
    }
    return ok(await this.repository.saveFeedback({ challenge_id: challengeId, rating, comment: comment ?? null }));
  }

  async totalScore(): Promise<number> {
    return this.repository.getTotalScore();
  }

  private async findChallenge(sessionId: string, challengeId: string): Promise<Result<StoredChallenge, GameError>> {
    const challenge = await this.repository.getChallenge(challengeId);
    if (!challenge || challenge.session_id !== sessionId) {
      return err(gameError('not_found', 'Challenge not found.'));
    }
    return ok(challenge);
  }
}

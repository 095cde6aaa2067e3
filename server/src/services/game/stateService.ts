/**
 * Game Session State Service
 * Creates, validates and advances the per-session game record.
 */

import { z } from 'zod';
import {
  Challenge,
  EvaluationResult,
  GAME_MODES,
  GameMode,
  GameSessionState,
} from '../../../../shared/types/index.js';
import { Random, defaultRandom, randomChoice } from '../../utils/random.js';

export const MAX_LIVES = 3;
export const POINTS_PER_CORRECT_ANSWER = 10;
export const MILESTONE_INTERVAL = 50;
export const MAX_DIFFICULTY = 3;

export const GAME_OVER_MESSAGE = 'Game Over! You have no lives left.';

export const gameSessionStateSchema = z.object({
  lives: z.number().int().min(0).max(MAX_LIVES).default(MAX_LIVES),
  score: z.number().int().min(0).default(0),
  difficulty: z.union([z.literal(1), z.literal(2), z.literal(3)]).default(1),
  game_mode: z.enum(GAME_MODES).default('translation'),
  pending_riddle: z.string().nullable().default(null),
  thematic_words: z.array(z.string()).default([]),
  story: z.string().nullable().default(null),
  story_chapter: z.number().int().min(0).default(0),
  incorrect_answers: z.array(z.string()).default([]),
});

export function createInitialState(gameMode: GameMode = 'translation'): GameSessionState {
  return {
    lives: MAX_LIVES,
    score: 0,
    difficulty: 1,
    game_mode: gameMode,
    pending_riddle: null,
    thematic_words: [],
    story: null,
    story_chapter: 0,
    incorrect_answers: [],
  };
}

export function cloneState(state: GameSessionState): GameSessionState {
  return {
    ...state,
    thematic_words: [...state.thematic_words],
    incorrect_answers: [...state.incorrect_answers],
  };
}

// ============================================
// Answer transitions
// ============================================

export interface AnswerOutcome {
  challenge: Pick<Challenge, 'challenge_type' | 'target_text'>;
  userAnswer: string;
  evaluation: EvaluationResult;
}

export interface TransitionResult {
  state: GameSessionState;
  message: string;
  scoreAwarded: number;
  gameOver: boolean;
  unlockedMode: GameMode | null;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function isMilestone(score: number): boolean {
  return score > 0 && score % MILESTONE_INTERVAL === 0;
}

/**
 * Apply the result of one answer submission. Returns a new state; the input
 * is left untouched.
 */
export function applyAnswer(
  current: GameSessionState,
  outcome: AnswerOutcome,
  random: Random = defaultRandom
): TransitionResult {
  const state = cloneState(current);
  const { evaluation, challenge } = outcome;

  if (evaluation.is_correct) {
    state.score += POINTS_PER_CORRECT_ANSWER;
    state.incorrect_answers = [];
    if (challenge.challenge_type === 'gusakuza') {
      state.thematic_words.push(challenge.target_text);
    }

    let message = 'Correct!';
    let unlockedMode: GameMode | null = null;

    if (isMilestone(state.score)) {
      const otherModes = GAME_MODES.filter(mode => mode !== state.game_mode);
      unlockedMode = randomChoice(otherModes, random) ?? null;
      if (unlockedMode) {
        state.game_mode = unlockedMode;
        message += ` You've unlocked a new game mode: ${capitalize(unlockedMode)}!`;
      }
      if (state.difficulty < MAX_DIFFICULTY) {
        state.difficulty = state.difficulty === 1 ? 2 : 3;
        message += ' Difficulty increased.';
      }
    }

    return { state, message, scoreAwarded: POINTS_PER_CORRECT_ANSWER, gameOver: false, unlockedMode };
  }

  // Giving up reveals the answer and leaves lives untouched
  if (evaluation.gave_up) {
    return { state, message: evaluation.feedback, scoreAwarded: 0, gameOver: false, unlockedMode: null };
  }

  state.lives = Math.max(0, state.lives - 1);
  state.incorrect_answers.push(outcome.userAnswer);

  if (state.lives <= 0) {
    state.lives = MAX_LIVES;
    state.score = 0;
    state.incorrect_answers = [];
    state.thematic_words = [];
    return { state, message: GAME_OVER_MESSAGE, scoreAwarded: 0, gameOver: true, unlockedMode: null };
  }

  return {
    state,
    message: 'Incorrect.',
    scoreAwarded: 0,
    gameOver: false,
    unlockedMode: null,
  };
}

/**
 * Answer Evaluator
 *
 * Riddles, proverbs, phrases and story lines are checked by normalized exact
 * match so a model can never talk a wrong cultural answer into a right one.
 * Image descriptions are always accepted. Everything else is judged by the
 * candidate models, with exact match as the fallback verdict.
 */

import { z } from 'zod';
import type { ChallengeType, EvaluationResult } from '../../../../shared/types/index.js';
import { ModelFailoverRunner } from '../ai/router.js';
import { parseJsonResponse } from '../ai/responseParser.js';
import { judgePrompt } from './prompts.js';
import logger from '../../utils/logger.js';

export const GIVE_UP_KEYWORDS = ['gitore', 'ngicyo'] as const;

const EXACT_MATCH_TYPES: ReadonlySet<ChallengeType> = new Set<ChallengeType>([
  'gusakuza',
  'story_translation',
  'kin_to_eng_proverb',
  'eng_to_kin_phrase',
]);

const OPEN_ENDED_TYPES: ReadonlySet<ChallengeType> = new Set<ChallengeType>(['image_description']);

const verdictSchema = z.object({
  is_correct: z.boolean(),
  feedback: z.string(),
});

export interface EvaluationRequest {
  userAnswer: string;
  targetText: string;
  challengeType: ChallengeType;
}

/**
 * Lowercase, drop punctuation and collapse whitespace.
 */
export function normalizeAnswer(text: string): string {
  return text
    .replace(/[^\p{L}\p{N}_\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

export function isGiveUp(userAnswer: string): boolean {
  const lowered = userAnswer.toLowerCase();
  return GIVE_UP_KEYWORDS.some(keyword => lowered.includes(keyword));
}

export function exactMatch(userAnswer: string, targetText: string): EvaluationResult {
  const isCorrect = normalizeAnswer(userAnswer) === normalizeAnswer(targetText);
  return {
    is_correct: isCorrect,
    feedback: isCorrect ? 'Correct!' : `Not quite. The expected answer was: ${targetText}`,
    gave_up: false,
  };
}

export class AnswerEvaluator {
  constructor(private readonly runner: ModelFailoverRunner) {}

  async evaluate(request: EvaluationRequest): Promise<EvaluationResult> {
    const { userAnswer, targetText, challengeType } = request;

    if (isGiveUp(userAnswer)) {
      return {
        is_correct: false,
        feedback: `You gave up. The correct answer was: ${targetText}`,
        gave_up: true,
      };
    }

    if (EXACT_MATCH_TYPES.has(challengeType)) {
      return exactMatch(userAnswer, targetText);
    }

    if (OPEN_ENDED_TYPES.has(challengeType)) {
      return {
        is_correct: true,
        feedback: 'Thank you for your description!',
        gave_up: false,
      };
    }

    return this.judge(userAnswer, targetText);
  }

  private async judge(userAnswer: string, targetText: string): Promise<EvaluationResult> {
    const response = await this.runner.run({ text: judgePrompt(userAnswer, targetText) });
    if (!response.ok) {
      logger.warn('Evaluator', 'No model could judge the answer, using exact match');
      return exactMatch(userAnswer, targetText);
    }

    const verdict = parseJsonResponse(response.text, verdictSchema);
    if (!verdict.ok) {
      logger.warn('Evaluator', `Unreadable verdict from ${response.model}, using exact match`, verdict.error.message);
      return exactMatch(userAnswer, targetText);
    }

    return {
      is_correct: verdict.value.is_correct,
      feedback: verdict.value.feedback || (verdict.value.is_correct ? 'Correct!' : 'Incorrect.'),
      gave_up: false,
    };
  }
}

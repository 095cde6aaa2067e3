import type { Challenge } from '../../../../shared/types/index.js';
import { ModelFailoverRunner } from '../ai/router.js';
import { stripMarkdown } from '../ai/responseParser.js';
import { hintPrompt } from './prompts.js';
import { normalizeAnswer } from './answerEvaluator.js';
import { GameError, Result, gameError, ok, err } from '../../utils/result.js';
import logger from '../../utils/logger.js';

export function letterHint(answer: string): string {
  const letters = answer.replace(/\s+/g, '');
  return `The answer starts with "${letters.charAt(0).toUpperCase()}" and has ${letters.length} letters.`;
}

/**
 * Hints for riddle challenges. A model hint that gives the answer away is
 * replaced by a letter hint.
 */
export class RiddleHintService {
  constructor(private readonly runner: ModelFailoverRunner) {}

  async hint(challenge: Pick<Challenge, 'challenge_type' | 'source_text' | 'target_text'>): Promise<Result<string, GameError>> {
    if (challenge.challenge_type !== 'gusakuza') {
      return err(gameError('precondition_failed', 'Hints are only available for riddles.'));
    }

    const response = await this.runner.run({ text: hintPrompt(challenge.source_text, challenge.target_text) });
    if (response.ok) {
      const hint = stripMarkdown(response.text);
      const answer = normalizeAnswer(challenge.target_text);
      if (hint && answer && !normalizeAnswer(hint).includes(answer)) {
        return ok(hint);
      }
      logger.warn('Hints', 'Model hint revealed the answer or was empty', hint);
    }

    return ok(letterHint(challenge.target_text));
  }
}

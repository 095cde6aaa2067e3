import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { GAME_MODES } from '../../../shared/types/index.js';
import { GameEngine } from '../services/game/gameEngine.js';
import { sendGameError, sendUnexpectedError } from './errors.js';

const createSessionSchema = z.object({
  gameMode: z.enum(GAME_MODES).optional(),
});

const challengeSchema = z.object({
  difficulty: z.coerce.number().int().min(1).max(3).optional(),
  gameMode: z.enum(GAME_MODES).optional(),
});

const answerSchema = z.object({
  challengeId: z.string().min(1),
  userAnswer: z.string().max(2000),
});

export function createSessionsRouter(engine: GameEngine): Router {
  const router = Router();

  // Start a new game session
  router.post('/', async (req: Request, res: Response) => {
    try {
      const { gameMode } = createSessionSchema.parse(req.body ?? {});
      const session = await engine.createSession(gameMode);
      return res.status(201).json(session);
    } catch (error) {
      return sendUnexpectedError(res, 'Sessions', error, 'Failed to create session');
    }
  });

  router.get('/:sessionId', async (req: Request, res: Response) => {
    try {
      const state = await engine.getState(req.params.sessionId);
      if (!state.ok) {
        return sendGameError(res, state.error);
      }
      return res.json({ session_id: req.params.sessionId, state: state.value });
    } catch (error) {
      return sendUnexpectedError(res, 'Sessions', error, 'Failed to load session');
    }
  });

  // Next challenge for the session (target_text is never sent)
  router.post('/:sessionId/challenges', async (req: Request, res: Response) => {
    try {
      const options = challengeSchema.parse(req.body ?? {});
      const challenge = await engine.nextChallenge(req.params.sessionId, options);
      if (!challenge.ok) {
        return sendGameError(res, challenge.error);
      }
      return res.json(challenge.value);
    } catch (error) {
      return sendUnexpectedError(res, 'Sessions', error, 'Failed to generate challenge');
    }
  });

  // Reveal the riddle announced by "Sakwe sakwe!"
  router.post('/:sessionId/soma', async (req: Request, res: Response) => {
    try {
      const challenge = await engine.soma(req.params.sessionId);
      if (!challenge.ok) {
        return sendGameError(res, challenge.error);
      }
      return res.json(challenge.value);
    } catch (error) {
      return sendUnexpectedError(res, 'Sessions', error, 'Failed to reveal riddle');
    }
  });

  router.post('/:sessionId/answers', async (req: Request, res: Response) => {
    try {
      const { challengeId, userAnswer } = answerSchema.parse(req.body);
      const submission = await engine.submitAnswer(req.params.sessionId, challengeId, userAnswer);
      if (!submission.ok) {
        return sendGameError(res, submission.error);
      }
      return res.json(submission.value);
    } catch (error) {
      return sendUnexpectedError(res, 'Sessions', error, 'Failed to submit answer');
    }
  });

  router.post('/:sessionId/challenges/:challengeId/hint', async (req: Request, res: Response) => {
    try {
      const hint = await engine.hint(req.params.sessionId, req.params.challengeId);
      if (!hint.ok) {
        return sendGameError(res, hint.error);
      }
      return res.json(hint.value);
    } catch (error) {
      return sendUnexpectedError(res, 'Sessions', error, 'Failed to generate hint');
    }
  });

  return router;
}

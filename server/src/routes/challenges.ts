import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { GameEngine } from '../services/game/gameEngine.js';
import { sendGameError, sendUnexpectedError } from './errors.js';

const feedbackSchema = z.object({
  rating: z.coerce.number().int().min(1).max(5),
  comment: z.string().max(2000).optional(),
});

export function createChallengesRouter(engine: GameEngine): Router {
  const router = Router();

  // Rate a challenge
  router.post('/:challengeId/feedback', async (req: Request, res: Response) => {
    try {
      const { rating, comment } = feedbackSchema.parse(req.body);
      const feedback = await engine.saveFeedback(req.params.challengeId, rating, comment);
      if (!feedback.ok) {
        return sendGameError(res, feedback.error);
      }
      return res.status(201).json({ feedback_id: feedback.value.id });
    } catch (error) {
      return sendUnexpectedError(res, 'Challenges', error, 'Failed to save feedback');
    }
  });

  return router;
}

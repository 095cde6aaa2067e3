import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { AppContext } from './context.js';
import { createSessionsRouter } from './routes/sessions.js';
import { createChallengesRouter } from './routes/challenges.js';
import { SAMPLE_IMAGE_ROUTE } from './services/game/sampleImages.js';
import logger from './utils/logger.js';

export function createApp(context: AppContext, clientUrl: string): express.Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors({
    origin: clientUrl,
    credentials: true,
  }));
  app.use(morgan('dev'));
  app.use(express.json());

  app.use(SAMPLE_IMAGE_ROUTE, express.static(context.sampleImageDir));

  // Health check
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API Info
  app.get('/api', (req, res) => {
    res.json({
      message: 'Kinyarwanda Quiz API',
      version: '1.0.0',
      devMode: context.devMode,
      models: context.candidateModels,
      endpoints: {
        sessions: {
          create: 'POST /api/sessions',
          get: 'GET /api/sessions/:sessionId',
          nextChallenge: 'POST /api/sessions/:sessionId/challenges',
          soma: 'POST /api/sessions/:sessionId/soma',
          submitAnswer: 'POST /api/sessions/:sessionId/answers',
          hint: 'POST /api/sessions/:sessionId/challenges/:challengeId/hint',
        },
        challenges: {
          feedback: 'POST /api/challenges/:challengeId/feedback',
        },
        score: 'GET /api/score',
      },
    });
  });

  app.get('/api/score', async (req, res, next) => {
    try {
      res.json({ total_score: await context.engine.totalScore() });
    } catch (error) {
      next(error);
    }
  });

  // Routes
  app.use('/api/sessions', createSessionsRouter(context.engine));
  app.use('/api/challenges', createChallengesRouter(context.engine));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error('HTTP', `${req.method} ${req.path} failed`, err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

import { Response } from 'express';
import { z } from 'zod';
import type { ErrorView } from '../../../shared/types/index.js';
import type { GameError } from '../utils/result.js';
import logger from '../utils/logger.js';

const STATUS_BY_KIND: Record<GameError['kind'], number> = {
  resource_unavailable: 503,
  precondition_failed: 400,
  not_found: 404,
};

export function sendGameError(res: Response, error: GameError): Response {
  const body: ErrorView = { error_message: error.message };
  return res.status(STATUS_BY_KIND[error.kind]).json(body);
}

export function sendUnexpectedError(res: Response, category: string, error: unknown, message: string): Response {
  if (error instanceof z.ZodError) {
    return res.status(400).json({ error: 'Validation error', details: error.errors });
  }
  logger.error(category, message, error);
  return res.status(500).json({ error: message });
}

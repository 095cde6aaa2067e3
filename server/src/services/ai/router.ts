/**
 * Model Failover Runner - tries candidate models in order until one answers
 *
 * No backoff and no retries within a candidate: a failing model is skipped
 * and the next one is tried immediately. Every attempt is logged.
 */

import type { ModelInvoker, Prompt } from './types.js';
import defaultLogger, { Logger } from '../../utils/logger.js';

export interface FailedAttempt {
  model: string;
  error: string;
}

export type FailoverResult =
  | { ok: true; text: string; model: string; attempts: FailedAttempt[] }
  | { ok: false; attempts: FailedAttempt[] };

function describePrompt(prompt: Prompt): string {
  const images = prompt.images ?? [];
  if (images.length === 0) {
    return prompt.text;
  }
  const labels = images.map(image => image.label ?? image.mimeType).join(', ');
  return `${prompt.text}\n[Images: ${labels}]`;
}

export class ModelFailoverRunner {
  constructor(
    private readonly candidates: readonly ModelInvoker[],
    private readonly logger: Logger = defaultLogger
  ) {}

  get hasCandidates(): boolean {
    return this.candidates.length > 0;
  }

  get candidateNames(): string[] {
    return this.candidates.map(candidate => candidate.name);
  }

  async run(prompt: Prompt, candidates: readonly ModelInvoker[] = this.candidates): Promise<FailoverResult> {
    const attempts: FailedAttempt[] = [];

    for (const candidate of candidates) {
      this.logger.info('AI Router', `Request to ${candidate.name}`, describePrompt(prompt));

      try {
        const text = await candidate.generate(prompt);
        this.logger.info('AI Router', `Response from ${candidate.name}`, text);
        return { ok: true, text, model: candidate.name, attempts };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn('AI Router', `${candidate.name} failed, trying next model`, message);
        attempts.push({ model: candidate.name, error: message });
      }
    }

    if (candidates.length === 0) {
      this.logger.debug('AI Router', 'No candidate models configured');
    } else {
      this.logger.error('AI Router', 'All candidate models failed', attempts);
    }
    return { ok: false, attempts };
  }
}

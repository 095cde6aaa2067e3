/**
 * Story Engine - keeps a multi-chapter story inside the session state
 *
 * The story is stored as a JSON string in `state.story`; `state.story_chapter`
 * points at the next chapter to turn into a challenge. A new story is
 * generated once every chapter has been used.
 */

import { z } from 'zod';
import type { GameSessionState, StoryData } from '../../../../shared/types/index.js';
import { ModelFailoverRunner } from '../ai/router.js';
import { ParseError, parseJsonResponse } from '../ai/responseParser.js';
import { STORY_PROMPT } from './prompts.js';
import { Result, ok, err } from '../../utils/result.js';
import logger from '../../utils/logger.js';

export const storySchema = z.object({
  title: z.string().min(1),
  chapters: z.array(z.string().trim().min(1)).min(1),
});

export interface Chapter {
  index: number;
  text: string;
  title: string;
}

export function decodeStory(encoded: string | null): StoryData | null {
  if (!encoded) {
    return null;
  }
  try {
    const parsed = storySchema.safeParse(JSON.parse(encoded));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export class StoryEngine {
  constructor(private readonly runner: ModelFailoverRunner) {}

  /**
   * The chapter the next story challenge will use, without advancing.
   */
  currentChapter(state: GameSessionState): Chapter | null {
    const story = decodeStory(state.story);
    if (!story || state.story_chapter < 0 || state.story_chapter >= story.chapters.length) {
      return null;
    }
    return { index: state.story_chapter, text: story.chapters[state.story_chapter], title: story.title };
  }

  /**
   * Make sure `state` holds a story with an unused chapter, generating a new
   * one when it is missing, undecodable or exhausted.
   */
  async ensureChapter(state: GameSessionState): Promise<Result<Chapter, ParseError>> {
    const existing = this.currentChapter(state);
    if (existing) {
      return ok(existing);
    }

    const response = await this.runner.run({ text: STORY_PROMPT });
    if (!response.ok) {
      return err({ kind: 'malformed', message: 'No model produced a story', raw: '' });
    }

    const story = parseJsonResponse(response.text, storySchema);
    if (!story.ok) {
      logger.warn('Story', 'Discarding malformed story', story.error.message);
      return story;
    }

    state.story = JSON.stringify(story.value);
    state.story_chapter = 0;
    logger.info('Story', `New story "${story.value.title}" with ${story.value.chapters.length} chapters`);
    return ok({ index: 0, text: story.value.chapters[0], title: story.value.title });
  }

  advance(state: GameSessionState): void {
    state.story_chapter += 1;
  }
}

/**
 * Challenge Generator
 *
 * Picks the next challenge type from the session state, asks the candidate
 * models for it and turns the `a|b|c` reply into a Challenge. Any model or
 * parsing failure degrades to the static challenge for the active game mode;
 * only a missing riddle bank or image directory is reported to the caller.
 *
 * Selection order:
 *   1. story mode          -> story_translation from the current chapter
 *   2. queued theme word   -> themed_translation
 *   3. sakwe               -> gusakuza_init (riddle bank, no model)
 *      image               -> image_description
 *      translation         -> kin_to_eng_proverb | eng_to_kin_phrase
 */

import type {
  Challenge,
  ChallengeType,
  Difficulty,
  GameMode,
  GameSessionState,
} from '../../../../shared/types/index.js';
import { ModelFailoverRunner } from '../ai/router.js';
import { ImageGenerator, InlineImage, Prompt } from '../ai/types.js';
import { parseDelimited } from '../ai/responseParser.js';
import { RiddleBank, decodeRiddle } from './riddleBank.js';
import { SampleImageLibrary } from './sampleImages.js';
import { StoryEngine } from './storyEngine.js';
import { IMAGE_CONTEXT, riddleAnnouncement, staticChallenge } from './staticChallenges.js';
import * as prompts from './prompts.js';
import { cloneState } from './stateService.js';
import { Random, defaultRandom, randomChoice } from '../../utils/random.js';
import { GameError, Result, gameError, ok, err } from '../../utils/result.js';
import logger from '../../utils/logger.js';

export interface ChallengeRequest {
  difficulty: Difficulty;
  gameMode: GameMode;
  state: GameSessionState;
}

export interface GenerationOutcome {
  result: Result<Challenge, GameError>;
  state: GameSessionState;
  usedFallback: boolean;
}

export interface RiddleReveal {
  result: Result<Challenge, GameError>;
  state: GameSessionState;
}

export interface ChallengeGeneratorDeps {
  runner: ModelFailoverRunner;
  riddles: RiddleBank;
  images: SampleImageLibrary;
  stories: StoryEngine;
  random?: Random;
  imageGenerator?: ImageGenerator;
}

type ModelFields = Result<string[], string>;

export class ChallengeGenerator {
  private readonly runner: ModelFailoverRunner;
  private readonly riddles: RiddleBank;
  private readonly images: SampleImageLibrary;
  private readonly stories: StoryEngine;
  private readonly random: Random;
  private readonly imageGenerator: ImageGenerator | undefined;

  constructor(deps: ChallengeGeneratorDeps) {
    this.runner = deps.runner;
    this.riddles = deps.riddles;
    this.images = deps.images;
    this.stories = deps.stories;
    this.random = deps.random ?? defaultRandom;
    this.imageGenerator = deps.imageGenerator;
  }

  /**
   * Produce the next challenge. The returned state carries the consumed theme
   * word, the story progress and any pending riddle; the input state is not
   * modified.
   */
  async generate(request: ChallengeRequest): Promise<GenerationOutcome> {
    const state = cloneState(request.state);
    const { difficulty, gameMode } = request;

    try {
      if (gameMode === 'story') {
        return await this.storyChallenge(state, difficulty);
      }

      const word = state.thematic_words.shift();
      if (word !== undefined) {
        return await this.themedChallenge(state, difficulty, word, gameMode);
      }

      switch (gameMode) {
        case 'sakwe':
          return this.riddleChallenge(state, difficulty);
        case 'image':
          return await this.imageChallenge(state, difficulty);
        case 'translation':
        default:
          return await this.translationChallenge(state, difficulty);
      }
    } catch (error) {
      logger.error('Challenges', `Error generating ${gameMode} challenge`, error);
      return this.fallback(state, difficulty, gameMode);
    }
  }

  /**
   * Second half of the sakwe/soma exchange: turn the pending riddle into a
   * playable `gusakuza` challenge and clear it.
   */
  revealRiddle(current: GameSessionState): RiddleReveal {
    const state = cloneState(current);
    const pending = state.pending_riddle;
    state.pending_riddle = null;

    if (!pending) {
      return { result: err(gameError('precondition_failed', 'No pending riddle.')), state };
    }

    const riddle = decodeRiddle(pending);
    if (!riddle) {
      logger.warn('Challenges', 'Pending riddle is not a riddle|answer pair', pending);
      return { result: err(gameError('precondition_failed', 'No pending riddle.')), state };
    }

    return {
      result: ok({
        challenge_type: 'gusakuza',
        source_text: riddle.riddle,
        target_text: riddle.answer,
        context: 'Igisakuzo',
        difficulty: state.difficulty,
      }),
      state,
    };
  }

  // ============================================
  // Challenge types
  // ============================================

  private async storyChallenge(state: GameSessionState, difficulty: Difficulty): Promise<GenerationOutcome> {
    const chapter = await this.stories.ensureChapter(state);
    if (!chapter.ok) {
      return this.fallback(state, difficulty, 'story');
    }

    const fields = await this.ask(
      { text: prompts.storyChallengePrompt({ ...this.promptContext(state, difficulty), chapterText: chapter.value.text }) },
      2
    );
    if (!fields.ok) {
      return this.fallback(state, difficulty, 'story');
    }

    this.stories.advance(state);
    return this.success(state, {
      challenge_type: 'story_translation',
      source_text: fields.value[0],
      target_text: fields.value[1],
      context: `Chapter ${chapter.value.index + 1}: ${chapter.value.text}`,
      difficulty,
    });
  }

  private async themedChallenge(
    state: GameSessionState,
    difficulty: Difficulty,
    word: string,
    gameMode: GameMode
  ): Promise<GenerationOutcome> {
    const fields = await this.ask({ text: prompts.themedPrompt(word, this.promptContext(state, difficulty)) }, 2);
    if (!fields.ok) {
      return this.fallback(state, difficulty, gameMode);
    }

    return this.success(state, {
      challenge_type: 'themed_translation',
      source_text: fields.value[0],
      target_text: fields.value[1],
      context: `Theme word: ${word}`,
      difficulty,
    });
  }

  private riddleChallenge(state: GameSessionState, difficulty: Difficulty): GenerationOutcome {
    const result = riddleAnnouncement(this.riddles, difficulty);
    if (result.ok) {
      state.pending_riddle = result.value.target_text;
    }
    return { result, state, usedFallback: false };
  }

  private async imageChallenge(state: GameSessionState, difficulty: Difficulty): Promise<GenerationOutcome> {
    const name = await this.images.pick();
    if (!name) {
      return {
        result: err(gameError('resource_unavailable', `No images found in the ${this.images.directory} directory.`)),
        state,
        usedFallback: false,
      };
    }

    const image = await this.images.load(name);

    if (this.imageGenerator) {
      const generated = await this.generatedImageChallenge(state, difficulty, image);
      if (generated) {
        return this.success(state, generated);
      }
    }

    const fields = await this.ask(
      { text: prompts.imageDescriptionPrompt(this.promptContext(state, difficulty)), images: [image] },
      2
    );
    if (!fields.ok) {
      return this.fallback(state, difficulty, 'image');
    }

    return this.success(state, {
      challenge_type: 'image_description',
      source_text: this.images.publicPath(name),
      target_text: `Kinyarwanda: ${fields.value[0]} | English: ${fields.value[1]}`,
      context: IMAGE_CONTEXT,
      difficulty,
    });
  }

  /**
   * Richer image path: the model writes a new picture concept from the sample
   * photo and the story, and the image model paints it. Returns null so the
   * caller can fall back to describing the sample photo itself.
   */
  private async generatedImageChallenge(
    state: GameSessionState,
    difficulty: Difficulty,
    sample: InlineImage
  ): Promise<Challenge | null> {
    if (!this.imageGenerator) {
      return null;
    }

    const fields = await this.ask(
      { text: prompts.imageConceptPrompt(this.promptContext(state, difficulty)), images: [sample] },
      3
    );
    if (!fields.ok) {
      return null;
    }

    const [imagePrompt, kinyarwanda, english] = fields.value;
    try {
      const dataUrl = await this.imageGenerator(imagePrompt);
      return {
        challenge_type: 'image_description',
        source_text: dataUrl,
        target_text: `Kinyarwanda: ${kinyarwanda} | English: ${english}`,
        context: IMAGE_CONTEXT,
        difficulty,
      };
    } catch (error) {
      logger.warn('Challenges', 'Image generation failed, describing the sample image instead', error);
      return null;
    }
  }

  private async translationChallenge(state: GameSessionState, difficulty: Difficulty): Promise<GenerationOutcome> {
    const options: ChallengeType[] = ['kin_to_eng_proverb', 'eng_to_kin_phrase'];
    const challengeType = randomChoice(options, this.random) ?? 'eng_to_kin_phrase';
    const ctx = this.promptContext(state, difficulty);

    const prompt = challengeType === 'kin_to_eng_proverb' ? prompts.proverbPrompt(ctx) : prompts.phrasePrompt(ctx);
    const fields = await this.ask({ text: prompt }, 2);
    if (!fields.ok) {
      return this.fallback(state, difficulty, 'translation');
    }

    const explanation = challengeType === 'kin_to_eng_proverb' ? fields.value[2] : undefined;
    return this.success(state, {
      challenge_type: challengeType,
      source_text: fields.value[0],
      target_text: fields.value[1],
      context: explanation ? explanation : null,
      difficulty,
    });
  }

  // ============================================
  // Helpers
  // ============================================

  private promptContext(state: GameSessionState, difficulty: Difficulty): prompts.PromptContext {
    return {
      difficulty,
      incorrectAnswers: state.incorrect_answers,
      chapterText: this.stories.currentChapter(state)?.text ?? null,
    };
  }

  private async ask(prompt: Prompt, minFields: number): Promise<ModelFields> {
    const response = await this.runner.run(prompt);
    if (!response.ok) {
      return err('No model answered');
    }

    const parsed = parseDelimited(response.text, minFields);
    if (!parsed.ok) {
      logger.warn('Challenges', `Malformed response from ${response.model}: ${parsed.error.message}`, parsed.error.raw);
      return err(parsed.error.message);
    }
    return ok(parsed.value);
  }

  private success(state: GameSessionState, challenge: Challenge): GenerationOutcome {
    return { result: ok(challenge), state, usedFallback: false };
  }

  private async fallback(
    state: GameSessionState,
    difficulty: Difficulty,
    gameMode: GameMode
  ): Promise<GenerationOutcome> {
    logger.warn('Challenges', `Using static ${gameMode} challenge`);
    try {
      const result = await staticChallenge(gameMode, difficulty, {
        riddles: this.riddles,
        images: this.images,
        random: this.random,
      });
      if (result.ok && result.value.challenge_type === 'gusakuza_init') {
        state.pending_riddle = result.value.target_text;
      }
      return { result, state, usedFallback: true };
    } catch (error) {
      logger.error('Challenges', 'Static challenge failed', error);
      return {
        result: err(gameError('resource_unavailable', `No ${gameMode} challenge is available right now.`)),
        state,
        usedFallback: true,
      };
    }
  }
}

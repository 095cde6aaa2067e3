/**
 * Static challenges used when no model is available or a model response
 * cannot be used. No model calls happen here.
 */

import type { Challenge, Difficulty, GameMode } from '../../../../shared/types/index.js';
import { RiddleBank, encodeRiddle } from './riddleBank.js';
import { SampleImageLibrary } from './sampleImages.js';
import { Random, randomChoice } from '../../utils/random.js';
import { GameError, Result, gameError, ok, err } from '../../utils/result.js';

export const SAKWE_ANNOUNCEMENT = 'Sakwe sakwe!';
export const SAKWE_CONTEXT = "Reply with 'soma' to get the riddle.";
export const IMAGE_CONTEXT = 'Describe the image in either Kinyarwanda or English.';

const STORY_PARAGRAPH =
  "The morning air was crisp and cool in the village of Nyarugenge. Children's laughter echoed as they chased a rolling hoop down the dirt path. In the distance, the lush green hills of Kigali were waking up, ready for a new day.";

const TRANSLATIONS: ReadonlyArray<Omit<Challenge, 'difficulty'>> = [
  {
    challenge_type: 'kin_to_eng_proverb',
    source_text: "Akabando k'iminsi gacibwa kare",
    target_text: 'A walking stick for old age is prepared in advance',
    context: 'Translate this Kinyarwanda proverb to English.',
  },
  {
    challenge_type: 'eng_to_kin_phrase',
    source_text: 'Good morning',
    target_text: 'Mwaramutse',
    context: 'Translate this English phrase to Kinyarwanda.',
  },
];

export interface StaticChallengeSources {
  riddles: RiddleBank;
  images: SampleImageLibrary;
  random: Random;
}

export function riddleAnnouncement(riddles: RiddleBank, difficulty: Difficulty): Result<Challenge, GameError> {
  const riddle = riddles.draw();
  if (!riddle) {
    return err(gameError('resource_unavailable', 'Riddle database is empty.'));
  }
  return ok({
    challenge_type: 'gusakuza_init',
    source_text: SAKWE_ANNOUNCEMENT,
    target_text: encodeRiddle(riddle),
    context: SAKWE_CONTEXT,
    difficulty,
  });
}

export async function staticChallenge(
  gameMode: GameMode,
  difficulty: Difficulty,
  sources: StaticChallengeSources
): Promise<Result<Challenge, GameError>> {
  switch (gameMode) {
    case 'sakwe':
      return riddleAnnouncement(sources.riddles, difficulty);

    case 'image': {
      const name = await sources.images.pick();
      if (!name) {
        return err(gameError('resource_unavailable', `No images found in the ${sources.images.directory} directory.`));
      }
      return ok({
        challenge_type: 'image_description',
        source_text: sources.images.publicPath(name),
        target_text: 'A beautiful Rwandan landscape.',
        context: IMAGE_CONTEXT,
        difficulty,
      });
    }

    case 'story':
      return ok({
        challenge_type: 'story_translation',
        source_text: "Children's laughter echoed.",
        target_text: "Ibitwenge by'abana byumvikanye.",
        context: STORY_PARAGRAPH,
        difficulty,
      });

    case 'translation':
    default: {
      const translation = randomChoice(TRANSLATIONS, sources.random) ?? TRANSLATIONS[0];
      return ok({ ...translation, difficulty });
    }
  }
}

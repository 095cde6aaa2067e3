import type { Difficulty } from '../../../../shared/types/index.js';

const FORMAT_RULE = 'Do not add any other text, titles, or formatting.';

// Only the most recent mistakes are worth steering the model with
const MAX_WEAK_POINTS = 5;

export function levelName(difficulty: Difficulty): 'beginner' | 'intermediate' | 'advanced' {
  switch (difficulty) {
    case 1:
      return 'beginner';
    case 3:
      return 'advanced';
    default:
      return 'intermediate';
  }
}

function weakPoints(incorrectAnswers: readonly string[]): string {
  const recent = incorrectAnswers.slice(-MAX_WEAK_POINTS).filter(answer => answer.trim().length > 0);
  if (recent.length === 0) {
    return '';
  }
  const quoted = recent.map(answer => `'${answer}'`).join(', ');
  return ` The learner recently got these answers wrong: ${quoted}. Practise the vocabulary and grammar behind those mistakes.`;
}

function storyGrounding(chapterText: string | null): string {
  return chapterText ? ` Keep it in the world of this story chapter: '${chapterText}'.` : '';
}

export interface PromptContext {
  difficulty: Difficulty;
  incorrectAnswers: readonly string[];
  chapterText: string | null;
}

export function proverbPrompt(ctx: PromptContext): string {
  return `Provide a Kinyarwanda proverb (${levelName(ctx.difficulty)} level), its English translation and a one-sentence explanation of its meaning, separated by pipes (|). Example: 'Akabando k'iminsi gacibwa kare|A walking stick for old age is prepared in advance|Prepare early for the future.'.${weakPoints(ctx.incorrectAnswers)} ${FORMAT_RULE}`;
}

export function phrasePrompt(ctx: PromptContext): string {
  return `Provide a simple English phrase (${levelName(ctx.difficulty)} level) and its Kinyarwanda translation, separated by a pipe (|). Example: 'Good morning|Mwaramutse'.${weakPoints(ctx.incorrectAnswers)} ${FORMAT_RULE}`;
}

export function storyChallengePrompt(ctx: PromptContext & { chapterText: string }): string {
  return `Based on this chapter of a story: '${ctx.chapterText}', create a language challenge (${levelName(ctx.difficulty)} level). The challenge should be a phrase from the story to translate from English to Kinyarwanda. The output should be in the format 'English phrase|Kinyarwanda translation'.${weakPoints(ctx.incorrectAnswers)} ${FORMAT_RULE}`;
}

export function themedPrompt(word: string, ctx: PromptContext): string {
  return `Write a short Kinyarwanda sentence (${levelName(ctx.difficulty)} level) that uses the word '${word}', followed by its English translation, separated by a pipe (|). Example: 'Amazi ni meza|The water is good'.${storyGrounding(ctx.chapterText)}${weakPoints(ctx.incorrectAnswers)} ${FORMAT_RULE}`;
}

export function imageDescriptionPrompt(ctx: PromptContext): string {
  return `Describe this image of Rwanda in a single, descriptive sentence suitable for a learner at ${levelName(ctx.difficulty)} level. Provide the description in both Kinyarwanda and English, separated by a pipe (|). Example: 'Umusozi w'u Rwanda|A Rwandan hill'.${storyGrounding(ctx.chapterText)}${weakPoints(ctx.incorrectAnswers)} ${FORMAT_RULE}`;
}

export function imageConceptPrompt(ctx: PromptContext): string {
  return `Use this photo of Rwanda as inspiration for a new picture.${storyGrounding(ctx.chapterText)} Reply with three fields separated by pipes (|): a one-sentence English prompt for an image generator, a one-sentence Kinyarwanda description of that new picture, and the same description in English. Example: 'A market at dawn with baskets of fruit|Isoko mu gitondo|A market in the morning'.${weakPoints(ctx.incorrectAnswers)} ${FORMAT_RULE}`;
}

export const STORY_PROMPT = `Write a short, engaging story for a language learning game. The story should be about a character exploring Rwanda. The story should be broken down into 3 chapters. Each chapter should introduce new vocabulary. The story should be in English. The output should be a JSON object with a 'title' and a list of 'chapters', where each chapter is a string. ${FORMAT_RULE}`;

export function judgePrompt(userAnswer: string, targetText: string): string {
  return `You are an expert in Kinyarwanda and English. The target text is '${targetText}'. The user's answer is '${userAnswer}'.
Is the user's answer a correct translation? Consider synonyms and minor grammatical variations.
Respond ONLY with a JSON object: {"is_correct": true or false, "feedback": "one short sentence for the learner"}`;
}

export function hintPrompt(riddle: string, answer: string): string {
  return `This is a Kinyarwanda riddle (igisakuzo): '${riddle}'. Its answer is '${answer}'.
Give the player a one-sentence hint in English that points toward the answer without containing the answer itself. ${FORMAT_RULE}`;
}

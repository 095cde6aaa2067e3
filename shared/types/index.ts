// Game Mode & Challenge Types
export const GAME_MODES = ['story', 'translation', 'sakwe', 'image'] as const;
export type GameMode = (typeof GAME_MODES)[number];

export const CHALLENGE_TYPES = [
  'kin_to_eng_proverb',
  'eng_to_kin_phrase',
  'story_translation',
  'themed_translation',
  'gusakuza_init',
  'gusakuza',
  'image_description',
] as const;
export type ChallengeType = (typeof CHALLENGE_TYPES)[number];

export type Difficulty = 1 | 2 | 3;

// Session State
export interface GameSessionState {
  lives: number;
  score: number;
  difficulty: Difficulty;
  game_mode: GameMode;
  pending_riddle: string | null; // "riddle|answer" between sakwe and soma
  thematic_words: string[];
  story: string | null; // JSON-encoded StoryData
  story_chapter: number;
  incorrect_answers: string[];
}

export interface StoryData {
  title: string;
  chapters: string[];
}

// Challenge & Evaluation
export interface Challenge {
  challenge_type: ChallengeType;
  source_text: string;
  target_text: string;
  context: string | null;
  difficulty: Difficulty;
}

export interface EvaluationResult {
  is_correct: boolean;
  feedback: string;
  gave_up: boolean;
}

// API Response Types
export interface ChallengeView {
  challenge_id: string;
  challenge_type: ChallengeType;
  source_text: string;
  context: string | null;
  difficulty: Difficulty;
}

export interface SubmissionView {
  message: string;
  is_correct: boolean;
  feedback: string;
  correct_answer: string;
  score_awarded: number;
  new_total_score: number;
  lives: number;
  score: number;
  game_mode: GameMode;
  difficulty: Difficulty;
  game_over: boolean;
}

export interface HintView {
  challenge_id: string;
  hint: string;
}

export interface ErrorView {
  error_message: string;
}

export function toDifficulty(value: number): Difficulty {
  if (value <= 1) return 1;
  if (value >= 3) return 3;
  return 2;
}

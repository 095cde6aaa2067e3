import crypto from 'crypto';
import type { Challenge, GameSessionState } from '../../../../shared/types/index.js';

// ============================================
// Records
// ============================================

export interface StoredChallenge extends Challenge {
  id: string;
  session_id: string;
  created_at: string;
  // Set once the challenge is answered correctly or given up
  resolved: boolean;
}

export interface Submission {
  id: string;
  session_id: string;
  challenge_id: string;
  user_answer: string;
  is_correct: boolean;
  score: number;
  submitted_at: string;
}

export interface Feedback {
  id: string;
  challenge_id: string;
  rating: number;
  comment: string | null;
  created_at: string;
}

export interface RepositorySnapshot {
  sessions: Record<string, GameSessionState>;
  challenges: Record<string, StoredChallenge>;
  submissions: Submission[];
  feedback: Feedback[];
}

export type NewSubmission = Omit<Submission, 'id' | 'submitted_at'>;
export type NewFeedback = Omit<Feedback, 'id' | 'created_at'>;

/**
 * Storage behind the game engine. Sessions are read and written whole.
 */
export interface GameRepository {
  createSession(state: GameSessionState): Promise<string>;
  getSession(sessionId: string): Promise<GameSessionState | null>;
  saveSession(sessionId: string, state: GameSessionState): Promise<void>;

  saveChallenge(sessionId: string, challenge: Challenge): Promise<StoredChallenge>;
  getChallenge(challengeId: string): Promise<StoredChallenge | null>;
  resolveChallenge(challengeId: string): Promise<void>;

  saveSubmission(submission: NewSubmission): Promise<Submission>;
  saveFeedback(feedback: NewFeedback): Promise<Feedback>;
  getTotalScore(): Promise<number>;
}

export function emptySnapshot(): RepositorySnapshot {
  return { sessions: {}, challenges: {}, submissions: [], feedback: [] };
}

function clone<T>(value: T): T {
  return structuredClone(value);
}

/**
 * Repository over an in-memory snapshot. Subclasses persist the snapshot
 * after every write.
 */
export class MemoryRepository implements GameRepository {
  protected data: RepositorySnapshot;

  constructor(snapshot: RepositorySnapshot = emptySnapshot()) {
    this.data = snapshot;
  }

  protected async persist(): Promise<void> {}

  async createSession(state: GameSessionState): Promise<string> {
    const sessionId = crypto.randomUUID();
    this.data.sessions[sessionId] = clone(state);
    await this.persist();
    return sessionId;
  }

  async getSession(sessionId: string): Promise<GameSessionState | null> {
    const state = this.data.sessions[sessionId];
    return state ? clone(state) : null;
  }

  async saveSession(sessionId: string, state: GameSessionState): Promise<void> {
    this.data.sessions[sessionId] = clone(state);
    await this.persist();
  }

  async saveChallenge(sessionId: string, challenge: Challenge): Promise<StoredChallenge> {
    const stored: StoredChallenge = {
      ...challenge,
      id: crypto.randomUUID(),
      session_id: sessionId,
      created_at: new Date().toISOString(),
      resolved: false,
    };
    this.data.challenges[stored.id] = stored;
    await this.persist();
    return clone(stored);
  }

  async getChallenge(challengeId: string): Promise<StoredChallenge | null> {
    const challenge = this.data.challenges[challengeId];
    return challenge ? clone(challenge) : null;
  }

  async resolveChallenge(challengeId: string): Promise<void> {
    const challenge = this.data.challenges[challengeId];
    if (challenge) {
      challenge.resolved = true;
      await this.persist();
    }
  }

  async saveSubmission(submission: NewSubmission): Promise<Submission> {
    const stored: Submission = {
      ...submission,
      id: crypto.randomUUID(),
      submitted_at: new Date().toISOString(),
    };
    this.data.submissions.push(stored);
    await this.persist();
    return clone(stored);
  }

  async saveFeedback(feedback: NewFeedback): Promise<Feedback> {
    const stored: Feedback = {
      ...feedback,
      id: crypto.randomUUID(),
      created_at: new Date().toISOString(),
    };
    this.data.feedback.push(stored);
    await this.persist();
    return clone(stored);
  }

  async getTotalScore(): Promise<number> {
    return this.data.submissions.reduce((total, submission) => total + submission.score, 0);
  }
}

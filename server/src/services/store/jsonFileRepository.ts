import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { CHALLENGE_TYPES } from '../../../../shared/types/index.js';
import { gameSessionStateSchema } from '../game/stateService.js';
import { MemoryRepository, RepositorySnapshot, emptySnapshot } from './gameRepository.js';
import logger from '../../utils/logger.js';

const storedChallengeSchema = z.object({
  id: z.string(),
  session_id: z.string(),
  created_at: z.string(),
  challenge_type: z.enum(CHALLENGE_TYPES),
  source_text: z.string(),
  target_text: z.string(),
  context: z.string().nullable().default(null),
  difficulty: z.union([z.literal(1), z.literal(2), z.literal(3)]),
  resolved: z.boolean().default(false),
});

const snapshotSchema = z.object({
  sessions: z.record(gameSessionStateSchema).default({}),
  challenges: z.record(storedChallengeSchema).default({}),
  submissions: z
    .array(
      z.object({
        id: z.string(),
        session_id: z.string(),
        challenge_id: z.string(),
        user_answer: z.string(),
        is_correct: z.boolean(),
        score: z.number(),
        submitted_at: z.string(),
      })
    )
    .default([]),
  feedback: z
    .array(
      z.object({
        id: z.string(),
        challenge_id: z.string(),
        rating: z.number(),
        comment: z.string().nullable(),
        created_at: z.string(),
      })
    )
    .default([]),
});

/**
 * Local JSON file store. The whole snapshot is rewritten through a temp
 * file and a rename after every change.
 */
export class JsonFileRepository extends MemoryRepository {
  private writeQueue: Promise<void> = Promise.resolve();

  private constructor(
    private readonly filePath: string,
    snapshot: RepositorySnapshot
  ) {
    super(snapshot);
  }

  static async open(filePath: string): Promise<JsonFileRepository> {
    return new JsonFileRepository(filePath, await JsonFileRepository.load(filePath));
  }

  private static async load(filePath: string): Promise<RepositorySnapshot> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch {
      logger.info('Store', `No data file at ${filePath}, starting empty`);
      return emptySnapshot();
    }

    try {
      const parsed = snapshotSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
      logger.error('Store', `Data file ${filePath} has an unexpected shape, starting empty`, parsed.error.issues);
    } catch (error) {
      logger.error('Store', `Data file ${filePath} is not valid JSON, starting empty`, error);
    }
    return emptySnapshot();
  }

  protected async persist(): Promise<void> {
    const payload = JSON.stringify(this.data, null, 2);
    const write = this.writeQueue.then(async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      const tempPath = `${this.filePath}.tmp`;
      await fs.writeFile(tempPath, payload, 'utf-8');
      await fs.rename(tempPath, this.filePath);
    });
    this.writeQueue = write.catch(error => {
      logger.error('Store', `Failed to write ${this.filePath}`, error);
    });
    return write;
  }
}

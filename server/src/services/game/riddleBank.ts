/**
 * Riddle Bank - ibisakuzo loaded once at startup
 *
 * Draws avoid repeats until every riddle has been used, and never hand out
 * the same riddle twice in a row.
 */

import fs from 'fs';
import { z } from 'zod';
import { Random, defaultRandom, randomChoice } from '../../utils/random.js';
import logger from '../../utils/logger.js';

export interface Riddle {
  riddle: string;
  answer: string;
}

const riddleSchema = z.object({
  riddle: z.string().trim().min(1),
  answer: z.string().trim().min(1),
});

/**
 * Keep the well-formed entries of an untrusted riddle list. The `|` character
 * is reserved for the pending-riddle encoding.
 */
export function parseRiddles(raw: unknown): Riddle[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  const riddles: Riddle[] = [];
  for (const entry of raw) {
    const parsed = riddleSchema.safeParse(entry);
    if (parsed.success && !parsed.data.riddle.includes('|') && !parsed.data.answer.includes('|')) {
      riddles.push(parsed.data);
    }
  }
  return riddles;
}

export class RiddleBank {
  private readonly riddles: readonly Riddle[];
  private used = new Set<number>();
  private lastIndex: number | null = null;

  constructor(riddles: readonly Riddle[], private readonly random: Random = defaultRandom) {
    this.riddles = [...riddles];
  }

  static fromFile(filePath: string, random: Random = defaultRandom): RiddleBank {
    try {
      const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
      const riddles = parseRiddles(raw);
      logger.info('Riddles', `Loaded ${riddles.length} riddles from ${filePath}`);
      return new RiddleBank(riddles, random);
    } catch (error) {
      logger.warn('Riddles', `Could not load ${filePath}, riddle bank is empty`, error);
      return new RiddleBank([], random);
    }
  }

  get size(): number {
    return this.riddles.length;
  }

  get isEmpty(): boolean {
    return this.riddles.length === 0;
  }

  draw(): Riddle | undefined {
    if (this.isEmpty) {
      return undefined;
    }

    let candidates = this.unusedIndexes();
    if (candidates.length === 0) {
      this.used = new Set();
      candidates = this.unusedIndexes();
    }
    if (candidates.length > 1 && this.lastIndex !== null) {
      candidates = candidates.filter(index => index !== this.lastIndex);
    }

    const index = randomChoice(candidates, this.random);
    if (index === undefined) {
      return undefined;
    }
    this.used.add(index);
    this.lastIndex = index;
    return this.riddles[index];
  }

  private unusedIndexes(): number[] {
    return this.riddles.map((_, index) => index).filter(index => !this.used.has(index));
  }
}

export function encodeRiddle(riddle: Riddle): string {
  return `${riddle.riddle}|${riddle.answer}`;
}

export function decodeRiddle(encoded: string): Riddle | null {
  const separator = encoded.indexOf('|');
  if (separator < 0) {
    return null;
  }
  const riddle = encoded.slice(0, separator).trim();
  const answer = encoded.slice(separator + 1).trim();
  if (!riddle || !answer) {
    return null;
  }
  return { riddle, answer };
}

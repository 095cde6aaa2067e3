import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { JsonFileRepository } from './jsonFileRepository.js';
import { createInitialState } from '../game/stateService.js';

let dir: string;
let file: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'quiz-store-'));
  file = path.join(dir, 'nested', 'game.json');
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('JsonFileRepository', () => {
  it('starts empty without a data file', async () => {
    const repository = await JsonFileRepository.open(file);

    expect(await repository.getSession('any')).toBeNull();
    expect(await repository.getTotalScore()).toBe(0);
  });

  it('keeps sessions, challenges and scores across reopen', async () => {
    const repository = await JsonFileRepository.open(file);
    const sessionId = await repository.createSession({ ...createInitialState('sakwe'), score: 20 });
    const challenge = await repository.saveChallenge(sessionId, {
      challenge_type: 'gusakuza',
      source_text: "Inshyushyu y'umusambi",
      target_text: 'amazi',
      context: 'Igisakuzo',
      difficulty: 1,
    });
    await repository.saveSubmission({
      session_id: sessionId,
      challenge_id: challenge.id,
      user_answer: 'amazi',
      is_correct: true,
      score: 10,
    });

    await repository.resolveChallenge(challenge.id);

    const reopened = await JsonFileRepository.open(file);

    expect((await reopened.getSession(sessionId))?.score).toBe(20);
    expect(await reopened.getChallenge(challenge.id)).toEqual({ ...challenge, resolved: true });
    expect(await reopened.getTotalScore()).toBe(10);
    expect(fs.existsSync(`${file}.tmp`)).toBe(false);
  });

  it('starts empty from a corrupt data file', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, '{"sessions": ');

    const repository = await JsonFileRepository.open(file);

    expect(await repository.getTotalScore()).toBe(0);
  });

  it('fills missing state fields with defaults', async () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify({ sessions: { old: { score: 30, game_mode: 'story' } } }));

    const repository = await JsonFileRepository.open(file);

    expect(await repository.getSession('old')).toEqual({ ...createInitialState('story'), score: 30 });
  });
});

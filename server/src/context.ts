import path from 'path';
import { GoogleGenerativeAI } from '@google/generative-ai';
import Anthropic from '@anthropic-ai/sdk';
import type { Config } from './config/index.js';
import { createGeminiImageGenerator, createGeminiInvoker } from './services/ai/gemini.js';
import { createClaudeInvoker } from './services/ai/claude.js';
import { ModelFailoverRunner } from './services/ai/router.js';
import type { ImageGenerator, ModelInvoker } from './services/ai/types.js';
import { RiddleBank } from './services/game/riddleBank.js';
import { SampleImageLibrary } from './services/game/sampleImages.js';
import { StoryEngine } from './services/game/storyEngine.js';
import { ChallengeGenerator } from './services/game/challengeGenerator.js';
import { AnswerEvaluator } from './services/game/answerEvaluator.js';
import { RiddleHintService } from './services/game/hintService.js';
import { GameEngine } from './services/game/gameEngine.js';
import { JsonFileRepository } from './services/store/jsonFileRepository.js';
import { defaultRandom } from './utils/random.js';
import logger from './utils/logger.js';

/**
 * Everything a request handler needs, built once at startup.
 */
export interface AppContext {
  engine: GameEngine;
  sampleImageDir: string;
  candidateModels: string[];
  devMode: boolean;
}

export function buildCandidates(config: Config): ModelInvoker[] {
  if (config.devMode) {
    return [];
  }

  const candidates: ModelInvoker[] = [];
  if (config.ai.google) {
    const genAI = new GoogleGenerativeAI(config.ai.google);
    for (const modelName of config.ai.geminiModels) {
      candidates.push(createGeminiInvoker(genAI, modelName));
    }
  }
  if (config.ai.anthropic) {
    const client = new Anthropic({ apiKey: config.ai.anthropic });
    candidates.push(createClaudeInvoker(client, config.ai.claudeModel));
  }
  return candidates;
}

function buildImageGenerator(config: Config): ImageGenerator | undefined {
  if (config.devMode || !config.ai.imageGeneration || !config.ai.google) {
    return undefined;
  }
  return createGeminiImageGenerator(new GoogleGenerativeAI(config.ai.google), config.ai.geminiImageModel);
}

export async function createAppContext(config: Config): Promise<AppContext> {
  const random = defaultRandom;
  const runner = new ModelFailoverRunner(buildCandidates(config));
  const sampleImageDir = path.resolve(config.paths.sampleImageDir);

  const generator = new ChallengeGenerator({
    runner,
    riddles: RiddleBank.fromFile(path.resolve(config.paths.riddlesFile), random),
    images: new SampleImageLibrary(sampleImageDir, random),
    stories: new StoryEngine(runner),
    random,
    imageGenerator: buildImageGenerator(config),
  });

  const engine = new GameEngine({
    repository: await JsonFileRepository.open(path.resolve(config.paths.dataDir, 'game.json')),
    generator,
    evaluator: new AnswerEvaluator(runner),
    hints: new RiddleHintService(runner),
    random,
  });

  if (config.devMode) {
    logger.warn('Startup', 'Dev mode: no model calls, static challenges only');
  } else {
    logger.info('Startup', `Candidate models: ${runner.candidateNames.join(', ')}`);
  }

  return {
    engine,
    sampleImageDir,
    candidateModels: runner.candidateNames,
    devMode: config.devMode,
  };
}

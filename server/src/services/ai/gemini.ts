/**
 * Gemini AI Service - text generation (with inline images) and image generation
 */

import { GoogleGenerativeAI, Part } from '@google/generative-ai';
import type { ImageGenerator, ModelInvoker, Prompt } from './types.js';
import logger from '../../utils/logger.js';

function toParts(prompt: Prompt): Part[] {
  const parts: Part[] = [{ text: prompt.text }];
  for (const image of prompt.images ?? []) {
    parts.push({ inlineData: { mimeType: image.mimeType, data: image.data } });
  }
  return parts;
}

export function createGeminiInvoker(genAI: GoogleGenerativeAI, modelName: string): ModelInvoker {
  return {
    name: modelName,
    async generate(prompt: Prompt): Promise<string> {
      const model = genAI.getGenerativeModel({ model: modelName });
      const result = await model.generateContent(toParts(prompt));
      const content = result.response.text();

      if (!content) {
        throw new Error(`No content in ${modelName} response`);
      }
      return content;
    },
  };
}

/**
 * Generate a brand-new picture with Gemini's native image output.
 */
export function createGeminiImageGenerator(genAI: GoogleGenerativeAI, modelName: string): ImageGenerator {
  // responseModalities is newer than the SDK's GenerationConfig typings
  const generationConfig = {
    temperature: 1,
    responseModalities: ['TEXT', 'IMAGE'],
  };

  return async (description: string): Promise<string> => {
    const fullPrompt = `${description}

Style requirements:
Warm natural light, realistic photographic style, a single scene set in Rwanda.

Important: Create a single static image with no text or lettering in it.`;

    logger.info('Gemini', `Generating image with ${modelName}`, fullPrompt.slice(0, 200));

    const model = genAI.getGenerativeModel({ model: modelName, generationConfig });
    const result = await model.generateContent(fullPrompt);
    const parts = result.response.candidates?.[0]?.content?.parts || [];

    for (const part of parts) {
      if ('inlineData' in part && part.inlineData) {
        const { mimeType, data } = part.inlineData;
        return `data:${mimeType};base64,${data}`;
      }
    }

    throw new Error('No image generated in response');
  };
}

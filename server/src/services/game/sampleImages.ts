import fs from 'fs/promises';
import path from 'path';
import type { ImageMimeType, InlineImage } from '../ai/types.js';
import { Random, defaultRandom, randomChoice } from '../../utils/random.js';
import logger from '../../utils/logger.js';

const MIME_TYPES: Record<string, ImageMimeType> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
};

export const SAMPLE_IMAGE_ROUTE = '/sampleimg';

/**
 * Directory of sample photos used by image mode
 */
export class SampleImageLibrary {
  constructor(
    readonly directory: string,
    private readonly random: Random = defaultRandom
  ) {}

  async list(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.directory);
      return entries.filter(name => path.extname(name).toLowerCase() in MIME_TYPES).sort();
    } catch (error) {
      logger.warn('Images', `Cannot read sample image directory ${this.directory}`, error);
      return [];
    }
  }

  async pick(): Promise<string | undefined> {
    return randomChoice(await this.list(), this.random);
  }

  async load(name: string): Promise<InlineImage> {
    const mimeType = MIME_TYPES[path.extname(name).toLowerCase()];
    if (!mimeType) {
      throw new Error(`Unsupported image type: ${name}`);
    }
    const data = await fs.readFile(path.join(this.directory, name));
    return { mimeType, data: data.toString('base64'), label: name };
  }

  publicPath(name: string): string {
    return `${SAMPLE_IMAGE_ROUTE}/${encodeURIComponent(name)}`;
  }
}

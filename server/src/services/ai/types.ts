export type ImageMimeType = 'image/png' | 'image/jpeg' | 'image/gif' | 'image/webp';

export interface InlineImage {
  mimeType: ImageMimeType;
  data: string; // base64
  label?: string;
}

export interface Prompt {
  text: string;
  images?: InlineImage[];
}

/**
 * One generative backend. Implementations do not retry; the failover
 * runner decides what happens after a failure.
 */
export interface ModelInvoker {
  readonly name: string;
  generate(prompt: Prompt): Promise<string>;
}

/**
 * Produces an image from a text prompt and returns it as a data URL.
 */
export type ImageGenerator = (prompt: string) => Promise<string>;

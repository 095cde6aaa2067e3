import Anthropic from '@anthropic-ai/sdk';
import type { ModelInvoker, Prompt } from './types.js';

type UserContent = Array<Anthropic.Messages.TextBlockParam | Anthropic.Messages.ImageBlockParam>;

function toContent(prompt: Prompt): UserContent {
  const content: UserContent = (prompt.images ?? []).map(image => ({
    type: 'image' as const,
    source: {
      type: 'base64' as const,
      media_type: image.mimeType,
      data: image.data,
    },
  }));
  content.push({ type: 'text', text: prompt.text });
  return content;
}

/**
 * Claude as a last-resort candidate behind the Gemini models
 */
export function createClaudeInvoker(client: Anthropic, model: string, maxTokens = 1024): ModelInvoker {
  return {
    name: model,
    async generate(prompt: Prompt): Promise<string> {
      const response = await client.messages.create({
        model,
        max_tokens: maxTokens,
        messages: [{ role: 'user', content: toContent(prompt) }],
      });

      const textContent = response.content.find(
        (block): block is Anthropic.Messages.TextBlock => block.type === 'text'
      );

      if (!textContent?.text) {
        throw new Error(`No text content in ${model} response`);
      }
      return textContent.text;
    },
  };
}

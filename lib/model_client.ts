import OpenAI from 'openai';
import type { ChatCompletionContentPart } from 'openai/resources/chat/completions';
import { ContentModel, GenerateOptions } from '@/types';
import { AppConfig } from './config';
import { ConfigurationError } from './errors';

/**
 * Generative model adapter over OpenAI chat completions.
 * Text-only prompts go as a plain user message; frames are attached as
 * base64 JPEG image parts after the prompt text.
 */

export const DEFAULT_TEMPERATURE = 0.7;

export function buildMessageContent(
  prompt: string,
  images: readonly Buffer[] = []
): string | ChatCompletionContentPart[] {
  if (images.length === 0) return prompt;

  return [
    { type: 'text', text: prompt },
    ...images.map(
      (image): ChatCompletionContentPart => ({
        type: 'image_url',
        image_url: { url: `data:image/jpeg;base64,${image.toString('base64')}` },
      })
    ),
  ];
}

export function createOpenAIModel(config: AppConfig): ContentModel {
  if (!config.openaiApiKey) {
    throw new ConfigurationError('OPENAI_API_KEY is required for content generation');
  }

  const openai = new OpenAI({
    apiKey: config.openaiApiKey,
    timeout: config.requestTimeoutMs,
    maxRetries: 1,
  });
  const model = config.openaiModel;

  return {
    name: model,
    async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
      const response = await openai.chat.completions.create({
        model,
        messages: [
          {
            role: 'user',
            content: buildMessageContent(prompt, options.images),
          },
        ],
        temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error('No response from LLM');
      }
      return content;
    },
  };
}

// src/services/promptTranslator.ts
// What: Japanese -> English translation of image-generation prompts.
// How: One chat completion with a fixed system prompt. Prompts without Japanese script are passed through, and so
//      is the original prompt whenever the API fails or answers with nothing.

import OpenAI from 'openai';
import logger from '../logging.js';

export interface PromptTranslator {
  translate(prompt: string): Promise<string>;
}

type ChatMessage = { role: 'system'; content: string } | { role: 'user'; content: string };

/** Subset of the OpenAI client the translator uses. */
export interface ChatClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        messages: ChatMessage[];
        temperature?: number;
      }): Promise<{ choices: { message: { content: string | null } }[] }>;
    };
  };
}

export interface OpenAITranslatorOptions {
  apiKey?: string;
  client?: ChatClient;
  model: string;
}

const SYSTEM_PROMPT =
  'Translate the user message from Japanese into natural English for a text-to-image model. ' +
  'Reply with the translation only.';

const JAPANESE = /[\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Han}]/u;

export function createOpenAITranslator(opts: OpenAITranslatorOptions): PromptTranslator {
  const client: ChatClient = opts.client ?? new OpenAI({ apiKey: opts.apiKey });

  return {
    async translate(prompt: string): Promise<string> {
      if (!JAPANESE.test(prompt)) return prompt;
      try {
        const completion = await client.chat.completions.create({
          model: opts.model,
          temperature: 0,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: prompt },
          ],
        });
        const translated = completion.choices[0]?.message.content?.trim();
        if (!translated) {
          logger.warn({ model: opts.model }, 'Empty translation; using the original prompt');
          return prompt;
        }
        return translated;
      } catch (err: unknown) {
        logger.warn({ err, model: opts.model }, 'Prompt translation failed; using the original prompt');
        return prompt;
      }
    },
  };
}

import OpenAI from 'openai';
import type {
  ChatCompletionContentPart,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';

import { LlmConfig } from '../types';

export type PromptContent = string | ChatCompletionContentPart[];

export interface TextGenerator {
  generate(content: PromptContent): Promise<string>;
}

/** The slice of the OpenAI client this service calls. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        messages: ChatCompletionMessageParam[];
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export function createOpenAIClient(config: LlmConfig): OpenAI {
  return new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
  });
}

export class ChatCompletionGenerator implements TextGenerator {
  constructor(
    private readonly client: ChatCompletionClient,
    private readonly model: string,
  ) {}

  async generate(content: PromptContent): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: 'user', content }],
    });

    const text = response.choices[0]?.message.content?.trim();
    if (!text) {
      throw new Error(`Model ${this.model} returned an empty completion`);
    }
    return text;
  }
}

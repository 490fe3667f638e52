import OpenAI from 'openai';
import type { OpenAiSettings } from '../../config.js';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ChatCompletionRequest {
  messages: ChatMessage[];
  maxTokens: number;
  temperature: number;
  signal?: AbortSignal;
}

export interface ChatModel {
  readonly name: string;
  complete(request: ChatCompletionRequest): Promise<string | null>;
}

function toMessageParam(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
  return message.role === 'system'
    ? { role: 'system', content: message.content }
    : { role: 'user', content: message.content };
}

export class OpenAiChatModel implements ChatModel {
  private readonly client: OpenAI;

  constructor(private readonly settings: OpenAiSettings, client?: OpenAI) {
    this.client = client ?? new OpenAI({ apiKey: settings.apiKey });
  }

  get name(): string {
    return `openai:${this.settings.chatModel}`;
  }

  async complete(request: ChatCompletionRequest): Promise<string | null> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.settings.chatModel,
        messages: request.messages.map(toMessageParam),
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      },
      { signal: request.signal },
    );
    return completion.choices[0]?.message.content ?? null;
  }
}

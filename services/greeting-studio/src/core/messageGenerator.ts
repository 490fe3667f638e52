import { MessageGenerationError } from '../errors.js';
import type { ChatModel } from '../providers/chat/openai.js';
import type { ChildProfile } from '../types/greeting.js';
import { buildSystemPrompt, buildUserPrompt } from './prompts.js';

export interface MessageGeneratorOptions {
  maxTokens?: number;
  temperature?: number;
}

export class MessageGenerator {
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(private readonly model: ChatModel, options: MessageGeneratorOptions = {}) {
    this.maxTokens = options.maxTokens ?? 400;
    this.temperature = options.temperature ?? 0.9;
  }

  async generate(profile: ChildProfile, signal?: AbortSignal): Promise<string> {
    let content: string | null;
    try {
      content = await this.model.complete({
        messages: [
          { role: 'system', content: buildSystemPrompt(profile.useSlang) },
          { role: 'user', content: buildUserPrompt(profile) },
        ],
        maxTokens: this.maxTokens,
        temperature: this.temperature,
        signal,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MessageGenerationError(`Message generation with ${this.model.name} failed: ${reason}`, { cause: error });
    }

    const text = content?.trim() ?? '';
    if (!text) {
      throw new MessageGenerationError(`${this.model.name} returned an empty message`);
    }
    return text;
  }
}

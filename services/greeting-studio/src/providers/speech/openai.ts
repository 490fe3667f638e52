import OpenAI from 'openai';
import type { OpenAiSettings } from '../../config.js';
import { audioLikeToBuffer } from '../../core/buffer.js';
import type { SpeechProvider, SynthesizeRequest, SynthesizedAudio } from '../../types/speech.js';

export class OpenAiSpeechProvider implements SpeechProvider {
  readonly name = 'openai';
  private readonly client: OpenAI;

  constructor(private readonly settings: OpenAiSettings, client?: OpenAI) {
    this.client = client ?? new OpenAI({ apiKey: settings.apiKey });
  }

  async synthesize(input: SynthesizeRequest): Promise<SynthesizedAudio> {
    const response = await this.client.audio.speech.create(
      {
        model: this.settings.speechModel,
        voice: this.settings.speechVoice,
        input: input.text,
        speed: this.settings.speechSpeed,
        response_format: 'mp3',
      },
      { signal: input.signal },
    );

    return {
      audio: await audioLikeToBuffer(response),
      mimeType: 'audio/mpeg',
      extension: 'mp3',
    };
  }
}

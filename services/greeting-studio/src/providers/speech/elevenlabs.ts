import { ElevenLabsClient } from '@elevenlabs/elevenlabs-js';
import type { ElevenLabsSettings } from '../../config.js';
import { audioLikeToBuffer } from '../../core/buffer.js';
import type { SpeechProvider, SynthesizeRequest, SynthesizedAudio } from '../../types/speech.js';

const OUTPUT_FORMAT = 'mp3_44100_128';

export class ElevenLabsSpeechProvider implements SpeechProvider {
  readonly name = 'elevenlabs';
  private readonly client: ElevenLabsClient;

  constructor(private readonly settings: ElevenLabsSettings) {
    this.client = new ElevenLabsClient({ apiKey: settings.apiKey });
  }

  async synthesize(input: SynthesizeRequest): Promise<SynthesizedAudio> {
    const audioLike = await this.client.textToSpeech.convert(
      this.settings.voiceId,
      {
        text: input.text,
        modelId: this.settings.modelId,
        outputFormat: OUTPUT_FORMAT,
      },
      { abortSignal: input.signal },
    );

    return {
      audio: await audioLikeToBuffer(audioLike),
      mimeType: 'audio/mpeg',
      extension: 'mp3',
    };
  }
}

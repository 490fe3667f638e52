import type { SpeechProviderName } from '../config.js';

export interface SynthesizeRequest {
  text: string;
  signal?: AbortSignal;
}

export interface SynthesizedAudio {
  audio: Buffer;
  mimeType: string;
  extension: string;
}

export interface SpeechProvider {
  readonly name: SpeechProviderName;
  synthesize(input: SynthesizeRequest): Promise<SynthesizedAudio>;
}

export interface SpeechProviders {
  primary?: SpeechProvider;
  secondary?: SpeechProvider;
}

export interface SpeechResult extends SynthesizedAudio {
  provider: SpeechProviderName;
  fellBack: boolean;
}

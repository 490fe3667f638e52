import type { SpeechProviderName, StudioConfig } from '../../config.js';
import { ConfigurationError } from '../../errors.js';
import type { SpeechProvider, SpeechProviders } from '../../types/speech.js';
import { ElevenLabsSpeechProvider } from './elevenlabs.js';
import { MockSpeechProvider } from './mock.js';
import { OpenAiSpeechProvider } from './openai.js';

function createSpeechProvider(name: SpeechProviderName, config: StudioConfig): SpeechProvider {
  if (name === 'mock') {
    return new MockSpeechProvider();
  }
  if (name === 'elevenlabs') {
    if (!config.elevenlabs) throw new ConfigurationError('ElevenLabs speech requested without credentials');
    return new ElevenLabsSpeechProvider(config.elevenlabs);
  }
  if (!config.openai) throw new ConfigurationError('OpenAI speech requested without credentials');
  return new OpenAiSpeechProvider(config.openai);
}

export function createSpeechProviders(config: StudioConfig): SpeechProviders {
  const { primary, secondary } = config.speech;
  return {
    primary: primary ? createSpeechProvider(primary, config) : undefined,
    secondary: secondary ? createSpeechProvider(secondary, config) : undefined,
  };
}

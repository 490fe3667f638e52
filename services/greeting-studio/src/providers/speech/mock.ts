import { randomBytes } from 'crypto';
import { setTimeout as delay } from 'timers/promises';
import type { SpeechProvider, SynthesizeRequest, SynthesizedAudio } from '../../types/speech.js';

function buildFakeMp3(text: string): Buffer {
  const seed = `${Date.now()}-${text.length}-${randomBytes(8).toString('hex')}`;
  return Buffer.from(`FAKE_MP3_DATA::${seed}::${text.slice(0, 120)}`, 'utf8');
}

/** Local-development stand-in: answers after a short simulated latency with placeholder bytes. */
export class MockSpeechProvider implements SpeechProvider {
  readonly name = 'mock';

  constructor(private readonly maxLatencyMs = 2000) {}

  async synthesize(input: SynthesizeRequest): Promise<SynthesizedAudio> {
    const simulatedLatency = Math.min(this.maxLatencyMs, 300 + input.text.length * 2);
    if (simulatedLatency > 0) {
      await delay(simulatedLatency, undefined, { signal: input.signal });
    }

    return {
      audio: buildFakeMp3(input.text),
      mimeType: 'audio/mpeg',
      extension: 'mp3',
    };
  }
}

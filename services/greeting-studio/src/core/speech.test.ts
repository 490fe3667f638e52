import { afterEach, describe, expect, it, vi } from 'vitest';
import type { SpeechProviderName } from '../config.js';
import {
  InvalidSpeechTextError,
  NoFallbackAvailableError,
  NoProviderAvailableError,
  SpeechProviderError,
} from '../errors.js';
import type { SpeechProvider, SynthesizeRequest } from '../types/speech.js';
import { SpeechSynthesizer } from './speech.js';

function fakeProvider(name: SpeechProviderName, outcome: Buffer | Error) {
  const synthesize = vi.fn(async (_input: SynthesizeRequest) => {
    if (outcome instanceof Error) throw outcome;
    return { audio: outcome, mimeType: 'audio/mpeg', extension: 'mp3' };
  });
  const provider: SpeechProvider = { name, synthesize };
  return { provider, synthesize };
}

describe('SpeechSynthesizer', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses the primary provider when it is preferred and succeeds', async () => {
    const primary = fakeProvider('elevenlabs', Buffer.from('primary-audio'));
    const secondary = fakeProvider('openai', Buffer.from('secondary-audio'));
    const synthesizer = new SpeechSynthesizer({ primary: primary.provider, secondary: secondary.provider });

    const result = await synthesizer.speak('Dag Lotte');

    expect(result).toEqual({
      audio: Buffer.from('primary-audio'),
      mimeType: 'audio/mpeg',
      extension: 'mp3',
      provider: 'elevenlabs',
      fellBack: false,
    });
    expect(secondary.synthesize).not.toHaveBeenCalled();
  });

  it('returns exactly the secondary audio after a primary failure', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const primary = fakeProvider('elevenlabs', new Error('quota exceeded'));
    const secondary = fakeProvider('openai', Buffer.from('secondary-audio'));
    const synthesizer = new SpeechSynthesizer({ primary: primary.provider, secondary: secondary.provider });

    const result = await synthesizer.speak('Dag Lotte');
    const secondaryAlone = await new SpeechSynthesizer({ secondary: secondary.provider }).speak('Dag Lotte');

    expect(result.audio.equals(secondaryAlone.audio)).toBe(true);
    expect(result).toMatchObject({ provider: 'openai', fellBack: true });
    expect(primary.synthesize).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith(
      '[greeting-studio] speech fallback from=elevenlabs to=openai reason=quota exceeded',
    );
  });

  it('wraps the primary error when no secondary is configured', async () => {
    const cause = new Error('invalid api key');
    const primary = fakeProvider('elevenlabs', cause);
    const synthesizer = new SpeechSynthesizer({ primary: primary.provider });

    const error = await synthesizer.speak('Dag Lotte').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NoFallbackAvailableError);
    expect(error instanceof NoFallbackAvailableError ? error.cause : undefined).toBe(cause);
  });

  it('goes straight to the secondary when the primary is not preferred', async () => {
    const primary = fakeProvider('elevenlabs', Buffer.from('primary-audio'));
    const secondary = fakeProvider('openai', Buffer.from('secondary-audio'));
    const synthesizer = new SpeechSynthesizer({ primary: primary.provider, secondary: secondary.provider });

    const result = await synthesizer.speak('Dag Lotte', { preferPrimary: false });

    expect(result).toMatchObject({ provider: 'openai', fellBack: false });
    expect(primary.synthesize).not.toHaveBeenCalled();
  });

  it('refuses a request that skips the primary when no secondary is configured', async () => {
    const primary = fakeProvider('elevenlabs', Buffer.from('primary-audio'));
    const synthesizer = new SpeechSynthesizer({ primary: primary.provider });

    await expect(synthesizer.speak('Dag Lotte', { preferPrimary: false })).rejects.toBeInstanceOf(
      NoProviderAvailableError,
    );
    expect(primary.synthesize).not.toHaveBeenCalled();
  });

  it('goes straight to the secondary when no primary is configured', async () => {
    const secondary = fakeProvider('openai', Buffer.from('secondary-audio'));
    const synthesizer = new SpeechSynthesizer({ secondary: secondary.provider });

    await expect(synthesizer.speak('Dag Lotte')).resolves.toMatchObject({ provider: 'openai', fellBack: false });
  });

  it('makes only one fallback hop', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const primary = fakeProvider('elevenlabs', new Error('primary down'));
    const secondary = fakeProvider('openai', new Error('secondary down'));
    const synthesizer = new SpeechSynthesizer({ primary: primary.provider, secondary: secondary.provider });

    const error = await synthesizer.speak('Dag Lotte').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SpeechProviderError);
    expect(error).toMatchObject({ provider: 'openai', message: 'Speech provider openai failed: secondary down' });
    expect(primary.synthesize).toHaveBeenCalledTimes(1);
    expect(secondary.synthesize).toHaveBeenCalledTimes(1);
  });

  it('refuses when no provider is configured', async () => {
    await expect(new SpeechSynthesizer({}).speak('Dag Lotte')).rejects.toBeInstanceOf(NoProviderAvailableError);
  });

  it('rejects blank text before calling any provider', async () => {
    const primary = fakeProvider('elevenlabs', Buffer.from('primary-audio'));
    const synthesizer = new SpeechSynthesizer({ primary: primary.provider });

    await expect(synthesizer.speak('  \n ')).rejects.toBeInstanceOf(InvalidSpeechTextError);
    expect(primary.synthesize).not.toHaveBeenCalled();
  });
});

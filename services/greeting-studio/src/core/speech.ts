import {
  InvalidSpeechTextError,
  NoFallbackAvailableError,
  NoProviderAvailableError,
  SpeechProviderError,
} from '../errors.js';
import type { SpeechProvider, SpeechProviders, SpeechResult } from '../types/speech.js';

export interface SpeakOptions {
  preferPrimary?: boolean;
  signal?: AbortSignal;
}

/**
 * Two-tier speech selection. The primary provider is tried first when asked
 * for and configured; a failure there gets exactly one hop to the secondary.
 * Without a preference for the primary only the secondary is tried.
 */
export class SpeechSynthesizer {
  constructor(private readonly providers: SpeechProviders) {}

  get primaryName(): string | undefined {
    return this.providers.primary?.name;
  }

  get secondaryName(): string | undefined {
    return this.providers.secondary?.name;
  }

  get available(): boolean {
    return Boolean(this.providers.primary || this.providers.secondary);
  }

  async speak(text: string, options: SpeakOptions = {}): Promise<SpeechResult> {
    if (text.trim().length === 0) {
      throw new InvalidSpeechTextError();
    }

    const { primary, secondary } = this.providers;
    const preferPrimary = options.preferPrimary ?? true;

    if (!primary && !secondary) {
      throw new NoProviderAvailableError();
    }

    if (primary && preferPrimary) {
      try {
        return await this.run(primary, text, false, options.signal);
      } catch (error) {
        if (!secondary || options.signal?.aborted) {
          throw new NoFallbackAvailableError(primary.name, error);
        }
        const reason = error instanceof Error ? error.message : String(error);
        console.warn(`[greeting-studio] speech fallback from=${primary.name} to=${secondary.name} reason=${reason}`);
        return this.attempt(secondary, text, true, options.signal);
      }
    }

    if (!secondary) {
      throw new NoProviderAvailableError();
    }
    return this.attempt(secondary, text, false, options.signal);
  }

  private async attempt(
    provider: SpeechProvider,
    text: string,
    fellBack: boolean,
    signal?: AbortSignal,
  ): Promise<SpeechResult> {
    try {
      return await this.run(provider, text, fellBack, signal);
    } catch (error) {
      throw new SpeechProviderError(provider.name, error);
    }
  }

  private async run(
    provider: SpeechProvider,
    text: string,
    fellBack: boolean,
    signal?: AbortSignal,
  ): Promise<SpeechResult> {
    const output = await provider.synthesize({ text, signal });
    return { ...output, provider: provider.name, fellBack };
  }
}

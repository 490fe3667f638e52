import { resolve } from 'path';
import { ConfigurationError } from './errors.js';

const DEFAULT_PORT = 3030;

export type SpeechProviderName = 'elevenlabs' | 'openai' | 'mock';
export type StorageBackend = 'local' | 's3';

export const OPENAI_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;
export type OpenAiVoice = (typeof OPENAI_VOICES)[number];

export interface ElevenLabsSettings {
  apiKey: string;
  voiceId: string;
  modelId: string;
}

export interface OpenAiSettings {
  apiKey: string;
  chatModel: string;
  chatMaxTokens: number;
  chatTemperature: number;
  speechModel: string;
  speechVoice: OpenAiVoice;
  speechSpeed: number;
}

export interface VideoSettings {
  apiKey: string;
  apiBaseUrl: string;
  uploadBaseUrl: string;
  avatarId?: string;
  portraitPath?: string;
  width: number;
  height: number;
  backgroundColor?: string;
  test: boolean;
  pollIntervalSeconds: number;
  pollTimeoutSeconds: number;
  requestTimeoutSeconds: number;
}

export interface S3Settings {
  endpoint: string;
  bucket: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  forcePathStyle: boolean;
  signedUrlTtlSeconds: number;
  keyPrefix: string;
}

export interface StudioConfig {
  port: number;
  publicBaseUrl: string;
  features: {
    messages: boolean;
    speech: boolean;
    video: boolean;
    letter: boolean;
  };
  openai?: OpenAiSettings;
  elevenlabs?: ElevenLabsSettings;
  speech: {
    primary?: SpeechProviderName;
    secondary?: SpeechProviderName;
  };
  video?: VideoSettings;
  letter: {
    backgroundPath?: string;
  };
  storage: {
    backend: StorageBackend;
    artifactsDir: string;
    retentionHours: number;
    cleanupIntervalMs: number;
    s3?: S3Settings;
  };
}

type Env = Record<string, string | undefined>;

function str(env: Env, name: string): string {
  return env[name]?.trim() ?? '';
}

function intFromEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function numberFromEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number.parseFloat(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function boolFromEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw) return fallback;
  const value = raw.toLowerCase().trim();
  if (value === '1' || value === 'true' || value === 'yes') return true;
  if (value === '0' || value === 'false' || value === 'no') return false;
  return fallback;
}

function optional(value: string): string | undefined {
  return value.length > 0 ? value : undefined;
}

function isOpenAiVoice(value: string): value is OpenAiVoice {
  return OPENAI_VOICES.some((voice) => voice === value);
}

function openAiVoiceFromEnv(env: Env): OpenAiVoice {
  const raw = str(env, 'OPENAI_TTS_VOICE').toLowerCase() || 'onyx';
  if (!isOpenAiVoice(raw)) {
    throw new ConfigurationError(`OPENAI_TTS_VOICE must be one of ${OPENAI_VOICES.join(', ')} (got "${raw}")`);
  }
  return raw;
}

function resolveSpeechProviders(
  env: Env,
  elevenlabs: ElevenLabsSettings | undefined,
  openai: OpenAiSettings | undefined,
): StudioConfig['speech'] {
  const requested = str(env, 'SPEECH_PRIMARY').toLowerCase();
  if (requested === 'mock') {
    return { primary: 'mock' };
  }
  if (requested && requested !== 'elevenlabs' && requested !== 'openai') {
    throw new ConfigurationError(`SPEECH_PRIMARY must be elevenlabs, openai or mock (got "${requested}")`);
  }
  if (requested === 'elevenlabs' && !elevenlabs) {
    throw new ConfigurationError('SPEECH_PRIMARY=elevenlabs needs ELEVENLABS_API_KEY and ELEVENLABS_VOICE_ID');
  }
  if (requested === 'openai' && !openai) {
    throw new ConfigurationError('SPEECH_PRIMARY=openai needs OPENAI_API_KEY');
  }

  if (requested === 'openai') {
    return { primary: 'openai', secondary: elevenlabs ? 'elevenlabs' : undefined };
  }
  return {
    primary: elevenlabs ? 'elevenlabs' : undefined,
    secondary: openai ? 'openai' : undefined,
  };
}

/**
 * Builds the one configuration object the service runs with. Every enabled
 * capability must find its credentials here; a half-configured capability
 * fails startup instead of failing the first request.
 */
export function loadConfig(env: Env = process.env): StudioConfig {
  const port = intFromEnv(env, 'PORT', DEFAULT_PORT);
  const features = {
    messages: boolFromEnv(env, 'FEATURE_MESSAGES', true),
    speech: boolFromEnv(env, 'FEATURE_SPEECH', true),
    video: boolFromEnv(env, 'FEATURE_VIDEO', false),
    letter: boolFromEnv(env, 'FEATURE_LETTER', true),
  };

  const openaiKey = str(env, 'OPENAI_API_KEY');
  const openai: OpenAiSettings | undefined = openaiKey
    ? {
        apiKey: openaiKey,
        chatModel: str(env, 'OPENAI_CHAT_MODEL') || 'gpt-4o',
        chatMaxTokens: intFromEnv(env, 'OPENAI_CHAT_MAX_TOKENS', 400),
        chatTemperature: numberFromEnv(env, 'OPENAI_CHAT_TEMPERATURE', 0.9),
        speechModel: str(env, 'OPENAI_TTS_MODEL') || 'tts-1-hd',
        speechVoice: openAiVoiceFromEnv(env),
        speechSpeed: numberFromEnv(env, 'OPENAI_TTS_SPEED', 0.85),
      }
    : undefined;

  const elevenlabsKey = str(env, 'ELEVENLABS_API_KEY');
  const elevenlabsVoice = str(env, 'ELEVENLABS_VOICE_ID');
  if (Boolean(elevenlabsKey) !== Boolean(elevenlabsVoice)) {
    throw new ConfigurationError('ELEVENLABS_API_KEY and ELEVENLABS_VOICE_ID must be set together');
  }
  const elevenlabs: ElevenLabsSettings | undefined = elevenlabsKey
    ? {
        apiKey: elevenlabsKey,
        voiceId: elevenlabsVoice,
        modelId: str(env, 'ELEVENLABS_MODEL_ID') || 'eleven_multilingual_v2',
      }
    : undefined;

  if (features.messages && !openai) {
    throw new ConfigurationError('OPENAI_API_KEY is required when FEATURE_MESSAGES is enabled');
  }

  const speech = features.speech ? resolveSpeechProviders(env, elevenlabs, openai) : {};
  if (features.speech && !speech.primary && !speech.secondary) {
    throw new ConfigurationError(
      'FEATURE_SPEECH needs ELEVENLABS_API_KEY + ELEVENLABS_VOICE_ID and/or OPENAI_API_KEY (or SPEECH_PRIMARY=mock)',
    );
  }
  if (features.video && !features.speech) {
    throw new ConfigurationError('FEATURE_VIDEO needs FEATURE_SPEECH: the avatar speaks the generated audio');
  }

  let video: VideoSettings | undefined;
  if (features.video) {
    const apiKey = str(env, 'HEYGEN_API_KEY');
    if (!apiKey) {
      throw new ConfigurationError('HEYGEN_API_KEY is required when FEATURE_VIDEO is enabled');
    }
    const avatarId = optional(str(env, 'HEYGEN_AVATAR_ID'));
    const portraitPath = optional(str(env, 'VIDEO_PORTRAIT_PATH'));
    if (!avatarId && !portraitPath) {
      throw new ConfigurationError('FEATURE_VIDEO needs HEYGEN_AVATAR_ID or VIDEO_PORTRAIT_PATH');
    }
    video = {
      apiKey,
      apiBaseUrl: str(env, 'HEYGEN_API_BASE') || 'https://api.heygen.com',
      uploadBaseUrl: str(env, 'HEYGEN_UPLOAD_BASE') || 'https://upload.heygen.com',
      avatarId,
      portraitPath: portraitPath ? resolve(process.cwd(), portraitPath) : undefined,
      width: intFromEnv(env, 'VIDEO_WIDTH', 1280),
      height: intFromEnv(env, 'VIDEO_HEIGHT', 720),
      backgroundColor: optional(str(env, 'VIDEO_BACKGROUND_COLOR')),
      test: boolFromEnv(env, 'VIDEO_TEST_MODE', false),
      pollIntervalSeconds: numberFromEnv(env, 'VIDEO_POLL_INTERVAL_SECONDS', 5),
      pollTimeoutSeconds: intFromEnv(env, 'VIDEO_POLL_TIMEOUT_SECONDS', 900),
      requestTimeoutSeconds: numberFromEnv(env, 'VIDEO_REQUEST_TIMEOUT_SECONDS', 120),
    };
  }

  const backendRaw = str(env, 'STORAGE_BACKEND') || 'local';
  if (backendRaw !== 'local' && backendRaw !== 's3') {
    throw new ConfigurationError(`STORAGE_BACKEND must be local or s3 (got "${backendRaw}")`);
  }
  let s3: S3Settings | undefined;
  if (backendRaw === 's3') {
    const endpoint = str(env, 'S3_ENDPOINT');
    const bucket = str(env, 'S3_BUCKET');
    const accessKeyId = str(env, 'S3_ACCESS_KEY_ID');
    const secretAccessKey = str(env, 'S3_SECRET_ACCESS_KEY');
    if (!endpoint) throw new ConfigurationError('S3_ENDPOINT is required when STORAGE_BACKEND=s3');
    if (!bucket) throw new ConfigurationError('S3_BUCKET is required when STORAGE_BACKEND=s3');
    if (!accessKeyId || !secretAccessKey) {
      throw new ConfigurationError('S3_ACCESS_KEY_ID and S3_SECRET_ACCESS_KEY are required when STORAGE_BACKEND=s3');
    }
    s3 = {
      endpoint,
      bucket,
      region: str(env, 'S3_REGION') || 'auto',
      accessKeyId,
      secretAccessKey,
      forcePathStyle: boolFromEnv(env, 'S3_FORCE_PATH_STYLE', true),
      signedUrlTtlSeconds: intFromEnv(env, 'S3_SIGNED_URL_TTL_SECONDS', 3600),
      keyPrefix: str(env, 'S3_KEY_PREFIX') || 'greetings',
    };
  }

  const letterBackground = optional(str(env, 'LETTER_BACKGROUND_PATH'));

  const config: StudioConfig = {
    port,
    publicBaseUrl: (str(env, 'PUBLIC_BASE_URL') || `http://localhost:${port}`).replace(/\/+$/, ''),
    features,
    openai,
    elevenlabs,
    speech,
    video,
    letter: {
      backgroundPath: letterBackground ? resolve(process.cwd(), letterBackground) : undefined,
    },
    storage: {
      backend: backendRaw,
      artifactsDir: resolve(process.cwd(), str(env, 'ARTIFACTS_DIR') || 'data/artifacts'),
      retentionHours: intFromEnv(env, 'ARTIFACT_RETENTION_HOURS', 24),
      cleanupIntervalMs: intFromEnv(env, 'ARTIFACT_CLEANUP_INTERVAL_MS', 30 * 60 * 1000),
      s3,
    },
  };
  return Object.freeze(config);
}

import { AvatarVideo } from 'avatar-video';
import type { StudioConfig } from './config.js';
import { LetterRenderer } from './core/letterRenderer.js';
import { MessageGenerator } from './core/messageGenerator.js';
import { SpeechSynthesizer } from './core/speech.js';
import { VideoJobStore } from './core/videoJobStore.js';
import { VideoPipeline } from './core/videoPipeline.js';
import { OpenAiChatModel } from './providers/chat/openai.js';
import { createSpeechProviders } from './providers/speech/index.js';
import { createArtifactStorage } from './providers/storage/index.js';
import type { AppContext, VideoContext } from './types/appContext.js';

export function buildContext(config: StudioConfig): AppContext {
  const videoJobs = new VideoJobStore(config.storage.retentionHours * 60 * 60 * 1000);

  let video: VideoContext | undefined;
  if (config.features.video && config.video) {
    const sdk = new AvatarVideo({
      apiKey: config.video.apiKey,
      apiBaseUrl: config.video.apiBaseUrl,
      uploadBaseUrl: config.video.uploadBaseUrl,
      requestTimeoutMs: config.video.requestTimeoutSeconds * 1000,
    });
    video = {
      pipeline: new VideoPipeline({ sdk, store: videoJobs, settings: config.video }),
      avatars: sdk.avatars,
      avatarId: config.video.avatarId,
    };
  }

  return {
    config,
    messages:
      config.features.messages && config.openai
        ? new MessageGenerator(new OpenAiChatModel(config.openai), {
            maxTokens: config.openai.chatMaxTokens,
            temperature: config.openai.chatTemperature,
          })
        : undefined,
    speech: new SpeechSynthesizer(createSpeechProviders(config)),
    letters: new LetterRenderer({ backgroundPath: config.letter.backgroundPath }),
    storage: createArtifactStorage(config),
    videoJobs,
    video,
  };
}

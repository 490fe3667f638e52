import type { AvatarVideo } from 'avatar-video';
import type { StudioConfig } from '../config.js';
import type { LetterRenderer } from '../core/letterRenderer.js';
import type { MessageGenerator } from '../core/messageGenerator.js';
import type { SpeechSynthesizer } from '../core/speech.js';
import type { VideoJobStore } from '../core/videoJobStore.js';
import type { VideoPipeline } from '../core/videoPipeline.js';
import type { ArtifactStorage } from '../providers/storage/types.js';

export interface VideoContext {
  pipeline: VideoPipeline;
  avatars: AvatarVideo['avatars'];
  avatarId?: string;
}

export interface AppContext {
  config: StudioConfig;
  messages?: MessageGenerator;
  speech: SpeechSynthesizer;
  letters: LetterRenderer;
  storage: ArtifactStorage;
  videoJobs: VideoJobStore;
  video?: VideoContext;
}

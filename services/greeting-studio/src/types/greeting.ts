export type ChildGender = 'boy' | 'girl';

export interface ChildProfile {
  name: string;
  age: number;
  gender: ChildGender;
  anecdote?: string;
  wishlist?: string;
  favoriteItem?: string;
  shoePlaced: boolean;
  useSlang: boolean;
}

export interface GreetingOutputs {
  audio: boolean;
  video: boolean;
  letter: boolean;
}

export interface GreetingRequest {
  childName: string;
  text: string;
  outputs: GreetingOutputs;
  preferPrimaryVoice: boolean;
}

export type VideoJobStatus = 'queued' | 'running' | 'done' | 'failed' | 'cancelled';

export interface VideoJobRecord {
  id: string;
  child_name: string;
  status: VideoJobStatus;
  progress: number;
  created_at: string;
  started_at?: string;
  completed_at?: string;
  provider_video_id?: string;
  result?: {
    video_url: string;
    thumbnail_url?: string;
    duration_seconds?: number;
  };
  error?: {
    code: string;
    kind: string;
    message: string;
    hint: string;
  };
}

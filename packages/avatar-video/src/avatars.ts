import type { AvatarVideoHttpClient } from './client.js';
import type {
  AvatarCatalog,
  AvatarFilter,
  AvatarListResponse,
  AvatarSummary,
  RequestOptions,
  TalkingPhotoSummary,
} from './types.js';

export function isStudioAvatar(avatar: AvatarSummary): boolean {
  return avatar.avatar_type === 'studio';
}

/** Avatars owned by the account: flagged private and not carrying the public id suffix. */
export function isCustomAvatar(avatar: AvatarSummary): boolean {
  return avatar.is_public === false && !avatar.avatar_id.includes('_public');
}

export function filterAvatars(avatars: AvatarSummary[], filter: AvatarFilter): AvatarSummary[] {
  if (filter === 'studio') return avatars.filter(isStudioAvatar);
  if (filter === 'custom') return avatars.filter(isCustomAvatar);
  return avatars;
}

export class AvatarsResource {
  constructor(private readonly client: AvatarVideoHttpClient) {}

  async list(options?: RequestOptions): Promise<AvatarCatalog> {
    const response = await this.client.request<AvatarListResponse>({
      host: 'api',
      method: 'GET',
      path: '/v2/avatars',
      options,
    });

    const avatars = response?.data?.avatars;
    const talkingPhotos = response?.data?.talking_photos;

    return {
      avatars: (Array.isArray(avatars) ? avatars : []).filter(
        (avatar): avatar is AvatarSummary =>
          typeof avatar === 'object' &&
          avatar !== null &&
          typeof avatar.avatar_id === 'string' &&
          avatar.avatar_id.length > 0,
      ),
      talkingPhotos: (Array.isArray(talkingPhotos) ? talkingPhotos : []).filter(
        (photo): photo is TalkingPhotoSummary => typeof photo === 'object' && photo !== null,
      ),
    };
  }
}

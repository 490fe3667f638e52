import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  AvatarVideo,
  AvatarVideoError,
  ConfigurationError,
  NotFoundError,
  RateLimitError,
  TransportError,
  filterAvatars,
  type AvatarSummary,
} from './index.js';

describe('AvatarVideo', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it('refuses to construct without an API key', () => {
    expect(() => new AvatarVideo({ apiKey: '  ' })).toThrow(ConfigurationError);
  });

  it('maps a 404 status response to NotFoundError', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(JSON.stringify({ code: 400116, message: 'Video not found' }), { status: 404 }),
    );
    const sdk = new AvatarVideo({ apiKey: 'test-key' });

    const error = await sdk.videos.status('vid_missing').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ message: 'Video not found', statusCode: 404 });
  });

  it('carries retry-after on rate limits', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('slow down', { status: 429, headers: { 'retry-after': '30' } }),
    );
    const sdk = new AvatarVideo({ apiKey: 'test-key' });

    const error = await sdk.videos.status('vid_1').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ message: 'slow down', details: { retry_after_seconds: 30 } });
  });

  it('keeps the status code of server errors', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('', { status: 502 }));
    const sdk = new AvatarVideo({ apiKey: 'test-key' });

    const error = await sdk.videos.status('vid_1').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AvatarVideoError);
    expect(error).toMatchObject({
      statusCode: 502,
      message: 'Avatar video API request failed with status 502',
    });
  });

  it('wraps network failures as TransportError', async () => {
    vi.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));
    const sdk = new AvatarVideo({ apiKey: 'test-key' });

    const error = await sdk.videos.status('vid_1').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: 'GET /v1/video_status.get failed: fetch failed' });
  });

  it('gives up on a request that never answers', async () => {
    vi.spyOn(globalThis, 'fetch').mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        }),
    );
    const sdk = new AvatarVideo({ apiKey: 'test-key', requestTimeoutMs: 50 });

    const error = await sdk.videos.status('vid_1').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: 'GET /v1/video_status.get timed out after 50ms' });
  });

  it('refuses a non-positive request timeout', () => {
    expect(() => new AvatarVideo({ apiKey: 'test-key', requestTimeoutMs: 0 })).toThrow(ConfigurationError);
  });

  it('skips null entries in the avatar catalog', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(
        JSON.stringify({
          data: {
            avatars: [null, { avatar_id: 'sint_studio', avatar_name: 'Sint', avatar_type: 'studio' }],
            talking_photos: [null],
          },
        }),
        { status: 200 },
      ),
    );
    const sdk = new AvatarVideo({ apiKey: 'test-key' });

    const catalog = await sdk.avatars.list();

    expect(catalog).toEqual({
      avatars: [{ avatar_id: 'sint_studio', avatar_name: 'Sint', avatar_type: 'studio' }],
      talkingPhotos: [],
    });
  });

  it('lists avatars and talking photos', async () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(
        JSON.stringify({
          error: null,
          data: {
            avatars: [
              { avatar_id: 'Sint_public_1', avatar_name: 'Public Sint', avatar_type: 'studio', is_public: true },
              { avatar_id: '', avatar_name: 'Broken' },
            ],
            talking_photos: [{ talking_photo_id: 'tp_1', talking_photo_name: 'Portrait' }],
          },
        }),
        { status: 200 },
      ),
    );
    const sdk = new AvatarVideo({ apiKey: 'test-key' });

    const catalog = await sdk.avatars.list();

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.heygen.com/v2/avatars');
    expect(catalog.avatars.map((avatar) => avatar.avatar_id)).toEqual(['Sint_public_1']);
    expect(catalog.talkingPhotos).toEqual([{ talking_photo_id: 'tp_1', talking_photo_name: 'Portrait' }]);
  });
});

describe('filterAvatars', () => {
  const avatars: AvatarSummary[] = [
    { avatar_id: 'studio_public', avatar_name: 'Stock', avatar_type: 'studio', is_public: true },
    { avatar_id: 'mine_1', avatar_name: 'Mine', avatar_type: 'studio', is_public: false },
    { avatar_id: 'photo_public_2', avatar_name: 'Photo', avatar_type: 'photo', is_public: false },
    { avatar_id: 'mine_photo', avatar_name: 'My photo', avatar_type: 'photo', is_public: false },
  ];

  it('keeps animated studio avatars', () => {
    expect(filterAvatars(avatars, 'studio').map((avatar) => avatar.avatar_id)).toEqual(['studio_public', 'mine_1']);
  });

  it('keeps private avatars without the public suffix', () => {
    expect(filterAvatars(avatars, 'custom').map((avatar) => avatar.avatar_id)).toEqual(['mine_1', 'mine_photo']);
  });

  it('returns everything for all', () => {
    expect(filterAvatars(avatars, 'all')).toHaveLength(4);
  });
});

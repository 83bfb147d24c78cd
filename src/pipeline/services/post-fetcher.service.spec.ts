import { Logger } from '@nestjs/common';
import { LedgerCorruptError } from '../errors/pipeline.errors';
import { FetchOptions, Post, RawSnapshot } from '../types/pipeline.types';
import { DedupLedgerService } from './dedup-ledger.service';
import { LedgerBackend, MemoryLedgerBackend } from './ledger-backend';
import { passesFilters, PostFetcherService } from './post-fetcher.service';
import { FetchedPost } from './social-api.service';

const NOW = new Date('2026-10-18T12:00:00.000Z');

const fetched = (
  id: string,
  overrides: Partial<FetchedPost> = {},
): FetchedPost => ({
  id,
  author: { username: 'alice', name: 'Alice' },
  text: `post ${id}`,
  url: `https://x.com/alice/status/${id}`,
  createdAt: '2026-10-18T10:00:00.000Z',
  viewCount: 10,
  likeCount: 1,
  repostCount: 0,
  replyCount: 0,
  hasMedia: false,
  isReply: false,
  lang: 'en',
  isRepost: false,
  ...overrides,
});

const options = (overrides: Partial<FetchOptions> = {}): FetchOptions => ({
  primaryHandle: '',
  customHandles: ['alice'],
  excludeHandles: [],
  postsPerAccount: 20,
  accountMaxPages: 5,
  maxFollowings: 0,
  queryGroups: [],
  trendingEnabled: false,
  excludeReposts: true,
  excludeReplies: true,
  filters: {
    language: 'all',
    minLikes: 0,
    minReposts: 0,
    includeKeywords: [],
    excludeKeywords: [],
  },
  windowHours: 8,
  ...overrides,
});

function setup(backend: LedgerBackend = new MemoryLedgerBackend()) {
  const social = {
    getFollowings: jest.fn(),
    getUserPosts: jest.fn(),
    searchPosts: jest.fn(),
  };
  const storage = {
    ensureWritable: jest.fn().mockResolvedValue(undefined),
    saveSnapshot: jest
      .fn()
      .mockResolvedValue('/data/raw/snapshot_20261018_200000.json'),
    loadFollowingsCache: jest.fn().mockResolvedValue(null),
    saveFollowingsCache: jest.fn().mockResolvedValue(undefined),
  };
  const service = new PostFetcherService(
    social as never,
    new DedupLedgerService(backend),
    storage as never,
  );
  return { social, storage, service };
}

function savedSnapshot(storage: { saveSnapshot: jest.Mock }): RawSnapshot {
  const calls = storage.saveSnapshot.mock.calls;
  return calls[calls.length - 1][0];
}

describe('PostFetcherService', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    warnSpy = jest
      .spyOn(Logger.prototype, 'warn')
      .mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('yields an empty snapshot when the same content is fetched twice', async () => {
    const backend = new MemoryLedgerBackend();
    const page = { posts: [fetched('1'), fetched('2')], nextCursor: null };

    const first = setup(backend);
    first.social.getUserPosts.mockResolvedValue(page);
    const firstSummary = await first.service.collect(options(), NOW);

    const second = setup(backend);
    second.social.getUserPosts.mockResolvedValue(page);
    const secondSummary = await second.service.collect(options(), NOW);

    expect(firstSummary.postCount).toBe(2);
    expect(secondSummary.postCount).toBe(0);
    expect(secondSummary.skippedSeen).toBe(2);
    expect(savedSnapshot(second.storage).posts).toEqual([]);
    expect(Object.keys(backend.snapshot()).sort()).toEqual(['1', '2']);
  });

  it('sees ids another run recorded between two collects of one instance', async () => {
    const backend = new MemoryLedgerBackend();
    const { social, service } = setup(backend);
    social.getUserPosts.mockResolvedValueOnce({
      posts: [fetched('1')],
      nextCursor: null,
    });
    await service.collect(options(), NOW);

    await backend.save(
      new Map([
        ['1', NOW.toISOString()],
        ['2', NOW.toISOString()],
      ]),
    );
    social.getUserPosts.mockResolvedValueOnce({
      posts: [fetched('2')],
      nextCursor: null,
    });
    const second = await service.collect(options(), NOW);

    expect(second.postCount).toBe(0);
    expect(second.skippedSeen).toBe(1);
    expect(Object.keys(backend.snapshot()).sort()).toEqual(['1', '2']);
  });

  it('pages backward until the window boundary is crossed', async () => {
    const { social, storage, service } = setup();
    social.getUserPosts
      .mockResolvedValueOnce({
        posts: [
          fetched('1', { createdAt: '2026-10-18T11:00:00.000Z' }),
          fetched('2', { createdAt: '2026-10-18T09:00:00.000Z' }),
        ],
        nextCursor: 'c1',
      })
      .mockResolvedValueOnce({
        posts: [
          fetched('3', { createdAt: '2026-10-18T07:00:00.000Z' }),
          fetched('4', { createdAt: '2026-10-18T01:00:00.000Z' }),
        ],
        nextCursor: 'c2',
      });

    const summary = await service.collect(options(), NOW);

    expect(social.getUserPosts).toHaveBeenCalledTimes(2);
    expect(social.getUserPosts).toHaveBeenNthCalledWith(2, 'alice', 'c1');
    expect(savedSnapshot(storage).posts.map((post) => post.id)).toEqual([
      '1',
      '2',
      '3',
    ]);
    expect(summary.apiCallCount).toBe(2);
  });

  it('stops at the per-account cap', async () => {
    const { social, storage, service } = setup();
    social.getUserPosts.mockResolvedValue({
      posts: [fetched('1'), fetched('2'), fetched('3')],
      nextCursor: 'more',
    });

    await service.collect(options({ postsPerAccount: 2 }), NOW);

    expect(social.getUserPosts).toHaveBeenCalledTimes(1);
    expect(savedSnapshot(storage).posts.map((post) => post.id)).toEqual([
      '1',
      '2',
    ]);
  });

  it('drops reposts and replies but keeps posts with an unparsable date', async () => {
    const { social, storage, service } = setup();
    social.getUserPosts.mockResolvedValue({
      posts: [
        fetched('1', { isRepost: true }),
        fetched('2', { isReply: true }),
        fetched('3', { createdAt: '' }),
      ],
      nextCursor: null,
    });

    await service.collect(options(), NOW);

    expect(savedSnapshot(storage).posts.map((post) => post.id)).toEqual([
      '3',
    ]);
  });

  it('applies language, engagement and keyword filters to followed posts', async () => {
    const { social, storage, service } = setup();
    social.getUserPosts.mockResolvedValue({
      posts: [
        fetched('1', { lang: 'fr', text: 'Model release', likeCount: 9 }),
        fetched('2', { text: 'Model release', likeCount: 2 }),
        fetched('3', { text: 'Model release', likeCount: 9, repostCount: 0 }),
        fetched('4', {
          text: 'Model release giveaway',
          likeCount: 9,
          repostCount: 3,
        }),
        fetched('5', { text: 'lunch photos', likeCount: 9, repostCount: 3 }),
        fetched('6', {
          lang: 'EN',
          text: 'New MODEL weights',
          likeCount: 9,
          repostCount: 3,
        }),
      ],
      nextCursor: null,
    });

    await service.collect(
      options({
        filters: {
          language: 'en',
          minLikes: 5,
          minReposts: 1,
          includeKeywords: ['model'],
          excludeKeywords: ['giveaway'],
        },
      }),
      NOW,
    );

    expect(savedSnapshot(storage).posts.map((post) => post.id)).toEqual([
      '6',
    ]);
  });

  it('leaves trending posts to the group thresholds', async () => {
    const { social, storage, service } = setup();
    social.getUserPosts.mockResolvedValue({ posts: [], nextCursor: null });
    social.searchPosts.mockResolvedValue({
      posts: [fetched('8', { lang: 'ja', likeCount: 0 })],
      nextCursor: null,
    });

    await service.collect(
      options({
        trendingEnabled: true,
        queryGroups: [
          { name: 'g', query: 'q', minLikes: 0, minViews: 0, maxPosts: 5 },
        ],
        filters: {
          language: 'en',
          minLikes: 5,
          minReposts: 0,
          includeKeywords: [],
          excludeKeywords: [],
        },
      }),
      NOW,
    );

    expect(savedSnapshot(storage).posts.map((post) => post.id)).toEqual([
      '8',
    ]);
  });

  it('keeps the most viewed trending posts when a group is capped', async () => {
    const { social, storage, service } = setup();
    social.getUserPosts.mockResolvedValue({ posts: [], nextCursor: null });
    social.searchPosts.mockImplementation(
      async (_query: string, sort: string) =>
        sort === 'Latest'
          ? {
              posts: [
                fetched('1', { viewCount: 100 }),
                fetched('2', { viewCount: 900 }),
              ],
              nextCursor: null,
            }
          : {
              posts: [
                fetched('3', { viewCount: 50 }),
                fetched('4', { viewCount: 400 }),
              ],
              nextCursor: null,
            },
    );

    await service.collect(
      options({
        trendingEnabled: true,
        queryGroups: [
          { name: 'g', query: 'q', minLikes: 0, minViews: 0, maxPosts: 2 },
        ],
      }),
      NOW,
    );

    expect(savedSnapshot(storage).posts.map((post) => post.id)).toEqual([
      '2',
      '4',
    ]);
  });

  it('isolates a failing account from the rest of the run', async () => {
    const { social, storage, service } = setup();
    social.getUserPosts.mockImplementation(async (handle: string) => {
      if (handle === 'alice') {
        throw new Error('status=503');
      }
      return {
        posts: [
          fetched('9', { author: { username: 'bob', name: 'Bob' } }),
        ],
        nextCursor: null,
      };
    });

    const summary = await service.collect(
      options({ customHandles: ['alice', 'bob'] }),
      NOW,
    );

    expect(summary.postCount).toBe(1);
    expect(savedSnapshot(storage).accountCount).toBe(2);
    expect(warnSpy).toHaveBeenCalledWith(
      'account fetch failed: @alice kept=0 status=503',
    );
  });

  it('tags trending matches and prefers the followed copy of a shared id', async () => {
    const { social, storage, service } = setup();
    social.getUserPosts.mockResolvedValue({
      posts: [fetched('1')],
      nextCursor: null,
    });
    social.searchPosts.mockImplementation(
      async (_query: string, sort: string) =>
        sort === 'Latest'
          ? {
              posts: [
                fetched('1', { likeCount: 50, viewCount: 500 }),
                fetched('5', { likeCount: 50, viewCount: 500 }),
                fetched('6', { likeCount: 2, viewCount: 500 }),
              ],
              nextCursor: null,
            }
          : {
              posts: [
                fetched('5', { likeCount: 50, viewCount: 500 }),
                fetched('7', { likeCount: 20, viewCount: 200 }),
              ],
              nextCursor: null,
            },
    );

    const summary = await service.collect(
      options({
        trendingEnabled: true,
        queryGroups: [
          { name: 'g', query: 'q', minLikes: 10, minViews: 100, maxPosts: 10 },
        ],
      }),
      NOW,
    );

    const posts = savedSnapshot(storage).posts;
    expect(
      posts.map((post) => [post.id, post.provenance, post.matchedQueryGroup]),
    ).toEqual([
      ['1', 'followed', undefined],
      ['5', 'trending', 'g'],
      ['7', 'trending', 'g'],
    ]);
    expect(social.searchPosts).toHaveBeenCalledWith('q', 'Latest');
    expect(social.searchPosts).toHaveBeenCalledWith('q', 'Top');
    expect(summary.followedCount).toBe(1);
    expect(summary.trendingCount).toBe(2);
    expect(summary.apiCallCount).toBe(3);
  });

  it('skips a failing query group without failing the run', async () => {
    const { social, service } = setup();
    social.getUserPosts.mockResolvedValue({
      posts: [fetched('1')],
      nextCursor: null,
    });
    social.searchPosts.mockRejectedValue(new Error('status=429'));

    const summary = await service.collect(
      options({
        trendingEnabled: true,
        queryGroups: [
          { name: 'g', query: 'q', minLikes: 0, minViews: 0, maxPosts: 10 },
        ],
      }),
      NOW,
    );

    expect(summary.postCount).toBe(1);
    expect(summary.trendingCount).toBe(0);
    expect(warnSpy).toHaveBeenCalledWith('query group skipped: g status=429');
  });

  it('keeps the first occurrence unless a followed copy replaces a trending one', () => {
    const { service } = setup();
    const base = {
      author: { username: 'a', name: 'A' },
      text: '',
      url: '',
      createdAt: '',
      viewCount: 0,
      likeCount: 0,
      repostCount: 0,
      replyCount: 0,
      hasMedia: false,
      isReply: false,
      lang: '',
    };
    const posts: Post[] = [
      { ...base, id: 'a', provenance: 'trending', matchedQueryGroup: 'g' },
      { ...base, id: 'b', provenance: 'followed', text: 'first' },
      { ...base, id: 'a', provenance: 'followed' },
      { ...base, id: 'b', provenance: 'followed', text: 'second' },
    ];

    const merged = service.mergeByProvenance(posts);

    expect(merged.map((post) => [post.id, post.provenance])).toEqual([
      ['a', 'followed'],
      ['b', 'followed'],
    ]);
    expect(merged[1].text).toBe('first');
  });

  it('resolves handles from a fresh followings cache plus custom handles', async () => {
    const { social, storage, service } = setup();
    storage.loadFollowingsCache.mockResolvedValue({
      handle: 'me',
      updatedAt: '2026-10-18T06:00:00.000Z',
      accounts: [{ username: 'carol', name: 'Carol' }],
    });

    const handles = await service.resolveHandles(
      options({
        primaryHandle: 'me',
        customHandles: ['bob', 'CAROL', 'dave'],
        excludeHandles: ['Bob'],
      }),
      NOW,
    );

    expect(handles).toEqual(['carol', 'dave']);
    expect(social.getFollowings).not.toHaveBeenCalled();
  });

  it('refreshes a stale followings cache', async () => {
    const { social, storage, service } = setup();
    storage.loadFollowingsCache.mockResolvedValue({
      handle: 'me',
      updatedAt: '2026-10-16T00:00:00.000Z',
      accounts: [{ username: 'old', name: 'Old' }],
    });
    social.getFollowings.mockResolvedValue([
      { username: 'new', name: 'New' },
    ]);

    const handles = await service.resolveHandles(
      options({ primaryHandle: 'me', customHandles: [] }),
      NOW,
    );

    expect(handles).toEqual(['new']);
    expect(social.getFollowings).toHaveBeenCalledWith('me', 0);
    expect(storage.saveFollowingsCache).toHaveBeenCalledWith({
      handle: 'me',
      updatedAt: NOW.toISOString(),
      accounts: [{ username: 'new', name: 'New' }],
    });
  });

  it('aborts before writing anything when the ledger is corrupt', async () => {
    const backend: LedgerBackend = {
      location: '/data/state/seen_posts.json',
      load: jest
        .fn()
        .mockRejectedValue(
          new LedgerCorruptError('/data/state/seen_posts.json', 'bad json'),
        ),
      save: jest.fn(),
    };
    const { social, storage, service } = setup(backend);

    await expect(service.collect(options(), NOW)).rejects.toBeInstanceOf(
      LedgerCorruptError,
    );
    expect(social.getUserPosts).not.toHaveBeenCalled();
    expect(storage.saveSnapshot).not.toHaveBeenCalled();
  });
});

describe('passesFilters', () => {
  const open = {
    language: 'all',
    minLikes: 0,
    minReposts: 0,
    includeKeywords: [],
    excludeKeywords: [],
  };

  it('accepts everything when no filter is set', () => {
    expect(passesFilters(fetched('1', { lang: '' }), open)).toBe(true);
  });

  it('lets an exclude keyword win over an include keyword', () => {
    const post = fetched('1', { text: 'Agent demo, sponsored' });

    expect(
      passesFilters(post, {
        ...open,
        includeKeywords: ['agent'],
        excludeKeywords: ['sponsored'],
      }),
    ).toBe(false);
    expect(passesFilters(post, { ...open, includeKeywords: ['agent'] })).toBe(
      true,
    );
  });
});

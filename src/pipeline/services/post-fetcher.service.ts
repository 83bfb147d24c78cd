import { Injectable, Logger } from '@nestjs/common';
import {
  ACCOUNT_MAX_PAGES,
  CUSTOM_HANDLES,
  EXCLUDE_HANDLES,
  EXCLUDE_REPLIES,
  EXCLUDE_REPOSTS,
  FETCH_CONCURRENCY,
  FILTER_EXCLUDE_KEYWORDS,
  FILTER_INCLUDE_KEYWORDS,
  FILTER_LANGUAGE,
  FILTER_MIN_LIKES,
  FILTER_MIN_REPOSTS,
  FOLLOWINGS_CACHE_HOURS,
  MAX_FOLLOWINGS,
  POSTS_PER_ACCOUNT,
  PRIMARY_HANDLE,
  RAW_DIR,
  TRENDING_ENABLED,
  WINDOW_HOURS,
} from '../config/pipeline.constants';
import { QUERY_GROUPS } from '../config/query-groups';
import {
  CollectSummary,
  FetchOptions,
  FollowedAccount,
  Post,
  PostFilters,
  QueryGroup,
} from '../types/pipeline.types';
import { mapWithConcurrency } from '../utils/concurrency.util';
import { computeAgeHours } from '../utils/date.util';
import { DedupLedgerService } from './dedup-ledger.service';
import { PipelineStorageService } from './pipeline-storage.service';
import {
  FetchedPost,
  SearchSort,
  SocialApiService,
} from './social-api.service';

const SEARCH_SORTS: SearchSort[] = ['Latest', 'Top'];

interface FetchStats {
  apiCalls: number;
}

export function defaultFetchOptions(): FetchOptions {
  return {
    primaryHandle: PRIMARY_HANDLE,
    customHandles: CUSTOM_HANDLES,
    excludeHandles: EXCLUDE_HANDLES,
    postsPerAccount: POSTS_PER_ACCOUNT,
    accountMaxPages: ACCOUNT_MAX_PAGES,
    maxFollowings: MAX_FOLLOWINGS,
    queryGroups: QUERY_GROUPS,
    trendingEnabled: TRENDING_ENABLED,
    excludeReposts: EXCLUDE_REPOSTS,
    excludeReplies: EXCLUDE_REPLIES,
    filters: {
      language: FILTER_LANGUAGE,
      minLikes: FILTER_MIN_LIKES,
      minReposts: FILTER_MIN_REPOSTS,
      includeKeywords: FILTER_INCLUDE_KEYWORDS,
      excludeKeywords: FILTER_EXCLUDE_KEYWORDS,
    },
    windowHours: WINDOW_HOURS,
  };
}

/**
 * Language, engagement and keyword checks for followed-account posts.
 * Keywords match case-insensitively anywhere in the text; an exclude hit
 * wins over an include hit.
 */
export function passesFilters(
  post: FetchedPost,
  filters: PostFilters,
): boolean {
  if (
    filters.language !== 'all' &&
    post.lang.toLowerCase() !== filters.language
  ) {
    return false;
  }
  if (
    post.likeCount < filters.minLikes ||
    post.repostCount < filters.minReposts
  ) {
    return false;
  }
  const text = post.text.toLowerCase();
  if (filters.excludeKeywords.some((keyword) => text.includes(keyword))) {
    return false;
  }
  return (
    filters.includeKeywords.length === 0 ||
    filters.includeKeywords.some((keyword) => text.includes(keyword))
  );
}

/**
 * Collects followed-account and trending posts, drops anything the ledger
 * has already seen and writes one raw snapshot per run. The ledger is
 * loaded before any output is written and flushed once, after the
 * snapshot is on disk.
 */
@Injectable()
export class PostFetcherService {
  private readonly logger = new Logger(PostFetcherService.name);

  constructor(
    private readonly social: SocialApiService,
    private readonly ledger: DedupLedgerService,
    private readonly storage: PipelineStorageService,
  ) {}

  async collect(
    options: FetchOptions = defaultFetchOptions(),
    now: Date = new Date(),
  ): Promise<CollectSummary> {
    const startedAt = Date.now();
    this.logger.log(
      `collect start: window=${options.windowHours}h perAccount=${options.postsPerAccount} groups=${options.trendingEnabled ? options.queryGroups.length : 0}`,
    );

    await this.ledger.load();
    await this.storage.ensureWritable(RAW_DIR);

    const stats: FetchStats = { apiCalls: 0 };
    const handles = await this.resolveHandles(options, now);
    const followed = (
      await mapWithConcurrency(handles, FETCH_CONCURRENCY, (handle) =>
        this.fetchAccount(handle, options, now, stats),
      )
    ).flat();
    const trending = options.trendingEnabled
      ? (
          await mapWithConcurrency(
            options.queryGroups,
            FETCH_CONCURRENCY,
            (group) => this.fetchGroup(group, options, now, stats),
          )
        ).flat()
      : [];

    const merged = this.mergeByProvenance([...followed, ...trending]);
    const fresh = merged.filter((post) => !this.ledger.contains(post.id));
    const skippedSeen = merged.length - fresh.length;

    const snapshotFile = await this.storage.saveSnapshot({
      capturedAt: now.toISOString(),
      windowHours: options.windowHours,
      accountCount: handles.length,
      posts: fresh,
      apiCallCount: stats.apiCalls,
    });
    this.ledger.markSeen(
      fresh.map((post) => post.id),
      now,
    );
    await this.ledger.flush(now);

    const summary: CollectSummary = {
      snapshotFile,
      postCount: fresh.length,
      followedCount: fresh.filter((post) => post.provenance === 'followed')
        .length,
      trendingCount: fresh.filter((post) => post.provenance === 'trending')
        .length,
      skippedSeen,
      apiCallCount: stats.apiCalls,
    };
    this.logger.log(
      `collect done: posts=${summary.postCount} followed=${summary.followedCount} trending=${summary.trendingCount} skippedSeen=${skippedSeen} apiCalls=${stats.apiCalls} elapsedMs=${Date.now() - startedAt}`,
    );
    return summary;
  }

  /**
   * Deduplicates by id keeping the first occurrence, except that a
   * followed copy replaces an earlier trending one.
   */
  mergeByProvenance(posts: Post[]): Post[] {
    const byId = new Map<string, Post>();
    for (const post of posts) {
      const existing = byId.get(post.id);
      if (!existing) {
        byId.set(post.id, post);
      } else if (
        existing.provenance === 'trending' &&
        post.provenance === 'followed'
      ) {
        byId.set(post.id, post);
      }
    }
    return [...byId.values()];
  }

  async resolveHandles(options: FetchOptions, now: Date): Promise<string[]> {
    const followed = options.primaryHandle
      ? await this.loadFollowings(
          options.primaryHandle,
          options.maxFollowings,
          now,
        )
      : [];
    const excluded = new Set(
      options.excludeHandles.map((handle) => handle.toLowerCase()),
    );
    const seen = new Set<string>();
    const out: string[] = [];
    for (const handle of [
      ...followed.map((account) => account.username),
      ...options.customHandles,
    ]) {
      const key = handle.toLowerCase();
      if (!handle || seen.has(key) || excluded.has(key)) {
        continue;
      }
      seen.add(key);
      out.push(handle);
    }
    return out;
  }

  private async loadFollowings(
    handle: string,
    maxFollowings: number,
    now: Date,
  ): Promise<FollowedAccount[]> {
    const cached = await this.storage.loadFollowingsCache(handle);
    const ageHours = computeAgeHours(cached?.updatedAt ?? '', now);
    if (
      cached &&
      ageHours !== null &&
      ageHours >= 0 &&
      ageHours < FOLLOWINGS_CACHE_HOURS
    ) {
      this.logger.log(
        `followings cache hit: handle=${handle} accounts=${cached.accounts.length} ageHours=${ageHours.toFixed(1)}`,
      );
      return this.capFollowings(cached.accounts, maxFollowings);
    }

    try {
      const accounts = await this.social.getFollowings(handle, maxFollowings);
      await this.storage.saveFollowingsCache({
        handle,
        updatedAt: now.toISOString(),
        accounts,
      });
      this.logger.log(
        `followings fetched: handle=${handle} accounts=${accounts.length}`,
      );
      return accounts;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (cached) {
        this.logger.warn(
          `followings refresh failed, using stale cache: handle=${handle} ${message}`,
        );
        return this.capFollowings(cached.accounts, maxFollowings);
      }
      this.logger.warn(`followings unavailable: handle=${handle} ${message}`);
      return [];
    }
  }

  private capFollowings(
    accounts: FollowedAccount[],
    maxFollowings: number,
  ): FollowedAccount[] {
    return maxFollowings > 0 ? accounts.slice(0, maxFollowings) : accounts;
  }

  private async fetchAccount(
    handle: string,
    options: FetchOptions,
    now: Date,
    stats: FetchStats,
  ): Promise<Post[]> {
    const out: Post[] = [];
    let cursor: string | undefined;
    try {
      for (let page = 0; page < options.accountMaxPages; page += 1) {
        stats.apiCalls += 1;
        const result = await this.social.getUserPosts(handle, cursor);
        let crossedWindow = false;
        for (const fetched of result.posts) {
          if (!this.isWithinWindow(fetched, options.windowHours, now)) {
            crossedWindow = true;
            continue;
          }
          if (
            this.isFilteredOut(fetched, options) ||
            !passesFilters(fetched, options.filters)
          ) {
            continue;
          }
          out.push(this.toPost(fetched, 'followed'));
          if (out.length >= options.postsPerAccount) {
            return out;
          }
        }
        if (crossedWindow || !result.nextCursor) {
          break;
        }
        cursor = result.nextCursor;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `account fetch failed: @${handle} kept=${out.length} ${message}`,
      );
    }
    return out;
  }

  private async fetchGroup(
    group: QueryGroup,
    options: FetchOptions,
    now: Date,
    stats: FetchStats,
  ): Promise<Post[]> {
    const candidates: FetchedPost[] = [];
    const ids = new Set<string>();
    try {
      for (const sort of SEARCH_SORTS) {
        stats.apiCalls += 1;
        const result = await this.social.searchPosts(group.query, sort);
        for (const fetched of result.posts) {
          if (
            ids.has(fetched.id) ||
            fetched.likeCount < group.minLikes ||
            fetched.viewCount < group.minViews ||
            !this.isWithinWindow(fetched, options.windowHours, now) ||
            this.isFilteredOut(fetched, options)
          ) {
            continue;
          }
          ids.add(fetched.id);
          candidates.push(fetched);
        }
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`query group skipped: ${group.name} ${message}`);
      return [];
    }
    const ranked = [...candidates].sort((a, b) => b.viewCount - a.viewCount);
    return (group.maxPosts > 0 ? ranked.slice(0, group.maxPosts) : ranked).map(
      (fetched) => this.toPost(fetched, 'trending', group.name),
    );
  }

  private isWithinWindow(
    post: FetchedPost,
    windowHours: number,
    now: Date,
  ): boolean {
    const age = computeAgeHours(post.createdAt, now);
    return age === null || age <= windowHours;
  }

  private isFilteredOut(post: FetchedPost, options: FetchOptions): boolean {
    return (
      (options.excludeReposts && post.isRepost) ||
      (options.excludeReplies && post.isReply)
    );
  }

  private toPost(
    fetched: FetchedPost,
    provenance: Post['provenance'],
    matchedQueryGroup?: string,
  ): Post {
    const post: Post = {
      id: fetched.id,
      author: fetched.author,
      text: fetched.text,
      url: fetched.url,
      createdAt: fetched.createdAt,
      viewCount: fetched.viewCount,
      likeCount: fetched.likeCount,
      repostCount: fetched.repostCount,
      replyCount: fetched.replyCount,
      hasMedia: fetched.hasMedia,
      isReply: fetched.isReply,
      lang: fetched.lang,
      provenance,
    };
    if (matchedQueryGroup) {
      post.matchedQueryGroup = matchedQueryGroup;
    }
    return post;
  }
}

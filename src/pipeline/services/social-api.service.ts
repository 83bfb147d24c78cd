import { Injectable, Logger } from '@nestjs/common';
import {
  FOLLOWING_API_BASE,
  RETRY_BASE_DELAY_MS,
  RETRY_JITTER_RATIO,
  RETRY_MAX_DELAY_MS,
  RETRY_MAX_RETRIES,
  SOCIAL_API_BASE,
  SOCIAL_TIMEOUT_MS,
} from '../config/pipeline.constants';
import { FollowedAccount, Post } from '../types/pipeline.types';
import { parseDateToIso } from '../utils/date.util';
import { asCount, asRecord, asString } from '../utils/record.util';
import { RetryPolicy, runWithRetry, sleep } from '../utils/retry.util';
import { cleanText, postUrl } from '../utils/text.util';

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

export type FetchedPost = Omit<Post, 'provenance' | 'matchedQueryGroup'> & {
  isRepost: boolean;
};

export interface PostPage {
  posts: FetchedPost[];
  nextCursor: string | null;
}

export type SearchSort = 'Latest' | 'Top';

type HttpResult =
  | { ok: true; status: number; json: Record<string, unknown> }
  | { ok: false; status: number; detail: string };

export class SocialApiError extends Error {
  constructor(
    readonly endpoint: string,
    readonly status: number,
    detail: string,
  ) {
    super(`social api request failed: ${endpoint} status=${status} ${detail}`);
    this.name = 'SocialApiError';
  }
}

/**
 * Client for the two collaborator APIs the fetcher polls: a relationship
 * API (who the primary account follows) and a content API (recent posts of
 * a handle, topic search). Every request has a timeout and bounded retry.
 */
@Injectable()
export class SocialApiService {
  private readonly logger = new Logger(SocialApiService.name);
  private readonly retryPolicy: RetryPolicy = {
    maxRetries: RETRY_MAX_RETRIES,
    baseDelayMs: RETRY_BASE_DELAY_MS,
    maxDelayMs: RETRY_MAX_DELAY_MS,
    jitterRatio: RETRY_JITTER_RATIO,
  };

  protected sleep(ms: number): Promise<void> {
    return sleep(ms);
  }

  async getFollowings(
    handle: string,
    maxAccounts: number,
  ): Promise<FollowedAccount[]> {
    const token = (process.env.FOLLOWING_API_TOKEN ?? '').trim();
    const headers = { Authorization: `Bearer ${token}` };
    const user = await this.getJson(
      `${FOLLOWING_API_BASE}/users/by/username/${encodeURIComponent(handle)}`,
      headers,
    );
    const userId = asString(asRecord(user.data)?.id);
    if (!userId) {
      throw new SocialApiError('users/by/username', 200, 'missing user id');
    }

    const accounts: FollowedAccount[] = [];
    let paginationToken = '';
    for (;;) {
      const params = new URLSearchParams({
        max_results: '1000',
        'user.fields': 'username,name',
      });
      if (paginationToken) {
        params.set('pagination_token', paginationToken);
      }
      const page = await this.getJson(
        `${FOLLOWING_API_BASE}/users/${userId}/following?${params.toString()}`,
        headers,
      );
      for (const item of Array.isArray(page.data) ? page.data : []) {
        const record = asRecord(item);
        const username = asString(record?.username);
        if (username) {
          accounts.push({ username, name: asString(record?.name) || username });
        }
      }
      if (maxAccounts > 0 && accounts.length >= maxAccounts) {
        return accounts.slice(0, maxAccounts);
      }
      paginationToken = asString(asRecord(page.meta)?.next_token);
      if (!paginationToken) {
        return accounts;
      }
    }
  }

  async getUserPosts(handle: string, cursor?: string): Promise<PostPage> {
    const params = new URLSearchParams({ userName: handle });
    if (cursor) {
      params.set('cursor', cursor);
    }
    const json = await this.getJson(
      `${SOCIAL_API_BASE}/user/last_tweets?${params.toString()}`,
      this.contentHeaders(),
    );
    return this.toPage(json);
  }

  async searchPosts(
    query: string,
    sort: SearchSort,
    cursor?: string,
  ): Promise<PostPage> {
    const params = new URLSearchParams({ query, queryType: sort });
    if (cursor) {
      params.set('cursor', cursor);
    }
    const json = await this.getJson(
      `${SOCIAL_API_BASE}/tweet/advanced_search?${params.toString()}`,
      this.contentHeaders(),
    );
    return this.toPage(json);
  }

  toFetchedPost(raw: unknown): FetchedPost | null {
    const record = asRecord(raw);
    const id = asString(record?.id).trim();
    if (!record || !id) {
      return null;
    }
    const author = asRecord(record.author);
    const username = asString(author?.userName ?? author?.username);
    const text = cleanText(asString(record.text));
    const extended = asRecord(record.extendedEntities);
    const entities = asRecord(record.entities);
    const media = extended?.media ?? entities?.media;

    return {
      id,
      author: { username, name: asString(author?.name) || username },
      text,
      url: asString(record.url) || postUrl(username, id),
      createdAt: parseDateToIso(asString(record.createdAt)),
      viewCount: asCount(record.viewCount),
      likeCount: asCount(record.likeCount),
      repostCount: asCount(record.retweetCount),
      replyCount: asCount(record.replyCount),
      hasMedia: Array.isArray(media) && media.length > 0,
      isReply: record.isReply === true,
      lang: asString(record.lang),
      isRepost:
        record.type === 'retweet' ||
        Boolean(asRecord(record.retweeted_tweet)) ||
        text.startsWith('RT @'),
    };
  }

  private toPage(json: Record<string, unknown>): PostPage {
    const data = asRecord(json.data);
    const rawPosts = Array.isArray(json.tweets)
      ? json.tweets
      : Array.isArray(data?.tweets)
        ? data.tweets
        : [];
    const posts = rawPosts
      .map((raw) => this.toFetchedPost(raw))
      .filter((post): post is FetchedPost => post !== null);
    const hasNext = json.has_next_page === true || data?.has_next_page === true;
    const nextCursor = asString(json.next_cursor ?? data?.next_cursor);
    return { posts, nextCursor: hasNext && nextCursor ? nextCursor : null };
  }

  private contentHeaders(): Record<string, string> {
    return { 'X-API-Key': (process.env.SOCIAL_API_KEY ?? '').trim() };
  }

  private async getJson(
    url: string,
    headers: Record<string, string>,
  ): Promise<Record<string, unknown>> {
    const endpoint = this.describeUrl(url);
    const run = await runWithRetry(
      () => this.requestOnce(url, headers),
      (result) =>
        result.ok
          ? { ok: true }
          : {
              ok: false,
              retryable:
                result.status === 0 || RETRYABLE_STATUS.has(result.status),
              reason: `status=${result.status}`,
            },
      {
        policy: this.retryPolicy,
        sleep: (ms) => this.sleep(ms),
        onWait: (state) =>
          this.logger.warn(
            `social api retry: ${endpoint} attempt=${state.attempt} ${state.reason} waitMs=${state.delayMs}`,
          ),
      },
    );

    const result = run.value;
    if (!result.ok) {
      throw new SocialApiError(endpoint, result.status, result.detail);
    }
    return result.json;
  }

  private async requestOnce(
    url: string,
    headers: Record<string, string>,
  ): Promise<HttpResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), SOCIAL_TIMEOUT_MS);
    try {
      const res = await fetch(url, {
        headers: { Accept: 'application/json', ...headers },
        signal: controller.signal,
      });
      const raw = await res.text();
      if (!res.ok) {
        return { ok: false, status: res.status, detail: raw.slice(0, 180) };
      }
      let json: Record<string, unknown> | null = null;
      try {
        json = asRecord(JSON.parse(raw));
      } catch {
        json = null;
      }
      if (!json) {
        return { ok: false, status: res.status, detail: 'non-json body' };
      }
      return { ok: true, status: res.status, json };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, status: 0, detail: message };
    } finally {
      clearTimeout(timeout);
    }
  }

  private describeUrl(url: string): string {
    try {
      const parsed = new URL(url);
      return `${parsed.hostname}${parsed.pathname}`;
    } catch {
      return url.slice(0, 80);
    }
  }
}

import {
  AnalysisResult,
  DetailLevel,
  FailedChunk,
  Post,
  RawSnapshot,
  UrgentPost,
} from '../types/pipeline.types';
import { parseDetailLevel } from '../config/pipeline.constants';
import {
  asCount,
  asRecord,
  asString,
  asStringArray,
} from './record.util';
import { postUrl } from './text.util';

// On-disk artifacts use snake_case keys; in-memory types use camelCase.

export function postToFile(post: Post): Record<string, unknown> {
  return {
    id: post.id,
    author: { username: post.author.username, name: post.author.name },
    text: post.text,
    url: post.url,
    created_at: post.createdAt,
    view_count: post.viewCount,
    like_count: post.likeCount,
    retweet_count: post.repostCount,
    reply_count: post.replyCount,
    lang: post.lang,
    provenance: post.provenance,
    matched_query_group: post.matchedQueryGroup,
    has_media: post.hasMedia,
    is_reply: post.isReply,
  };
}

export function postFromFile(value: unknown): Post | null {
  const record = asRecord(value);
  const id = asString(record?.id).trim();
  if (!record || !id) {
    return null;
  }
  const author = asRecord(record.author);
  const username = asString(author?.username);
  const provenance = record.provenance === 'trending' ? 'trending' : 'followed';
  const group = asString(record.matched_query_group);
  return {
    id,
    author: { username, name: asString(author?.name) || username },
    text: asString(record.text),
    url: asString(record.url) || postUrl(username, id),
    createdAt: asString(record.created_at),
    viewCount: asCount(record.view_count),
    likeCount: asCount(record.like_count),
    repostCount: asCount(record.retweet_count),
    replyCount: asCount(record.reply_count),
    hasMedia: record.has_media === true,
    isReply: record.is_reply === true,
    lang: asString(record.lang),
    provenance,
    ...(provenance === 'trending' && group ? { matchedQueryGroup: group } : {}),
  };
}

export function snapshotToFile(snapshot: RawSnapshot): Record<string, unknown> {
  return {
    captured_at: snapshot.capturedAt,
    window_hours: snapshot.windowHours,
    followings_count: snapshot.accountCount,
    posts: snapshot.posts.map(postToFile),
    api_calls: snapshot.apiCallCount,
  };
}

export function snapshotFromFile(value: unknown): RawSnapshot | null {
  const record = asRecord(value);
  const capturedAt = asString(record?.captured_at);
  if (!record || !capturedAt || !Array.isArray(record.posts)) {
    return null;
  }
  return {
    capturedAt,
    windowHours: Number(record.window_hours) || 0,
    accountCount: asCount(record.followings_count),
    posts: record.posts
      .map(postFromFile)
      .filter((post): post is Post => post !== null),
    apiCallCount: asCount(record.api_calls),
  };
}

function failedChunksFromFile(value: unknown): FailedChunk[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const out: FailedChunk[] = [];
  for (const item of value) {
    const record = asRecord(item);
    if (!record) {
      continue;
    }
    out.push({
      index: asCount(record.index),
      postIds: asStringArray(record.post_ids),
      reason: asString(record.reason),
    });
  }
  return out;
}

function urgentPostsFromFile(value: unknown): UrgentPost[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const out: UrgentPost[] = [];
  for (const item of value) {
    const record = asRecord(item);
    const id = asString(record?.id);
    if (!record || !id) {
      continue;
    }
    out.push({
      id,
      author: asString(record.author),
      text: asString(record.text),
      url: asString(record.url),
    });
  }
  return out;
}

export function analysisToFile(
  result: AnalysisResult,
): Record<string, unknown> {
  return {
    analyzed_at: result.analyzedAt,
    source_files: result.sourceFiles,
    source_captured_at: result.sourceCapturedAt,
    window_hours: result.windowHours,
    model: result.model,
    detail_level: result.detailLevel,
    post_count: result.postCount,
    relevant_ids: result.relevantIds,
    urgent_ids: result.urgentIds,
    urgent_posts: result.urgentPosts,
    narrative_text: result.narrativeText,
    narrative_degraded: result.narrativeDegraded,
    summary_omitted_posts: result.summaryOmittedPosts,
    failed_chunks: result.failedChunks.map((chunk) => ({
      index: chunk.index,
      post_ids: chunk.postIds,
      reason: chunk.reason,
    })),
  };
}

export function analysisFromFile(value: unknown): AnalysisResult | null {
  const record = asRecord(value);
  const analyzedAt = asString(record?.analyzed_at);
  if (!record || !analyzedAt) {
    return null;
  }
  const detailLevel: DetailLevel =
    parseDetailLevel(asString(record.detail_level)) ?? 'standard';
  const windowHours = Number(record.window_hours);
  return {
    analyzedAt,
    sourceFiles: asStringArray(record.source_files),
    sourceCapturedAt: asString(record.source_captured_at) || analyzedAt,
    windowHours:
      Number.isFinite(windowHours) && windowHours > 0 ? windowHours : null,
    model: asString(record.model),
    detailLevel,
    postCount: asCount(record.post_count),
    relevantIds: asStringArray(record.relevant_ids),
    urgentIds: asStringArray(record.urgent_ids),
    urgentPosts: urgentPostsFromFile(record.urgent_posts),
    narrativeText: asString(record.narrative_text),
    narrativeDegraded: record.narrative_degraded === true,
    summaryOmittedPosts: asCount(record.summary_omitted_posts),
    failedChunks: failedChunksFromFile(record.failed_chunks),
  };
}

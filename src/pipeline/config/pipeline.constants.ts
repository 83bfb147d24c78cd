import path from 'node:path';
import { DetailLevel } from '../types/pipeline.types';

function readNumber(envName: string, fallback: number, min = 0): number {
  const raw = Number(process.env[envName] ?? fallback);
  return Number.isFinite(raw) ? Math.max(min, raw) : fallback;
}

function readFlag(envName: string, fallback: boolean): boolean {
  const raw = (process.env[envName] ?? '').trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  return !['0', 'false', 'no', 'off'].includes(raw);
}

export function parseHandleCsv(raw: string): string[] {
  const out: string[] = [];
  for (const token of raw.split(',')) {
    const handle = token.trim().replace(/^@/, '');
    if (handle && !out.some((h) => h.toLowerCase() === handle.toLowerCase())) {
      out.push(handle);
    }
  }
  return out;
}

export function parseKeywordCsv(raw: string): string[] {
  const out: string[] = [];
  for (const token of raw.split(',')) {
    const keyword = token.trim().toLowerCase();
    if (keyword && !out.includes(keyword)) {
      out.push(keyword);
    }
  }
  return out;
}

export const SERVICE_NAME = 'postwatch';

export const DATA_DIR =
  process.env.DATA_DIR ?? path.join(process.cwd(), 'data');
export const RAW_DIR = path.join(DATA_DIR, 'raw');
export const ANALYSIS_DIR = path.join(DATA_DIR, 'analysis');
export const REPORTS_DIR = path.join(DATA_DIR, 'reports');
export const STATE_DIR = path.join(DATA_DIR, 'state');
export const LEDGER_PATH =
  process.env.LEDGER_PATH ?? path.join(STATE_DIR, 'seen_posts.json');
export const FOLLOWINGS_CACHE_PATH = path.join(
  STATE_DIR,
  'followings_cache.json',
);

export const PRIMARY_HANDLE = (process.env.PRIMARY_HANDLE ?? '')
  .trim()
  .replace(/^@/, '');
export const CUSTOM_HANDLES = parseHandleCsv(process.env.CUSTOM_HANDLES ?? '');
export const EXCLUDE_HANDLES = parseHandleCsv(
  process.env.EXCLUDE_HANDLES ?? '',
);
export const POSTS_PER_ACCOUNT = Math.floor(
  readNumber('POSTS_PER_ACCOUNT', 20, 1),
);
export const ACCOUNT_MAX_PAGES = Math.floor(
  readNumber('ACCOUNT_MAX_PAGES', 5, 1),
);
export const MAX_FOLLOWINGS = Math.floor(readNumber('MAX_FOLLOWINGS', 0));
export const FOLLOWINGS_CACHE_HOURS = readNumber('FOLLOWINGS_CACHE_HOURS', 24);
export const WINDOW_HOURS = readNumber('WINDOW_HOURS', 8, 1);
export const EXCLUDE_REPOSTS = readFlag('EXCLUDE_REPOSTS', true);
export const EXCLUDE_REPLIES = readFlag('EXCLUDE_REPLIES', true);
export const FILTER_LANGUAGE =
  (process.env.FILTER_LANGUAGE ?? 'all').trim().toLowerCase() || 'all';
export const FILTER_MIN_LIKES = Math.floor(readNumber('FILTER_MIN_LIKES', 0));
export const FILTER_MIN_REPOSTS = Math.floor(
  readNumber('FILTER_MIN_REPOSTS', 0),
);
export const FILTER_INCLUDE_KEYWORDS = parseKeywordCsv(
  process.env.FILTER_INCLUDE_KEYWORDS ?? '',
);
export const FILTER_EXCLUDE_KEYWORDS = parseKeywordCsv(
  process.env.FILTER_EXCLUDE_KEYWORDS ?? '',
);
export const TRENDING_ENABLED = readFlag('TRENDING_ENABLED', true);
export const FETCH_CONCURRENCY = Math.floor(
  readNumber('FETCH_CONCURRENCY', 4, 1),
);

export const SOCIAL_API_BASE =
  process.env.SOCIAL_API_BASE ?? 'https://api.twitterapi.io/twitter';
export const FOLLOWING_API_BASE =
  process.env.FOLLOWING_API_BASE ?? 'https://api.twitter.com/2';
export const SOCIAL_TIMEOUT_MS = readNumber('SOCIAL_TIMEOUT_SEC', 30, 1) * 1000;

export const LEDGER_RETENTION_DAYS = readNumber('LEDGER_RETENTION_DAYS', 30, 1);

export const CLASSIFY_CHUNK_SIZE = Math.floor(
  readNumber('CLASSIFY_CHUNK_SIZE', 40, 1),
);
export const CLASSIFY_CONCURRENCY = Math.floor(
  readNumber('CLASSIFY_CONCURRENCY', 3, 1),
);
export const CLASSIFY_TEXT_MAX_CHARS = 400;

export const RETRY_MAX_RETRIES = Math.floor(readNumber('RETRY_MAX_RETRIES', 2));
export const RETRY_BASE_DELAY_MS = readNumber('RETRY_BASE_DELAY_MS', 1500);
export const RETRY_MAX_DELAY_MS = readNumber('RETRY_MAX_DELAY_MS', 30000);
const jitterRaw = readNumber('RETRY_JITTER_RATIO', 0.2);
export const RETRY_JITTER_RATIO = Math.min(1, jitterRaw);

export const AI_PROVIDER = (
  process.env.AI_PROVIDER ?? 'anthropic'
).toLowerCase();
export const AI_TIMEOUT_MS = readNumber('AI_TIMEOUT_SEC', 120, 1) * 1000;
export const AI_MAX_OUTPUT_TOKENS = Math.floor(
  readNumber('AI_MAX_OUTPUT_TOKENS', 4096, 256),
);

const DETAIL_LEVELS: DetailLevel[] = ['terse', 'standard', 'analytic'];

export function parseDetailLevel(value: string): DetailLevel | null {
  const lowered = value.trim().toLowerCase();
  return DETAIL_LEVELS.find((level) => level === lowered) ?? null;
}

export const SUMMARY_DETAIL: DetailLevel =
  parseDetailLevel(process.env.SUMMARY_DETAIL ?? '') ?? 'standard';
export const SUMMARY_INSTRUCTION = (
  process.env.SUMMARY_INSTRUCTION ?? ''
).trim();
export const SUMMARY_MAX_POSTS = Math.floor(
  readNumber('SUMMARY_MAX_POSTS', 200, 1),
);
export const RESYNTHESIS_MAX_ENTRIES = Math.floor(
  readNumber('RESYNTHESIS_MAX_ENTRIES', 300, 1),
);
export const HIGHLIGHTS_MAX = Math.floor(readNumber('HIGHLIGHTS_MAX', 5, 1));
export const TOPIC_DESCRIPTION = (
  process.env.TOPIC_DESCRIPTION ??
  'the AI industry: models, research, AI products and developer tools, funding and policy'
).trim();

export const REPORT_TZ_OFFSET_HOURS = readNumber(
  'REPORT_TZ_OFFSET_HOURS',
  8,
  -12,
);

export const NOTIFY_ENABLED = readFlag('NOTIFY_ENABLED', false);
export const NOTIFY_WEBHOOK_URL = (process.env.NOTIFY_WEBHOOK_URL ?? '').trim();
export const NOTIFY_DESTINATION = (process.env.NOTIFY_DESTINATION ?? '').trim();
export const NOTIFY_TIMEOUT_MS = readNumber('NOTIFY_TIMEOUT_SEC', 15, 1) * 1000;
export const NOTIFY_MAX_ITEMS = Math.floor(
  readNumber('NOTIFY_MAX_ITEMS', 10, 1),
);

export const HIGHLIGHTS_CATEGORY = 'Highlights';
export const FALLBACK_CATEGORY = 'Other';

// Render order of narrative sections.
export const CATEGORY_PRIORITY = [
  'Models & Research',
  'Products & Tools',
  'Open Source & Developers',
  'Industry & Funding',
  'Policy & Safety',
  FALLBACK_CATEGORY,
];

export const CATEGORY_ALIASES: Record<string, string> = {
  models: 'Models & Research',
  model: 'Models & Research',
  research: 'Models & Research',
  papers: 'Models & Research',
  products: 'Products & Tools',
  product: 'Products & Tools',
  tools: 'Products & Tools',
  launches: 'Products & Tools',
  'open source': 'Open Source & Developers',
  opensource: 'Open Source & Developers',
  developers: 'Open Source & Developers',
  dev: 'Open Source & Developers',
  industry: 'Industry & Funding',
  business: 'Industry & Funding',
  funding: 'Industry & Funding',
  market: 'Industry & Funding',
  policy: 'Policy & Safety',
  regulation: 'Policy & Safety',
  safety: 'Policy & Safety',
  security: 'Policy & Safety',
  misc: FALLBACK_CATEGORY,
  other: FALLBACK_CATEGORY,
};

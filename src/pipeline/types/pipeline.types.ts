export type Provenance = 'followed' | 'trending';

export type DetailLevel = 'terse' | 'standard' | 'analytic';

export type ReportScope = 'single' | 'daily' | 'weekly' | 'monthly';

export interface PostAuthor {
  username: string;
  name: string;
}

export interface Post {
  id: string;
  author: PostAuthor;
  text: string;
  url: string;
  createdAt: string;
  viewCount: number;
  likeCount: number;
  repostCount: number;
  replyCount: number;
  hasMedia: boolean;
  isReply: boolean;
  lang: string;
  provenance: Provenance;
  matchedQueryGroup?: string;
}

export interface QueryGroup {
  name: string;
  query: string;
  minLikes: number;
  minViews: number;
  maxPosts: number;
}

export interface FollowedAccount {
  username: string;
  name: string;
}

/** Applied to followed-account posts; `language` 'all' disables it. */
export interface PostFilters {
  language: string;
  minLikes: number;
  minReposts: number;
  includeKeywords: string[];
  excludeKeywords: string[];
}

export interface FetchOptions {
  primaryHandle: string;
  customHandles: string[];
  excludeHandles: string[];
  postsPerAccount: number;
  accountMaxPages: number;
  maxFollowings: number;
  queryGroups: QueryGroup[];
  trendingEnabled: boolean;
  excludeReposts: boolean;
  excludeReplies: boolean;
  filters: PostFilters;
  windowHours: number;
}

export interface RawSnapshot {
  capturedAt: string;
  windowHours: number;
  accountCount: number;
  posts: Post[];
  apiCallCount: number;
}

export interface StoredSnapshot {
  file: string;
  snapshot: RawSnapshot;
}

export interface CategorizedLine {
  description: string;
  link: string;
  source?: string;
  rationale?: string;
}

export interface CategorySection {
  category: string;
  lines: CategorizedLine[];
}

export interface CategorizedText {
  highlights: CategorizedLine[];
  sections: CategorySection[];
}

export interface FailedChunk {
  index: number;
  postIds: string[];
  reason: string;
}

export interface ClassificationOutcome {
  relevantIds: Set<string>;
  urgentIds: Set<string>;
  chunkCount: number;
  failedChunks: FailedChunk[];
}

export interface SummaryOutcome {
  narrative: CategorizedText;
  relevantIds: string[];
  /** Relevant posts left out of the prompt by the summary cap. */
  omittedCount: number;
  degraded: boolean;
}

export interface UrgentPost {
  id: string;
  author: string;
  text: string;
  url: string;
}

export interface AnalysisResult {
  analyzedAt: string;
  sourceFiles: string[];
  sourceCapturedAt: string;
  windowHours: number | null;
  model: string;
  detailLevel: DetailLevel;
  postCount: number;
  relevantIds: string[];
  urgentIds: string[];
  urgentPosts: UrgentPost[];
  narrativeText: string;
  narrativeDegraded: boolean;
  summaryOmittedPosts: number;
  failedChunks: FailedChunk[];
}

export interface StoredAnalysis {
  file: string;
  result: AnalysisResult;
}

export interface ReportEntry {
  link: string;
  description: string;
  category: string;
  source?: string;
}

export interface Period {
  scope: ReportScope;
  start: Date;
  end: Date;
  label: string;
}

export interface Report {
  scope: ReportScope;
  periodStart: string;
  periodEnd: string;
  periodLabel: string;
  /** File name without extension, derived from the period. */
  fileKey: string;
  narrativeText: string;
  entryCount: number;
  sourceRefs: string[];
  /** Posts in the source snapshot; null for period reports. */
  postCount: number | null;
  failedChunks: number;
  /** Posts inside failed chunks, never judged relevant or not. */
  unclassifiedPosts: number;
  degraded: boolean;
}

export interface AggregationOutcome {
  period: Period;
  entries: ReportEntry[];
  sourceRefs: string[];
  narrative: CategorizedText;
  resynthesized: boolean;
}

export interface CollectSummary {
  snapshotFile: string;
  postCount: number;
  followedCount: number;
  trendingCount: number;
  skippedSeen: number;
  apiCallCount: number;
}

export interface ClassifySummary {
  analysisFile: string;
  postCount: number;
  relevantCount: number;
  urgentCount: number;
  failedChunks: number;
  narrativeDegraded: boolean;
}

export interface ReportSummary {
  scope: ReportScope;
  periodLabel: string;
  documentFile: string;
  sidecarFile: string;
  entryCount: number;
  sourceCount: number;
}

export type LlmResult<T> =
  | { kind: 'ok'; value: T; model: string; attempts: number }
  | { kind: 'parse_failure'; raw: string; attempts: number }
  | {
      kind: 'transport_failure';
      status: number;
      error: string;
      attempts: number;
    };

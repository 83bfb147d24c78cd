import { QueryGroup } from '../types/pipeline.types';
import { asRecord } from '../utils/record.util';

export const DEFAULT_QUERY_GROUPS: QueryGroup[] = [
  {
    name: 'frontier-models',
    query:
      '(OpenAI OR Anthropic OR Gemini OR "Llama" OR Mistral OR DeepSeek) (release OR launch OR model) -is:retweet -is:reply',
    minLikes: 100,
    minViews: 5000,
    maxPosts: 20,
  },
  {
    name: 'ai-tooling',
    query:
      '("AI agent" OR "coding agent" OR LLM OR RAG OR "open weights") -is:retweet -is:reply',
    minLikes: 50,
    minViews: 2000,
    maxPosts: 20,
  },
  {
    name: 'ai-policy',
    query:
      '("AI Act" OR "AI regulation" OR "AI safety" OR "export controls" GPU) -is:retweet -is:reply',
    minLikes: 50,
    minViews: 2000,
    maxPosts: 10,
  },
];

function asNonNegative(value: unknown, fallback: number): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? Math.floor(parsed) : fallback;
}

export function parseQueryGroups(raw: string): QueryGroup[] | null {
  if (!raw.trim()) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!Array.isArray(parsed)) {
    return null;
  }

  const groups: QueryGroup[] = [];
  for (const item of parsed) {
    const record = asRecord(item);
    if (!record) {
      continue;
    }
    const name = typeof record.name === 'string' ? record.name.trim() : '';
    const query = typeof record.query === 'string' ? record.query.trim() : '';
    if (!name || !query) {
      continue;
    }
    groups.push({
      name,
      query,
      minLikes: asNonNegative(record.minLikes, 0),
      minViews: asNonNegative(record.minViews, 0),
      maxPosts: asNonNegative(record.maxPosts, 20) || 20,
    });
  }
  return groups;
}

export const QUERY_GROUPS: QueryGroup[] =
  parseQueryGroups(process.env.TRENDING_QUERY_GROUPS_JSON ?? '') ??
  DEFAULT_QUERY_GROUPS;

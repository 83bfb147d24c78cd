import { Injectable, Logger } from '@nestjs/common';
import {
  CATEGORY_PRIORITY,
  CLASSIFY_TEXT_MAX_CHARS,
  HIGHLIGHTS_MAX,
  RESYNTHESIS_MAX_ENTRIES,
  SUMMARY_DETAIL,
  SUMMARY_INSTRUCTION,
  SUMMARY_MAX_POSTS,
  TOPIC_DESCRIPTION,
} from '../config/pipeline.constants';
import {
  buildItemsUserPrompt,
  buildResynthesisSystemPrompt,
  buildSummarizeSystemPrompt,
} from '../prompts/summarize.prompt';
import {
  CategorizedLine,
  CategorizedText,
  CategorySection,
  DetailLevel,
  Post,
  ReportEntry,
  SummaryOutcome,
} from '../types/pipeline.types';
import {
  groupEntries,
  normalizeCategory,
  orderSections,
} from '../utils/narrative.util';
import { asRecord, asString } from '../utils/record.util';
import { cleanText, truncate } from '../utils/text.util';
import { LlmClientService } from './llm-client.service';

interface ModelItem {
  ref: number;
  category: string;
  description: string;
  rationale: string;
}

interface ModelDigest {
  highlights: ModelItem[];
  items: ModelItem[];
}

export interface ResynthesisOutcome {
  narrative: CategorizedText;
  resynthesized: boolean;
}

function emptyNarrative(): CategorizedText {
  return { highlights: [], sections: [] };
}

function readItems(value: unknown, max: number): ModelItem[] | null {
  if (!Array.isArray(value)) {
    return null;
  }
  const out: ModelItem[] = [];
  for (const raw of value) {
    const record = asRecord(raw);
    const ref = Number(record?.ref);
    if (!record || !Number.isInteger(ref) || ref < 1 || ref > max) {
      continue;
    }
    out.push({
      ref,
      category: asString(record.category),
      description: cleanText(asString(record.description)),
      rationale: cleanText(asString(record.rationale)),
    });
  }
  return out;
}

function readDigest(
  value: Record<string, unknown>,
  max: number,
): ModelDigest | null {
  const items = readItems(value.items, max);
  if (!items) {
    return null;
  }
  return { highlights: readItems(value.highlights, max) ?? [], items };
}

function engagement(post: Post): number {
  return post.likeCount + post.repostCount * 2 + post.replyCount;
}

/**
 * Turns relevant posts (or already extracted report entries) into a
 * categorized narrative. Links and handles always come from the input,
 * never from generated text.
 */
@Injectable()
export class SummarizerService {
  private readonly logger = new Logger(SummarizerService.name);

  constructor(private readonly llm: LlmClientService) {}

  async summarize(
    posts: Post[],
    detail: DetailLevel = SUMMARY_DETAIL,
    instruction: string = SUMMARY_INSTRUCTION,
    maxPosts: number = SUMMARY_MAX_POSTS,
  ): Promise<SummaryOutcome> {
    const relevantIds = posts.map((post) => post.id);
    if (posts.length === 0) {
      return {
        narrative: emptyNarrative(),
        relevantIds,
        omittedCount: 0,
        degraded: false,
      };
    }

    const startedAt = Date.now();
    const selected =
      posts.length > maxPosts
        ? [...posts]
            .sort((a, b) => engagement(b) - engagement(a))
            .slice(0, maxPosts)
        : posts;
    const omittedCount = posts.length - selected.length;
    this.logger.log(
      `summarize start: posts=${posts.length} selected=${selected.length} detail=${detail}`,
    );
    if (omittedCount > 0) {
      this.logger.warn(
        `summarize capped: relevant=${posts.length} max=${maxPosts} omitted=${omittedCount}`,
      );
    }

    const result = await this.llm.generateStructured(
      buildSummarizeSystemPrompt(
        TOPIC_DESCRIPTION,
        CATEGORY_PRIORITY,
        detail,
        instruction,
      ),
      buildItemsUserPrompt(
        'Posts',
        selected.map((post, i) => ({
          ordinal: i + 1,
          author: post.author.username,
          text: truncate(post.text, CLASSIFY_TEXT_MAX_CHARS),
        })),
      ),
      'summarize',
      (value) => readItems(value.items, selected.length),
    );

    if (result.kind !== 'ok') {
      this.logger.warn(
        `summarize degraded: kind=${result.kind} relevant=${relevantIds.length}`,
      );
      return {
        narrative: emptyNarrative(),
        relevantIds,
        omittedCount,
        degraded: true,
      };
    }

    const used = new Set<number>();
    const sections: CategorySection[] = [];
    for (const item of result.value) {
      if (used.has(item.ref) || !item.description) {
        continue;
      }
      used.add(item.ref);
      const post = selected[item.ref - 1];
      sections.push({
        category: normalizeCategory(item.category),
        lines: [this.postLine(post, item, detail)],
      });
    }

    const narrative: CategorizedText = {
      highlights: [],
      sections: orderSections(sections),
    };
    this.logger.log(
      `summarize done: lines=${used.size} sections=${narrative.sections.length} elapsedMs=${Date.now() - startedAt}`,
    );
    return { narrative, relevantIds, omittedCount, degraded: false };
  }

  /**
   * Period-level narrative over deduplicated entries: a highlights
   * section followed by categorized sections. Every entry appears in the
   * sections exactly once; entries the model skipped keep their parsed
   * category and description. On failure the entries are grouped as-is.
   */
  async resynthesize(
    entries: ReportEntry[],
    instruction: string = SUMMARY_INSTRUCTION,
  ): Promise<ResynthesisOutcome> {
    if (entries.length === 0) {
      return { narrative: emptyNarrative(), resynthesized: false };
    }

    const startedAt = Date.now();
    const prompted = entries.slice(0, RESYNTHESIS_MAX_ENTRIES);
    this.logger.log(
      `resynthesize start: entries=${entries.length} prompted=${prompted.length}`,
    );

    const result = await this.llm.generateStructured(
      buildResynthesisSystemPrompt(
        TOPIC_DESCRIPTION,
        CATEGORY_PRIORITY,
        HIGHLIGHTS_MAX,
        instruction,
      ),
      buildItemsUserPrompt(
        'Entries',
        prompted.map((entry, i) => ({
          ordinal: i + 1,
          author: entry.source ?? '',
          category: entry.category,
          text: entry.description,
        })),
      ),
      'resynthesize',
      (value) => readDigest(value, prompted.length),
    );

    if (result.kind !== 'ok') {
      this.logger.warn(
        `resynthesize fallback: kind=${result.kind} entries=${entries.length}`,
      );
      return { narrative: groupEntries(entries), resynthesized: false };
    }

    const highlights: CategorizedLine[] = [];
    const highlighted = new Set<number>();
    for (const item of result.value.highlights) {
      if (highlights.length >= HIGHLIGHTS_MAX || highlighted.has(item.ref)) {
        continue;
      }
      highlighted.add(item.ref);
      const entry = prompted[item.ref - 1];
      highlights.push(
        this.entryLine(entry, item.description || entry.description),
      );
    }

    const placed = new Set<number>();
    const sections: CategorySection[] = [];
    for (const item of result.value.items) {
      if (placed.has(item.ref)) {
        continue;
      }
      placed.add(item.ref);
      const entry = prompted[item.ref - 1];
      sections.push({
        category: item.category
          ? normalizeCategory(item.category)
          : entry.category,
        lines: [this.entryLine(entry, item.description || entry.description)],
      });
    }
    entries.forEach((entry, i) => {
      if (!placed.has(i + 1)) {
        sections.push({
          category: entry.category,
          lines: [this.entryLine(entry, entry.description)],
        });
      }
    });

    const narrative: CategorizedText = {
      highlights,
      sections: orderSections(sections),
    };
    this.logger.log(
      `resynthesize done: highlights=${highlights.length} sections=${narrative.sections.length} elapsedMs=${Date.now() - startedAt}`,
    );
    return { narrative, resynthesized: true };
  }

  private postLine(
    post: Post,
    item: ModelItem,
    detail: DetailLevel,
  ): CategorizedLine {
    const line: CategorizedLine = {
      description: item.description,
      link: post.url,
    };
    if (detail !== 'terse' && post.author.username) {
      line.source = post.author.username;
    }
    if (detail === 'analytic' && item.rationale) {
      line.rationale = item.rationale;
    }
    return line;
  }

  private entryLine(entry: ReportEntry, description: string): CategorizedLine {
    return entry.source
      ? { description, link: entry.link, source: entry.source }
      : { description, link: entry.link };
  }
}

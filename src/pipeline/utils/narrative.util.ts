import {
  CATEGORY_ALIASES,
  CATEGORY_PRIORITY,
  FALLBACK_CATEGORY,
  HIGHLIGHTS_CATEGORY,
} from '../config/pipeline.constants';
import {
  CategorizedLine,
  CategorizedText,
  CategorySection,
  ReportEntry,
} from '../types/pipeline.types';
import { cleanText } from './text.util';

/*
 * Line-item grammar shared by the renderer and the parser:
 *
 *   heading   := "##" | "###" SP title
 *   item      := bullet SP "[" label "](" url ")" [SEP text] [" (via @" handle ")"]
 *   bullet    := "-" | "*" | "•" | digits "." | digits ")"
 *   rationale := indent ">" SP text     (belongs to the item above it)
 *
 * Items under the Highlights heading repeat entries from the sections below
 * and are not extracted. Items before the first heading fall under Other.
 * A bare URL at the end of a bullet is accepted in place of a link.
 */

const HEADING_RE = /^\s{0,3}#{2,3}\s+(.+?)\s*#*\s*$/;
const BULLET = '(?:[-*•]|\\d+[.)])';
const LINK_ITEM_RE = new RegExp(
  `^\\s{0,3}${BULLET}\\s+\\[(.+?)\\]\\((https?:\\/\\/[^\\s)]+)\\)(.*)$`,
);
const BARE_ITEM_RE = new RegExp(
  `^\\s{0,3}${BULLET}\\s+(.+?)\\s+<?(https?:\\/\\/[^\\s>]+)>?\\s*$`,
);
const VIA_RE = /\s*\(via @([A-Za-z0-9_]{1,30})\)\s*$/;
const LEADING_SEPARATOR_RE = /^[\s,，.。:：;；\-–—]+/;
const TRAILING_SEPARATOR_RE = /[\s,，:：;；\-–—]+$/;

export function normalizeCategory(raw: string): string {
  const cleaned = cleanText(raw)
    .replace(/^\d+[.)]\s*/, '')
    .replace(/^[\p{P}\p{S}\s]+/u, '')
    .trim();
  if (!cleaned) {
    return FALLBACK_CATEGORY;
  }
  const lowered = cleaned.toLowerCase();
  const exact = CATEGORY_PRIORITY.find(
    (category) => category.toLowerCase() === lowered,
  );
  return exact ?? CATEGORY_ALIASES[lowered] ?? FALLBACK_CATEGORY;
}

export function orderSections(sections: CategorySection[]): CategorySection[] {
  const merged = new Map<string, CategorizedLine[]>();
  for (const section of sections) {
    const lines = merged.get(section.category) ?? [];
    lines.push(...section.lines);
    merged.set(section.category, lines);
  }

  const rank = (category: string): number => {
    const index = CATEGORY_PRIORITY.indexOf(category);
    return index === -1 ? CATEGORY_PRIORITY.length : index;
  };
  return Array.from(merged.entries())
    .filter(([, lines]) => lines.length > 0)
    .sort(([a], [b]) => rank(a) - rank(b))
    .map(([category, lines]) => ({ category, lines }));
}

function sanitizeLabel(value: string): string {
  return cleanText(value).replace(/\[/g, '(').replace(/\]/g, ')');
}

function renderLine(line: CategorizedLine): string[] {
  const source = line.source ? ` (via @${line.source})` : '';
  const out = [`- [${sanitizeLabel(line.description)}](${line.link})${source}`];
  const rationale = cleanText(line.rationale ?? '');
  if (rationale) {
    out.push(`  > ${rationale}`);
  }
  return out;
}

export function renderNarrative(text: CategorizedText): string {
  const blocks: string[] = [];
  if (text.highlights.length > 0) {
    blocks.push(
      [`## ${HIGHLIGHTS_CATEGORY}`, ...text.highlights.flatMap(renderLine)].join(
        '\n',
      ),
    );
  }
  for (const section of orderSections(text.sections)) {
    blocks.push(
      [`## ${section.category}`, ...section.lines.flatMap(renderLine)].join(
        '\n',
      ),
    );
  }
  return blocks.join('\n\n');
}

export function isNarrativeEmpty(text: CategorizedText): boolean {
  return (
    text.highlights.length === 0 &&
    text.sections.every((section) => section.lines.length === 0)
  );
}

function parseItem(line: string): Omit<ReportEntry, 'category'> | null {
  const linked = line.match(LINK_ITEM_RE);
  if (linked) {
    const [, label, link, rawTail] = linked;
    let tail = rawTail;
    let source: string | undefined;
    const via = tail.match(VIA_RE);
    if (via) {
      source = via[1];
      tail = tail.slice(0, via.index);
    }
    tail = cleanText(tail.replace(LEADING_SEPARATOR_RE, ''));
    const description = cleanText(tail ? `${label} ${tail}` : label);
    if (!description) {
      return null;
    }
    return source ? { link, description, source } : { link, description };
  }

  const bare = line.match(BARE_ITEM_RE);
  if (bare) {
    const description = cleanText(bare[1].replace(TRAILING_SEPARATOR_RE, ''));
    return description ? { link: bare[2], description } : null;
  }
  return null;
}

/**
 * Extracts report entries from a rendered narrative. Unrecognized lines are
 * skipped; malformed input yields an empty list.
 */
export function parseNarrativeEntries(text: unknown): ReportEntry[] {
  if (typeof text !== 'string' || !text.trim()) {
    return [];
  }

  const entries: ReportEntry[] = [];
  let category: string | null = FALLBACK_CATEGORY;
  for (const line of text.split(/\r?\n/)) {
    const heading = line.match(HEADING_RE);
    if (heading) {
      const title = cleanText(heading[1]);
      category =
        title.toLowerCase() === HIGHLIGHTS_CATEGORY.toLowerCase()
          ? null
          : normalizeCategory(title);
      continue;
    }
    if (category === null) {
      continue;
    }
    const item = parseItem(line);
    if (item) {
      entries.push({ ...item, category });
    }
  }
  return entries;
}

export function groupEntries(entries: ReportEntry[]): CategorizedText {
  return {
    highlights: [],
    sections: orderSections(
      entries.map((entry) => ({
        category: entry.category,
        lines: [
          entry.source
            ? {
                description: entry.description,
                link: entry.link,
                source: entry.source,
              }
            : { description: entry.description, link: entry.link },
        ],
      })),
    ),
  };
}

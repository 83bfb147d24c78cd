import { DetailLevel } from '../types/pipeline.types';

export interface SummarizePromptItem {
  ordinal: number;
  author: string;
  text: string;
  category?: string;
}

const DETAIL_RULES: Record<DetailLevel, string> = {
  terse: `- description: exactly one sentence, at most 25 words.
- Do not include a rationale.`,
  standard: `- description: one or two factual sentences.
- Do not include a rationale.`,
  analytic: `- description: one or two factual sentences.
- rationale: one line on why this matters to the reader.`,
};

function withInstruction(prompt: string, instruction: string): string {
  return instruction
    ? `${prompt}\n\nAdditional instruction:\n${instruction}`
    : prompt;
}

export function buildSummarizeSystemPrompt(
  topic: string,
  categories: string[],
  detail: DetailLevel,
  instruction: string,
): string {
  return withInstruction(
    `You write a categorized digest of social media posts about ${topic}.

Use ONLY the provided posts. Do not add facts that are not in the text.
Respond ONLY in valid JSON.

Output schema:
{
  "items": [{"ref": number, "category": string, "description": string, "rationale": string}]
}

Rules:
- ref: the ordinal of the post the item is about. One item per story; when several posts tell the same story use the most informative one.
- category: one of ${categories.map((c) => `"${c}"`).join(', ')}.
${DETAIL_RULES[detail]}
- Do not include links or handles; they are attached separately.
- Return JSON only.`,
    instruction,
  );
}

export function buildResynthesisSystemPrompt(
  topic: string,
  categories: string[],
  highlightsMax: number,
  instruction: string,
): string {
  return withInstruction(
    `You edit a period digest about ${topic} from entries that were already written for shorter digests.

Respond ONLY in valid JSON.

Output schema:
{
  "highlights": [{"ref": number, "description": string}],
  "items": [{"ref": number, "category": string, "description": string}]
}

Rules:
- highlights: at most ${highlightsMax} entries that matter most for the whole period, with a one-sentence description.
- items: every entry worth keeping, each with a category from ${categories.map((c) => `"${c}"`).join(', ')}.
- Keep the meaning of each entry; you may shorten or merge wording.
- ref must be an ordinal from the input.
- Return JSON only.`,
    instruction,
  );
}

export function buildItemsUserPrompt(
  label: string,
  items: SummarizePromptItem[],
): string {
  const lines = items.map((item) => {
    const author = item.author ? ` @${item.author}` : '';
    const category = item.category ? ` (${item.category})` : '';
    return `[${item.ordinal}]${author}${category}: ${item.text}`;
  });
  return `${label} (${items.length}):\n${lines.join('\n')}`;
}

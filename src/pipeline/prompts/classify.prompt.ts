export interface ClassifyPromptItem {
  ordinal: number;
  author: string;
  text: string;
}

export function buildClassifySystemPrompt(topic: string): string {
  return `You screen short social media posts for an analyst who follows ${topic}.

Each post is given with a numeric ordinal. Judge every post on its text alone.
Respond ONLY in valid JSON.

Output schema:
{
  "relevant": [number],
  "urgent": [number]
}

Rules:
- relevant: ordinals of posts that carry real news, releases, research, data or informed opinion about the topic.
- Jokes, memes, personal updates, giveaways and engagement bait are not relevant.
- urgent: ordinals of relevant posts an analyst should see within the hour (major launches, outages, security incidents, regulatory actions).
- Every urgent ordinal must also appear in relevant.
- Use only ordinals that appear in the input. Empty lists are valid.
- Return JSON only.`;
}

export function buildClassifyUserPrompt(items: ClassifyPromptItem[]): string {
  const lines = items.map(
    (item) => `[${item.ordinal}] @${item.author}: ${item.text}`,
  );
  return `Posts (${items.length}):\n${lines.join('\n')}`;
}

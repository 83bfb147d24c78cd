const WS_RE = /\s+/g;
const TAG_RE = /<[^>]+>/g;

const ENTITY_MAP: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&nbsp;': ' ',
};

export function decodeHtmlEntities(value: string): string {
  if (!value) {
    return '';
  }
  return value.replace(
    /&(amp|lt|gt|quot|#39|nbsp);/g,
    (match) => ENTITY_MAP[match] ?? match,
  );
}

export function cleanText(value: string): string {
  if (!value) {
    return '';
  }
  return decodeHtmlEntities(value)
    .replace(TAG_RE, ' ')
    .replace(WS_RE, ' ')
    .trim();
}

export function truncate(value: string, maxChars: number): string {
  if (value.length <= maxChars) {
    return value;
  }
  return `${value.slice(0, Math.max(0, maxChars - 1)).trimEnd()}…`;
}

/**
 * Key used to decide whether two report entries point at the same thing:
 * lower-cased, without query string, fragment or trailing slashes.
 */
export function normalizeLink(link: string): string {
  const trimmed = (link ?? '').trim().toLowerCase();
  if (!trimmed) {
    return '';
  }
  const cut = trimmed.search(/[?#]/);
  const withoutQuery = cut === -1 ? trimmed : trimmed.slice(0, cut);
  return withoutQuery.replace(/\/+$/, '');
}

export function postUrl(username: string, id: string): string {
  return `https://x.com/${username || 'i'}/status/${id}`;
}

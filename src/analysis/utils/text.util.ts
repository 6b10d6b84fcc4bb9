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

export function countWords(value: string): number {
  const trimmed = (value ?? '').trim();
  if (!trimmed) {
    return 0;
  }
  return trimmed.split(WS_RE).length;
}

export function stripCodeFences(value: string): string {
  if (!value) {
    return '';
  }
  return value
    .trim()
    .replace(/```json/gi, '')
    .replace(/```/g, '')
    .trim();
}

export function stripTrailingCommas(value: string): string {
  return value.replace(/,\s*([}\]])/g, '$1');
}

// Theme answers sometimes come back quoted or with a "Theme:" label.
export function normalizeTheme(value: string): string {
  const firstLine =
    cleanText(stripCodeFences(value).split('\n')[0] ?? '') || '';
  return firstLine
    .replace(/^(theme|topic)\s*[:：-]\s*/i, '')
    .replace(/^["'«“]+|["'»”]+$/g, '')
    .trim();
}

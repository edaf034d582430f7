const SMART_QUOTES: Record<string, string> = {
  '“': '"',
  '”': '"',
  '‘': "'",
  '’': "'",
};

export function normalizeQuotes(text: string): string {
  return text.replace(/[“”‘’]/g, ch => SMART_QUOTES[ch] ?? ch);
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

import abbreviations from './abbreviations.json' with { type: 'json' };

const SUPPRESSED = new Set<string>(abbreviations);

// Break after runs of terminators, keeping closing quotes with the sentence.
const TERMINATOR = /([.!?]+['"]*\s+)/;

function endsWithAbbreviation(piece: string): boolean {
  const words = piece.trimEnd().split(/\s+/);
  return SUPPRESSED.has(words[words.length - 1] ?? '');
}

/**
 * Split text into sentences for semantic newlines. Never breaks after a known
 * abbreviation; the match is case-sensitive.
 */
export function segment(text: string): string[] {
  const parts = text.split(TERMINATOR);
  const sentences: string[] = [];
  let prefix = '';

  for (let i = 0; i < parts.length; i += 2) {
    const piece = parts[i] + (parts[i + 1] ?? '');
    if (endsWithAbbreviation(piece)) {
      prefix += piece;
      continue;
    }
    if (piece.length > 0) {
      sentences.push(prefix + piece);
      prefix = '';
    }
  }
  if (prefix.length > 0) sentences.push(prefix);

  return sentences.map(s => s.trim()).filter(s => s.length > 0);
}

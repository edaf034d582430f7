/**
 * Blank out parts of C source while keeping every offset and newline in place, so that
 * shape matching can run on the masked text and slices can be taken from the original.
 */
export function maskSource(text: string, options: { literals: boolean } = { literals: true }): string {
  const out = text.split('');
  const blank = (from: number, to: number) => {
    for (let i = from; i < to; i++) {
      if (out[i] !== '\n') out[i] = ' ';
    }
  };

  let i = 0;
  while (i < text.length) {
    if (text.startsWith('/*', i)) {
      const close = text.indexOf('*/', i + 2);
      const end = close === -1 ? text.length : close + 2;
      blank(i, end);
      i = end;
    } else if (text.startsWith('//', i)) {
      const nl = text.indexOf('\n', i);
      const end = nl === -1 ? text.length : nl;
      blank(i, end);
      i = end;
    } else if (text[i] === '"' || text[i] === "'") {
      const quote = text[i];
      let j = i + 1;
      while (j < text.length && text[j] !== quote && text[j] !== '\n') {
        if (text[j] === '\\') j++;
        j++;
      }
      if (options.literals) blank(i + 1, Math.min(j, text.length));
      i = j + 1;
    } else {
      i++;
    }
  }
  return out.join('');
}

export function stripComments(text: string): string {
  return maskSource(text, { literals: false });
}

/** Offset of the bracket closing the one at `open`, or -1. Expects masked text. */
export function matchingBracket(masked: string, open: number): number {
  const pairs: Record<string, string> = { '{': '}', '(': ')', '[': ']' };
  const opener = masked[open];
  const closer = pairs[opener];
  if (!closer) return -1;
  let depth = 0;
  for (let i = open; i < masked.length; i++) {
    if (masked[i] === opener) depth++;
    else if (masked[i] === closer) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** Split masked text at `separator` occurring outside any bracket pair. Returns [start, end) ranges. */
export function splitTopLevel(masked: string, separator: string): Array<[number, number]> {
  const ranges: Array<[number, number]> = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < masked.length; i++) {
    const ch = masked[i];
    if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') depth--;
    else if (ch === separator && depth === 0) {
      ranges.push([start, i]);
      start = i + 1;
    }
  }
  ranges.push([start, masked.length]);
  return ranges;
}

/** First offset of `ch` outside any bracket pair, or -1. */
export function indexOfTopLevel(masked: string, ch: string, from = 0): number {
  let depth = 0;
  for (let i = from; i < masked.length; i++) {
    const c = masked[i];
    if (c === ch && depth === 0) return i;
    if (c === '(' || c === '[' || c === '{') depth++;
    else if (c === ')' || c === ']' || c === '}') depth--;
  }
  return -1;
}

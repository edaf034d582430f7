import { basename, extname } from 'node:path';

/** File name shown in `#include <...>` lines. */
export function includeName(filePath: string, mode: 'short' | 'full'): string {
  const normalized = filePath.replace(/\\/g, '/');
  return mode === 'short' ? basename(normalized) : normalized;
}

/** Header file name without its extension, e.g. `include/foo.h` → `foo`. */
export function stem(filePath: string): string {
  const name = basename(filePath.replace(/\\/g, '/'));
  const ext = extname(name);
  return ext ? name.slice(0, -ext.length) : name;
}

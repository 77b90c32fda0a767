import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { MODE_PROFILES, type Mode } from './modes.js';

export const DEFAULT_KEYWORDS_PATH = fileURLToPath(new URL('../../config/keywords.txt', import.meta.url));

export interface KeywordSource {
  load(mode: Mode): Promise<string[]>;
}

/**
 * One keyword per line. Blank lines and `#` comments are ignored, and
 * duplicates (case-insensitive) keep their first occurrence.
 */
export function parseKeywords(text: string): string[] {
  const seen = new Set<string>();
  const keywords: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    const keyword = line.replace(/#.*$/, '').trim();
    if (!keyword) continue;
    const folded = keyword.toLowerCase();
    if (seen.has(folded)) continue;
    seen.add(folded);
    keywords.push(keyword);
  }

  return keywords;
}

export function selectKeywords(keywords: string[], mode: Mode): string[] {
  const { keywordLimit } = MODE_PROFILES[mode];
  return keywordLimit === undefined ? keywords : keywords.slice(0, keywordLimit);
}

export function fileKeywordSource(path: string = DEFAULT_KEYWORDS_PATH): KeywordSource {
  return {
    async load(mode) {
      const text = await readFile(path, 'utf-8');
      const keywords = parseKeywords(text);
      if (keywords.length === 0) {
        throw new Error(`No keywords found in ${path}`);
      }
      return selectKeywords(keywords, mode);
    },
  };
}

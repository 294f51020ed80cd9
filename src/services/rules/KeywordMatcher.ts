/**
 * Case-insensitive phrase matching over free text.
 *
 * Terms that start with a word character must begin on a word boundary, so
 * "sign" matches "signature" but not "design". Terms starting with
 * punctuation ("?") match anywhere.
 */

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function termPattern(term: string): RegExp {
  const normalized = term.toLowerCase();
  const lead = /^\w/.test(normalized) ? '\\b' : '';
  return new RegExp(lead + escapeRegExp(normalized), 'g');
}

export interface KeywordHit {
  term: string;
  count: number;
}

export class KeywordMatcher {
  private readonly patterns: ReadonlyArray<{ term: string; pattern: RegExp }>;

  constructor(terms: readonly string[]) {
    const unique = Array.from(new Set(terms.map(term => term.toLowerCase())));
    this.patterns = unique.map(term => ({ term, pattern: termPattern(term) }));
  }

  /**
   * Hits in term declaration order; `text` is expected to be lowercased
   */
  scan(text: string): KeywordHit[] {
    const hits: KeywordHit[] = [];
    for (const { term, pattern } of this.patterns) {
      const count = text.match(pattern)?.length ?? 0;
      if (count > 0) {
        hits.push({ term, count });
      }
    }
    return hits;
  }

  matchedTerms(text: string): string[] {
    return this.scan(text).map(hit => hit.term);
  }

  totalHits(text: string): number {
    return this.scan(text).reduce((sum, hit) => sum + hit.count, 0);
  }

  matches(text: string): boolean {
    return this.patterns.some(({ pattern }) => {
      pattern.lastIndex = 0;
      return pattern.test(text);
    });
  }
}

export function normalizeText(...parts: string[]): string {
  return parts.join('\n').toLowerCase();
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(word => word.length > 0).length;
}

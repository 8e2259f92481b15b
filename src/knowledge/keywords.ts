/**
 * Keyword extraction for the discovery search
 */

/**
 * Turns ticket text into search terms. Replaceable: the default is a
 * pattern heuristic with no precision target.
 */
export interface KeywordExtractor {
  extract(text: string, maxKeywords: number): string[];
}

const TERM_PATTERNS: RegExp[] = [
  // CamelCase identifiers: PaymentGateway, OrderService
  /\b[A-Z][a-z]+(?:[A-Z][a-z]+)+\b/g,
  // Multi-word capitalized terms: Payment Gateway
  /\b[A-Z][a-z]+(?:[ \t]+[A-Z][a-z]+)+\b/g,
  // Acronyms: API, SLA
  /\b[A-Z]{2,}\b/g,
  // Known technical suffixes
  /\b\w+(?:API|Service|Module|Handler|Client|Provider)\b/gi,
];

const MIN_FALLBACK_WORD_LENGTH = 5;
const FALLBACK_TEXT_LENGTH = 50;

export class PatternKeywordExtractor implements KeywordExtractor {
  extract(text: string, maxKeywords: number): string[] {
    const terms: string[] = [];
    for (const pattern of TERM_PATTERNS) {
      terms.push(...(text.match(pattern) ?? []));
    }

    const unique = [...new Set(terms)].slice(0, maxKeywords);
    if (unique.length > 0) {
      return unique;
    }

    // Longest plain words
    const words = [
      ...new Set(
        text.split(/\s+/).filter((w) => w.length >= MIN_FALLBACK_WORD_LENGTH && /^\p{L}+$/u.test(w)),
      ),
    ];
    const longest = words.sort((a, b) => b.length - a.length).slice(0, maxKeywords);
    if (longest.length > 0) {
      return longest;
    }

    const trimmed = text.trim().slice(0, FALLBACK_TEXT_LENGTH);
    return trimmed ? [trimmed] : [];
  }
}

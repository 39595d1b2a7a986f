import { logger } from './logger';

/**
 * Calculate Levenshtein distance between two strings
 */
export function levenshteinDistance(str1: string, str2: string): number {
  const m = str1.length;
  const n = str2.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      if (str1[i - 1] === str2[j - 1]) {
        dp[i][j] = dp[i - 1][j - 1];
      } else {
        dp[i][j] = Math.min(
          dp[i - 1][j] + 1,    // deletion
          dp[i][j - 1] + 1,    // insertion
          dp[i - 1][j - 1] + 1 // substitution
        );
      }
    }
  }

  return dp[m][n];
}

export interface AnchorMatch {
  /** Offset of the first matched character */
  start: number;
  /** Offset just past the matched anchor */
  end: number;
  distance: number;
  score: number;
  matched: string;
}

export interface AnchorSearchOptions {
  maxDistance: number;
  minScore: number;
  from?: number;
  to?: number;
}

interface Token {
  text: string;
  start: number;
  end: number;
}

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function normalizeAnchorText(str: string): string {
  return str.toLowerCase().replace(/\s+/g, ' ').trim();
}

function tokenize(text: string, from: number): Token[] {
  const tokens: Token[] = [];
  const re = /\S+/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    tokens.push({ text: m[0], start: from + m.index, end: from + m.index + m[0].length });
  }
  return tokens;
}

/**
 * Locate an anchor phrase in text, tolerating a small edit distance.
 *
 * An exact (case and whitespace insensitive) occurrence wins outright. Otherwise
 * word windows around the phrase length are scored and the closest one within
 * both the distance bound and the score floor is returned, earliest first on ties.
 */
export function findAnchor(text: string, phrase: string, options: AnchorSearchOptions): AnchorMatch | null {
  const from = options.from ?? 0;
  const to = options.to ?? text.length;
  const haystack = text.slice(from, to);
  const target = normalizeAnchorText(phrase);
  if (!target || !haystack) return null;

  const exact = new RegExp(target.split(' ').map(escapeRegex).join('\\s+'), 'i').exec(haystack);
  if (exact) {
    return {
      start: from + exact.index,
      end: from + exact.index + exact[0].length,
      distance: 0,
      score: 1,
      matched: exact[0],
    };
  }

  if (options.maxDistance <= 0) return null;

  const tokens = tokenize(haystack, from);
  const width = target.split(' ').length;
  let best: AnchorMatch | null = null;

  for (let i = 0; i < tokens.length; i++) {
    for (let size = Math.max(1, width - 1); size <= width + 1; size++) {
      if (i + size > tokens.length) break;
      const window = tokens.slice(i, i + size);
      const last = window[window.length - 1];
      const trailing = /[:;,.]+$/.exec(last.text);
      const end = trailing ? last.end - trailing[0].length : last.end;
      const candidate = normalizeAnchorText(text.slice(window[0].start, end));
      if (!candidate || Math.abs(candidate.length - target.length) > options.maxDistance) continue;

      const distance = levenshteinDistance(candidate, target);
      const score = 1 - distance / Math.max(candidate.length, target.length);
      if (distance > options.maxDistance || score < options.minScore) continue;

      if (!best || distance < best.distance) {
        best = { start: window[0].start, end, distance, score, matched: text.slice(window[0].start, end) };
      }
    }
  }

  if (best) {
    logger.debug({ phrase, matched: best.matched, distance: best.distance }, 'Fuzzy anchor match');
  }
  return best;
}

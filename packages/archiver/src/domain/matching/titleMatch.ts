const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

/**
 * Score given to an exact match after normalization
 */
export const EXACT_MATCH_SCORE = 1;

/**
 * Token-prefix matches score in [PREFIX_BASE_SCORE, 1)
 */
export const PREFIX_BASE_SCORE = 0.85;

export const DEFAULT_MATCH_THRESHOLD = 0.8;

function decodeEntities(input: string): string {
  return input
    .replace(/&#x([0-9a-fA-F]{1,6});/g, (m, hex: string) => codePointOr(Number.parseInt(hex, 16), m))
    .replace(/&#([0-9]{1,7});/g, (m, dec: string) => codePointOr(Number.parseInt(dec, 10), m))
    .replace(/&([a-zA-Z]{2,8});/g, (m, name: string) => NAMED_ENTITIES[name.toLowerCase()] ?? m);
}

function codePointOr(cp: number, fallback: string): string {
  if (cp < 0 || cp > 0x10ffff || (cp >= 0xd800 && cp <= 0xdfff)) return fallback;
  return String.fromCodePoint(cp);
}

/**
 * 番組タイトルを比較用に正規化
 * - HTMLエンティティの一部をデコード
 * - NFKC + case-fold
 * - 記号は空白に置換し、連続空白を1つにまとめる
 */
export function normalizeTitle(raw: string): string {
  return decodeEntities(raw)
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[‘’ʼ']/g, '')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

function tokens(normalized: string): string[] {
  return normalized.length === 0 ? [] : normalized.split(' ');
}

/**
 * Levenshtein distance (two-row DP)
 */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let prev = Array.from({ length: b.length + 1 }, (_, i) => i);
  let curr = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    curr[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[b.length];
}

/**
 * 2つの正規化済み文字列の類似度 [0, 1]
 * edit-distance 比と token の Jaccard 係数の大きい方
 */
export function similarity(a: string, b: string): number {
  if (a.length === 0 && b.length === 0) return 1;
  const maxLen = Math.max(a.length, b.length);
  const editRatio = 1 - editDistance(a, b) / maxLen;

  const ta = new Set(tokens(a));
  const tb = new Set(tokens(b));
  let shared = 0;
  for (const t of ta) {
    if (tb.has(t)) shared++;
  }
  const union = ta.size + tb.size - shared;
  const jaccard = union === 0 ? 0 : shared / union;

  return Math.max(editRatio, jaccard);
}

function isTokenPrefix(query: string[], title: string[]): boolean {
  if (query.length === 0 || query.length > title.length) return false;
  return query.every((t, i) => title[i] === t);
}

/**
 * 正規化済みクエリと番組タイトルの一致スコア
 *
 * - 完全一致: 1
 * - トークン単位の前方一致: 0.85 + 0.15 * |query| / |title|
 * - それ以外: similarity が threshold 以上ならその値
 *
 * 閾値未満は null
 */
export function matchTitle(query: string, title: string, threshold: number = DEFAULT_MATCH_THRESHOLD): number | null {
  if (query.length === 0 || title.length === 0) return null;
  if (query === title) return EXACT_MATCH_SCORE;

  if (isTokenPrefix(tokens(query), tokens(title))) {
    return PREFIX_BASE_SCORE + (1 - PREFIX_BASE_SCORE) * (query.length / title.length);
  }

  const score = similarity(query, title);
  return score >= threshold ? score : null;
}

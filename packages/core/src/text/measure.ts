/**
 * packages/core/src/text/measure.ts — Text measurement in terminal cells.
 *
 * Width rules:
 *   - ASCII printable: 1 cell
 *   - ASCII control: 0 cells
 *   - East Asian wide/fullwidth: 2 cells
 *   - Combining marks, format characters, ZWJ: 0 cells (merge with base)
 *   - Emoji-presented grapheme clusters: 2 cells total
 *
 * Grapheme clusters come from Intl.Segmenter; a cluster is measured by its
 * first scalar unless it presents as emoji.
 */

/* ========== Text Measurement Cache ========== */

const TEXT_CACHE_MAX_SIZE = 10000;
/** Long strings rarely repeat; caching them only churns the map. */
const TEXT_CACHE_MAX_KEY_LENGTH = 96;

const textWidthCache = new Map<string, number>();

function evictOldestTextWidthCacheEntry(): void {
  const oldest = textWidthCache.keys().next();
  if (oldest.done === true) return;
  textWidthCache.delete(oldest.value);
}

export function clearTextMeasureCache(): void {
  textWidthCache.clear();
}

export function getTextMeasureCacheSize(): number {
  return textWidthCache.size;
}

/* ========== Unicode classification ========== */

/** East Asian Wide / Fullwidth blocks, sorted, inclusive. */
const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1100, 0x115f], // Hangul Jamo initials
  [0x231a, 0x231b],
  [0x2329, 0x232a],
  [0x23e9, 0x23ec],
  [0x2e80, 0x303e], // CJK radicals, punctuation
  [0x3041, 0x33ff], // Hiragana, Katakana, CJK compatibility
  [0x3400, 0x4dbf], // CJK extension A
  [0x4e00, 0x9fff], // CJK unified ideographs
  [0xa000, 0xa4cf], // Yi
  [0xa960, 0xa97f],
  [0xac00, 0xd7a3], // Hangul syllables
  [0xf900, 0xfaff], // CJK compatibility ideographs
  [0xfe10, 0xfe19],
  [0xfe30, 0xfe6f],
  [0xff00, 0xff60], // Fullwidth forms
  [0xffe0, 0xffe6],
  [0x16fe0, 0x16fe4],
  [0x17000, 0x18cff], // Tangut
  [0x1b000, 0x1b2ff], // Kana supplement
  [0x1f300, 0x1f64f], // Misc symbols and pictographs, emoticons
  [0x1f680, 0x1f6ff], // Transport and map
  [0x1f900, 0x1f9ff], // Supplemental symbols and pictographs
  [0x20000, 0x2fffd], // CJK extension B..
  [0x30000, 0x3fffd],
];

const ZERO_WIDTH_RE = /^[\p{Mn}\p{Me}\p{Cf}]$/u;
const EMOJI_PRESENTATION_RE = /\p{Emoji_Presentation}/u;
const EXTENDED_PICTOGRAPHIC_RE = /\p{Extended_Pictographic}/u;
const VARIATION_SELECTOR_16 = "\ufe0f";
const ZWJ = "\u200d";

function isWide(scalar: number): boolean {
  let low = 0;
  let high = WIDE_RANGES.length - 1;
  while (low <= high) {
    const mid = (low + high) >> 1;
    const range = WIDE_RANGES[mid];
    if (range === undefined) return false;
    if (scalar < range[0]) high = mid - 1;
    else if (scalar > range[1]) low = mid + 1;
    else return true;
  }
  return false;
}

function widthScalar(char: string): 0 | 1 | 2 {
  const scalar = char.codePointAt(0) ?? 0;
  if (scalar < 0x20 || (scalar >= 0x7f && scalar < 0xa0)) return 0;
  if (ZERO_WIDTH_RE.test(char)) return 0;
  return isWide(scalar) ? 2 : 1;
}

function widthCluster(cluster: string): 0 | 1 | 2 {
  if (EMOJI_PRESENTATION_RE.test(cluster)) return 2;
  if (
    EXTENDED_PICTOGRAPHIC_RE.test(cluster) &&
    (cluster.includes(VARIATION_SELECTOR_16) || cluster.includes(ZWJ))
  ) {
    return 2;
  }
  const first = String.fromCodePoint(cluster.codePointAt(0) ?? 0);
  return widthScalar(first);
}

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/** Split text into grapheme clusters paired with their cell width. */
export function graphemes(text: string): Array<Readonly<{ cluster: string; width: number }>> {
  const out: Array<Readonly<{ cluster: string; width: number }>> = [];
  for (const { segment } of segmenter.segment(text)) {
    out.push({ cluster: segment, width: widthCluster(segment) });
  }
  return out;
}

function measureTextCellsAsciiOnly(text: string): number | null {
  let total = 0;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code >= 0x80) return null;
    if (code < 0x20 || code === 0x7f) continue;
    total++;
  }
  return total;
}

function measureTextCellsUncached(text: string): number {
  let total = 0;
  for (const { segment } of segmenter.segment(text)) {
    total += widthCluster(segment);
  }
  return total;
}

/**
 * Display width of `text` in terminal columns. Tabs are not expanded.
 */
export function measureTextCells(text: string): number {
  if (text.length === 0) return 0;

  const cacheable = text.length <= TEXT_CACHE_MAX_KEY_LENGTH;
  if (cacheable) {
    const cached = textWidthCache.get(text);
    if (cached !== undefined) return cached;
  }

  const width = measureTextCellsAsciiOnly(text) ?? measureTextCellsUncached(text);

  if (cacheable) {
    if (textWidthCache.size >= TEXT_CACHE_MAX_SIZE) {
      evictOldestTextWidthCacheEntry();
    }
    textWidthCache.set(text, width);
  }

  return width;
}

/**
 * Split `word` into pieces of at most `maxWidth` cells at grapheme boundaries.
 * A single grapheme wider than `maxWidth` still becomes its own piece.
 */
export function splitWordByWidth(word: string, maxWidth: number): string[] {
  if (word.length === 0 || maxWidth <= 0) return [];
  const out: string[] = [];
  let piece = "";
  let pieceWidth = 0;
  for (const { cluster, width } of graphemes(word)) {
    if (pieceWidth + width > maxWidth && piece.length > 0) {
      out.push(piece);
      piece = "";
      pieceWidth = 0;
    }
    piece += cluster;
    pieceWidth += width;
  }
  if (piece.length > 0) out.push(piece);
  return out;
}

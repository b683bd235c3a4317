// `matchAll` iterates over a copy of the regex, so this stays untouched
// between scans.
const FOOTNOTE_MARKER = /\{\{footnote:\s*([\s\S]*?)\}\}/g;

export type MarkerMatch = {
  /** Offset of the opening `{{` in the scanned text. */
  start: number;
  /** Offset just past the closing `}}`. */
  end: number;
  content: string;
};

/**
 * Yields every `{{footnote: ...}}` marker in `body`, left to right.
 *
 * Content may span lines and ends at the first `}}`, so a footnote can't
 * contain a literal `}}`. Whitespace after the colon is dropped, whitespace
 * before the closing braces is kept. Markers without a closing `}}` never
 * match.
 */
export function* scanMarkers(body: string): Generator<MarkerMatch> {
  for (const match of body.matchAll(FOOTNOTE_MARKER)) {
    const start = match.index ?? 0;
    yield {
      start,
      end: start + match[0].length,
      content: match[1] ?? '',
    };
  }
}

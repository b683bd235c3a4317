import {
  type FootnoteEntry,
  type FootnoteStyle,
  renderFootnoteList,
  rendererFor,
} from './renderer.js';
import { scanMarkers } from './scanner.js';

export type TransformResult = {
  content: string;
  footnotes: FootnoteEntry[];
};

/**
 * Replaces each footnote marker in `body` with a numbered reference and
 * appends the footnote list. Numbering starts at 1 on every call.
 */
export function transformContent(
  body: string,
  style: FootnoteStyle,
): TransformResult {
  const renderer = rendererFor(style);
  const footnotes: FootnoteEntry[] = [];

  let content = '';
  let last = 0;
  for (const marker of scanMarkers(body)) {
    const entry = { index: footnotes.length + 1, content: marker.content };
    footnotes.push(entry);
    content += body.slice(last, marker.start) + renderer.reference(entry.index);
    last = marker.end;
  }

  if (!footnotes.length) {
    return { content: body, footnotes };
  }

  content += body.slice(last);
  return {
    content: content + renderFootnoteList(renderer, footnotes),
    footnotes,
  };
}

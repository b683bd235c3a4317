export type FootnoteStyle = 'markdown' | 'hyperlink';

export type FootnoteEntry = {
  index: number;
  content: string;
};

export interface FootnoteRenderer {
  /** Replaces the marker in the text. Depends only on the index. */
  reference(index: number): string;
  /** Written once, before the first entry of the trailing list. */
  separator: string;
  entry(entry: FootnoteEntry): string;
}

export const markdownRenderer: FootnoteRenderer = {
  reference: (index) => `[^${index}]`,
  separator: '<p><hr/>\n',
  entry: ({ index, content }) => `\n\n[^${index}]: ${content}`,
};

export const hyperlinkRenderer: FootnoteRenderer = {
  reference: (index) =>
    `<sup><a name="to-footnote-${index}">[${index}](#footnote-${index})</a></sup>`,
  separator: '\n---\n',
  entry: ({ index, content }) =>
    `\n\n<a name="footnote-${index}">[${index}](#to-footnote-${index})</a>: ${content}`,
};

export function rendererFor(style: FootnoteStyle): FootnoteRenderer {
  switch (style) {
    case 'markdown':
      return markdownRenderer;
    case 'hyperlink':
      return hyperlinkRenderer;
  }
}

export function renderFootnoteList(
  renderer: FootnoteRenderer,
  entries: FootnoteEntry[],
): string {
  if (!entries.length) {
    return '';
  }
  return renderer.separator + entries.map((e) => renderer.entry(e)).join('');
}

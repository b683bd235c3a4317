import { type FootnoteConfig, MARKDOWN_OPTION } from './config.js';

// Name the host uses for its test renderer.
export const UNSUPPORTED_RENDERER = 'not-supported';

/** Renderers known to display the HTML that hyperlink style produces. */
export const HTML_RENDERERS: ReadonlySet<string> = new Set(['html', 'epub']);

export function supportsRenderer(renderer: string): boolean {
  return renderer !== UNSUPPORTED_RENDERER;
}

export function hyperlinkStyleAdvisory(
  renderer: string,
  config: FootnoteConfig,
): string | null {
  if (config.style !== 'hyperlink' || HTML_RENDERERS.has(renderer)) {
    return null;
  }
  return (
    `Footnotes are rendered as HTML links, which the "${renderer}" renderer may not display. ` +
    `Set ${MARKDOWN_OPTION} = true to use markdown footnotes instead.`
  );
}

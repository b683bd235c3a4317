import { Option, Predicate, Schema } from 'effect';
import type { FootnoteStyle } from './renderer.js';

/** Set to `true` in the book config to get markdown footnotes. */
export const MARKDOWN_OPTION = 'preprocessor.footnote.markdown';

export type FootnoteConfig = {
  style: FootnoteStyle;
};

export const defaultFootnoteConfig: FootnoteConfig = { style: 'hyperlink' };

export function getConfigValue(config: unknown, path: string): unknown {
  let current = config;
  for (const key of path.split('.')) {
    if (!Predicate.isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

const decodeFlag = Schema.decodeUnknownOption(Schema.Boolean);

/**
 * Reads the footnote settings out of the host's config tree. Anything other
 * than a boolean `true` under {@link MARKDOWN_OPTION} means hyperlink style.
 */
export function resolveFootnoteConfig(config: unknown): FootnoteConfig {
  const markdown = decodeFlag(getConfigValue(config, MARKDOWN_OPTION)).pipe(
    Option.getOrElse(() => false),
  );
  return markdown ? { style: 'markdown' } : defaultFootnoteConfig;
}

import { type Book, mapChapters } from './book.js';
import type { FootnoteConfig } from './config.js';
import { transformContent } from './transform.js';

export const PREPROCESSOR_NAME = 'footnote';

export type ChapterReport = {
  name: string;
  footnotes: number;
};

export type PreprocessResult = {
  book: Book;
  report: ChapterReport[];
};

export function preprocessBook(
  book: Book,
  config: FootnoteConfig,
): PreprocessResult {
  const report: ChapterReport[] = [];
  const sections = mapChapters(book.sections, (chapter) => {
    const { content, footnotes } = transformContent(
      chapter.content,
      config.style,
    );
    report.push({ name: chapter.name, footnotes: footnotes.length });
    return { ...chapter, content };
  });
  return { book: { ...book, sections }, report };
}

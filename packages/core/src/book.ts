import { Schema } from 'effect';

// Only the fields the preprocessor touches are declared. Decoding with
// `onExcessProperty: 'preserve'` keeps the rest of the host's chapter
// metadata (number, path, source_path, parent_names, ...) on the values.
export interface Chapter {
  readonly name: string;
  readonly content: string;
  readonly sub_items: ReadonlyArray<BookItem>;
}

export type BookItem =
  | { readonly Chapter: Chapter }
  | 'Separator'
  | { readonly PartTitle: string };

export const Chapter: Schema.Schema<Chapter> = Schema.Struct({
  name: Schema.String,
  content: Schema.String,
  sub_items: Schema.Array(
    Schema.suspend((): Schema.Schema<BookItem> => BookItem),
  ),
});

export const BookItem: Schema.Schema<BookItem> = Schema.Union(
  Schema.Struct({ Chapter }),
  Schema.Literal('Separator'),
  Schema.Struct({ PartTitle: Schema.String }),
);

export const Book = Schema.Struct({
  sections: Schema.Array(BookItem),
});

export type Book = typeof Book.Type;

export function isChapterItem(
  item: BookItem,
): item is { readonly Chapter: Chapter } {
  return typeof item === 'object' && 'Chapter' in item;
}

/**
 * Returns a copy of `items` with every chapter, at any depth, replaced by
 * `fn(chapter)`. A parent is mapped before its sub-items, and the sub-items
 * of the returned chapter are the ones that get visited.
 */
export function mapChapters(
  items: ReadonlyArray<BookItem>,
  fn: (chapter: Chapter) => Chapter,
): BookItem[] {
  return items.map((item) => {
    if (!isChapterItem(item)) {
      return item;
    }
    const chapter = fn(item.Chapter);
    return {
      ...item,
      Chapter: { ...chapter, sub_items: mapChapters(chapter.sub_items, fn) },
    };
  });
}

import type { Book, BookItem, Chapter } from '../../src/book.js';

export function chapter(
  name: string,
  content: string,
  sub_items: BookItem[] = [],
): { Chapter: Chapter } {
  return { Chapter: { name, content, sub_items } };
}

export function book(...sections: BookItem[]): Book {
  return { sections };
}

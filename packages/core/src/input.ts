import { Schema } from 'effect';
import { Book } from './book.js';

export const PreprocessorContext = Schema.Struct({
  root: Schema.String,
  config: Schema.Record({ key: Schema.String, value: Schema.Unknown }),
  renderer: Schema.String,
  mdbook_version: Schema.String,
});

export type PreprocessorContext = typeof PreprocessorContext.Type;

/** What the host writes to the preprocessor's stdin. */
export const PreprocessorInput = Schema.parseJson(
  Schema.Tuple(PreprocessorContext, Book),
);

export const decodePreprocessorInput = Schema.decodeUnknown(
  PreprocessorInput,
  { onExcessProperty: 'preserve' },
);

export function encodeBook(book: Book): string {
  return JSON.stringify(book);
}

import { Effect, Layer } from 'effect';
import { BookIO } from '../src/context/bookIO.js';
import { GlobalOpts } from '../src/context/globalOpts.js';

export function memoryIO(input: string) {
  const written: string[] = [];
  const layer = Layer.succeed(BookIO, {
    source: 'test',
    read: Effect.succeed(input),
    write: (contents: string) =>
      Effect.sync(() => {
        written.push(contents);
      }),
  });
  return { layer, written };
}

export const opts = (overrides: { quiet?: boolean; verbose?: boolean } = {}) =>
  Layer.succeed(GlobalOpts, { quiet: false, verbose: false, ...overrides });

export const hostInput = (
  book: unknown,
  overrides: { renderer?: string; mdbook_version?: string; config?: object } = {},
) =>
  JSON.stringify([
    {
      root: '/books/test',
      config: { book: { title: 'Test Book' } },
      renderer: 'html',
      mdbook_version: '0.4.40',
      ...overrides,
    },
    book,
  ]);

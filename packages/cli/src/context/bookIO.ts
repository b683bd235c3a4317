import { FileSystem } from '@effect/platform';
import { Console, Context, Effect, Layer } from 'effect';
import { text } from 'stream/consumers';
import { InputReadError, OutputWriteError } from '../errors.js';

/**
 * Where the preprocessor input comes from and where the processed book goes.
 * The host talks over stdin/stdout; `--input` and `--output` swap in files.
 */
export class BookIO extends Context.Tag('book-footnotes/cli/context/bookIO')<
  BookIO,
  {
    source: string;
    read: Effect.Effect<string, InputReadError>;
    write: (contents: string) => Effect.Effect<void, OutputWriteError>;
  }
>() {}

const readStdin = Effect.tryPromise({
  try: () => text(process.stdin),
  catch: (cause) =>
    new InputReadError({ message: "Couldn't read from stdin", cause }),
});

export const BookIOLive = (args: { input?: string; output?: string }) =>
  Layer.effect(
    BookIO,
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const { input, output } = args;

      const read = input
        ? fs.readFileString(input, 'utf8').pipe(
            Effect.mapError(
              (cause) =>
                new InputReadError({
                  message: `Couldn't read ${input}`,
                  cause,
                }),
            ),
          )
        : readStdin;

      const write = (contents: string) =>
        output
          ? fs.writeFileString(output, contents).pipe(
              Effect.mapError(
                (cause) =>
                  new OutputWriteError({
                    message: `Couldn't write ${output}`,
                    cause,
                  }),
              ),
            )
          : Console.log(contents);

      return { source: input ?? 'stdin', read, write };
    }),
  );

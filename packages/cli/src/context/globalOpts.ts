import { Config, Context, Effect, Layer } from 'effect';
import { warn } from '../logging.js';

export class GlobalOpts extends Context.Tag(
  'book-footnotes/cli/context/globalOpts',
)<
  GlobalOpts,
  {
    quiet: boolean;
    verbose: boolean;
  }
>() {}

// A bad value must not fail the run: the host treats a failing
// `supports` call as an unsupported renderer.
const envFlag = (name: string) =>
  Config.boolean(name).pipe(
    Config.withDefault(false),
    Effect.orElse(() =>
      Effect.sync(() => {
        warn(`Ignoring ${name}: expected true or false`);
        return false;
      }),
    ),
  );

export const GlobalOptsLive = (flags: { quiet?: boolean; verbose?: boolean }) =>
  Layer.effect(
    GlobalOpts,
    Effect.gen(function* () {
      const quiet = yield* envFlag('BOOK_FOOTNOTES_QUIET');
      const verbose = yield* envFlag('BOOK_FOOTNOTES_VERBOSE');
      return {
        quiet: flags.quiet || quiet,
        verbose: flags.verbose || verbose,
      };
    }),
  );

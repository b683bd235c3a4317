import { NodeContext } from '@effect/platform-node';
import chalk from 'chalk';
import { Cause, Console, Effect, Layer, Option } from 'effect';
import { BookIOLive } from './context/bookIO.js';
import { GlobalOptsLive } from './context/globalOpts.js';

/**
 * Prints the failure in red and turns the result into `false`, so the caller
 * can set the exit code.
 */
export const printRedErrors = Effect.catchAllCause((cause) => {
  const failure = Cause.failureOption(cause);

  // Print just the message if the error has a message attribute and no cause
  if (
    Option.isSome(failure) &&
    typeof failure.value === 'object' &&
    failure.value !== null &&
    'message' in failure.value &&
    typeof failure.value.message === 'string' &&
    !('cause' in failure.value)
  ) {
    return Console.error(chalk.red(failure.value.message)).pipe(
      Effect.as(false),
    );
  }
  return Console.error(
    chalk.red(Cause.pretty(cause, { renderErrorCause: true })),
  ).pipe(Effect.as(false));
});

export const runCommand = async (command: Effect.Effect<boolean, unknown>) => {
  const ok = await Effect.runPromise(command.pipe(printRedErrors));
  process.exitCode = ok ? 0 : 1;
};

export const PreprocessLayerLive = (opts: {
  input?: string;
  output?: string;
  quiet?: boolean;
  verbose?: boolean;
}) =>
  Layer.merge(
    GlobalOptsLive(opts),
    Layer.provide(BookIOLive(opts), NodeContext.layer),
  );

import { ConfigProvider, Effect } from 'effect';
import { afterEach, describe, expect, test, vi } from 'vitest';
import { supportsCommand } from '../src/commands/supports.js';
import { GlobalOptsLive } from '../src/context/globalOpts.js';
import { InputReadError, InvalidInputError } from '../src/errors.js';
import { printRedErrors, runCommand } from '../src/layer.js';

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

test('printRedErrors prints the message of a plain error', async () => {
  const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  const ok = await Effect.runPromise(
    Effect.fail(new InvalidInputError({ message: 'bad input' })).pipe(
      Effect.as(true),
      printRedErrors,
    ),
  );
  expect(ok).toBe(false);
  expect(errorSpy).toHaveBeenCalledTimes(1);
  expect(errorSpy.mock.calls[0][0]).toContain('bad input');
});

test('printRedErrors prints errors with a cause in full', async () => {
  const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  const ok = await Effect.runPromise(
    Effect.fail(
      new InputReadError({
        message: "Couldn't read from stdin",
        cause: new Error('stream closed'),
      }),
    ).pipe(Effect.as(true), printRedErrors),
  );
  expect(ok).toBe(false);
  expect(errorSpy).toHaveBeenCalledTimes(1);
  expect(errorSpy.mock.calls[0][0]).toContain("Couldn't read from stdin");
});

test('printRedErrors passes success through', async () => {
  expect(await Effect.runPromise(Effect.succeed(true).pipe(printRedErrors))).toBe(
    true,
  );
});

describe('runCommand', () => {
  test('exits 0 when the command succeeds with true', async () => {
    await runCommand(Effect.succeed(true));
    expect(process.exitCode).toBe(0);
  });

  test('exits 1 when the command succeeds with false', async () => {
    await runCommand(Effect.succeed(false));
    expect(process.exitCode).toBe(1);
  });

  test('exits 1 when the command fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    await runCommand(Effect.fail(new InvalidInputError({ message: 'bad' })));
    expect(process.exitCode).toBe(1);
  });

  const supports = (renderer: string, env: [string, string][] = []) =>
    runCommand(
      supportsCommand(renderer).pipe(
        Effect.provide(GlobalOptsLive({})),
        Effect.withConfigProvider(ConfigProvider.fromMap(new Map(env))),
      ),
    );

  test('supports exits by renderer', async () => {
    await supports('not-supported');
    expect(process.exitCode).toBe(1);

    await supports('latex');
    expect(process.exitCode).toBe(0);
  });

  test('supports ignores a bad env flag', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await supports('html', [['BOOK_FOOTNOTES_VERBOSE', 'maybe']]);
    expect(process.exitCode).toBe(0);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0][0]).toContain(
      'Ignoring BOOK_FOOTNOTES_VERBOSE: expected true or false',
    );
  });
});

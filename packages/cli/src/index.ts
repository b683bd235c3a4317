#!/usr/bin/env node
import { program } from '@commander-js/extra-typings';
import { Effect } from 'effect';
import { preprocessCommand } from './commands/preprocess.js';
import { supportsCommand } from './commands/supports.js';
import { GlobalOptsLive } from './context/globalOpts.js';
import { PreprocessLayerLive, runCommand } from './layer.js';
import { loadEnv } from './util/loadEnv.js';
import version from './version.js';

loadEnv();

const cli = program
  .name('book-footnotes')
  .description(
    'A book preprocessor that turns {{footnote: ...}} markers into numbered footnotes.',
  )
  .option(
    '-i --input <file>',
    'Read the [context, book] JSON from a file instead of stdin',
  )
  .option(
    '-o --output <file>',
    'Write the processed book to a file instead of stdout',
  )
  .option('-q --quiet', 'Hide warnings')
  .option('--verbose', 'Log the footnote count of every chapter')
  .option('--env <file>', 'Use a specific .env file')
  .version(version, '-v --version', 'Print the version number')
  .action((opts) =>
    runCommand(
      preprocessCommand().pipe(Effect.provide(PreprocessLayerLive(opts))),
    ),
  );

cli
  .command('supports')
  .description('Check whether a renderer is supported by this preprocessor')
  .argument('<renderer>', 'Name of the renderer')
  .action((renderer) =>
    runCommand(
      supportsCommand(renderer).pipe(
        Effect.provide(GlobalOptsLive(cli.opts())),
      ),
    ),
  );

cli.configureHelp({ showGlobalOptions: true });

await cli.parseAsync(process.argv);

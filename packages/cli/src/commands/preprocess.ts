import {
  decodePreprocessorInput,
  encodeBook,
  hyperlinkStyleAdvisory,
  isCompatibleHostVersion,
  PREPROCESSOR_NAME,
  preprocessBook,
  PROTOCOL_VERSION,
  resolveFootnoteConfig,
} from '@book-footnotes/core';
import { Effect } from 'effect';
import { BookIO } from '../context/bookIO.js';
import { GlobalOpts } from '../context/globalOpts.js';
import { InvalidInputError } from '../errors.js';
import { debug, warn } from '../logging.js';

export const preprocessCommand = () =>
  Effect.gen(function* () {
    const io = yield* BookIO;
    const opts = yield* GlobalOpts;

    const raw = yield* io.read;
    const [ctx, book] = yield* decodePreprocessorInput(raw).pipe(
      Effect.mapError(
        (e) =>
          new InvalidInputError({
            message: `Invalid preprocessor input from ${io.source}: ${e.message}`,
          }),
      ),
    );

    if (!opts.quiet && !isCompatibleHostVersion(ctx.mdbook_version)) {
      warn(
        `The ${PREPROCESSOR_NAME} preprocessor was written against mdbook ${PROTOCOL_VERSION}, ` +
          `but is being called from version ${ctx.mdbook_version}`,
      );
    }

    const config = resolveFootnoteConfig(ctx.config);
    const advisory = hyperlinkStyleAdvisory(ctx.renderer, config);
    if (advisory && !opts.quiet) {
      warn(advisory);
    }

    const { book: processed, report } = preprocessBook(book, config);
    if (opts.verbose) {
      for (const { name, footnotes } of report) {
        debug(`${name}: ${footnotes} footnote${footnotes === 1 ? '' : 's'}`);
      }
    }

    yield* io.write(encodeBook(processed));
    return true;
  });

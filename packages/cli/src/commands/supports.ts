import { supportsRenderer } from '@book-footnotes/core';
import { Effect } from 'effect';
import { GlobalOpts } from '../context/globalOpts.js';
import { debug } from '../logging.js';

/** Succeeds with whether the host may run us before `renderer`. */
export const supportsCommand = (renderer: string) =>
  Effect.gen(function* () {
    const opts = yield* GlobalOpts;
    const supported = supportsRenderer(renderer);
    if (opts.verbose) {
      debug(`renderer "${renderer}" is ${supported ? '' : 'not '}supported`);
    }
    return supported;
  });

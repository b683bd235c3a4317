import dotenvFlow from 'dotenv-flow';
import { basename, dirname, resolve } from 'path';

/**
 * Loads `.env*` files from the working directory, or only the file named by
 * `--env`. Runs before commander parses, so it looks at argv itself.
 */
export const loadEnv = (argv: string[] = process.argv) => {
  const envIndex = argv.indexOf('--env');
  const envFile = envIndex !== -1 ? argv[envIndex + 1] : undefined;

  if (!envFile) {
    dotenvFlow.config({ silent: true });
    return;
  }

  // dotenv-flow looks for `files` inside `path`
  const fullPath = resolve(envFile);
  dotenvFlow.config({
    silent: true,
    path: dirname(fullPath),
    files: [basename(fullPath)],
  });
};

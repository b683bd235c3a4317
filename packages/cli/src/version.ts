import { Schema } from 'effect';
import { readFileSync } from 'fs';

const Manifest = Schema.parseJson(Schema.Struct({ version: Schema.String }));

// `../package.json` is the package manifest from both `src/` and `dist/`.
const { version } = Schema.decodeUnknownSync(Manifest)(
  readFileSync(new URL('../package.json', import.meta.url), 'utf8'),
);

export default version;

#!/usr/bin/env node
/**
 * string-shroud CLI
 *
 * Usage:
 *   string-shroud src -o build/src                 # rewrite a source tree
 *   string-shroud app.ts                           # outputs app.shrouded.ts
 *   string-shroud bundle.zip --seed 7001           # rewrite sources inside an archive
 *   string-shroud src --config shroud.json         # custom config file
 */

import { run } from './command';

run(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch(e => {
    console.error(e);
    process.exit(1);
  });

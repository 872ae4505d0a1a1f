#!/usr/bin/env node
/**
 * Usage:
 *   node src/cli/topspot.ts get-top-tracks --time-range short_term --limit 10
 *   node src/cli/topspot.ts get-top-artists
 *   node src/cli/topspot.ts search --track "Buddy Holly"
 *
 * Prints:
 *   1 - Buddy Holly by Weezer (2:39)
 */

import { errorMessage } from '../lib/errors';
import { main } from '../lib/runCli';

main(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(errorMessage(err));
    process.exit(1);
  });

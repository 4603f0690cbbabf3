// src/cli/bin/wfmon.ts
// CLI bootstrap (executes the parser). Kept apart from makeCli() so the
// factory stays side-effect free for tests.
import { CommanderError } from 'commander';

import { makeCli } from '..';

try {
  await makeCli().parseAsync();
} catch (e) {
  // Commander already printed its message and the exit code is set.
  if (!(e instanceof CommanderError)) throw e;
}

#!/usr/bin/env node
/**
 * kagent-setup executable
 */

import { runCli } from '../cli/cli';
import { errorMessage } from '../errors';

runCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    process.stderr.write(`❌ ${errorMessage(error)}\n`);
    process.exit(1);
  },
);

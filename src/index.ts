#!/usr/bin/env node
/**
 * wheelwright CLI
 * Python source in, installable (and optionally published) package out
 */

import { runCLI } from './cli/index.js';

runCLI().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});

#!/usr/bin/env node
/**
 * Executable entry: loads .env, then runs the CLI.
 *
 * @module cli/bin
 */

import 'dotenv/config';
import { main } from './index.js';

main().catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});

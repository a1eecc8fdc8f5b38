#!/usr/bin/env node

/**
 * Notebook widget metadata fixer
 * Usage: fix-notebook <notebook_path>
 */

import 'dotenv/config';
import { runCli } from '../notebook-repair/src/cli.js';

async function main() {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error) => {
  console.log('Repair failed:', error);
  process.exitCode = 1;
});

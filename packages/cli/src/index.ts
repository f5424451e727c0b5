#!/usr/bin/env node

import { Command } from 'commander';
import { registerMirrorCommand } from './commands/mirror/mirror';
import { normalizeArgv } from './argv';

const program = new Command();

program
  .name('repomirror')
  .description('Keep a local mirror of every GitHub repository owned by an account')
  .version('1.0.0');

registerMirrorCommand(program);

program.parseAsync(normalizeArgv(process.argv)).catch((error: unknown) => {
  console.error("❌ Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});

#!/usr/bin/env node

process.on('uncaughtException', (error) => {
  console.error('[claude-tune] Fatal error:', error.message || error);
  if (error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
});

process.on('unhandledRejection', (reason, _promise) => {
  console.error('[claude-tune] Unhandled promise rejection:', reason);
  process.exit(1);
});

import { Command } from 'commander';
import { createRequire } from 'module';
import { analyzeCommand } from './cli/commands/analyze.js';
import { handoffCommand } from './cli/commands/handoff.js';
import {
  hooksAddCommand,
  hooksInitCommand,
  hooksListCommand,
  hooksRemoveCommand,
  hooksTemplatesCommand,
} from './cli/commands/hooks.js';
import { initCommand } from './cli/commands/init.js';
import { learnCommand } from './cli/commands/learn.js';
import { LOGS_DIR_ENV } from './utils/config.js';

const require = createRequire(import.meta.url);
const packageJson = require('../package.json') as { version: string };

const program = new Command()
  .name('claude-tune')
  .description('Tune your CLAUDE.md from your own Claude Code session logs')
  .version(packageJson.version)
  .option('--logs <path>', `Session log file, directory or projects root (env: ${LOGS_DIR_ENV}, default: ~/.claude/projects)`)
  .option('--rules <file>', 'Replace the bundled heuristics table with a JSON file')
  .option('-v, --verbose', 'Print a warning for every malformed log line');

program
  .command('init')
  .description('Create a CLAUDE.md from a short questionnaire and your session history')
  .option('-o, --output <file>', 'Output file (default: ./CLAUDE.md)')
  .option('-y, --yes', 'Skip the questions and use the defaults')
  .option('-l, --limit <number>', 'Number of recent sessions to analyze (default: 20)')
  .action((_options, command: Command) => initCommand(command.optsWithGlobals()));

program
  .command('learn')
  .description('Suggest CLAUDE.md rules learned from your sessions')
  .option('--apply', 'Merge new suggestions into CLAUDE.md')
  .option('-y, --yes', 'Apply without asking for confirmation')
  .option('-l, --limit <number>', 'Only analyze the N most recent sessions')
  .option('-p, --project <name>', 'Filter by project (substring match)')
  .option('--claude-md <file>', 'CLAUDE.md to update (default: nearest CLAUDE.md)')
  .option('--min <n>', 'Minimum occurrences for a pattern')
  .option('-j, --json', 'Output as JSON')
  .action((_options, command: Command) => learnCommand(command.optsWithGlobals()));

program
  .command('analyze')
  .description('Show statistics about your sessions')
  .option('-l, --limit <number>', 'Only analyze the N most recent sessions')
  .option('-p, --project <name>', 'Filter by project (substring match)')
  .option('-o, --output <file>', 'Save the report as JSON')
  .option('-j, --json', 'Output as JSON')
  .action((_options, command: Command) => analyzeCommand(command.optsWithGlobals()));

program
  .command('handoff')
  .description('Write HANDOFF.md summarizing a session for the next one')
  .option('-s, --session <id>', 'Session id (default: latest)')
  .option('-o, --output <file>', 'Output file', 'HANDOFF.md')
  .option('-n, --notes <text>', 'Extra notes to include')
  .action((_options, command: Command) => handoffCommand(command.optsWithGlobals()));

const hooks = program
  .command('hooks')
  .description('Manage hooks in .claude/settings.json');

hooks
  .command('list')
  .description('List configured hooks')
  .option('-d, --dir <path>', 'Project directory (default: current directory)')
  .action(hooksListCommand);

hooks
  .command('templates')
  .description('List available hook templates')
  .option('-d, --dir <path>', 'Project directory used for suggestions')
  .action(hooksTemplatesCommand);

hooks
  .command('init')
  .description('Create an empty hooks section')
  .option('-d, --dir <path>', 'Project directory (default: current directory)')
  .action(hooksInitCommand);

hooks
  .command('add <template>')
  .description('Add a hook from a template')
  .option('--pre', 'Register as PreToolUse instead of the template default')
  .option('-d, --dir <path>', 'Project directory (default: current directory)')
  .action(hooksAddCommand);

hooks
  .command('remove <matcher>')
  .description('Remove hooks by matcher')
  .option('--pre', 'Only PreToolUse hooks')
  .option('--post', 'Only PostToolUse hooks')
  .option('-d, --dir <path>', 'Project directory (default: current directory)')
  .action(hooksRemoveCommand);

program.parseAsync().catch((error: unknown) => {
  console.error('[claude-tune]', error instanceof Error ? error.message : error);
  process.exit(1);
});

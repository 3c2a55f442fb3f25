/**
 * CLI command handler for `claude-tune init`
 *
 * Asks a few questions (or takes the defaults with --yes), analyzes recent
 * sessions, and writes a fresh CLAUDE.md, backing up any existing one.
 */

import React from 'react';
import { render } from 'ink';
import { join, resolve } from 'path';
import { analyzeLogs } from '../../analysis/index.js';
import {
  DEFAULT_ANSWERS,
  generateClaudeMd,
  writeClaudeMd,
  type InitAnswers,
  type InitWriteResult,
} from '../../features/init/index.js';
import { generateSuggestions } from '../../features/suggestions/index.js';
import { CLAUDE_MD, resolveSettings, type GlobalOptions } from '../../utils/config.js';
import { InitWizard } from '../components/InitWizard.js';
import { fail, parseCount, printWarning, reportSkipped } from '../options.js';

interface InitCliOptions extends GlobalOptions {
  output?: string;
  yes?: boolean;
  limit?: string;
}

const DEFAULT_SESSION_LIMIT = 20;

/**
 * Run the interactive wizard. Resolves null when the user quits.
 */
export async function runInitWizard(): Promise<InitAnswers | null> {
  let answers: InitAnswers | null = null;
  const app = render(
    <InitWizard
      onComplete={(result) => {
        answers = result;
      }}
    />,
  );
  await app.waitUntilExit();
  return answers;
}

export async function initCommand(options: InitCliOptions): Promise<void> {
  const settings = resolveSettings(options);
  const outputPath = options.output ? resolve(settings.cwd, options.output) : join(settings.cwd, CLAUDE_MD);

  let answers: InitAnswers | null;
  if (options.yes) {
    answers = DEFAULT_ANSWERS;
  } else {
    if (!process.stdin.isTTY) {
      fail('The init wizard needs a terminal; re-run with --yes to use the defaults');
    }
    answers = await runInitWizard();
  }

  if (!answers) {
    console.log('Cancelled.');
    return;
  }

  let content: string;
  try {
    const analysis = analyzeLogs(settings, {
      limit: parseCount(options.limit, '--limit') ?? DEFAULT_SESSION_LIMIT,
      ...(settings.verbose ? { onWarning: printWarning } : {}),
    });
    reportSkipped(analysis.readStats, settings.verbose);

    if (analysis.statistics.sessions > 0) {
      console.log(`Analyzed ${analysis.statistics.sessions} session(s), ${analysis.patterns.length} pattern(s) found`);
    } else {
      console.log('No session logs to learn from; writing the base template');
    }

    const suggestions = generateSuggestions(analysis.patterns, { heuristics: analysis.heuristics });
    content = generateClaudeMd(answers, { statistics: analysis.statistics, suggestions });
  } catch (error) {
    fail('Analysis failed', error);
  }

  let result: InitWriteResult;
  try {
    result = writeClaudeMd(outputPath, content);
  } catch (error) {
    fail(`Could not write ${outputPath}`, error);
  }

  if (result.backupPath) {
    console.log(`Backed up the existing file to ${result.backupPath}`);
  }
  console.log(`Created ${result.path}`);
}

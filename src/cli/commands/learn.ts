/**
 * CLI command handler for `claude-tune learn`
 *
 * Ranks CLAUDE.md rule suggestions learned from the session logs and,
 * with --apply, merges the new ones into the document.
 */

import { analyzeLogs, type Analysis } from '../../analysis/index.js';
import {
  applySuggestions,
  formatSuggestionReport,
  generateSuggestions,
  parseConfigDocument,
  type ApplyResult,
  type Suggestion,
} from '../../features/suggestions/index.js';
import { resolveClaudeMdPath, resolveSettings, type GlobalOptions } from '../../utils/config.js';
import { readTextFile } from '../../utils/files.js';
import { renderMarkdownContent } from '../../utils/format.js';
import { runConfirmPrompt } from '../components/ConfirmPrompt.js';
import { LOG_PREFIX, fail, parseCount, printWarning, reportSkipped } from '../options.js';

interface LearnCliOptions extends GlobalOptions {
  apply?: boolean;
  yes?: boolean;
  limit?: string;
  project?: string;
  claudeMd?: string;
  min?: string;
  json?: boolean;
}

interface LearnPlan {
  analysis: Analysis;
  suggestions: Suggestion[];
  documentPath: string;
}

function plan(options: LearnCliOptions): LearnPlan {
  const settings = resolveSettings(options);
  const analysis = analyzeLogs(settings, {
    project: options.project,
    limit: parseCount(options.limit, '--limit'),
    minOccurrences: parseCount(options.min, '--min'),
    ...(settings.verbose ? { onWarning: printWarning } : {}),
  });
  reportSkipped(analysis.readStats, settings.verbose);

  const documentPath = resolveClaudeMdPath(options.claudeMd, settings.cwd);
  const existing = readTextFile(documentPath);
  const suggestions = generateSuggestions(analysis.patterns, {
    heuristics: analysis.heuristics,
    ...(existing !== null ? { document: parseConfigDocument(existing) } : {}),
  });

  return { analysis, suggestions, documentPath };
}

function printApplyResult(result: ApplyResult): void {
  if (!result.changed) {
    console.log(`${result.path} is already up to date.`);
    return;
  }
  console.log(`Added ${result.added.length} rule(s) to ${result.path}`);
  for (const suggestion of result.added) {
    console.log(`  + [${suggestion.section}] ${suggestion.rule}`);
  }
  for (const section of result.createdSections) {
    console.log(`  new section: ## ${section}`);
  }
}

export async function learnCommand(options: LearnCliOptions): Promise<void> {
  let learned: LearnPlan;
  try {
    learned = plan(options);
  } catch (error) {
    fail('Analysis failed', error);
  }

  const { analysis, suggestions, documentPath } = learned;

  if (options.json) {
    console.log(
      JSON.stringify(
        { claudeMd: documentPath, readStats: analysis.readStats, suggestions, patterns: analysis.patterns },
        null,
        2,
      ),
    );
  } else {
    const report = formatSuggestionReport({
      suggestions,
      patterns: analysis.patterns,
      readStats: analysis.readStats,
      sessions: analysis.statistics.sessions,
      documentPath,
    });
    console.log(renderMarkdownContent(report));
  }

  if (!options.apply) return;

  const pending = suggestions.filter((s) => !s.alreadyPresent);
  if (pending.length === 0) {
    console.log(`${documentPath} is already up to date.`);
    return;
  }

  if (!options.yes) {
    if (!process.stdin.isTTY) {
      fail('Refusing to modify CLAUDE.md without a terminal to confirm; re-run with --yes');
    }
    const confirmed = await runConfirmPrompt(
      `Add ${pending.length} rule(s) to ${documentPath}?`,
      pending.map((s) => `- [${s.section}] ${s.rule}`),
    );
    if (!confirmed) {
      console.log('No changes made.');
      return;
    }
  }

  let result: ApplyResult;
  try {
    result = applySuggestions(documentPath, pending);
  } catch (error) {
    fail(`Failed to update ${documentPath}`, error);
  }

  printApplyResult(result);
  if (result.skipped.length > 0) {
    console.error(`${LOG_PREFIX} ${result.skipped.length} rule(s) were already present`);
  }
}

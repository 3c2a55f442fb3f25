/**
 * CLI command handler for `claude-tune analyze`
 *
 * Prints usage statistics and detected patterns for the session logs.
 */

import { analyzeLogs, type Analysis } from '../../analysis/index.js';
import { resolveSettings, type GlobalOptions } from '../../utils/config.js';
import { writeFileAtomic } from '../../utils/files.js';
import { formatPercent } from '../../utils/format.js';
import { fail, parseCount, printWarning, reportSkipped } from '../options.js';

interface AnalyzeCliOptions extends GlobalOptions {
  limit?: string;
  project?: string;
  output?: string;
  json?: boolean;
}

export interface AnalysisReport {
  logs: string;
  files: number;
  lines: number;
  skipped: number;
  ignored: number;
  statistics: Analysis['statistics'];
  patterns: Array<{ id: string; category: string; label: string; occurrences: number }>;
}

export function buildAnalysisReport(logs: string, analysis: Analysis): AnalysisReport {
  const { readStats } = analysis;
  return {
    logs,
    files: readStats.files,
    lines: readStats.lines,
    skipped: readStats.skipped,
    ignored: readStats.ignored,
    statistics: analysis.statistics,
    patterns: analysis.patterns.map((p) => ({
      id: p.id,
      category: p.category,
      label: p.label,
      occurrences: p.occurrences,
    })),
  };
}

function printReport(report: AnalysisReport): void {
  const s = report.statistics;

  console.log('');
  console.log(`Analysis of ${report.logs}`);
  if (report.files === 0) {
    console.log('  (no session logs found)');
  }
  console.log('');
  console.log(`  Sessions:       ${s.sessions}`);
  console.log(`  Turns:          ${s.turns} (user ${s.userTurns}, assistant ${s.assistantTurns}, tool ${s.toolTurns})`);
  console.log(`  Tool calls:     ${s.toolCalls}`);
  console.log(`  Avg message:    ${s.averageUserMessageLength.toFixed(1)} chars`);
  console.log(`  Questions:      ${formatPercent(s.questionRatio)}`);
  console.log(`  Code requests:  ${formatPercent(s.codeRequestRatio)}`);

  if (s.toolFrequency.length > 0) {
    const width = Math.max(...s.toolFrequency.slice(0, 10).map((t) => t.name.length));
    console.log('');
    console.log('Top tools');
    for (const tool of s.toolFrequency.slice(0, 10)) {
      console.log(`  ${tool.name.padEnd(width)}  ${tool.count}`);
    }
  }

  if (report.patterns.length > 0) {
    console.log('');
    console.log('Patterns');
    for (const pattern of report.patterns) {
      console.log(`  [${pattern.category}] ${pattern.label} ×${pattern.occurrences}`);
    }
  }
  console.log('');
}

export async function analyzeCommand(options: AnalyzeCliOptions): Promise<void> {
  let report: AnalysisReport;
  try {
    const settings = resolveSettings(options);
    const analysis = analyzeLogs(settings, {
      project: options.project,
      limit: parseCount(options.limit, '--limit'),
      ...(settings.verbose ? { onWarning: printWarning } : {}),
    });
    reportSkipped(analysis.readStats, settings.verbose);
    report = buildAnalysisReport(settings.logsPath, analysis);
  } catch (error) {
    fail('Analysis failed', error);
  }

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printReport(report);
  }

  if (options.output) {
    try {
      writeFileAtomic(options.output, `${JSON.stringify(report, null, 2)}\n`);
    } catch (error) {
      fail('Could not save the report', error);
    }
    console.log(`Saved report to ${options.output}`);
  }
}

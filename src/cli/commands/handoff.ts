/**
 * CLI command handler for `claude-tune handoff`
 */

import { resolve } from 'path';
import { loadHeuristics } from '../../analysis/index.js';
import { createHandoff, type HandoffResult } from '../../features/handoff/index.js';
import { resolveSettings, type GlobalOptions } from '../../utils/config.js';
import { fail, printWarning } from '../options.js';

interface HandoffCliOptions extends GlobalOptions {
  session?: string;
  output?: string;
  notes?: string;
}

export async function handoffCommand(options: HandoffCliOptions): Promise<void> {
  const settings = resolveSettings(options);
  const outputPath = resolve(settings.cwd, options.output ?? 'HANDOFF.md');

  let result: HandoffResult | null;
  try {
    const heuristics = loadHeuristics(settings.rulesPath);
    result = createHandoff({
      logsPath: settings.logsPath,
      outputPath,
      markers: heuristics.handoff,
      ...(options.session ? { sessionId: options.session } : {}),
      ...(options.notes ? { notes: options.notes } : {}),
      ...(settings.verbose ? { onWarning: printWarning } : {}),
    });
  } catch (error) {
    fail('Handoff failed', error);
  }

  if (!result) {
    const which = options.session ? `session ${options.session}` : 'any session';
    fail(`Could not find ${which} in ${settings.logsPath}`);
  }

  console.log(`Wrote ${result.path} (session ${result.sessionId})`);
}

/**
 * HANDOFF.md generation for carrying a session's context into a new one
 */

import { collectTurns, discoverSessionFiles, readTurns } from '../../adapters/claude-code/index.js';
import type { ReadWarning } from '../../adapters/types.js';
import { writeFileAtomic } from '../../utils/files.js';
import { extractHandoffContext, pickSession, type HandoffMarkers } from './extract.js';
import { renderHandoff } from './render.js';

export interface CreateHandoffOptions {
  /** Session log location (file, project directory or projects root) */
  logsPath: string;
  outputPath: string;
  markers: HandoffMarkers;
  /** Session file stem; the most recent session when omitted or 'latest' */
  sessionId?: string;
  notes?: string;
  now?: Date;
  onWarning?: (warning: ReadWarning) => void;
}

export interface HandoffResult {
  path: string;
  sessionId: string;
  content: string;
}

/**
 * Build HANDOFF.md from one session and write it. Returns null when no session matches.
 */
export function createHandoff(options: CreateHandoffOptions): HandoffResult | null {
  const session = pickSession(discoverSessionFiles(options.logsPath), options.sessionId);
  if (!session) return null;

  const { turns } = collectTurns(
    readTurns(session.path, options.onWarning ? { onWarning: options.onWarning } : {}),
  );
  const context = extractHandoffContext(turns, options.markers);
  const content = renderHandoff(context, {
    sessionId: session.sessionId,
    ...(options.notes ? { notes: options.notes } : {}),
    ...(options.now ? { now: options.now } : {}),
  });

  writeFileAtomic(options.outputPath, content);
  return { path: options.outputPath, sessionId: session.sessionId, content };
}

export { extractHandoffContext, pickSession, NO_SUMMARY, DEFAULT_NEXT_STEP, type HandoffContext, type HandoffMarkers } from './extract.js';
export { renderHandoff, type RenderHandoffOptions } from './render.js';

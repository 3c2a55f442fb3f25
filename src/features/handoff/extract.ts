/**
 * Pull a handoff summary out of one session's turns
 */

import { basename } from 'path';
import type { SessionFile, Turn } from '../../adapters/types.js';

export interface HandoffMarkers {
  /** Assistant text containing one of these marks a finished task */
  completedMarkers: readonly string[];
  /** User requests containing one of these are open tasks */
  pendingMarkers: readonly string[];
}

export interface HandoffContext {
  summary: string;
  completedTasks: string[];
  pendingTasks: string[];
  importantFiles: string[];
  nextSteps: string[];
}

export const NO_SUMMARY = '세션 요약 없음';
export const DEFAULT_NEXT_STEP = '다음 작업을 정의하세요';

const MAX_TASKS = 5;
const MAX_FILES = 10;
const MAX_NEXT_STEPS = 3;

function takeChars(text: string, max: number): string {
  return Array.from(text).slice(0, max).join('');
}

function includesAny(text: string, markers: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return markers.some((marker) => lower.includes(marker.toLowerCase()));
}

/** Unique values in first-seen order, keeping the last `max` */
function lastUnique(values: readonly string[], max: number): string[] {
  return [...new Set(values)].slice(-max);
}

/**
 * The session to hand off: the one with the given id, or the most recently modified.
 * `files` is expected oldest first, as discovery returns it.
 */
export function pickSession(files: readonly SessionFile[], sessionId?: string): SessionFile | undefined {
  if (sessionId && sessionId !== 'latest') {
    return files.find((f) => f.sessionId === sessionId);
  }
  return files[files.length - 1];
}

function completedTaskLine(text: string): string | undefined {
  for (const line of text.split('\n').slice(0, 3)) {
    const trimmed = line.trim();
    if (trimmed && Array.from(line).length < 100) {
      return takeChars(trimmed, 80);
    }
  }
  return undefined;
}

export function extractHandoffContext(turns: readonly Turn[], markers: HandoffMarkers): HandoffContext {
  const completed: string[] = [];
  const pending: string[] = [];
  const files = new Set<string>();
  let summary: string | undefined;

  for (const turn of turns) {
    if (turn.role === 'assistant') {
      if (turn.text && includesAny(turn.text, markers.completedMarkers)) {
        const task = completedTaskLine(turn.text);
        if (task) completed.push(task);
      }

      for (const call of turn.toolCalls) {
        const filePath = call.args['file_path'];
        if (typeof filePath === 'string' && filePath && !filePath.startsWith('/tmp')) {
          files.add(basename(filePath));
        }
      }
    } else if (turn.role === 'user' && turn.text) {
      summary ??= takeChars(turn.text, 200);

      if (includesAny(turn.text, markers.pendingMarkers) && Array.from(turn.text).length < 150) {
        pending.push(takeChars(turn.text.trim(), 100));
      }
    }
  }

  const pendingTasks = lastUnique(pending, MAX_TASKS);

  return {
    summary: summary ?? NO_SUMMARY,
    completedTasks: lastUnique(completed, MAX_TASKS),
    pendingTasks,
    importantFiles: [...files].slice(0, MAX_FILES),
    nextSteps: pendingTasks.length > 0 ? pendingTasks.slice(0, MAX_NEXT_STEPS) : [DEFAULT_NEXT_STEP],
  };
}

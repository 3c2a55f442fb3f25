/**
 * Manage Claude Code hooks in a project's `.claude/settings.json`
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
  HOOK_EVENTS,
  SettingsError,
  readSettings,
  writeSettings,
  type ClaudeSettings,
  type HookEvent,
  type HookMatcher,
} from './settings.js';

const DEFAULT_TEMPLATES_PATH = fileURLToPath(new URL('../../../data/hook-templates.json', import.meta.url));

const hookTemplateSchema = z.object({
  matcher: z.string().min(1),
  command: z.string().min(1),
  description: z.string(),
  event: z.enum(HOOK_EVENTS).optional(),
});

export interface HookTemplate extends z.infer<typeof hookTemplateSchema> {
  name: string;
}

export interface HookListing {
  event: string;
  matcher: string;
  command: string;
}

export type AddHookResult = 'added' | 'appended' | 'exists';

export function loadHookTemplates(path: string = DEFAULT_TEMPLATES_PATH): HookTemplate[] {
  let value: unknown;
  try {
    value = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new SettingsError(`Cannot load hook templates from ${path}`, { cause: error });
  }

  const parsed = z.record(z.string(), hookTemplateSchema).safeParse(value);
  if (!parsed.success) {
    throw new SettingsError(`Invalid hook templates in ${path}: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  }
  return Object.entries(parsed.data).map(([name, template]) => ({ name, ...template }));
}

function emptyHooks(): Record<string, HookMatcher[]> {
  return { PreToolUse: [], PostToolUse: [] };
}

function withHooks(settings: ClaudeSettings, hooks: Record<string, HookMatcher[]>): ClaudeSettings {
  return { ...settings, hooks };
}

/**
 * Create an empty hooks section. Returns false if one already exists.
 */
export function initHooks(settingsPath: string): boolean {
  const settings = readSettings(settingsPath);
  if (settings.hooks) return false;
  writeSettings(settingsPath, withHooks(settings, emptyHooks()));
  return true;
}

/**
 * Register `command` for `matcher` under the given event. A command already
 * registered for that matcher is left alone and nothing is written.
 */
export function addHook(
  settingsPath: string,
  hook: { matcher: string; command: string },
  event: HookEvent = 'PostToolUse',
): AddHookResult {
  const settings = readSettings(settingsPath);
  const hooks = { ...(settings.hooks ?? emptyHooks()) };
  const entries = [...(hooks[event] ?? [])];
  const command = { type: 'command', command: hook.command };

  let result: AddHookResult;
  const index = entries.findIndex((entry) => (entry.matcher ?? '') === hook.matcher);
  const existing = entries[index];

  if (existing) {
    if (existing.hooks.some((h) => h.command === hook.command)) return 'exists';
    entries[index] = { ...existing, hooks: [...existing.hooks, command] };
    result = 'appended';
  } else {
    entries.push({ matcher: hook.matcher, hooks: [command] });
    result = 'added';
  }

  hooks[event] = entries;
  writeSettings(settingsPath, withHooks(settings, hooks));
  return result;
}

/**
 * Remove every entry with this matcher (from one event, or from both tool events).
 * Returns the number of entries removed.
 */
export function removeHooks(settingsPath: string, matcher: string, event?: HookEvent): number {
  const settings = readSettings(settingsPath);
  if (!settings.hooks) return 0;

  const hooks = { ...settings.hooks };
  let removed = 0;

  for (const name of event ? [event] : HOOK_EVENTS) {
    const entries = hooks[name];
    if (!entries) continue;
    const kept = entries.filter((entry) => (entry.matcher ?? '') !== matcher);
    removed += entries.length - kept.length;
    hooks[name] = kept;
  }

  if (removed > 0) {
    writeSettings(settingsPath, withHooks(settings, hooks));
  }
  return removed;
}

/**
 * One row per configured command, across all events.
 */
export function listHooks(settingsPath: string): HookListing[] {
  const { hooks } = readSettings(settingsPath);
  if (!hooks) return [];

  const rows: HookListing[] = [];
  for (const [event, entries] of Object.entries(hooks)) {
    for (const entry of entries) {
      for (const h of entry.hooks) {
        rows.push({ event, matcher: entry.matcher || '*', command: h.command });
      }
    }
  }
  return rows;
}

/**
 * Template names that fit the files present in a project directory.
 */
export function suggestHooks(projectDir: string): string[] {
  const has = (name: string) => existsSync(join(projectDir, name));
  const suggestions: string[] = [];

  if (has('pyproject.toml') || has('requirements.txt')) {
    suggestions.push('lint-python', 'test-python');
  }
  if (has('package.json')) {
    suggestions.push('lint-js', 'test-js');
    if (has('tsconfig.json')) suggestions.push('type-check');
  }
  if (has('.git')) suggestions.push('no-force-push');
  if (has('.env') || has('.env.local')) suggestions.push('no-env-commit');

  return suggestions;
}

export { HOOK_EVENTS, SettingsError, getSettingsPath, readSettings, type ClaudeSettings, type HookEvent } from './settings.js';

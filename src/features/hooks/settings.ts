/**
 * `.claude/settings.json` access. Only the `hooks` key is modelled; every
 * other key is carried through untouched.
 */

import { join } from 'path';
import { z } from 'zod';
import { readTextFile, writeFileAtomic } from '../../utils/files.js';

export const HOOK_EVENTS = ['PreToolUse', 'PostToolUse'] as const;
export type HookEvent = (typeof HOOK_EVENTS)[number];

const hookCommandSchema = z
  .object({
    type: z.string(),
    command: z.string(),
    timeout: z.number().optional(),
  })
  .passthrough();

const hookMatcherSchema = z
  .object({
    matcher: z.string().optional(),
    hooks: z.array(hookCommandSchema),
  })
  .passthrough();

const settingsSchema = z
  .object({
    hooks: z.record(z.string(), z.array(hookMatcherSchema)).optional(),
  })
  .passthrough();

export type HookCommand = z.infer<typeof hookCommandSchema>;
export type HookMatcher = z.infer<typeof hookMatcherSchema>;
export type ClaudeSettings = z.infer<typeof settingsSchema>;

export class SettingsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SettingsError';
  }
}

export function getSettingsPath(projectDir: string): string {
  return join(projectDir, '.claude', 'settings.json');
}

/**
 * Read and validate settings; a missing file reads as `{}`.
 */
export function readSettings(path: string): ClaudeSettings {
  const raw = readTextFile(path);
  if (raw === null || !raw.trim()) return {};

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new SettingsError(`${path} is not valid JSON`, { cause: error });
  }

  const parsed = settingsSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid document';
    throw new SettingsError(`Invalid ${path}: ${where}`);
  }
  return parsed.data;
}

export function writeSettings(path: string, settings: ClaudeSettings): void {
  writeFileAtomic(path, `${JSON.stringify(settings, null, 2)}\n`);
}

/**
 * CLI command handlers for `claude-tune hooks <subcommand>`
 */

import { resolve } from 'path';
import {
  addHook,
  getSettingsPath,
  initHooks,
  listHooks,
  loadHookTemplates,
  removeHooks,
  suggestHooks,
  type HookEvent,
} from '../../features/hooks/index.js';
import { fail } from '../options.js';

interface HooksCliOptions {
  dir?: string;
}

interface HookEventOptions extends HooksCliOptions {
  pre?: boolean;
  post?: boolean;
}

function settingsPathFor(options: HooksCliOptions): string {
  return getSettingsPath(resolve(options.dir ?? process.cwd()));
}

export async function hooksListCommand(options: HooksCliOptions): Promise<void> {
  const path = settingsPathFor(options);
  let rows: ReturnType<typeof listHooks>;
  try {
    rows = listHooks(path);
  } catch (error) {
    fail('Could not read hooks', error);
  }

  if (rows.length === 0) {
    console.log(`No hooks configured in ${path}`);
    return;
  }

  console.log('');
  console.log(`Hooks in ${path}`);
  console.log('');
  for (const row of rows) {
    console.log(`  ${row.event.padEnd(12)} ${row.matcher.padEnd(10)} ${row.command}`);
  }
  console.log('');
}

export async function hooksTemplatesCommand(options: HooksCliOptions): Promise<void> {
  let templates: ReturnType<typeof loadHookTemplates>;
  let suggested: string[];
  try {
    templates = loadHookTemplates();
    suggested = suggestHooks(resolve(options.dir ?? process.cwd()));
  } catch (error) {
    fail('Could not load hook templates', error);
  }

  const width = Math.max(...templates.map((t) => t.name.length));
  console.log('');
  for (const template of templates) {
    const mark = suggested.includes(template.name) ? '*' : ' ';
    console.log(`${mark} ${template.name.padEnd(width)}  [${template.matcher}] ${template.description}`);
    console.log(`  ${' '.repeat(width)}  ${template.command}`);
  }
  if (suggested.length > 0) {
    console.log('');
    console.log('* suggested for this project');
  }
  console.log('');
}

export async function hooksInitCommand(options: HooksCliOptions): Promise<void> {
  const path = settingsPathFor(options);
  let created: boolean;
  try {
    created = initHooks(path);
  } catch (error) {
    fail(`Could not update ${path}`, error);
  }
  console.log(created ? `Initialized hooks in ${path}` : `Hooks already configured in ${path}`);
}

export async function hooksAddCommand(name: string, options: HookEventOptions): Promise<void> {
  const path = settingsPathFor(options);

  let outcome: { event: HookEvent; result: ReturnType<typeof addHook> };
  try {
    const template = loadHookTemplates().find((t) => t.name === name);
    if (!template) {
      throw new Error(`unknown template "${name}" (see \`claude-tune hooks templates\`)`);
    }
    const event: HookEvent = options.pre ? 'PreToolUse' : (template.event ?? 'PostToolUse');
    outcome = { event, result: addHook(path, template, event) };
  } catch (error) {
    fail('Could not add hook', error);
  }

  if (outcome.result === 'exists') {
    console.log(`${name} is already configured (${outcome.event})`);
  } else {
    console.log(`Added ${name} to ${outcome.event} in ${path}`);
  }
}

export async function hooksRemoveCommand(matcher: string, options: HookEventOptions): Promise<void> {
  const path = settingsPathFor(options);
  const event: HookEvent | undefined = options.pre ? 'PreToolUse' : options.post ? 'PostToolUse' : undefined;

  let removed: number;
  try {
    removed = removeHooks(path, matcher, event);
  } catch (error) {
    fail(`Could not update ${path}`, error);
  }

  console.log(removed > 0 ? `Removed ${removed} hook entr${removed === 1 ? 'y' : 'ies'} for ${matcher}` : `No hooks match ${matcher}`);
}

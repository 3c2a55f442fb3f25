/**
 * Merge suggestions into an existing CLAUDE.md.
 *
 * Rules are appended as `- <rule>` to the section named by the suggestion,
 * creating a `## <section>` at the end of the document when none exists.
 * A rule whose exact text is already a bullet anywhere in the document is
 * skipped, so merging the same suggestions twice changes nothing. Rules never
 * land inside a code fence: they go before a fence the section leaves open,
 * and a fence open at the end of the document is closed before a new section.
 */

import { cloneConfigDocument, closingFence, findOpenFence, findSection, listRules } from './document.js';
import type { ConfigDocument, MergeResult, Suggestion } from './types.js';

function isBlank(line: string): boolean {
  return line.trim() === '';
}

function appendToSection(lines: string[], ruleLine: string): void {
  const openFence = findOpenFence(lines);
  let insertAt = openFence === -1 ? lines.length : openFence;
  while (insertAt > 0 && isBlank(lines[insertAt - 1] ?? '')) {
    insertAt--;
  }
  lines.splice(insertAt, 0, ruleLine);
}

function appendSection(document: ConfigDocument, name: string, ruleLine: string): void {
  const lastSection = document.sections[document.sections.length - 1];
  const tail = lastSection ? lastSection.lines : document.preamble;

  while (tail.length > 0 && isBlank(tail[tail.length - 1] ?? '')) {
    tail.pop();
  }

  const openFence = findOpenFence(tail);
  if (openFence !== -1) tail.push(closingFence(tail[openFence] ?? ''));

  const hasContent = document.sections.length > 0 || document.preamble.length > 0;
  if (hasContent) tail.push('');

  document.sections.push({
    heading: `## ${name}`,
    level: 2,
    name,
    lines: [ruleLine, ''],
  });
}

export function mergeSuggestions(document: ConfigDocument, suggestions: readonly Suggestion[]): MergeResult {
  const merged = cloneConfigDocument(document);
  const existing = new Set(listRules(merged));
  const added: Suggestion[] = [];
  const skipped: Suggestion[] = [];
  const createdSections: string[] = [];

  for (const suggestion of suggestions) {
    const rule = suggestion.rule.trim();
    if (existing.has(rule)) {
      skipped.push(suggestion);
      continue;
    }

    const ruleLine = `- ${rule}`;
    const section = findSection(merged, suggestion.section);
    if (section) {
      appendToSection(section.lines, ruleLine);
    } else {
      appendSection(merged, suggestion.section, ruleLine);
      createdSections.push(suggestion.section);
    }

    existing.add(rule);
    added.push(suggestion);
  }

  return { document: merged, added, skipped, createdSections };
}

import { readTextFile, writeFileAtomic } from '../../utils/files.js';
import { parseConfigDocument, serializeConfigDocument } from './document.js';
import { mergeSuggestions } from './merge.js';
import type { ApplyResult, Suggestion } from './types.js';

/**
 * Merge suggestions into the CLAUDE.md at `path` (a missing file counts as empty)
 * and write it back atomically. Nothing is written when no rule was added.
 */
export function applySuggestions(path: string, suggestions: readonly Suggestion[]): ApplyResult {
  const original = readTextFile(path) ?? '';
  const { document, added, skipped, createdSections } = mergeSuggestions(parseConfigDocument(original), suggestions);
  const updated = serializeConfigDocument(document);
  const changed = updated !== original;

  if (changed) {
    writeFileAtomic(path, updated);
  }

  return { path, added, skipped, createdSections, changed };
}

/**
 * CLAUDE.md as a list of heading-delimited sections.
 *
 * Lines are kept without their line ending. A document whose lines all end the
 * same way serializes back to the exact input.
 */

import type { ConfigDocument, DocumentSection, LineEnding } from './types.js';

const HEADING = /^(#{1,6})[ \t]+(.*?)(?:[ \t]+#+)?[ \t]*$/;
const FENCE = /^\s*(`{3,}|~{3,})/;
const BULLET = /^\s*[-*+][ \t]+(.*\S)\s*$/;

/**
 * Heading name used for section lookups: trimmed and case-folded.
 */
export function normalizeSectionName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function detectLineEnding(text: string): LineEnding {
  return text.includes('\r\n') ? '\r\n' : '\n';
}

export function parseConfigDocument(text: string): ConfigDocument {
  const lineEnding = detectLineEnding(text);
  const document: ConfigDocument = { preamble: [], sections: [], lineEnding };
  let current: string[] = document.preamble;
  let inFence = false;

  for (const raw of text.split('\n')) {
    const line = lineEnding === '\r\n' && raw.endsWith('\r') ? raw.slice(0, -1) : raw;
    if (FENCE.test(line)) {
      inFence = !inFence;
    } else if (!inFence) {
      const match = HEADING.exec(line);
      if (match) {
        const section: DocumentSection = {
          heading: line,
          level: match[1]?.length ?? 1,
          name: (match[2] ?? '').trim(),
          lines: [],
        };
        document.sections.push(section);
        current = section.lines;
        continue;
      }
    }
    current.push(line);
  }

  return document;
}

export function serializeConfigDocument(document: ConfigDocument): string {
  const lines = [...document.preamble];
  for (const section of document.sections) {
    lines.push(section.heading, ...section.lines);
  }
  return lines.join(document.lineEnding);
}

export function cloneConfigDocument(document: ConfigDocument): ConfigDocument {
  return {
    preamble: [...document.preamble],
    sections: document.sections.map((s) => ({ ...s, lines: [...s.lines] })),
    lineEnding: document.lineEnding,
  };
}

/**
 * Index of the fence line left open at the end of `lines`, or -1 when every
 * fence is closed. Sections always start outside a fence.
 */
export function findOpenFence(lines: readonly string[]): number {
  let openAt = -1;
  for (let i = 0; i < lines.length; i++) {
    if (FENCE.test(lines[i] ?? '')) {
      openAt = openAt === -1 ? i : -1;
    }
  }
  return openAt;
}

/**
 * Marker that closes the fence opened by `line` (same character, same length).
 */
export function closingFence(line: string): string {
  return FENCE.exec(line)?.[1] ?? '```';
}

export function findSection(document: ConfigDocument, name: string): DocumentSection | undefined {
  const wanted = normalizeSectionName(name);
  return document.sections.find((s) => normalizeSectionName(s.name) === wanted);
}

/**
 * Text of every bullet item outside fenced code blocks, trimmed.
 */
export function listRules(document: ConfigDocument): string[] {
  const rules: string[] = [];
  let inFence = false;

  const scan = (lines: readonly string[]) => {
    for (const line of lines) {
      if (FENCE.test(line)) {
        inFence = !inFence;
        continue;
      }
      if (inFence) continue;
      const match = BULLET.exec(line);
      if (match?.[1]) rules.push(match[1].trim());
    }
  };

  scan(document.preamble);
  for (const section of document.sections) {
    scan(section.lines);
  }
  return rules;
}

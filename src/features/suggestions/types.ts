/**
 * Types for suggestions and the CLAUDE.md document model
 */

import type { PatternCategory } from '../../analysis/heuristics.js';

export type Priority = 'high' | 'medium' | 'low';

export interface Suggestion {
  id: string;
  patternId: string;
  category: PatternCategory;
  /** Heading text of the section the rule belongs in */
  section: string;
  /** Rule text, written into the document as `- <rule>` */
  rule: string;
  rationale: string;
  priority: Priority;
  /** occurrences × category weight */
  score: number;
  occurrences: number;
  /** Most recent evidence snippet */
  latestEvidence?: string;
  /** turnIndex of the most recent evidence (ranking tie-break) */
  lastSeen: number;
  /** Set when an existing document was given and already contains the rule */
  alreadyPresent?: boolean;
}

export interface DocumentSection {
  /** Raw heading line, e.g. `## 말투 규칙` */
  heading: string;
  level: number;
  /** Heading text without the leading hashes */
  name: string;
  /** Lines after the heading up to the next heading */
  lines: string[];
}

export type LineEnding = '\n' | '\r\n';

/**
 * A markdown document split at its headings. Serializing an unmodified
 * document reproduces the original text byte for byte, as long as its
 * line endings were consistent.
 */
export interface ConfigDocument {
  /** Lines before the first heading */
  preamble: string[];
  sections: DocumentSection[];
  /** CRLF when the source text contains any, LF otherwise */
  lineEnding: LineEnding;
}

export interface MergeResult {
  document: ConfigDocument;
  added: Suggestion[];
  /** Suggestions whose rule text was already in the document */
  skipped: Suggestion[];
  /** Sections created by this merge */
  createdSections: string[];
}

export interface ApplyResult extends Omit<MergeResult, 'document'> {
  path: string;
  /** False when the document already contained every rule (nothing written) */
  changed: boolean;
}

/**
 * Suggestion generation and CLAUDE.md updates
 */

export { applySuggestions } from './apply.js';
export {
  findSection,
  listRules,
  normalizeSectionName,
  parseConfigDocument,
  serializeConfigDocument,
} from './document.js';
export { compareSuggestions, generateSuggestions, priorityFor, type GenerateOptions } from './generate.js';
export { mergeSuggestions } from './merge.js';
export { formatSuggestionReport, type SuggestionReportInput } from './report.js';
export type * from './types.js';

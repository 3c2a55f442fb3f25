/**
 * Build a fresh CLAUDE.md from wizard answers plus whatever the logs taught us
 */

import type { Statistics } from '../../analysis/types.js';
import { mergeSuggestions } from '../suggestions/merge.js';
import { parseConfigDocument, serializeConfigDocument } from '../suggestions/document.js';
import type { Suggestion } from '../suggestions/types.js';
import { parseList, type CodeStyle, type InitAnswers, type Tone } from './questions.js';

export interface LearnedContext {
  statistics: Statistics;
  suggestions: readonly Suggestion[];
}

const TONE_RULES: Record<Tone, string> = {
  존댓말: '항상 존댓말 사용',
  반말: '반말로 대화',
  영어: 'Respond in English',
};

const STYLE_RULES: Record<CodeStyle, readonly string[]> = {
  간결함: ['최소한의 코드로 작성', '불필요한 주석 제거', '자명한 코드 선호'],
  명확함: ['명시적인 타입 선언', '복잡한 로직에 주석 추가', '함수와 변수 이름은 설명적으로'],
  밸런스: ['간결함과 명확함의 균형', '필요한 곳에만 주석', '일관된 네이밍 컨벤션'],
};

const COMMIT_TYPES = [
  'feat: 새로운 기능',
  'fix: 버그 수정',
  'docs: 문서 변경',
  'style: 코드 포맷팅',
  'refactor: 리팩토링',
  'test: 테스트',
  'chore: 빌드/설정',
];

function bullets(items: readonly string[]): string[] {
  return items.map((item) => `- ${item}`);
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function generateClaudeMd(answers: InitAnswers, learned?: LearnedContext, now: Date = new Date()): string {
  const header = [`> claude-tune으로 생성됨 (${formatDate(now)})`];
  if (learned && learned.statistics.sessions > 0) {
    header.push(`> 분석한 대화: 세션 ${learned.statistics.sessions}개, 턴 ${learned.statistics.turns}개`);
  }

  const lines = [
    '# CLAUDE.md',
    '',
    ...header,
    '',
    '## 프로젝트 개요',
    '',
    `이 프로젝트는 ${answers.role}가 작업하는 코드베이스입니다.`,
    '',
    '## 기술 스택',
    '',
    ...bullets(answers.languages),
    '',
    '## 말투 규칙',
    '',
    `- ${TONE_RULES[answers.tone]}`,
    '',
    '## 코드 스타일',
    '',
    ...bullets(STYLE_RULES[answers.codeStyle]),
    '',
  ];

  if (answers.extraRules) {
    lines.push('## 추가 규칙', '', ...bullets(parseList(answers.extraRules)), '');
  }

  lines.push('## 커밋 메시지 규칙', '', '```', ...COMMIT_TYPES, '```', '');

  const base = lines.join('\n');
  if (!learned || learned.suggestions.length === 0) return base;

  // Learned rules land in their sections, or in new sections at the end
  const { document } = mergeSuggestions(parseConfigDocument(base), learned.suggestions);
  return serializeConfigDocument(document);
}


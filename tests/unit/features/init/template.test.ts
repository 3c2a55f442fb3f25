import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { DEFAULT_ANSWERS, generateClaudeMd, writeClaudeMd } from '../../../../src/features/init/index.js';
import { emptyStatistics } from '../../../../src/analysis/statistics.js';
import { TempDir } from '../../../helpers/temp.js';
import { makeSuggestion } from '../../../helpers/patterns.js';

const NOW = new Date('2025-01-15T10:00:00.000Z');

const DEFAULT_DOCUMENT = [
  '# CLAUDE.md',
  '',
  '> claude-tune으로 생성됨 (2025-01-15)',
  '',
  '## 프로젝트 개요',
  '',
  '이 프로젝트는 풀스택 개발자가 작업하는 코드베이스입니다.',
  '',
  '## 기술 스택',
  '',
  '- TypeScript',
  '- Python',
  '',
  '## 말투 규칙',
  '',
  '- 항상 존댓말 사용',
  '',
  '## 코드 스타일',
  '',
  '- 간결함과 명확함의 균형',
  '- 필요한 곳에만 주석',
  '- 일관된 네이밍 컨벤션',
  '',
  '## 커밋 메시지 규칙',
  '',
  '```',
  'feat: 새로운 기능',
  'fix: 버그 수정',
  'docs: 문서 변경',
  'style: 코드 포맷팅',
  'refactor: 리팩토링',
  'test: 테스트',
  'chore: 빌드/설정',
  '```',
  '',
].join('\n');

describe('generateClaudeMd', () => {
  it('renders the default answers', () => {
    expect(generateClaudeMd(DEFAULT_ANSWERS, undefined, NOW)).toBe(DEFAULT_DOCUMENT);
  });

  it('renders tone, style and extra rules from the answers', () => {
    const content = generateClaudeMd(
      { role: '백엔드 개발자', languages: ['Go'], tone: '영어', codeStyle: '명확함', extraRules: '테스트 코드 항상 작성, 한글 주석 사용' },
      undefined,
      NOW,
    );
    const lines = content.split('\n');

    expect(lines).toContain('이 프로젝트는 백엔드 개발자가 작업하는 코드베이스입니다.');
    expect(lines).toContain('- Respond in English');
    expect(lines).toContain('- 명시적인 타입 선언');
    const extra = lines.indexOf('## 추가 규칙');
    expect(lines.slice(extra, extra + 5)).toEqual(['## 추가 규칙', '', '- 테스트 코드 항상 작성', '- 한글 주석 사용', '']);
    expect(lines.indexOf('## 커밋 메시지 규칙')).toBe(extra + 5);
  });

  it('adds the analysis summary and learned rules', () => {
    const statistics = { ...emptyStatistics(), sessions: 3, turns: 120 };
    const content = generateClaudeMd(
      DEFAULT_ANSWERS,
      {
        statistics,
        suggestions: [
          makeSuggestion('말투 규칙', '항상 존댓말 사용'),
          makeSuggestion('코드 스타일', '변수와 함수 이름은 camelCase 사용'),
          makeSuggestion('언어', '응답은 한국어로 작성'),
        ],
      },
      NOW,
    );
    const lines = content.split('\n');

    expect(lines.slice(2, 5)).toEqual([
      '> claude-tune으로 생성됨 (2025-01-15)',
      '> 분석한 대화: 세션 3개, 턴 120개',
      '',
    ]);
    expect(lines.filter((l) => l === '- 항상 존댓말 사용').length).toBe(1);
    expect(lines[lines.indexOf('- 일관된 네이밍 컨벤션') + 1]).toBe('- 변수와 함수 이름은 camelCase 사용');
    expect(content.endsWith('```\n\n## 언어\n- 응답은 한국어로 작성\n')).toBe(true);
  });

  it('omits the analysis line when no sessions were read', () => {
    const content = generateClaudeMd(DEFAULT_ANSWERS, { statistics: emptyStatistics(), suggestions: [] }, NOW);

    expect(content).toBe(DEFAULT_DOCUMENT);
  });
});

describe('writeClaudeMd', () => {
  let temp: TempDir;

  beforeEach(() => {
    temp = new TempDir();
  });

  afterEach(async () => {
    await temp.cleanupAll();
  });

  it('backs up an existing file before overwriting it', async () => {
    const path = join(await temp.create(), 'CLAUDE.md');
    writeFileSync(path, '# old');

    const result = writeClaudeMd(path, '# new');

    expect(result).toEqual({ path, backupPath: `${path}.backup` });
    expect(readFileSync(path, 'utf-8')).toBe('# new');
    expect(readFileSync(`${path}.backup`, 'utf-8')).toBe('# old');
  });

  it('writes a new file without a backup', async () => {
    const path = join(await temp.create(), 'CLAUDE.md');

    expect(writeClaudeMd(path, '# new').backupPath).toBeNull();
    expect(readFileSync(path, 'utf-8')).toBe('# new');
  });
});

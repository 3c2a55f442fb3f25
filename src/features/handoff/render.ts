import { formatTimestamp } from '../../utils/format.js';
import type { HandoffContext } from './extract.js';

export interface RenderHandoffOptions {
  sessionId?: string;
  notes?: string;
  now?: Date;
}

function listOr(items: readonly string[], format: (item: string, index: number) => string, empty: string): string {
  return items.length > 0 ? items.map(format).join('\n') : empty;
}

export function renderHandoff(context: HandoffContext, options: RenderHandoffOptions = {}): string {
  const now = options.now ?? new Date();
  const sections = [
    '# HANDOFF.md',
    '',
    '> 세션 인수인계 문서',
    `> 생성: ${formatTimestamp(now.toISOString())} (UTC)`,
    `> 세션 ID: ${options.sessionId ?? 'N/A'}`,
    '',
    '## 요약',
    '',
    context.summary,
    '',
    '## 완료된 작업',
    '',
    listOr(context.completedTasks, (task) => `- [x] ${task}`, '- 아직 완료된 작업 없음'),
    '',
    '## 남은 작업',
    '',
    listOr(context.pendingTasks, (task) => `- [ ] ${task}`, '- 남은 작업 없음'),
    '',
    '## 중요 파일',
    '',
    listOr(context.importantFiles, (file) => `- \`${file}\``, '- 특별히 없음'),
    '',
    '## 다음 단계',
    '',
    context.nextSteps.map((step, i) => `${i + 1}. ${step}`).join('\n'),
    '',
  ];

  if (options.notes) {
    sections.push('## 추가 메모', '', options.notes, '');
  }

  sections.push(
    '## 사용 방법',
    '',
    '이 파일을 새 Claude 세션에 붙여넣으면 컨텍스트가 전달됩니다:',
    '',
    '```',
    '아래 HANDOFF.md를 읽고 이전 작업을 이어서 진행해주세요.',
    '',
    '[HANDOFF.md 내용 붙여넣기]',
    '```',
    '',
  );

  return sections.join('\n');
}

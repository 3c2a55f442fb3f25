/**
 * Init wizard questions and the answer reducer.
 *
 * The wizard is a small state machine: `applyAnswer` either advances to the
 * next question or keeps the current one with an error message.
 */

export type Tone = '존댓말' | '반말' | '영어';
export type CodeStyle = '간결함' | '명확함' | '밸런스';

export interface InitAnswers {
  role: string;
  languages: string[];
  tone: Tone;
  codeStyle: CodeStyle;
  extraRules?: string;
}

interface ChoiceOption<T> {
  label: string;
  value: T;
}

interface ChoiceQuestionOf<K extends 'role' | 'tone' | 'codeStyle'> {
  kind: 'choice';
  id: K;
  prompt: string;
  options: readonly ChoiceOption<InitAnswers[K]>[];
  /** 0-based index picked on blank input */
  defaultIndex: number;
}

export type ChoiceQuestion = ChoiceQuestionOf<'role'> | ChoiceQuestionOf<'tone'> | ChoiceQuestionOf<'codeStyle'>;

export interface ListQuestion {
  kind: 'list';
  id: 'languages';
  prompt: string;
  hint: string;
  defaultValue: readonly string[];
}

export interface TextQuestion {
  kind: 'text';
  id: 'extraRules';
  prompt: string;
  hint: string;
}

export type Question = ChoiceQuestion | ListQuestion | TextQuestion;

export const DEFAULT_ANSWERS: InitAnswers = {
  role: '풀스택 개발자',
  languages: ['TypeScript', 'Python'],
  tone: '존댓말',
  codeStyle: '밸런스',
};

export const QUESTIONS: readonly Question[] = [
  {
    kind: 'choice',
    id: 'role',
    prompt: '주로 어떤 역할로 Claude를 사용하시나요?',
    options: [
      { label: '백엔드 개발자', value: '백엔드 개발자' },
      { label: '프론트엔드 개발자', value: '프론트엔드 개발자' },
      { label: '풀스택 개발자', value: '풀스택 개발자' },
      { label: '데이터/ML 엔지니어', value: '데이터/ML 엔지니어' },
      { label: 'DevOps/인프라', value: 'DevOps/인프라 엔지니어' },
      { label: '기타', value: '개발자' },
    ],
    defaultIndex: 2,
  },
  {
    kind: 'list',
    id: 'languages',
    prompt: '주로 사용하는 프로그래밍 언어는? (쉼표로 구분)',
    hint: '예: TypeScript, Python, Go',
    defaultValue: DEFAULT_ANSWERS.languages,
  },
  {
    kind: 'choice',
    id: 'tone',
    prompt: 'Claude의 말투 선호는?',
    options: [
      { label: '존댓말 (정중한 어투)', value: '존댓말' },
      { label: '반말 (편한 어투)', value: '반말' },
      { label: '영어', value: '영어' },
    ],
    defaultIndex: 0,
  },
  {
    kind: 'choice',
    id: 'codeStyle',
    prompt: '선호하는 코드 스타일은?',
    options: [
      { label: '간결함 우선 (최소한의 코드)', value: '간결함' },
      { label: '명확함 우선 (주석, 타입 명시)', value: '명확함' },
      { label: '밸런스', value: '밸런스' },
    ],
    defaultIndex: 2,
  },
  {
    kind: 'text',
    id: 'extraRules',
    prompt: '추가하고 싶은 규칙이 있나요? (선택, 엔터로 건너뛰기)',
    hint: '예: 테스트 코드 항상 작성, 한글 주석 사용',
  },
];

export interface WizardState {
  /** Index into QUESTIONS; equals QUESTIONS.length once finished */
  step: number;
  answers: InitAnswers;
  /** Validation message for the current question */
  error?: string;
}

export function initialWizardState(): WizardState {
  return { step: 0, answers: { ...DEFAULT_ANSWERS, languages: [...DEFAULT_ANSWERS.languages] } };
}

export function currentQuestion(state: WizardState): Question | undefined {
  return QUESTIONS[state.step];
}

/**
 * Option preselected when the wizard reaches `step`; 0 for questions without options.
 */
export function defaultSelection(step: number): number {
  const question = QUESTIONS[step];
  return question?.kind === 'choice' ? question.defaultIndex : 0;
}

export function isComplete(state: WizardState): boolean {
  return state.step >= QUESTIONS.length;
}

/**
 * Parse a 1-based choice number; blank picks the default. Returns the 0-based
 * index, or null for anything out of range.
 */
export function parseChoice(input: string, optionCount: number, defaultIndex: number): number | null {
  const trimmed = input.trim();
  if (!trimmed) return defaultIndex;
  if (!/^\d+$/.test(trimmed)) return null;
  const choice = Number(trimmed);
  return choice >= 1 && choice <= optionCount ? choice - 1 : null;
}

export function parseList(input: string): string[] {
  return input
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

function withChoice(answers: InitAnswers, question: ChoiceQuestion, index: number): InitAnswers | null {
  switch (question.id) {
    case 'role': {
      const option = question.options[index];
      return option ? { ...answers, role: option.value } : null;
    }
    case 'tone': {
      const option = question.options[index];
      return option ? { ...answers, tone: option.value } : null;
    }
    case 'codeStyle': {
      const option = question.options[index];
      return option ? { ...answers, codeStyle: option.value } : null;
    }
  }
}

function advance(state: WizardState, answers: InitAnswers): WizardState {
  return { step: state.step + 1, answers };
}

/**
 * Apply the raw input for the current question.
 */
export function applyAnswer(state: WizardState, input: string): WizardState {
  const question = currentQuestion(state);
  if (!question) return state;

  switch (question.kind) {
    case 'choice': {
      const index = parseChoice(input, question.options.length, question.defaultIndex);
      const answers = index === null ? null : withChoice(state.answers, question, index);
      if (!answers) {
        return { ...state, error: `1-${question.options.length} 사이의 번호를 입력하세요.` };
      }
      return advance(state, answers);
    }
    case 'list': {
      const items = parseList(input);
      return advance(state, { ...state.answers, languages: items.length > 0 ? items : [...question.defaultValue] });
    }
    case 'text': {
      const { extraRules: _previous, ...rest } = state.answers;
      const text = input.trim();
      return advance(state, text ? { ...rest, extraRules: text } : rest);
    }
  }
}

/**
 * Feed a list of raw inputs through the wizard (used for non-interactive runs).
 * Stops early on the first invalid input and returns that state.
 */
export function answerAll(inputs: readonly string[], state: WizardState = initialWizardState()): WizardState {
  let current = state;
  for (const input of inputs) {
    if (isComplete(current)) break;
    const next = applyAnswer(current, input);
    if (next.error) return next;
    current = next;
  }
  return current;
}

/**
 * InitWizard component - asks the init questions one at a time
 *
 * Choice questions are answered with j/k + Enter or a number key; list and
 * text questions take a typed line. Validation lives in applyAnswer, so the
 * component only collects raw input.
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import {
  QUESTIONS,
  applyAnswer,
  currentQuestion,
  defaultSelection,
  initialWizardState,
  isComplete,
  type InitAnswers,
  type WizardState,
} from '../../features/init/questions.js';
import { KeyHints, SelectableRow } from './SelectableRow.js';

export interface InitWizardProps {
  onComplete: (answers: InitAnswers | null) => void;
}

export function InitWizard({ onComplete }: InitWizardProps) {
  const { exit } = useApp();
  const [state, setState] = useState<WizardState>(initialWizardState);
  const [selectedIndex, setSelectedIndex] = useState(0);
  const [buffer, setBuffer] = useState('');

  const question = currentQuestion(state);

  useEffect(() => {
    if (isComplete(state)) {
      onComplete(state.answers);
      exit();
    }
  }, [state, onComplete, exit]);

  // New question: preselect its default option and clear the input line
  useEffect(() => {
    setSelectedIndex(defaultSelection(state.step));
    setBuffer('');
  }, [state.step]);

  const submit = (input: string) => {
    setState((s) => applyAnswer(s, input));
  };

  useInput((input, key) => {
    if (!question) return;

    if (key.escape || (key.ctrl && input === 'c')) {
      onComplete(null);
      exit();
      return;
    }

    if (question.kind === 'choice') {
      if (input === 'j' || key.downArrow) {
        setSelectedIndex((i) => Math.min(i + 1, question.options.length - 1));
      } else if (input === 'k' || key.upArrow) {
        setSelectedIndex((i) => Math.max(i - 1, 0));
      } else if (key.return) {
        submit(String(selectedIndex + 1));
      } else if (input === 'q') {
        onComplete(null);
        exit();
      } else if (/^\d$/.test(input)) {
        submit(input);
      }
      return;
    }

    if (key.return) {
      submit(buffer);
    } else if (key.backspace || key.delete) {
      setBuffer((b) => Array.from(b).slice(0, -1).join(''));
    } else if (input && !key.ctrl && !key.meta) {
      setBuffer((b) => b + input);
    }
  });

  if (!question) return null;

  return (
    <Box flexDirection="column" paddingX={1}>
      <Box marginBottom={1}>
        <Text bold>claude-tune init</Text>
        <Text dimColor>
          {' '}
          ({state.step + 1}/{QUESTIONS.length})
        </Text>
      </Box>

      <Box marginBottom={1}>
        <Text>{question.prompt}</Text>
      </Box>

      {question.kind === 'choice' ? (
        <Box flexDirection="column">
          {question.options.map((option, i) => (
            <SelectableRow key={option.label} label={`${i + 1}) ${option.label}`} isSelected={i === selectedIndex} />
          ))}
        </Box>
      ) : (
        <Box flexDirection="column">
          <Text dimColor>{question.hint}</Text>
          <Box>
            <Text color="cyan">› </Text>
            <Text>{buffer}</Text>
            <Text inverse> </Text>
          </Box>
        </Box>
      )}

      {state.error && (
        <Box marginTop={1}>
          <Text color="red">✗ </Text>
          <Text>{state.error}</Text>
        </Box>
      )}

      <Box marginTop={1}>
        <KeyHints
          hints={
            question.kind === 'choice'
              ? [['j/k', 'navigate'], ['Enter', 'select'], ['1-9', 'pick'], ['q', 'quit']]
              : [['Enter', 'confirm (blank = default)'], ['Esc', 'quit']]
          }
        />
      </Box>
    </Box>
  );
}

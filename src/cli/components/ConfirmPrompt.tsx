/**
 * ConfirmPrompt component - yes/no question before writing files
 */

import React, { useState } from 'react';
import { Box, Text, render, useApp, useInput } from 'ink';
import { KeyHints, SelectableRow } from './SelectableRow.js';

export interface ConfirmPromptProps {
  message: string;
  /** Lines shown above the question (e.g. the rules about to be added) */
  details?: string[];
  onAnswer: (confirmed: boolean) => void;
}

export function ConfirmPrompt({ message, details = [], onAnswer }: ConfirmPromptProps) {
  const { exit } = useApp();
  const [selectedIndex, setSelectedIndex] = useState(0);

  const answer = (confirmed: boolean) => {
    onAnswer(confirmed);
    exit();
  };

  useInput((input, key) => {
    if (input === 'j' || key.downArrow) {
      setSelectedIndex((i) => Math.min(i + 1, 1));
    } else if (input === 'k' || key.upArrow) {
      setSelectedIndex((i) => Math.max(i - 1, 0));
    } else if (input === 'y') {
      answer(true);
    } else if (input === 'n' || input === 'q' || key.escape) {
      answer(false);
    } else if (key.return) {
      answer(selectedIndex === 0);
    }
  });

  return (
    <Box flexDirection="column" paddingX={1}>
      {details.length > 0 && (
        <Box flexDirection="column" marginBottom={1}>
          {details.map((line, i) => (
            <Text key={i} dimColor>
              {line}
            </Text>
          ))}
        </Box>
      )}
      <Box marginBottom={1}>
        <Text bold>{message}</Text>
      </Box>
      <SelectableRow label="Yes" isSelected={selectedIndex === 0} />
      <SelectableRow label="No" isSelected={selectedIndex === 1} />
      <Box marginTop={1}>
        <KeyHints hints={[['j/k', 'navigate'], ['Enter', 'select'], ['y/n', 'answer']]} />
      </Box>
    </Box>
  );
}

/**
 * Ask a yes/no question in the terminal. Resolves false if the prompt is dismissed.
 */
export async function runConfirmPrompt(message: string, details?: string[]): Promise<boolean> {
  let confirmed = false;
  const app = render(
    <ConfirmPrompt
      message={message}
      {...(details ? { details } : {})}
      onAnswer={(value) => {
        confirmed = value;
      }}
    />,
  );
  await app.waitUntilExit();
  return confirmed;
}

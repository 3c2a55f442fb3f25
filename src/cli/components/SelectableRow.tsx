import React from 'react';
import { Box, Text } from 'ink';

export function SelectionIndicator({ isSelected }: { isSelected: boolean }) {
  return (
    <Text
      backgroundColor={isSelected ? 'cyan' : undefined}
      color={isSelected ? 'black' : undefined}
    >
      {isSelected ? ' ▸ ' : '   '}
    </Text>
  );
}

/**
 * One option of a vertical choice list
 */
export function SelectableRow({ label, isSelected }: { label: string; isSelected: boolean }) {
  return (
    <Box>
      <SelectionIndicator isSelected={isSelected} />
      <Text color={isSelected ? 'cyan' : undefined}> {label}</Text>
    </Box>
  );
}

/**
 * Footer key hints, e.g. "j/k: navigate · Enter: select"
 */
export function KeyHints({ hints }: { hints: Array<[key: string, action: string]> }) {
  return (
    <Box>
      {hints.map(([key, action], i) => (
        <Text key={key}>
          {i > 0 && <Text dimColor> · </Text>}
          <Text color="white">{key}</Text>
          <Text dimColor>: {action}</Text>
        </Text>
      ))}
    </Box>
  );
}

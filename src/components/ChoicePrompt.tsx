import { Box, Text, useInput } from 'ink';
import SelectInput from 'ink-select-input';

export interface PromptChoice<T extends string> {
  value: T;
  label: string;
}

interface ChoicePromptProps<T extends string> {
  title: string;
  message?: string;
  choices: PromptChoice<T>[];
  onSelect: (value: T) => void;
  /** Escape picks this value. */
  cancelValue: T;
}

export function ChoicePrompt<T extends string>({
  title,
  message,
  choices,
  onSelect,
  cancelValue,
}: ChoicePromptProps<T>) {
  useInput((_input, key) => {
    if (key.escape) {
      onSelect(cancelValue);
    }
  });

  const items = choices.map((c) => ({ key: c.value, label: c.label, value: c.value }));

  return (
    <Box
      flexDirection="column"
      borderStyle="round"
      borderColor="cyan"
      paddingX={1}
    >
      <Box marginBottom={1}>
        <Text bold color="cyan">
          {title}
        </Text>
      </Box>
      {message ? (
        <Box marginBottom={1}>
          <Text>{message}</Text>
        </Box>
      ) : null}
      <SelectInput items={items} onSelect={(item) => onSelect(item.value)} />
      <Box marginTop={1}>
        <Text dimColor>{'↑↓ navigate  enter select  esc cancel'}</Text>
      </Box>
    </Box>
  );
}

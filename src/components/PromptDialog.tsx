import { Box, Text } from 'ink';

type PromptDialogProps = {
  title: string;
  text: string;
  // Swatch shown beside the input, e.g. the color a hex entry parses to.
  preview?: string | null;
};

// Single-line text input.
export function PromptDialog({ title, text, preview = null }: PromptDialogProps) {
  return (
    <Box flexDirection="column" borderStyle="round" paddingX={1}>
      <Text bold>{title}</Text>
      <Box>
        <Text>{`> ${text}`}</Text>
        <Text inverse> </Text>
        {preview ? <Text color={preview}>{`  ██ ${preview}`}</Text> : null}
      </Box>
      <Text dimColor>enter confirm, esc cancel</Text>
    </Box>
  );
}

import { Box, Text } from 'ink';

type FileListDialogProps = {
  title: string;
  files: string[];
  selected: number;
  emptyText: string;
  hint: string;
};

// Selectable list of file names in the working directory.
export function FileListDialog({ title, files, selected, emptyText, hint }: FileListDialogProps) {
  return (
    <Box flexDirection="column" borderStyle="round" paddingX={1}>
      <Text bold>{title}</Text>
      {files.length === 0 ? <Text dimColor>{emptyText}</Text> : null}
      {files.map((name, index) => (
        <Text key={name} color={index === selected ? 'cyan' : undefined}>
          {`${index === selected ? '›' : ' '} ${name}`}
        </Text>
      ))}
      <Text dimColor>{hint}</Text>
    </Box>
  );
}

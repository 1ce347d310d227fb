import { Box, Text } from 'ink';
import { TOOLS } from '../editor/tools';
import type { Tool } from '../editor/types';

type EditorToolbarProps = {
  tool: Tool;
  filledRect: boolean;
};

// Tool list with shortcut keys; the active tool is marked and highlighted.
export function EditorToolbar({ tool, filledRect }: EditorToolbarProps) {
  return (
    <Box flexDirection="column" borderStyle="round" paddingX={1}>
      <Text bold>Tools</Text>
      {TOOLS.map((info) => {
        const active = info.tool === tool;
        const suffix = info.tool === 'rectangle' && filledRect ? ' (filled)' : '';
        return (
          <Text key={info.tool} color={active ? 'cyan' : undefined}>
            {`${active ? '›' : ' '} ${info.key} ${info.icon} ${info.name}${suffix}`}
          </Text>
        );
      })}
    </Box>
  );
}

import { Box, Text } from 'ink';
import { hslToRgb, rgbToHex } from '../editor/color';
import type { Hsl } from '../editor/types';

type ColorSlidersProps = {
  hsl: Hsl;
  // 0 hue, 1 saturation, 2 lightness.
  active: number;
};

const BAR_WIDTH = 20;

function bar(value: number, max: number): string {
  const filled = Math.round((value / max) * BAR_WIDTH);
  return `${'█'.repeat(filled)}${'░'.repeat(BAR_WIDTH - filled)}`;
}

// HSL sliders with a preview of the resulting color.
export function ColorSliders({ hsl, active }: ColorSlidersProps) {
  const hex = rgbToHex(hslToRgb(hsl));
  const rows = [
    { label: 'H', value: hsl.h, max: 359 },
    { label: 'S', value: hsl.s, max: 100 },
    { label: 'L', value: hsl.l, max: 100 }
  ];

  return (
    <Box flexDirection="column" borderStyle="round" paddingX={1}>
      <Text bold>Color</Text>
      {rows.map((row, index) => (
        <Text key={row.label} color={index === active ? 'cyan' : undefined}>
          {`${index === active ? '›' : ' '} ${row.label} ${String(row.value).padStart(3)} ${bar(row.value, row.max)}`}
        </Text>
      ))}
      <Text>
        <Text color={hex}>████</Text> {hex}
      </Text>
      <Text dimColor>up/down pick, left/right adjust by 5, enter apply, esc cancel</Text>
    </Box>
  );
}

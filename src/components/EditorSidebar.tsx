import path from 'node:path';
import { Box, Text } from 'ink';
import { rgbToHex } from '../editor/color';
import type { PaletteSection } from '../editor/palette';
import { symmetryLabel } from '../editor/symmetry';
import type { Brush, ColorMode, Rgb, SymmetryMode } from '../editor/types';

type EditorSidebarProps = {
  brush: Brush;
  paletteSection: PaletteSection;
  // Selected slot within paletteSection, -1 when the brush color came from elsewhere.
  paletteSlot: number;
  customPaletteName: string | null;
  recentColors: Rgb[];
  symmetry: SymmetryMode;
  canvasWidth: number;
  canvasHeight: number;
  colorMode: ColorMode;
  currentFilePath: string | null;
  hasUnsavedChanges: boolean;
  penDown: boolean;
  undoDepth: number;
  redoDepth: number;
};

function Swatch({ hex, selected }: { hex: string; selected: boolean }) {
  return <Text color={hex}>{selected ? '[█]' : ' █ '}</Text>;
}

// Brush, palette and document state.
export function EditorSidebar({
  brush,
  paletteSection,
  paletteSlot,
  customPaletteName,
  recentColors,
  symmetry,
  canvasWidth,
  canvasHeight,
  colorMode,
  currentFilePath,
  hasUnsavedChanges,
  penDown,
  undoDepth,
  redoDepth
}: EditorSidebarProps) {
  const brushHex = brush.fg ? rgbToHex(brush.fg) : 'none';
  const fileName = currentFilePath ? path.basename(currentFilePath) : 'untitled';

  return (
    <Box flexDirection="column" borderStyle="round" paddingX={1} width={34}>
      <Text bold>termpix</Text>

      <Box marginTop={1}>
        <Text>Brush </Text>
        <Text color={brush.fg ? brushHex : undefined}>{brush.glyph.repeat(2)}</Text>
        <Text> {brushHex}</Text>
      </Box>
      <Text>Pen {penDown ? 'down' : 'up'}</Text>

      <Box marginTop={1} flexDirection="column">
        <Text>Palette {paletteSection.name}</Text>
        <Box flexWrap="wrap">
          {paletteSection.colors.map((hex, index) => (
            <Swatch key={`${hex}-${index}`} hex={hex} selected={index === paletteSlot} />
          ))}
        </Box>
        <Text dimColor>Custom {customPaletteName ?? 'none'}</Text>
      </Box>

      {recentColors.length > 0 ? (
        <Box flexDirection="column">
          <Text>Recent</Text>
          <Box>
            {recentColors.map((color) => {
              const hex = rgbToHex(color);
              return <Swatch key={hex} hex={hex} selected={false} />;
            })}
          </Box>
        </Box>
      ) : null}

      <Box marginTop={1} flexDirection="column">
        <Text>Symmetry {symmetryLabel(symmetry)}</Text>
        <Text>
          Canvas {canvasWidth}x{canvasHeight}
        </Text>
        <Text>Export {colorMode}</Text>
        <Text>
          History {undoDepth} undo / {redoDepth} redo
        </Text>
      </Box>

      <Box marginTop={1}>
        <Text>{fileName}</Text>
        {hasUnsavedChanges ? <Text color="yellow"> *</Text> : null}
      </Box>
    </Box>
  );
}

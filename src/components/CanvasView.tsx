import { Box, Text } from 'ink';
import type { Canvas } from '../editor/canvas';
import { rgbToHex } from '../editor/color';
import { displayCell } from '../editor/export';
import type { Point } from '../editor/types';

type CanvasViewProps = {
  canvas: Canvas;
  cursor: Point;
  // First corner of a pending line or rectangle.
  anchor: Point | null;
};

const CURSOR_COLOR = '#ffff00';
const ANCHOR_COLOR = '#00ffff';

// Canvas rendered two columns per cell, with the cursor and pending anchor drawn over it.
export function CanvasView({ canvas, cursor, anchor }: CanvasViewProps) {
  return (
    <Box flexDirection="column" borderStyle="single">
      {canvas.rows().map((row, y) => (
        <Box key={y}>
          {row.map((raw, x) => {
            const cell = displayCell(raw);
            const isCursor = cursor.x === x && cursor.y === y;
            const isAnchor = anchor !== null && anchor.x === x && anchor.y === y;
            if (isCursor || isAnchor) {
              return (
                <Text key={x} backgroundColor={isCursor ? CURSOR_COLOR : ANCHOR_COLOR} color="#000000">
                  {cell.glyph === ' ' ? '[]' : cell.glyph.repeat(2)}
                </Text>
              );
            }
            return (
              <Text
                key={x}
                color={cell.fg ? rgbToHex(cell.fg) : undefined}
                backgroundColor={cell.bg ? rgbToHex(cell.bg) : undefined}
              >
                {cell.glyph.repeat(2)}
              </Text>
            );
          })}
        </Box>
      ))}
    </Box>
  );
}

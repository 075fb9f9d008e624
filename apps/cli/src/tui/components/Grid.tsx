import React from "react";
import { Box, Text } from "ink";
import type { CellView } from "@numplace/engine";
import { cellColors, symbols } from "../theme.js";

interface CellStyle {
  color: string;
  backgroundColor?: string;
  bold?: boolean;
}

export function cellStyle(cell: CellView): CellStyle {
  const color =
    cell.value === 0
      ? cell.notes.length > 0
        ? cellColors.note
        : cellColors.empty
      : cell.conflict && !cell.fixed
        ? cellColors.conflict
        : cell.fixed
          ? cellColors.clue
          : cellColors.player;

  const backgroundColor = cell.selected
    ? cellColors.selectedBg
    : cell.sameValue
      ? cellColors.sameValueBg
      : cell.peer
        ? cellColors.peerBg
        : undefined;

  return { color, backgroundColor, bold: cell.fixed || cell.conflict };
}

function cellText(cell: CellView): string {
  if (cell.value !== 0) return ` ${cell.value} `;
  return cell.notes.length > 0 ? ` ${symbols.noted} ` : ` ${symbols.empty} `;
}

function rule(left: string, middle: string, right: string): string {
  const span = symbols.horizontal.repeat(9);
  return left + [span, span, span].join(middle) + right;
}

const TOP = rule(symbols.topLeft, symbols.teeDown, symbols.topRight);
const MIDDLE = rule(symbols.tee, symbols.cross, symbols.teeRight);
const BOTTOM = rule(symbols.bottomLeft, symbols.teeUp, symbols.bottomRight);

export function Grid({ cells }: { cells: CellView[][] }) {
  return (
    <Box flexDirection="column">
      <Text>{TOP}</Text>
      {cells.map((row, r) => (
        <Box key={r} flexDirection="column">
          {r > 0 && r % 3 === 0 && <Text>{MIDDLE}</Text>}
          <Text>
            {symbols.vertical}
            {row.map((cell, c) => (
              <Text key={c}>
                <Text {...cellStyle(cell)}>{cellText(cell)}</Text>
                {c % 3 === 2 ? symbols.vertical : ""}
              </Text>
            ))}
          </Text>
        </Box>
      ))}
      <Text>{BOTTOM}</Text>
    </Box>
  );
}

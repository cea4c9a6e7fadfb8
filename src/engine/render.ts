import type { CellState } from "./types";

export const GLYPHS = {
  covered: "■",
  revealed: "□",
  mine: "*",
  flag: "⚑",
  question: "?",
} as const;

interface RenderableBoard {
  readonly width: number;
  readonly height: number;
  cellState(x: number, y: number): CellState;
}

export function cellGlyph(cell: CellState): string {
  switch (cell.kind) {
    case "unknown":
      return GLYPHS.covered;
    case "known":
      return cell.mined ? GLYPHS.mine : GLYPHS.revealed;
    case "counted":
      return String(cell.count);
    case "flagged":
      return GLYPHS.flag;
    case "questioned":
      return GLYPHS.question;
  }
}

/** One glyph per cell, space separated, one line per row. */
export function renderBoard(board: RenderableBoard): string {
  const lines: string[] = [];
  for (let y = 0; y < board.height; y++) {
    const row: string[] = [];
    for (let x = 0; x < board.width; x++) {
      row.push(cellGlyph(board.cellState(x, y)));
    }
    lines.push(row.join(" "));
  }
  return lines.join("\n");
}

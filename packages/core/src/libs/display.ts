import { BoardView, CELLS, COLS, ROWS, candidatesOf } from "../types/board";

/** Pad `text` on both sides to `width`; odd padding puts the extra space on the right. */
export function center(text: string, width: number): string {
  const pad = Math.max(0, width - text.length);
  const left = Math.floor(pad / 2);
  return " ".repeat(left) + text + " ".repeat(pad - left);
}

/**
 * Column width for a board: 1 when every cell is solved, otherwise the
 * widest candidate set plus one space.
 */
export function cellWidth(board: BoardView): number {
  let widest = 0;
  for (const cell of CELLS) {
    widest = Math.max(widest, candidatesOf(board, cell).length);
  }
  return widest <= 1 ? 1 : widest + 1;
}

/**
 * Render the board as a 9x9 grid with "|" after columns 3 and 6 and a
 * separator line after rows C and F. Undetermined cells show all of their
 * candidates; a contradiction shows as "-".
 */
export function renderBoard(board: BoardView): string {
  const width = cellWidth(board);
  const separator = Array(3).fill("-".repeat(width * 3)).join("+");

  const lines: string[] = [];
  for (const r of ROWS) {
    let line = "";
    for (const c of COLS) {
      const candidates = candidatesOf(board, `${r}${c}`);
      const text = candidates.length === 0 ? "-" : candidates.join("");
      line += center(text, width);
      if (c === "3" || c === "6") line += "|";
    }
    lines.push(line);
    if (r === "C" || r === "F") lines.push(separator);
  }
  return lines.join("\n");
}

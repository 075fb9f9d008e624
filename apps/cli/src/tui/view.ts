import { RenderSnapshot, SessionState } from "@numplace/engine";
import { symbols } from "./theme.js";

/** Keeps a list cursor on an existing entry after the list shrinks. */
export function clampIndex(index: number, count: number): number {
  return Math.max(0, Math.min(index, count - 1));
}

/** The number pad, with a check mark for each completed digit */
export function digitPad(snapshot: RenderSnapshot): string {
  return [1, 2, 3, 4, 5, 6, 7, 8, 9]
    .map((d) => (snapshot.completedDigits.includes(d) ? symbols.check : String(d)))
    .join("");
}

/** Notes of the selected cell; null while paused or when there are none. */
export function notesLine(snapshot: RenderSnapshot): string | null {
  if (snapshot.state === SessionState.PAUSED || !snapshot.selected || !snapshot.cells) return null;
  const cell = snapshot.cells[snapshot.selected.row][snapshot.selected.col];
  return cell.notes.length > 0 ? `${symbols.pencil} ${cell.notes.join(" ")}` : null;
}

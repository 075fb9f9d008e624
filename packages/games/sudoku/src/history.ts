import { Board, Move } from "./board.js";

export type UndoResult =
  | { ok: true; move: Move }
  | { ok: false; reason: "empty_history" };

/** Moves in the order they were made, newest last. */
export class MoveHistory {
  private readonly moves: Move[];

  constructor(moves: readonly Move[] = []) {
    this.moves = [...moves];
  }

  get size(): number {
    return this.moves.length;
  }

  canUndo(): boolean {
    return this.moves.length > 0;
  }

  push(move: Move): void {
    this.moves.push(move);
  }

  /** The most recent move, without removing it */
  peek(): Move | undefined {
    return this.moves[this.moves.length - 1];
  }

  /** Pops the latest move and reverts it on `board`. */
  undo(board: Board): UndoResult {
    const move = this.moves.pop();
    if (!move) return { ok: false, reason: "empty_history" };
    board.revert(move);
    return { ok: true, move };
  }

  clear(): void {
    this.moves.length = 0;
  }

  toJSON(): Move[] {
    return [...this.moves];
  }
}

import {
  type Board,
  Cell,
  createBoard,
  createGame,
  FirstMover,
  type GameConfig,
  type GameSession,
  toIndex,
} from "@shared/mod.ts";

export type Move = readonly [row: number, col: number];

export const CPU_FIRST: GameConfig = {cpu: Cell.X, firstMover: FirstMover.Cpu};
export const HUMAN_FIRST: GameConfig = {cpu: Cell.X, firstMover: FirstMover.Human};

/** Started session with `moves` applied in order. */
export function replay(config: GameConfig, moves: readonly Move[]): GameSession {
  const session = createGame(config);
  session.start();
  for (const [row, col] of moves) {
    session.attemptMove(row, col);
  }
  return session;
}

/** Board from three rows of `X`, `O` and `-`. */
export function boardOf(...rows: string[]): Board {
  const board = createBoard();
  rows.forEach((line, row) => {
    [...line].forEach((ch, col) => {
      board[toIndex({row, col})] = ch === "X" ? Cell.X : ch === "O" ? Cell.O : Cell.Empty;
    });
  });
  return board;
}

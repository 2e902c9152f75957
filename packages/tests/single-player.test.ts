import {describe, expect, it} from "vitest";

import {
  Cell,
  type Coord,
  emptyCoords,
  isFinished,
  MoveAttempt,
  occupiedCount,
  PhaseType,
} from "@shared/mod.ts";

import {SinglePlayerMatch} from "../../apps/cli/src/single-player.ts";
import {CPU_FIRST, HUMAN_FIRST} from "./helpers.ts";

function recordingMatch(config = CPU_FIRST): { match: SinglePlayerMatch; cpuMoves: Coord[] } {
  const cpuMoves: Coord[] = [];
  const match = new SinglePlayerMatch(config, (move) => cpuMoves.push(move));
  return {match, cpuMoves};
}

describe("SinglePlayerMatch", () => {
  it("lets the cpu open when it moves first", () => {
    const {match, cpuMoves} = recordingMatch();

    match.begin();

    expect(cpuMoves).toHaveLength(1);
    expect(occupiedCount(match.session().board())).toBe(1);
    expect(match.session().phase()).toEqual({type: PhaseType.Turn, player: Cell.O});
  });

  it("waits for the human when the human moves first", () => {
    const {match, cpuMoves} = recordingMatch(HUMAN_FIRST);

    match.begin();

    expect(cpuMoves).toHaveLength(0);
    expect(match.session().phase()).toEqual({type: PhaseType.Turn, player: Cell.O});
  });

  it("starts on first input and answers the human move", () => {
    const {match, cpuMoves} = recordingMatch(HUMAN_FIRST);

    expect(match.play(1, 1)).toBe(MoveAttempt.Applied);

    const board = match.session().board();
    expect(board[4]).toBe(Cell.O);
    expect(cpuMoves).toHaveLength(1);
    expect(board[cpuMoves[0].row * 3 + cpuMoves[0].col]).toBe(Cell.X);
    expect(match.session().phase()).toEqual({type: PhaseType.Turn, player: Cell.O});
  });

  it("does not answer a rejected move", () => {
    const {match, cpuMoves} = recordingMatch(HUMAN_FIRST);
    match.play(1, 1);
    const taken = cpuMoves[0];

    expect(match.play(taken.row, taken.col)).toBe(MoveAttempt.Rejected);
    expect(cpuMoves).toHaveLength(1);
    expect(match.session().phase()).toEqual({type: PhaseType.InvalidRetry, player: Cell.O});
  });

  it("never lets the human win", () => {
    const {match} = recordingMatch();
    match.begin();

    while (!isFinished(match.session().phase())) {
      const [first] = emptyCoords(match.session().board());
      match.play(first.row, first.col);
    }

    expect(match.session().phase()).not.toEqual({type: PhaseType.Won, winner: Cell.O});
  });

  it("ignores input after the game ends", () => {
    const {match} = recordingMatch();
    match.begin();

    while (!isFinished(match.session().phase())) {
      const [first] = emptyCoords(match.session().board());
      match.play(first.row, first.col);
    }

    const board = match.session().board();
    const free = emptyCoords(board);
    if (free.length > 0) {
      expect(match.play(free[0].row, free[0].col)).toBe(MoveAttempt.Ignored);
    }
    expect(match.session().board()).toEqual(board);
  });

  it("reset starts over from Ready", () => {
    const {match} = recordingMatch();
    match.begin();
    const previous = match.session();

    match.reset();

    expect(match.session()).not.toBe(previous);
    expect(match.session().phase()).toEqual({type: PhaseType.Ready});
    expect(occupiedCount(match.session().board())).toBe(0);
  });
});

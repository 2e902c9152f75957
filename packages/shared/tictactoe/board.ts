import {type Board, Cell, type Coord, type Mark, type Roles} from "./types.ts";

export const BOARD_SIZE = 3;
export const CELL_COUNT = BOARD_SIZE * BOARD_SIZE;

const WINNING_LINES: readonly (readonly number[])[] = [
    [0, 1, 2],
    [3, 4, 5],
    [6, 7, 8],
    [0, 3, 6],
    [1, 4, 7],
    [2, 5, 8],
    [0, 4, 8],
    [2, 4, 6],
] as const;

/* =========================
   Cells & Roles
   ========================= */

export function complement(cell: Mark): Mark;
export function complement(cell: Cell): Cell;
export function complement(cell: Cell): Cell {
    switch (cell) {
        case Cell.X:
            return Cell.O;
        case Cell.O:
            return Cell.X;
        case Cell.Empty:
            return Cell.Empty;
    }
}

export function rolesFor(cpu: Mark): Roles {
    return {cpu, human: complement(cpu)};
}

/* =========================
   Coordinates
   ========================= */

export function isInBounds(row: number, col: number): boolean {
    return Number.isInteger(row) &&
        Number.isInteger(col) &&
        row >= 0 && row < BOARD_SIZE &&
        col >= 0 && col < BOARD_SIZE;
}

export function toIndex(coord: Coord): number {
    return coord.row * BOARD_SIZE + coord.col;
}

export function toCoord(index: number): Coord {
    return {row: Math.floor(index / BOARD_SIZE), col: index % BOARD_SIZE};
}

/* =========================
   Board Creation & Queries
   ========================= */

export function createBoard(): Board {
    return Array<Cell>(CELL_COUNT).fill(Cell.Empty);
}

export function cloneBoard(board: readonly Cell[]): Board {
    return board.slice();
}

export function boardsEqual(a: readonly Cell[], b: readonly Cell[]): boolean {
    return a.length === b.length && a.every((cell, idx) => cell === b[idx]);
}

export function cellAt(board: readonly Cell[], coord: Coord): Cell {
    return board[toIndex(coord)];
}

export function* cells(board: readonly Cell[]): Generator<{ coord: Coord; cell: Cell }> {
    for (let idx = 0; idx < CELL_COUNT; idx++) {
        yield {coord: toCoord(idx), cell: board[idx]};
    }
}

/** Empty cells in row-major order. */
export function emptyCoords(board: readonly Cell[]): Coord[] {
    const result: Coord[] = [];
    for (let idx = 0; idx < CELL_COUNT; idx++) {
        if (board[idx] === Cell.Empty) result.push(toCoord(idx));
    }
    return result;
}

export function isBoardFull(board: readonly Cell[]): boolean {
    return board.every((cell) => cell !== Cell.Empty);
}

export function occupiedCount(board: readonly Cell[]): number {
    return board.filter((cell) => cell !== Cell.Empty).length;
}

/* =========================
   Mutation
   ========================= */

export function placeMark(board: Board, coord: Coord, mark: Mark): void {
    const idx = toIndex(coord);
    if (board[idx] !== Cell.Empty) {
        throw new Error(`Cell (${coord.row}, ${coord.col}) is already occupied`);
    }
    board[idx] = mark;
}

export function clearCell(board: Board, coord: Coord): void {
    board[toIndex(coord)] = Cell.Empty;
}

/* =========================
   Lines
   ========================= */

/**
 * Whether `mark` owns a full line through `coord`. A line can only become
 * complete on its latest cell, so this is enough after each placement.
 */
export function completesLine(board: readonly Cell[], mark: Mark, coord: Coord): boolean {
    const {row, col} = coord;
    const owns = (r: number, c: number): boolean => board[r * BOARD_SIZE + c] === mark;
    const span = [0, 1, 2];

    if (span.every((i) => owns(row, i)) || span.every((i) => owns(i, col))) {
        return true;
    }
    if (row === col && span.every((i) => owns(i, i))) {
        return true;
    }
    return row + col === BOARD_SIZE - 1 && span.every((i) => owns(i, BOARD_SIZE - 1 - i));
}

export function hasLine(board: readonly Cell[], mark: Mark): boolean {
    return WINNING_LINES.some((line) =>
        line.every((index) => board[index] === mark)
    );
}

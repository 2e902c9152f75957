import {BOARD_SIZE, Cell, type Coord, type GamePhase, PhaseType, type Roles} from '@shared/mod.ts';

const MOVE_PATTERN = /^\s*([0-2])\s*[\s,]\s*([0-2])\s*$/;

function cellText(cell: Cell): string {
    return cell === Cell.Empty ? '-' : cell;
}

export function renderBoard(board: readonly Cell[]): string {
    const rows: string[] = [];
    for (let row = 0; row < BOARD_SIZE; row++) {
        rows.push(board.slice(row * BOARD_SIZE, (row + 1) * BOARD_SIZE).map(cellText).join(' '));
    }
    return rows.join('\n');
}

export function statusText(phase: GamePhase, roles: Roles): string {
    switch (phase.type) {
        case PhaseType.Ready:
            return 'Pick a cell to start.';
        case PhaseType.Turn:
            return phase.player === roles.cpu
                ? `CPU to move (${phase.player}).`
                : `Your turn (${phase.player}).`;
        case PhaseType.InvalidRetry:
            return `Cell taken, try again (${phase.player}).`;
        case PhaseType.Won:
            return phase.winner === roles.cpu
                ? `Game over: CPU (${phase.winner}) wins!`
                : `Game over: you (${phase.winner}) win!`;
        case PhaseType.Draw:
            return 'Game over: Draw!';
    }
}

/** Accepts `row col` or `row,col` with digits 0-2. */
export function parseMove(input: string): Coord | undefined {
    const match = MOVE_PATTERN.exec(input);
    if (!match) return undefined;
    return {row: Number(match[1]), col: Number(match[2])};
}

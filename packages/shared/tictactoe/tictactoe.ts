import {
    type Board,
    Cell,
    FirstMover,
    type GameConfig,
    type GamePhase,
    type Mark,
    MoveAttempt,
    PhaseType,
} from "./types.ts";
import {
    cloneBoard,
    complement,
    completesLine,
    createBoard,
    isBoardFull,
    isInBounds,
    placeMark,
    toIndex,
} from "./board.ts";

export const DEFAULT_CONFIG: GameConfig = {
    cpu: Cell.X,
    firstMover: FirstMover.Cpu,
};

/* =========================
   Phase Helpers
   ========================= */

export function isFinished(phase: GamePhase): boolean {
    return phase.type === PhaseType.Won || phase.type === PhaseType.Draw;
}

export function isPlayable(phase: GamePhase): boolean {
    return phase.type === PhaseType.Turn || phase.type === PhaseType.InvalidRetry;
}

/** The mark expected to move next, or `undefined` outside of play. */
export function activePlayer(phase: GamePhase): Mark | undefined {
    switch (phase.type) {
        case PhaseType.Turn:
        case PhaseType.InvalidRetry:
            return phase.player;
        default:
            return undefined;
    }
}

export function firstMoverMark(config: GameConfig): Mark {
    return config.firstMover === FirstMover.Cpu ? config.cpu : complement(config.cpu);
}

/* =========================
   Game Session
   ========================= */

export class GameSession {
    private readonly cells: Board = createBoard();
    private current: GamePhase = {type: PhaseType.Ready};

    constructor(private readonly settings: GameConfig = DEFAULT_CONFIG) {
    }

    config(): GameConfig {
        return this.settings;
    }

    board(): Board {
        return cloneBoard(this.cells);
    }

    phase(): GamePhase {
        return this.current;
    }

    start(): void {
        if (this.current.type !== PhaseType.Ready) return;
        this.current = {type: PhaseType.Turn, player: firstMoverMark(this.settings)};
    }

    attemptMove(row: number, col: number): MoveAttempt {
        const player = activePlayer(this.current);

        // Not playable, or off the grid → no state change
        if (player === undefined || !isInBounds(row, col)) {
            return MoveAttempt.Ignored;
        }

        const coord = {row, col};

        // Occupied → same player retries
        if (this.cells[toIndex(coord)] !== Cell.Empty) {
            this.current = {type: PhaseType.InvalidRetry, player};
            return MoveAttempt.Rejected;
        }

        placeMark(this.cells, coord, player);

        if (completesLine(this.cells, player, coord)) {
            this.current = {type: PhaseType.Won, winner: player};
        } else if (isBoardFull(this.cells)) {
            this.current = {type: PhaseType.Draw};
        } else {
            this.current = {type: PhaseType.Turn, player: complement(player)};
        }

        return MoveAttempt.Applied;
    }

    /** A fresh session with the same config; this one is left as it is. */
    reset(): GameSession {
        return new GameSession(this.settings);
    }
}

export function createGame(config: GameConfig = DEFAULT_CONFIG): GameSession {
    return new GameSession(config);
}

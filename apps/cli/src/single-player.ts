import {
    activePlayer,
    bestMove,
    type Coord,
    createGame,
    DEFAULT_CONFIG,
    type GameConfig,
    type GameSession,
    MoveAttempt,
    PhaseType,
} from '@shared/mod.ts';

export interface CpuMoveListener {
    (move: Coord): void;
}

/**
 * Human vs CPU on one session: human input goes through `play`, and the CPU
 * answers whenever the turn passes to it.
 */
export class SinglePlayerMatch {
    private game: GameSession;

    constructor(
        config: GameConfig = DEFAULT_CONFIG,
        private readonly onCpuMove: CpuMoveListener = () => {},
    ) {
        this.game = createGame(config);
    }

    session(): GameSession {
        return this.game;
    }

    begin(): void {
        this.game.start();
        this.maybeCpuMove();
    }

    play(row: number, col: number): MoveAttempt {
        if (this.game.phase().type === PhaseType.Ready) {
            this.begin();
        }

        if (!this.isHumanTurn()) {
            return MoveAttempt.Ignored;
        }

        const attempt = this.game.attemptMove(row, col);
        if (attempt === MoveAttempt.Applied) {
            this.maybeCpuMove();
        }
        return attempt;
    }

    reset(): void {
        this.game = this.game.reset();
    }

    private isHumanTurn(): boolean {
        const player = activePlayer(this.game.phase());
        return player !== undefined && player !== this.game.config().cpu;
    }

    private maybeCpuMove(): void {
        const phase = this.game.phase();
        const cpu = this.game.config().cpu;

        if (phase.type !== PhaseType.Turn || phase.player !== cpu) return;

        const move = bestMove(this.game.board(), cpu);
        this.game.attemptMove(move.row, move.col);
        this.onCpuMove(move);
    }
}

export enum Cell {
    Empty = "Empty",
    X = "X",
    O = "O",
}

export type Mark = Cell.X | Cell.O;

export type Board = Cell[];

export interface Coord {
    readonly row: number;
    readonly col: number;
}

export enum FirstMover {
    Cpu = "cpu",
    Human = "human",
}

export interface Roles {
    readonly cpu: Mark;
    readonly human: Mark;
}

export interface GameConfig {
    readonly cpu: Mark;
    readonly firstMover: FirstMover;
}

export enum PhaseType {
    Ready = "Ready",
    Turn = "Turn",
    InvalidRetry = "InvalidRetry",
    Won = "Won",
    Draw = "Draw",
}

export type GamePhase =
    | {
    type: PhaseType.Ready;
}
    | {
    type: PhaseType.Turn;
    player: Mark;
}
    | {
    type: PhaseType.InvalidRetry;
    player: Mark;
}
    | {
    type: PhaseType.Won;
    winner: Mark;
}
    | {
    type: PhaseType.Draw;
};

export enum MoveAttempt {
    Applied = "Applied",
    Rejected = "Rejected",
    Ignored = "Ignored",
}

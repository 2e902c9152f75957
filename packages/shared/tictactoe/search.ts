import {type Board, Cell, type Coord, type Mark, type Roles} from "./types.ts";
import {clearCell, cloneBoard, complement, emptyCoords, hasLine, isBoardFull, placeMark, rolesFor} from "./board.ts";

/** Above any ply count, so every win outscores every draw. */
const WIN_SCORE = 10;

/* =========================
   Public API
   ========================= */

/**
 * Optimal move for `cpu` on `board`, assuming the opponent also plays
 * optimally. Searches the whole remaining tree with alpha-beta pruning.
 *
 * Leaves score `WIN_SCORE - ply` for a cpu line, `ply - WIN_SCORE` for a
 * human line and 0 for a draw, so the sign is the game result and, within a
 * sign, the faster win or the slower loss scores higher. Equal scores go to
 * the first empty cell in row-major order.
 *
 * The input board is copied and never mutated. Throws when the board has no
 * empty cell.
 */
export function bestMove(board: readonly Cell[], cpu: Mark = Cell.X): Coord {
    const roles = rolesFor(cpu);
    const scratch = cloneBoard(board);
    const actions = emptyCoords(scratch);

    if (actions.length === 0) {
        throw new Error("bestMove called on a full board");
    }

    let bestAction = actions[0];
    let bestScore = -Infinity;

    for (const action of actions) {
        placeMark(scratch, action, roles.cpu);

        // Full window per root action: root scores stay exact
        const score = minimax(scratch, roles, roles.human, -Infinity, Infinity, 1);

        clearCell(scratch, action);

        if (score > bestScore) {
            bestScore = score;
            bestAction = action;
        }
    }

    return bestAction;
}

/* =========================
   Minimax
   ========================= */

function minimax(
    board: Board,
    roles: Roles,
    toMove: Mark,
    alpha: number,
    beta: number,
    depth: number,
): number {
    if (isTerminal(board, roles)) {
        return evaluate(board, roles, depth);
    }

    const maximizing = toMove === roles.cpu;
    let best = maximizing ? -Infinity : Infinity;

    for (const action of emptyCoords(board)) {
        placeMark(board, action, toMove);
        const score = minimax(board, roles, complement(toMove), alpha, beta, depth + 1);
        clearCell(board, action);

        if (maximizing) {
            best = Math.max(best, score);
            alpha = Math.max(alpha, best);
        } else {
            best = Math.min(best, score);
            beta = Math.min(beta, best);
        }

        if (beta <= alpha) {
            break;
        }
    }

    return best;
}

/* =========================
   Helpers
   ========================= */

function isTerminal(board: readonly Cell[], roles: Roles): boolean {
    return hasLine(board, roles.cpu) ||
        hasLine(board, roles.human) ||
        isBoardFull(board);
}

function evaluate(board: readonly Cell[], roles: Roles, depth: number): number {
    if (hasLine(board, roles.cpu)) return WIN_SCORE - depth;
    if (hasLine(board, roles.human)) return depth - WIN_SCORE;
    return 0;
}

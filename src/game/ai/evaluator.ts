import type { Board } from '../board';
import { otherPlayer } from '../logic';
import type { Player } from '../types';
import {
    CELL_WEIGHTS,
    WINDOWS,
    WINDOW_BLOCK_THREE,
    WINDOW_BLOCK_TWO,
    WINDOW_FOUR,
    WINDOW_ONE,
    WINDOW_THREE,
    WINDOW_TWO,
} from './constants';
import { HEURISTIC_LIMIT, SCORE_LOSS, SCORE_WIN } from './types';

// Score of one window for the player owning `own` of its cells, given `opp` opponent cells
export function scoreWindow(own: number, opp: number): number {
    if (own === 4) return WINDOW_FOUR;
    if (opp === 0) {
        if (own === 3) return WINDOW_THREE;
        if (own === 2) return WINDOW_TWO;
        if (own === 1) return WINDOW_ONE;
        return 0;
    }
    if (own === 0) {
        // Opponent about to connect: weigh blocking
        if (opp === 3) return WINDOW_BLOCK_THREE;
        if (opp === 2) return WINDOW_BLOCK_TWO;
    }
    return 0;
}

// Window and positional score of one player's pieces, ignoring the other side's own score
export function scorePlayer(board: Board, player: Player): number {
    const cells = board.cells;
    let score = 0;

    for (const run of WINDOWS) {
        let own = 0;
        let opp = 0;
        for (const idx of run) {
            const cell = cells[idx];
            if (cell === player) own++;
            else if (cell !== 0) opp++;
        }
        score += scoreWindow(own, opp);
    }

    for (let i = 0; i < cells.length; i++) {
        if (cells[i] === player) score += CELL_WEIGHTS[i];
    }

    return score;
}

// Static evaluation from the perspective of 'player'; evaluate(b, p) === -evaluate(b, other(p))
export function evaluate(board: Board, player: Player): number {
    const score = scorePlayer(board, player) - scorePlayer(board, otherPlayer(player));
    // Kept below SCORE_MATE so no static score ends the iterative deepening early
    return Math.max(-HEURISTIC_LIMIT, Math.min(HEURISTIC_LIMIT, score));
}

// Exact score of a finished position for 'player', or null while the game is still on.
// Wins found closer to the root score higher.
export function terminalScore(board: Board, player: Player, ply: number): number | null {
    if (board.isWin(otherPlayer(player))) return SCORE_LOSS + ply;
    if (board.isWin(player)) return SCORE_WIN - ply;
    if (board.isFull()) return 0;
    return null;
}

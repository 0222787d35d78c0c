import { Board } from './board'
import { COLS } from './constants'

// Deterministic PRNG (mulberry32) so generated positions repeat from run to run
export const createRandom = (seed: number): (() => number) => {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export interface RandomBoardOptions {
  plies: number
  // Stop before the position is decided
  stopBeforeEnd?: boolean
}

export const randomBoard = (
  random: () => number,
  { plies, stopBeforeEnd = false }: RandomBoardOptions
): Board => {
  const board = new Board()
  for (let i = 0; i < plies; i++) {
    const moves = board.legalMoves()
    if (moves.length === 0) break
    const move = moves[Math.floor(random() * moves.length)]
    board.applyMove(move)
    if (stopBeforeEnd && board.isTerminal()) {
      board.undo()
      break
    }
  }
  return board
}

export const snapshot = (board: Board) => ({
  playerOne: board.bitboard(1),
  playerTwo: board.bitboard(2),
  heights: Array.from({ length: COLS }, (_, col) => board.height(col)),
  cells: Array.from(board.cells),
  history: board.history(),
  moveCount: board.moveCount,
  currentPlayer: board.currentPlayer,
})

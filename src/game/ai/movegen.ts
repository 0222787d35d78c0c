import type { Board } from '../board'

// Center columns take part in the most lines, so they are searched first
export const CENTER_FIRST = [3, 2, 4, 1, 5, 0, 6] as const

export const orderMoves = (board: Board): number[] =>
  CENTER_FIRST.filter((col) => board.canPlay(col))

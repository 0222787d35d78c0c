import type { Board } from './board'
import { COLS, PLAYER_ONE, PLAYER_TWO, ROWS } from './constants'
import type { Cell, Player, Position, WinningLine } from './types'

// Column and row steps: up, right, up-right, down-right
const DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [0, 1],
  [1, 0],
  [1, 1],
  [1, -1],
]

const SYMBOLS: Record<Cell, string> = { 0: '.', 1: 'X', 2: 'O' }

export const otherPlayer = (player: Player): Player =>
  player === PLAYER_ONE ? PLAYER_TWO : PLAYER_ONE

export const inBounds = (column: number, row: number): boolean =>
  column >= 0 && column < COLS && row >= 0 && row < ROWS

// Cell-by-cell scan for a four-in-a-row, for highlighting the winning line.
// Pass a player to look only at that player's pieces.
export const findWinningLine = (
  board: Board,
  player?: Player
): WinningLine | null => {
  for (let col = 0; col < COLS; col++) {
    for (let row = 0; row < ROWS; row++) {
      const cell = board.getCell(col, row)
      if (cell === 0 || (player !== undefined && cell !== player)) continue

      for (const [dc, dr] of DIRECTIONS) {
        const cells: Position[] = []
        for (let i = 0; i < 4; i++) {
          const c = col + dc * i
          const r = row + dr * i
          if (!inBounds(c, r) || board.getCell(c, r) !== cell) break
          cells.push({ column: c, row: r })
        }
        if (cells.length === 4) {
          return { player: cell, cells }
        }
      }
    }
  }
  return null
}

export const renderBoard = (board: Board): string => {
  const lines = board.grid().map((row) => row.map((cell) => SYMBOLS[cell]).join(' '))
  const footer = Array.from({ length: COLS }, (_, col) => String(col)).join(' ')
  return [...lines, footer].join('\n')
}

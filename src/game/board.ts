import {
  CELL_COUNT,
  COLS,
  COLUMN_BITS,
  PLAYER_ONE,
  PLAYER_TWO,
  ROWS,
} from './constants'
import { EmptyHistoryError, InvalidMoveError } from './errors'
import type { Cell, Player } from './types'

// Bit of each playable cell, indexed column * ROWS + row.
// Bitboard layout is column-major with COLUMN_BITS per column, the top bit
// of each column always empty so shifts never carry into the next column.
const CELL_BITS = new BigUint64Array(CELL_COUNT)
for (let col = 0; col < COLS; col++) {
  for (let row = 0; row < ROWS; row++) {
    CELL_BITS[col * ROWS + row] = 1n << BigInt(col * COLUMN_BITS + row)
  }
}

// Shift per direction: vertical, horizontal, diagonal up-right, diagonal down-right
const DIRECTION_SHIFTS = [
  1n,
  BigInt(COLUMN_BITS),
  BigInt(COLUMN_BITS + 1),
  BigInt(COLUMN_BITS - 1),
] as const

const toCell = (value: number): Cell => {
  if (value === PLAYER_ONE) return PLAYER_ONE
  if (value === PLAYER_TWO) return PLAYER_TWO
  return 0
}

export class Board {
  // Occupancy per player, slot 0 for player 1
  private readonly masks = new BigUint64Array(2)
  private readonly heights = new Int8Array(COLS)
  private readonly moves = new Int8Array(CELL_COUNT)
  private count = 0

  // Flat cell values (0, 1, 2), indexed column * ROWS + row.
  // Mirrors the bitboards; read by the evaluator.
  public readonly cells = new Int8Array(CELL_COUNT)

  static fromMoves (moves: Iterable<number> | string): Board {
    const board = new Board()
    const columns = typeof moves === 'string'
      ? Array.from(moves, (ch) => Number(ch))
      : moves
    for (const column of columns) {
      board.applyMove(column)
    }
    return board
  }

  get moveCount (): number {
    return this.count
  }

  // Player 1 always opens; parity decides who is on move
  get currentPlayer (): Player {
    return this.count % 2 === 0 ? PLAYER_ONE : PLAYER_TWO
  }

  public bitboard (player: Player): bigint {
    return this.masks[player - 1]
  }

  public height (column: number): number {
    return this.heights[column]
  }

  public getCell (column: number, row: number): Cell {
    return toCell(this.cells[column * ROWS + row])
  }

  public history (): number[] {
    return Array.from(this.moves.subarray(0, this.count))
  }

  public canPlay (column: number): boolean {
    return Number.isInteger(column) &&
      column >= 0 &&
      column < COLS &&
      this.heights[column] < ROWS
  }

  public legalMoves (): number[] {
    const moves: number[] = []
    for (let col = 0; col < COLS; col++) {
      if (this.heights[col] < ROWS) moves.push(col)
    }
    return moves
  }

  public applyMove (column: number): void {
    if (!Number.isInteger(column) || column < 0 || column >= COLS) {
      throw new InvalidMoveError(column, 'out_of_range')
    }
    const row = this.heights[column]
    if (row >= ROWS) {
      throw new InvalidMoveError(column, 'column_full')
    }

    const player = this.currentPlayer
    const idx = column * ROWS + row
    this.masks[player - 1] |= CELL_BITS[idx]
    this.cells[idx] = player
    this.heights[column] = row + 1
    this.moves[this.count] = column
    this.count++
  }

  // Returns the column that was taken back
  public undo (): number {
    if (this.count === 0) {
      throw new EmptyHistoryError()
    }

    this.count--
    const column = this.moves[this.count]
    const row = this.heights[column] - 1
    const idx = column * ROWS + row
    // After the decrement, parity points back at the player who made the move
    this.masks[this.currentPlayer - 1] ^= CELL_BITS[idx]
    this.cells[idx] = 0
    this.heights[column] = row
    return column
  }

  public isWin (player: Player): boolean {
    const b = this.masks[player - 1]
    for (const shift of DIRECTION_SHIFTS) {
      const pairs = b & (b >> shift)
      if ((pairs & (pairs >> (2n * shift))) !== 0n) return true
    }
    return false
  }

  public isFull (): boolean {
    return this.count === CELL_COUNT
  }

  public isDraw (): boolean {
    return this.isFull() && !this.isWin(PLAYER_ONE) && !this.isWin(PLAYER_TWO)
  }

  public isTerminal (): boolean {
    return this.isWin(PLAYER_ONE) || this.isWin(PLAYER_TWO) || this.isFull()
  }

  // Rows top to bottom, for rendering
  public grid (): Cell[][] {
    const rows: Cell[][] = []
    for (let row = ROWS - 1; row >= 0; row--) {
      const line: Cell[] = []
      for (let col = 0; col < COLS; col++) {
        line.push(this.getCell(col, row))
      }
      rows.push(line)
    }
    return rows
  }

  public clone (): Board {
    const copy = new Board()
    copy.masks.set(this.masks)
    copy.heights.set(this.heights)
    copy.moves.set(this.moves)
    copy.cells.set(this.cells)
    copy.count = this.count
    return copy
  }
}

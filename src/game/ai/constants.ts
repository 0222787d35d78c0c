import { COLS, ROWS } from '../constants'

// Window scores, from the point of view of the player being scored
export const WINDOW_FOUR = 100000
export const WINDOW_THREE = 1000 // 3 + 1 empty
export const WINDOW_TWO = 100 // 2 + 2 empty
export const WINDOW_ONE = 10 // 1 + 3 empty
export const WINDOW_BLOCK_THREE = -800 // opponent 3 + 1 empty
export const WINDOW_BLOCK_TWO = -50 // opponent 2 + 2 empty

// Column preference, center heaviest
export const COLUMN_WEIGHTS = [40, 70, 120, 200, 120, 70, 40] as const

// Every run of four cells as flat indices (column * ROWS + row)
export const WINDOWS: ReadonlyArray<readonly [number, number, number, number]> = (() => {
  const windows: Array<[number, number, number, number]> = []
  const steps: ReadonlyArray<readonly [number, number]> = [[1, 0], [0, 1], [1, 1], [1, -1]]
  for (const [dc, dr] of steps) {
    for (let col = 0; col < COLS; col++) {
      for (let row = 0; row < ROWS; row++) {
        const endCol = col + dc * 3
        const endRow = row + dr * 3
        if (endCol >= COLS || endRow < 0 || endRow >= ROWS) continue
        windows.push([
          col * ROWS + row,
          (col + dc) * ROWS + (row + dr),
          (col + 2 * dc) * ROWS + (row + 2 * dr),
          (col + 3 * dc) * ROWS + (row + 3 * dr),
        ])
      }
    }
  }
  return windows
})()

// Positional weight per cell: how many windows pass through it (3 at the corners, 13 in the middle)
// plus the column preference.
export const CELL_WEIGHTS: Int16Array = (() => {
  const weights = new Int16Array(COLS * ROWS)
  for (const cells of WINDOWS) {
    for (const idx of cells) weights[idx]++
  }
  for (let col = 0; col < COLS; col++) {
    for (let row = 0; row < ROWS; row++) {
      weights[col * ROWS + row] += COLUMN_WEIGHTS[col]
    }
  }
  return weights
})()

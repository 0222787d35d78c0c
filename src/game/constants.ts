import type { Cell, Difficulty, Player } from './types'

// --- Board Geometry ---
export const COLS = 7
export const ROWS = 6
export const CELL_COUNT = COLS * ROWS
// Bits per column in a bitboard: ROWS playable rows plus one empty sentinel
export const COLUMN_BITS = ROWS + 1

export const CELL_EMPTY: Cell = 0
export const PLAYER_ONE: Player = 1
export const PLAYER_TWO: Player = 2

// --- Difficulty (caller side; the search only takes a depth) ---
export const DIFFICULTY_LABELS: readonly Difficulty[] = [
  'Easy',
  'Medium',
  'Hard',
  'Expert',
  'Insane',
]

export const DIFFICULTY_DEPTHS: Readonly<Record<Difficulty, number>> = {
  Easy: 2,
  Medium: 4,
  Hard: 6,
  Expert: 8,
  Insane: 10,
}

export const DEFAULT_DIFFICULTY: Difficulty = 'Medium'

// Search depth per difficulty (Single Source of Truth)
export const getSearchDepth = (difficulty: Difficulty): number =>
  DIFFICULTY_DEPTHS[difficulty]

export const getDifficultyLabel = (depth: number): Difficulty => {
  const idx = Math.max(0, Math.min(Math.floor(depth / 2) - 1, 4))
  return DIFFICULTY_LABELS[idx]
}

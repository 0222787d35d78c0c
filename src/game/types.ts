// Game primitives
export type Player = 1 | 2
export type Cell = 0 | Player
export type Difficulty = 'Easy' | 'Medium' | 'Hard' | 'Expert' | 'Insane'

export interface Position {
  column: number
  row: number
}

export interface WinningLine {
  player: Player
  cells: Position[]
}

import { Search } from './ai/search'
import type { SearchOptions } from './ai/types'
import { Board } from './board'
import { PLAYER_ONE, PLAYER_TWO } from './constants'
import type { Player } from './types'

export interface MatchOptions {
  // Search depth for player 1 and player 2
  depths: readonly [number, number]
  maxTime?: number
}

export interface MatchResult {
  winner: Player | null
  moves: number[]
}

export interface SeriesResult {
  shallowWins: number
  deepWins: number
  draws: number
}

// Engine against engine from an empty board
export const playMatch = ({ depths, maxTime }: MatchOptions): MatchResult => {
  const board = new Board()
  const engine = new Search()
  const options: SearchOptions = maxTime === undefined ? {} : { maxTime }

  while (!board.isTerminal()) {
    const depth = depths[board.currentPlayer - 1]
    const { column } = engine.search(board, depth, options)
    if (column === null) break
    board.applyMove(column)
  }

  let winner: Player | null = null
  if (board.isWin(PLAYER_ONE)) winner = PLAYER_ONE
  else if (board.isWin(PLAYER_TWO)) winner = PLAYER_TWO

  return { winner, moves: board.history() }
}

// Alternates which side opens: even games the shallow engine, odd games the deep one
export const playSeries = (
  shallow: number,
  deep: number,
  games: number
): SeriesResult => {
  const series: SeriesResult = { shallowWins: 0, deepWins: 0, draws: 0 }

  for (let game = 0; game < games; game++) {
    const deepPlayer: Player = game % 2 === 0 ? PLAYER_TWO : PLAYER_ONE
    const depths: [number, number] = deepPlayer === PLAYER_ONE
      ? [deep, shallow]
      : [shallow, deep]

    const { winner } = playMatch({ depths })
    if (winner === null) series.draws++
    else if (winner === deepPlayer) series.deepWins++
    else series.shallowWins++
  }

  return series
}

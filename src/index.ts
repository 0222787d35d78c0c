export { Board } from './game/board'
export { InvalidMoveError, EmptyHistoryError } from './game/errors'
export type { MoveRejectReason } from './game/errors'
export {
  COLS,
  ROWS,
  CELL_EMPTY,
  PLAYER_ONE,
  PLAYER_TWO,
  DIFFICULTY_LABELS,
  DIFFICULTY_DEPTHS,
  DEFAULT_DIFFICULTY,
  getSearchDepth,
  getDifficultyLabel,
} from './game/constants'
export type { Cell, Difficulty, Player, Position, WinningLine } from './game/types'
export { findWinningLine, otherPlayer, renderBoard } from './game/logic'
export { Search, bestMove, analyzeMoves } from './game/ai/search'
export { evaluate, terminalScore } from './game/ai/evaluator'
export { CENTER_FIRST, orderMoves } from './game/ai/movegen'
export { SCORE_WIN, SCORE_LOSS, SCORE_MATE, HEURISTIC_LIMIT } from './game/ai/types'
export type { MoveScore, SearchNode, SearchOptions, SearchResult } from './game/ai/types'
export { playMatch, playSeries } from './game/match'
export type { MatchOptions, MatchResult, SeriesResult } from './game/match'
export { runBenchmark } from './game/benchmark'
export type { BenchmarkOptions, BenchmarkReport } from './game/benchmark'

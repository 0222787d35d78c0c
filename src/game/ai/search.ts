import type { Board } from '../board'
import { evaluate, terminalScore } from './evaluator'
import { orderMoves } from './movegen'
import type { MoveScore, SearchNode, SearchOptions, SearchResult } from './types'
import { SCORE_MATE } from './types'

// The clock is sampled once every (mask + 1) nodes
const TIME_CHECK_MASK = 1023

const assertDepth = (depth: number): void => {
  if (!Number.isInteger(depth) || depth < 0) {
    throw new RangeError(`Search depth must be a non-negative integer, got ${depth}.`)
  }
}

export class Search {
  nodesVisited = 0
  startTime = 0
  timeLimit = Infinity
  nodeLimit = Infinity
  pruning = true
  abort = false

  search (
    board: Board,
    maxDepth: number,
    options: SearchOptions = {}
  ): SearchResult {
    assertDepth(maxDepth)
    this.reset(options)

    const captureTree = options.captureTree ?? false
    const player = board.currentPlayer

    const terminal = terminalScore(board, player, 0)
    if (terminal !== null) {
      return this.result(null, terminal, 0, captureTree ? { column: null, score: terminal, children: [] } : undefined)
    }

    // Static fallback, and the whole answer at depth 0
    if (maxDepth === 0) this.nodesVisited = 1
    let bestColumn = orderMoves(board)[0]
    let bestScore = evaluate(board, player)
    let completedDepth = 0
    let bestTree: SearchNode | undefined = captureTree
      ? { column: null, score: bestScore, children: [] }
      : undefined

    // Iterative Deepening
    for (let d = 1; d <= maxDepth; d++) {
      // Guarantee completion of Depth 1 by disabling budget abort
      const canAbort = d > 1
      const root: SearchNode | null = captureTree
        ? { column: null, score: 0, children: [] }
        : null

      const result = this.alphaBeta(board, d, -Infinity, Infinity, 0, canAbort, root)

      if (this.abort) break

      bestScore = result.score
      bestColumn = result.move
      completedDepth = d
      if (root) {
        root.score = result.score
        bestTree = root
      }

      if (options.debug) {
        console.debug(
          `[Search] depth ${d}: column ${result.move}, score ${result.score}, nodes ${this.nodesVisited}`
        )
      }

      if (result.score > SCORE_MATE) break
    }

    return this.result(bestColumn, bestScore, completedDepth, bestTree)
  }

  // Exact score of every root move, in search order
  analyze (board: Board, depth: number): MoveScore[] {
    assertDepth(depth)
    if (depth === 0) {
      throw new RangeError('Move analysis needs a depth of at least 1.')
    }
    this.reset({})

    if (terminalScore(board, board.currentPlayer, 0) !== null) return []

    return orderMoves(board).map((column) => ({
      column,
      score: this.searchChild(board, column, depth, -Infinity, Infinity, 0, false, null),
    }))
  }

  alphaBeta (
    board: Board,
    depth: number,
    alpha: number,
    beta: number,
    ply: number,
    canAbort: boolean,
    trace: SearchNode | null
  ): { score: number; move: number } {
    this.nodesVisited++
    if (canAbort && this.outOfBudget()) {
      this.abort = true
    }
    if (this.abort) return { score: 0, move: -1 }

    const player = board.currentPlayer
    const terminal = terminalScore(board, player, ply)
    if (terminal !== null) {
      return { score: terminal, move: -1 }
    }

    if (depth === 0) {
      return { score: evaluate(board, player), move: -1 }
    }

    let bestScore = -Infinity
    let bestMove = -1

    for (const move of orderMoves(board)) {
      const child: SearchNode | null = trace
        ? { column: move, score: 0, children: [] }
        : null

      const score = this.searchChild(board, move, depth, alpha, beta, ply, canAbort, child)

      if (this.abort) return { score: 0, move: -1 }

      if (trace && child) {
        child.score = score
        trace.children.push(child)
      }

      // Strict comparison: among equal scores the earliest ordered move stays
      if (score > bestScore) {
        bestScore = score
        bestMove = move
      }
      if (score > alpha) {
        alpha = score
      }
      if (this.pruning && alpha >= beta) break
    }

    return { score: bestScore, move: bestMove }
  }

  // Play, search the reply from the opponent's side, and take the move back on every path
  private searchChild (
    board: Board,
    move: number,
    depth: number,
    alpha: number,
    beta: number,
    ply: number,
    canAbort: boolean,
    trace: SearchNode | null
  ): number {
    board.applyMove(move)
    try {
      // Subtract from 0 so a drawn line scores +0 rather than -0
      return 0 - this.alphaBeta(board, depth - 1, -beta, -alpha, ply + 1, canAbort, trace).score
    } finally {
      board.undo()
    }
  }

  private outOfBudget (): boolean {
    if (this.nodesVisited > this.nodeLimit) return true
    if ((this.nodesVisited & TIME_CHECK_MASK) === 0) {
      return performance.now() - this.startTime > this.timeLimit
    }
    return false
  }

  private reset (options: SearchOptions): void {
    this.nodesVisited = 0
    this.startTime = performance.now()
    this.timeLimit = options.maxTime ?? Infinity
    this.nodeLimit = options.maxNodes ?? Infinity
    this.pruning = options.pruning ?? true
    this.abort = false
  }

  private result (
    column: number | null,
    score: number,
    depth: number,
    tree: SearchNode | undefined
  ): SearchResult {
    const result: SearchResult = {
      column,
      score,
      depth,
      nodes: this.nodesVisited,
      time: performance.now() - this.startTime,
    }
    if (tree) result.tree = tree
    return result
  }
}

export const bestMove = (
  board: Board,
  depth: number,
  options?: SearchOptions
): SearchResult => new Search().search(board, depth, options)

export const analyzeMoves = (board: Board, depth: number): MoveScore[] =>
  new Search().analyze(board, depth)

import { Search } from './ai/search'
import { Board } from './board'
import { getSearchDepth } from './constants'

export interface BenchmarkOptions {
  timeout?: number
  searchDepth?: number
  // Opening to search from, as a string of column digits
  moves?: string
}

export interface BenchmarkReport {
  targetDepth: number
  depth: number
  time: number
  nodes: number
  nps: number
  score: number
  column: number | null
}

const benchmarkEngine = new Search()

export const runBenchmark = (options: BenchmarkOptions): BenchmarkReport => {
  const { timeout, searchDepth, moves = '3' } = options

  const hasTimeout = timeout !== undefined
  const hasSearchDepth = searchDepth !== undefined

  if (hasTimeout === hasSearchDepth) {
    throw new Error(
      "Benchmark Error: Exactly one of 'timeout' or 'searchDepth' must be provided."
    )
  }

  const timeMs = timeout ?? 2147483647 // Max Int if not provided
  const targetDepth = searchDepth ?? getSearchDepth('Insane')

  console.log(`Starting Benchmark after opening "${moves}"...`)
  if (hasTimeout) {
    console.log(
      `Mode: Time Limit (${timeMs}ms). Max Search Depth: ${targetDepth}`
    )
  } else console.log(`Mode: Fixed Depth (${targetDepth}). Unlimited Time.`)

  const board = Board.fromMoves(moves)

  const start = performance.now()
  const result = benchmarkEngine.search(board, targetDepth, { maxTime: timeMs })
  const end = performance.now()

  const elapsed = end - start
  const nps = result.nodes > 0 && elapsed > 0 ? result.nodes / (elapsed / 1000) : 0

  console.table({
    'Target Search Depth': targetDepth,
    'Actual Depth Explored': result.depth,
    'Time (ms)': Math.round(elapsed),
    Nodes: result.nodes.toLocaleString(),
    NPS: Math.round(nps).toLocaleString(),
    'Best Column': result.column,
    'Best Score': result.score,
  })

  return {
    targetDepth,
    depth: result.depth,
    time: elapsed,
    nodes: result.nodes,
    nps,
    score: result.score,
    column: result.column,
  }
}

import { afterEach, describe, test, expect, vi } from 'vitest'
import { runBenchmark } from './benchmark'

afterEach(() => {
  vi.restoreAllMocks()
})

describe('runBenchmark', () => {
  test('needs exactly one of timeout and searchDepth', () => {
    expect(() => runBenchmark({})).toThrow(/Exactly one of 'timeout' or 'searchDepth'/)
    expect(() => runBenchmark({ timeout: 100, searchDepth: 2 })).toThrow(/Exactly one/)
  })

  test('reports a fixed-depth search', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const table = vi.spyOn(console, 'table').mockImplementation(() => {})

    const report = runBenchmark({ searchDepth: 3 })

    expect(report).toMatchObject({ targetDepth: 3, depth: 3, column: 3, score: 23 })
    expect(report.nodes).toBeGreaterThan(0)
    expect(log).toHaveBeenCalledWith('Mode: Fixed Depth (3). Unlimited Time.')
    expect(table).toHaveBeenCalledTimes(1)
  })

  test('searches from the given opening', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'table').mockImplementation(() => {})

    const report = runBenchmark({ searchDepth: 2, moves: '001122' })
    expect(report.column).toBe(3)
    expect(report.score).toBe(99999)
    // Forced win settles at depth 1
    expect(report.depth).toBe(1)
  })
})

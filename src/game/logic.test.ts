import { describe, test, expect } from 'vitest'
import { Board } from './board'
import { findWinningLine, inBounds, otherPlayer, renderBoard } from './logic'

describe('otherPlayer', () => {
  test('swaps the two players', () => {
    expect(otherPlayer(1)).toBe(2)
    expect(otherPlayer(2)).toBe(1)
  })
})

describe('inBounds', () => {
  test('accepts only cells on the 7x6 grid', () => {
    expect(inBounds(0, 0)).toBe(true)
    expect(inBounds(6, 5)).toBe(true)
    expect(inBounds(7, 0)).toBe(false)
    expect(inBounds(0, 6)).toBe(false)
    expect(inBounds(-1, 2)).toBe(false)
  })
})

describe('findWinningLine', () => {
  test('returns null while nobody has four', () => {
    expect(findWinningLine(new Board())).toBeNull()
    expect(findWinningLine(Board.fromMoves('001122'))).toBeNull()
  })

  test('returns the winner and the four cells', () => {
    expect(findWinningLine(Board.fromMoves('0011223'))).toEqual({
      player: 1,
      cells: [
        { column: 0, row: 0 },
        { column: 1, row: 0 },
        { column: 2, row: 0 },
        { column: 3, row: 0 },
      ],
    })
  })

  test('finds diagonal lines', () => {
    expect(findWinningLine(Board.fromMoves('01122323353'))?.cells).toEqual([
      { column: 0, row: 0 },
      { column: 1, row: 1 },
      { column: 2, row: 2 },
      { column: 3, row: 3 },
    ])
  })

  test('can be limited to one player', () => {
    const board = Board.fromMoves('0101010')
    expect(findWinningLine(board, 2)).toBeNull()
    expect(findWinningLine(board, 1)?.player).toBe(1)
  })
})

describe('renderBoard', () => {
  test('prints the top row first with a column footer', () => {
    expect(renderBoard(Board.fromMoves('33'))).toBe(
      [
        '. . . . . . .',
        '. . . . . . .',
        '. . . . . . .',
        '. . . . . . .',
        '. . . O . . .',
        '. . . X . . .',
        '0 1 2 3 4 5 6',
      ].join('\n')
    )
  })
})

export type MoveRejectReason = 'out_of_range' | 'column_full'

export class InvalidMoveError extends Error {
  column: number
  reason: MoveRejectReason

  constructor (column: number, reason: MoveRejectReason) {
    super(
      reason === 'column_full'
        ? `Column ${column} is full.`
        : `Column ${column} is not a column index between 0 and 6.`
    )
    this.name = 'InvalidMoveError'
    this.column = column
    this.reason = reason
  }
}

export class EmptyHistoryError extends Error {
  constructor () {
    super('There is no move to undo.')
    this.name = 'EmptyHistoryError'
  }
}

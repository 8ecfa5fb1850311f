import { CellIndexError } from '../errors.js'

/**
 * Resolves a cell index against a sequence of `length` cells.
 *
 * Valid indices are `-length` to `length - 1`; negative indices count from the end,
 * so `-1` is the last cell.
 *
 * @param index - Index as supplied by the caller
 * @param length - Number of cells
 * @returns Position in `0..length-1`
 * @throws CellIndexError When the index is not an integer or falls outside the valid range
 */
export function resolveIndex(index: number, length: number): number {
  if (!Number.isInteger(index) || index < -length || index >= length) {
    throw new CellIndexError(index, length)
  }
  return index < 0 ? length + index : index
}

/**
 * Resolves an insertion position. Unlike {@link resolveIndex}, `length` itself is valid
 * and means "append"; a negative position inserts before the cell it addresses.
 *
 * @throws CellIndexError When the position falls outside `-length..length`
 */
export function resolveInsertPosition(index: number, length: number): number {
  if (!Number.isInteger(index) || index < -length || index > length) {
    throw new CellIndexError(
      index,
      length,
      `Insert position ${index} out of range (valid range: ${-length} to ${length})`
    )
  }
  return index < 0 ? length + index : index
}

import { describe, it, expect } from 'vitest'
import { deleteCellsBatch, filterCells, insertCellsBatch, reorderCells, replaceCellsBatch } from '../batch.js'
import { CellIndexError, NotebookValueError } from '../../errors.js'
import { codeCells, createNotebook, sourcesOf } from '../../__fixtures__/notebook-helpers.js'

describe('replaceCellsBatch', () => {
  it('replaces every addressed cell', () => {
    const notebook = createNotebook(codeCells('a', 'b', 'c'))
    replaceCellsBatch(notebook, [
      { index: 0, content: 'A' },
      { index: -1, content: 'C' },
    ])
    expect(sourcesOf(notebook)).toEqual(['A', 'b', 'C'])
  })

  it('applies nothing when one index is out of range', () => {
    const notebook = createNotebook(codeCells('a', 'b'))
    expect(() =>
      replaceCellsBatch(notebook, [
        { index: 0, content: 'A' },
        { index: 2, content: 'X' },
      ])
    ).toThrow(CellIndexError)
    expect(sourcesOf(notebook)).toEqual(['a', 'b'])
  })
})

describe('deleteCellsBatch', () => {
  it('deletes by original indices', () => {
    const notebook = createNotebook(codeCells('a', 'b', 'c', 'd', 'e'))
    expect(deleteCellsBatch(notebook, [1, 3])).toBe(2)
    expect(sourcesOf(notebook)).toEqual(['a', 'c', 'e'])
  })

  it('gives the same result whatever order the indices are listed in', () => {
    const orders = [
      [0, 2, 4],
      [4, 2, 0],
      [2, 0, 4],
      [-1, 0, 2],
    ]
    for (const indices of orders) {
      const notebook = createNotebook(codeCells('a', 'b', 'c', 'd', 'e'))
      deleteCellsBatch(notebook, indices)
      expect(sourcesOf(notebook)).toEqual(['b', 'd'])
    }
  })

  it('deletes nothing when one index is out of range', () => {
    const notebook = createNotebook(codeCells('a', 'b', 'c'))
    expect(() => deleteCellsBatch(notebook, [0, 3])).toThrow(CellIndexError)
    expect(sourcesOf(notebook)).toEqual(['a', 'b', 'c'])
  })

  it('rejects two indices addressing the same cell', () => {
    const notebook = createNotebook(codeCells('a', 'b', 'c'))
    expect(() => deleteCellsBatch(notebook, [2, -1])).toThrow(
      'Duplicate cell index -1 (cell 2 is already being deleted)'
    )
    expect(sourcesOf(notebook)).toEqual(['a', 'b', 'c'])
  })

  it('accepts an empty list', () => {
    const notebook = createNotebook(codeCells('a'))
    expect(deleteCellsBatch(notebook, [])).toBe(0)
    expect(sourcesOf(notebook)).toEqual(['a'])
  })
})

describe('insertCellsBatch', () => {
  it('interprets each index after the previous insertions', () => {
    const notebook = createNotebook(codeCells('X'))
    insertCellsBatch(notebook, [
      { index: 0, content: 'A' },
      { index: 0, content: 'B' },
    ])
    expect(sourcesOf(notebook)).toEqual(['B', 'A', 'X'])
  })

  it('allows appending at the count grown by earlier insertions', () => {
    const notebook = createNotebook(codeCells('X'))
    expect(
      insertCellsBatch(notebook, [
        { index: 1, content: 'A' },
        { index: 2, content: 'B', cellType: 'markdown' },
      ])
    ).toBe(2)
    expect(sourcesOf(notebook)).toEqual(['X', 'A', 'B'])
    expect(notebook.cells.map((cell) => cell.cell_type)).toEqual(['code', 'code', 'markdown'])
  })

  it('checks every cell type before inserting anything', () => {
    const notebook = createNotebook(codeCells('X'))
    expect(() =>
      insertCellsBatch(notebook, [
        { index: 0, content: 'A' },
        { index: 0, content: 'B', cellType: 'chart' },
      ])
    ).toThrow(NotebookValueError)
    expect(sourcesOf(notebook)).toEqual(['X'])
  })

  it('throws when an index is out of range for the state it sees', () => {
    const notebook = createNotebook(codeCells('X'))
    expect(() =>
      insertCellsBatch(notebook, [
        { index: 1, content: 'A' },
        { index: 4, content: 'B' },
      ])
    ).toThrow('Insert position 4 out of range (valid range: -2 to 2)')
  })
})

describe('reorderCells', () => {
  it('puts the cell at newOrder[k] in position k', () => {
    const notebook = createNotebook(codeCells('a', 'b', 'c'))
    reorderCells(notebook, [2, 0, 1])
    expect(sourcesOf(notebook)).toEqual(['c', 'a', 'b'])
  })

  it('keeps cell identity when reordering', () => {
    const notebook = createNotebook(codeCells('a', 'b'))
    reorderCells(notebook, [1, 0])
    expect(notebook.cells.map((cell) => cell.id)).toEqual(['cell-1', 'cell-0'])
  })

  it.each([
    { order: [0, 1], message: 'Invalid new order: missing index 2' },
    { order: [0, 0, 1], message: 'Invalid new order: duplicate index 0' },
    { order: [0, 1, 3], message: 'Invalid new order: index 3 out of range (valid range: 0 to 2)' },
    { order: [0, -1, 2], message: 'Invalid new order: index -1 out of range (valid range: 0 to 2)' },
    { order: [0, 1, 2, 1], message: 'Invalid new order: duplicate index 1' },
  ])('rejects $order without changing the notebook', ({ order, message }) => {
    const notebook = createNotebook(codeCells('a', 'b', 'c'))
    expect(() => reorderCells(notebook, order)).toThrow(NotebookValueError)
    expect(() => reorderCells(notebook, order)).toThrow(message)
    expect(sourcesOf(notebook)).toEqual(['a', 'b', 'c'])
  })

  it('reports the lowest missing index', () => {
    const notebook = createNotebook(codeCells('a', 'b', 'c', 'd'))
    expect(() => reorderCells(notebook, [3, 2])).toThrow('Invalid new order: missing index 0')
  })
})

describe('filterCells', () => {
  const cells = () =>
    createNotebook([
      { type: 'code', source: 'a=1' },
      { type: 'markdown', source: '# Title' },
      { type: 'code', source: 'print(a)' },
    ])

  it('keeps cells of the given type in their original order', () => {
    const notebook = cells()
    expect(filterCells(notebook, 'code')).toEqual({ kept: 2, deleted: 1 })
    expect(sourcesOf(notebook)).toEqual(['a=1', 'print(a)'])
    expect(notebook.cells.every((cell) => cell.cell_type === 'code')).toBe(true)
  })

  it('keeps cells matching both type and pattern', () => {
    const notebook = cells()
    expect(filterCells(notebook, 'code', 'print')).toEqual({ kept: 1, deleted: 2 })
    expect(sourcesOf(notebook)).toEqual(['print(a)'])
  })

  it('keeps every cell without criteria', () => {
    const notebook = cells()
    expect(filterCells(notebook)).toEqual({ kept: 3, deleted: 0 })
    expect(sourcesOf(notebook)).toEqual(['a=1', '# Title', 'print(a)'])
  })

  it('rejects an invalid pattern before removing anything', () => {
    const notebook = cells()
    expect(() => filterCells(notebook, undefined, '[')).toThrow(NotebookValueError)
    expect(notebook.cells).toHaveLength(3)
  })
})

import { describe, it, expect } from 'vitest'
import {
  appendCell,
  countOccurrences,
  createCell,
  deleteCell,
  getCell,
  insertCell,
  parseCellType,
  replaceCellSource,
  strReplaceInCell,
} from '../cells.js'
import { CellIndexError, NotebookValueError } from '../../errors.js'
import { codeCells, createNotebook, executedCell, sourcesOf } from '../../__fixtures__/notebook-helpers.js'

describe('getCell', () => {
  it('returns the cell at a positive or negative index', () => {
    const notebook = createNotebook(codeCells('a', 'b', 'c'))
    expect(getCell(notebook, 1).source).toBe('b')
    expect(getCell(notebook, -1).source).toBe('c')
  })

  it('throws CellIndexError out of range', () => {
    const notebook = createNotebook(codeCells('a'))
    expect(() => getCell(notebook, 1)).toThrow(CellIndexError)
  })
})

describe('parseCellType', () => {
  it('accepts the three cell types', () => {
    expect(parseCellType('code')).toBe('code')
    expect(parseCellType('markdown')).toBe('markdown')
    expect(parseCellType('raw')).toBe('raw')
  })

  it('rejects anything else', () => {
    expect(() => parseCellType('heading')).toThrow(NotebookValueError)
    expect(() => parseCellType('heading')).toThrow("Invalid cell type 'heading'. Must be one of: code, markdown, raw")
  })
})

describe('createCell', () => {
  it('creates a code cell without outputs', () => {
    const cell = createCell(createNotebook([]), 'code', 'x = 1')
    expect(cell).toMatchObject({ cell_type: 'code', source: 'x = 1', metadata: {}, outputs: [], execution_count: null })
  })

  it('generates an id for format 4.5 and later', () => {
    const cell = createCell(createNotebook([], { nbformatMinor: 5 }), 'markdown', '# Title')
    expect(cell.id).toMatch(/^[0-9a-f]{16}$/)
  })

  it('omits the id before format 4.5', () => {
    const cell = createCell(createNotebook([], { nbformatMinor: 4 }), 'raw', 'text')
    expect(cell).toEqual({ cell_type: 'raw', metadata: {}, source: 'text' })
  })
})

describe('replaceCellSource', () => {
  it('changes only the source', () => {
    const notebook = createNotebook([{ ...executedCell('old', 3), metadata: { tags: ['keep'] } }])
    replaceCellSource(notebook, 0, 'new')
    expect(notebook.cells[0]).toEqual({
      cell_type: 'code',
      id: 'cell-0',
      metadata: { tags: ['keep'] },
      source: 'new',
      outputs: [{ output_type: 'stream', name: 'stdout', text: ['out\n'] }],
      execution_count: 3,
    })
  })
})

describe('insertCell', () => {
  it('places the new cell at the index and shifts later cells', () => {
    const notebook = createNotebook(codeCells('a', 'b', 'c'))
    expect(insertCell(notebook, 1, 'new')).toBe(1)
    expect(sourcesOf(notebook)).toEqual(['a', 'new', 'b', 'c'])
  })

  it('appends when the index equals the cell count', () => {
    const notebook = createNotebook(codeCells('a', 'b'))
    expect(insertCell(notebook, 2, 'end', 'markdown')).toBe(2)
    expect(sourcesOf(notebook)).toEqual(['a', 'b', 'end'])
    expect(notebook.cells[2]?.cell_type).toBe('markdown')
  })

  it('inserts before the cell addressed by a negative index', () => {
    const notebook = createNotebook(codeCells('a', 'b', 'c'))
    expect(insertCell(notebook, -1, 'new')).toBe(2)
    expect(sourcesOf(notebook)).toEqual(['a', 'b', 'new', 'c'])
  })

  it('rejects an invalid cell type without changing the notebook', () => {
    const notebook = createNotebook(codeCells('a'))
    expect(() => insertCell(notebook, 0, 'x', 'script')).toThrow(NotebookValueError)
    expect(sourcesOf(notebook)).toEqual(['a'])
  })

  it('rejects a position past the end', () => {
    const notebook = createNotebook(codeCells('a'))
    expect(() => insertCell(notebook, 2, 'x')).toThrow(CellIndexError)
  })

  it('is undone by deleting the returned position', () => {
    const notebook = createNotebook(codeCells('a', 'b', 'c'))
    for (const index of [0, 2, 3, -2]) {
      const position = insertCell(notebook, index, 'temp')
      deleteCell(notebook, position)
      expect(sourcesOf(notebook)).toEqual(['a', 'b', 'c'])
    }
  })
})

describe('appendCell', () => {
  it('returns the index of the new last cell', () => {
    const notebook = createNotebook(codeCells('a', 'b'))
    expect(appendCell(notebook, 'c')).toBe(2)
    expect(getCell(notebook, -1).source).toBe('c')
  })

  it('appends to an empty notebook', () => {
    const notebook = createNotebook([])
    expect(appendCell(notebook, '# Notes', 'markdown')).toBe(0)
    expect(notebook.cells).toHaveLength(1)
  })
})

describe('deleteCell', () => {
  it('removes the cell and shifts later cells down', () => {
    const notebook = createNotebook(codeCells('a', 'b', 'c'))
    expect(deleteCell(notebook, 0).source).toBe('a')
    expect(sourcesOf(notebook)).toEqual(['b', 'c'])
  })

  it('deletes by negative index', () => {
    const notebook = createNotebook(codeCells('a', 'b', 'c'))
    deleteCell(notebook, -1)
    expect(sourcesOf(notebook)).toEqual(['a', 'b'])
  })
})

describe('strReplaceInCell', () => {
  it('replaces a unique occurrence', () => {
    const notebook = createNotebook(codeCells('x = 1\ny = 2'))
    strReplaceInCell(notebook, 0, 'y = 2', 'y = 3')
    expect(sourcesOf(notebook)).toEqual(['x = 1\ny = 3'])
  })

  it('inserts the replacement literally', () => {
    const notebook = createNotebook(codeCells('price = 1'))
    strReplaceInCell(notebook, 0, '1', '$& $1')
    expect(sourcesOf(notebook)).toEqual(['price = $& $1'])
  })

  it('fails when the text is absent', () => {
    const notebook = createNotebook(codeCells('x = 1'))
    expect(() => strReplaceInCell(notebook, 0, 'z', 'w')).toThrow('String not found in cell 0: "z"')
  })

  it('fails when the text occurs more than once', () => {
    const notebook = createNotebook(codeCells('a = a + 1'))
    expect(() => strReplaceInCell(notebook, 0, 'a', 'b')).toThrow(
      'Multiple matches (2) found in cell 0 for "a". Include more surrounding text to make the match unique.'
    )
    expect(sourcesOf(notebook)).toEqual(['a = a + 1'])
  })

  it('fails on empty old text', () => {
    const notebook = createNotebook(codeCells('x'))
    expect(() => strReplaceInCell(notebook, 0, '', 'y')).toThrow('old_str must not be empty')
  })

  it('checks the index first', () => {
    const notebook = createNotebook(codeCells('x'))
    expect(() => strReplaceInCell(notebook, 5, 'x', 'y')).toThrow(CellIndexError)
  })
})

describe('countOccurrences', () => {
  it('counts non-overlapping occurrences', () => {
    expect(countOccurrences('aaaa', 'aa')).toBe(2)
    expect(countOccurrences('abc', 'd')).toBe(0)
    expect(countOccurrences('a.b.c', '.')).toBe(2)
  })
})

/**
 * Tiled Affine Grid Tests
 *
 * Tiles that carry their own transforms, and the agreement between
 * tiling then transforming and transforming then tiling.
 */

import { describe, expect, it } from 'vitest'
import { OutOfBoundsError, createGrid } from '@rastergrid/grid'

const transform = [10, 0, 200000, 0, -10, 6100000] as const
const tileSize = { cols: 1024, rows: 1024 }

describe('TiledAffineGrid', () => {
  const base = createGrid(10247, 5123)
  const affineGrid = base.addTransform(transform)
  const tiled = affineGrid.tile(tileSize)

  describe('commutativity', () => {
    const transformedFirst = base.addTransform(transform).tile(tileSize)
    const tiledFirst = base.tile(tileSize).addTransform(transform)

    it('should build the same kind of grid in either order', () => {
      expect(transformedFirst.kind).toBe('tiledAffineGrid')
      expect(tiledFirst.kind).toBe('tiledAffineGrid')
      expect(transformedFirst.size).toEqual({ cols: 11, rows: 6 })
      expect(tiledFirst.size).toEqual({ cols: 11, rows: 6 })
    })

    it('should place every tile identically in either order', () => {
      for (const [col, row] of [
        [0, 0],
        [3, 2],
        [10, 5],
      ]) {
        const a = transformedFirst.tileAt(col, row)
        const b = tiledFirst.tileAt(col, row)

        expect(a.transform.equals(b.transform)).toBe(true)
        expect(a.size).toEqual(b.size)
        expect(a.cellAt(0, 0).origin.equals(b.cellAt(0, 0).origin)).toBe(true)
        expect(a.cellAt(0, 0).origin.equals(affineGrid.originOf(a.offset))).toBe(true)
      }
    })
  })

  describe('tile transforms', () => {
    it('should move the parent transform to the tile offset', () => {
      const tile = tiled.tileAt(3, 2)

      expect(tile.kind).toBe('affineTile')
      expect(tile.offset).toEqual({ col: 3072, row: 2048 })
      expect(tile.transform.coefficients).toEqual([10, 0, 230720, 0, -10, 6079520])
    })

    it('should agree with the base grid on every tile cell', () => {
      const cell = tiled.tileAt(3, 2).cellAt(5, 7)

      expect(cell.kind).toBe('affineTileCell')
      expect(cell.globalCol).toBe(3077)
      expect(cell.globalRow).toBe(2055)
      expect(cell.centroid.toArray()).toEqual([230775, 6079445])
      expect(cell.centroid.equals(affineGrid.centroidOf({ col: 3077, row: 2055 }))).toBe(true)
    })

    it('should resolve tile cells to base-grid cells', () => {
      const global = tiled.tileAt(3, 2).cellAt(5, 7).toGlobal()

      expect(global.kind).toBe('affineCell')
      expect(global.grid).toBe(affineGrid)
      expect(global.equals({ col: 3077, row: 2055 })).toBe(true)
    })
  })

  describe('tile footprints', () => {
    it('should span a full tile', () => {
      const tile = tiled.tileAt(3, 2)

      expect(tile.origin.toArray()).toEqual([230720, 6079520])
      expect(tile.antiorigin.toArray()).toEqual([240960, 6069280])
      expect(tile.bounds).toEqual({
        minX: 230720,
        minY: 6069280,
        maxX: 240960,
        maxY: 6079520,
      })
    })

    it('should stop truncated edge tiles at the grid edge', () => {
      const tile = tiled.tileAt(10, 5)

      expect(tile.isEdge).toBe(true)
      expect(tile.size).toEqual({ cols: 7, rows: 3 })
      expect(tile.origin.toArray()).toEqual([302400, 6048800])
      expect(tile.antiorigin.toArray()).toEqual([302470, 6048770])
      expect(
        tile.antiorigin.equals(affineGrid.antioriginOf({ col: 10246, row: 5122 })),
      ).toBe(true)
    })
  })

  describe('tile grid transform', () => {
    it('should scale the base transform by the nominal tile size', () => {
      expect(tiled.tileGridTransform.coefficients).toEqual([
        10240, 0, 200000, 0, -10240, 6100000,
      ])
    })

    it('should map tile addresses to tile origins', () => {
      expect(tiled.tileGridTransform.forward(3, 2)).toEqual(
        tiled.tileAt(3, 2).origin.toArray(),
      )
    })
  })

  describe('tileContaining', () => {
    const point = affineGrid.centroidOf({ col: 5000, row: 3000 })

    it('should find the tile holding a point', () => {
      const tile = tiled.tileContaining(point)

      expect([tile.col, tile.row]).toEqual([4, 2])
    })

    it('should find the tile holding a base-grid cell', () => {
      const tile = tiled.tileContaining({ col: 5000, row: 3000 })

      expect([tile.col, tile.row]).toEqual([4, 2])
    })

    it('should find the local cell inside the tile', () => {
      const cell = tiled.tileContaining(point).cellContaining(point)

      expect([cell.col, cell.row]).toEqual([904, 952])
      expect([cell.globalCol, cell.globalRow]).toEqual([5000, 3000])
    })

    it('should reject points off the grid', () => {
      expect(() => tiled.tileContaining({ x: 0, y: 0 })).toThrow(OutOfBoundsError)
    })
  })

  describe('whole-grid view', () => {
    it('should resolve points to base-grid cells', () => {
      const cell = tiled.cellContaining({ x: 250005, y: 6069995 })

      expect(cell.kind).toBe('affineCell')
      expect(cell.equals({ col: 5000, row: 3000 })).toBe(true)
    })

    it('should share the base transform and bounds', () => {
      expect(tiled.transform).toBe(affineGrid.transform)
      expect(tiled.bounds).toEqual(affineGrid.bounds)
    })
  })

  describe('tileInto', () => {
    it('should split a transformed grid into a tile grid', () => {
      const split = createGrid(10000, 5000).addTransform(transform).tileInto({ cols: 10, rows: 5 })

      expect(split.tileAt(9, 4).origin.toArray()).toEqual([290000, 6060000])
    })
  })

  describe('tile cells', () => {
    it('should find the tile of a tile cell by its global position', () => {
      const tile = tiled.tileContaining(tiled.tileAt(3, 2).cellAt(5, 7))

      expect([tile.col, tile.row]).toEqual([3, 2])
    })
  })
})

describe('TiledAffineGrid with a fractional transform', () => {
  const base = createGrid(300, 300)
  const fine = [0.1, 0, 500000.05, 0, -0.1, 4000000.3] as const
  const grid = base.addTransform(fine)
  const tiled = grid.tile({ cols: 7, rows: 7 })
  const sampleTiles = [
    [0, 0],
    [5, 5],
    [42, 0],
    [42, 42],
  ]

  it('should give tile cells exactly the points of their global cells', () => {
    let misses = 0

    for (const [col, row] of sampleTiles) {
      for (const cell of tiled.tileAt(col, row).cells()) {
        const global = { col: cell.globalCol, row: cell.globalRow }

        if (
          !cell.origin.equals(grid.originOf(global)) ||
          !cell.centroid.equals(grid.centroidOf(global)) ||
          !cell.antiorigin.equals(grid.antioriginOf(global))
        ) {
          misses++
        }
      }
    }

    expect(misses).toBe(0)
  })

  it('should resolve global origins to the matching local cell', () => {
    let misses = 0

    for (const [col, row] of sampleTiles) {
      const tile = tiled.tileAt(col, row)
      for (const cell of tile.cells()) {
        const origin = grid.originOf({ col: cell.globalCol, row: cell.globalRow })
        if (!tile.cellContaining(origin).equals(cell)) misses++
      }
    }

    expect(misses).toBe(0)
  })

  it('should map local grid coordinates like the parent', () => {
    const tile = tiled.tileAt(5, 5)

    expect(tile.toModel(2, 3).equals(grid.toModel(37, 38))).toBe(true)
    expect(tile.originOf({ col: 2, row: 3 }).equals(grid.originOf({ col: 37, row: 38 }))).toBe(
      true,
    )
  })

  it('should reject points on the far side of the tile edge', () => {
    const tile = tiled.tileAt(5, 5)

    expect(() => tile.cellContaining(grid.originOf({ col: 42, row: 35 }))).toThrow(
      OutOfBoundsError,
    )
    expect(() => tile.cellContaining(grid.originOf({ col: 0, row: 0 }))).toThrow(
      OutOfBoundsError,
    )

    const next = tiled.tileContaining(grid.originOf({ col: 42, row: 35 }))
    expect([next.col, next.row]).toEqual([6, 5])
  })

  it('should agree cell for cell whichever order it was built in', () => {
    const tiledFirst = base.tile({ cols: 7, rows: 7 }).addTransform(fine)
    let misses = 0

    for (const [col, row] of sampleTiles) {
      const a = tiled.tileAt(col, row)
      const b = tiledFirst.tileAt(col, row)

      for (const cell of a.cells()) {
        const other = b.cellAt(cell.col, cell.row)
        if (!cell.origin.equals(other.origin) || !cell.centroid.equals(other.centroid)) {
          misses++
        }
      }
    }

    expect(misses).toBe(0)
  })
})


import { describe, expect, it } from 'vitest'
import {
  DegenerateTransformError,
  InvalidTransformError,
  createAffine,
  fromGdal,
  identity,
  isAffine,
  scale,
  toAffine,
  translation,
  validateAffineCoefficients,
} from '@rastergrid/affine'
import type { AffineTransform } from '@rastergrid/affine'

describe('createAffine', () => {
  const transform = createAffine([10, 0, 200000, 0, -10, 6100000])

  describe('construction', () => {
    it('should expose the six coefficients', () => {
      expect(transform.a).toBe(10)
      expect(transform.b).toBe(0)
      expect(transform.c).toBe(200000)
      expect(transform.d).toBe(0)
      expect(transform.e).toBe(-10)
      expect(transform.f).toBe(6100000)
      expect(transform.coefficients).toEqual([10, 0, 200000, 0, -10, 6100000])
    })

    it('should be frozen', () => {
      expect(Object.isFrozen(transform)).toBe(true)
    })

    it('should reject a short coefficient list', () => {
      expect(() => createAffine([1, 2, 3])).toThrow(InvalidTransformError)
    })

    it('should validate coefficient lists without throwing', () => {
      expect(validateAffineCoefficients([1, 0, 0, 0, 1, 0]).success).toBe(true)
      expect(validateAffineCoefficients([1, 0, 0]).success).toBe(false)
      expect(validateAffineCoefficients('identity').success).toBe(false)
    })

    it('should reject non-finite coefficients', () => {
      expect(() => createAffine([1, 0, 0, 0, Number.NaN, 0])).toThrow(
        InvalidTransformError,
      )
      expect(() => createAffine([1, 0, Infinity, 0, 1, 0])).toThrow(
        InvalidTransformError,
      )
    })
  })

  describe('mapping', () => {
    it('should map grid corners forward', () => {
      expect(transform.forward(0, 0)).toEqual([200000, 6100000])
      expect(transform.forward(1, 1)).toEqual([200010, 6099990])
    })

    it('should map model coordinates back to fractional grid coordinates', () => {
      expect(transform.inverse(200005, 6099995)).toEqual([0.5, 0.5])
    })

    it('should round-trip integral corners exactly', () => {
      const [x, y] = transform.forward(4321, 1234)
      expect(transform.inverse(x, y)).toEqual([4321, 1234])
    })
  })

  describe('properties', () => {
    it('should compute the determinant', () => {
      expect(transform.determinant).toBe(-100)
      expect(transform.isDegenerate).toBe(false)
    })

    it('should detect rectilinear transforms', () => {
      expect(transform.isRectilinear).toBe(true)
      expect(createAffine([0, 1, 0, 1, 0, 0]).isRectilinear).toBe(true)
      expect(createAffine([1, 0.5, 0, 0.5, 1, 0]).isRectilinear).toBe(false)
    })
  })

  describe('derived transforms', () => {
    it('should translate the grid origin', () => {
      const moved = transform.translate(1000, 500)
      expect(moved.coefficients).toEqual([10, 0, 210000, 0, -10, 6095000])
      expect(moved.forward(0, 0)).toEqual(transform.forward(1000, 500))
    })

    it('should compose with the right-hand transform applied first', () => {
      const composed = translation(5, 7).compose(scale(2))
      expect(composed.coefficients).toEqual([2, 0, 5, 0, 2, 7])
      expect(composed.forward(1, 1)).toEqual([7, 9])
    })

    it('should invert', () => {
      const inverted = createAffine([2, 0, 10, 0, 4, 20]).invert()
      expect(inverted.forward(12, 24)).toEqual([1, 1])
    })

    it('should compose with its inverse to identity', () => {
      const roundTrip = transform.compose(transform.invert())
      expect(roundTrip.a).toBeCloseTo(1, 12)
      expect(roundTrip.e).toBeCloseTo(1, 12)
      expect(roundTrip.c).toBeCloseTo(0, 6)
      expect(roundTrip.f).toBeCloseTo(0, 6)
    })
  })

  describe('degenerate transforms', () => {
    const degenerate = createAffine([1, 2, 0, 2, 4, 0])

    it('should flag a zero determinant', () => {
      expect(degenerate.determinant).toBe(0)
      expect(degenerate.isDegenerate).toBe(true)
    })

    it('should still map forward', () => {
      expect(degenerate.forward(1, 1)).toEqual([3, 6])
    })

    it('should refuse to map backward', () => {
      expect(() => degenerate.inverse(3, 6)).toThrow(DegenerateTransformError)
      expect(() => degenerate.invert()).toThrow(DegenerateTransformError)
    })
  })

  describe('equality', () => {
    it('should compare coefficients exactly', () => {
      expect(transform.equals(createAffine([10, 0, 200000, 0, -10, 6100000]))).toBe(true)
      expect(transform.equals(identity())).toBe(false)
    })
  })
})

describe('GDAL geotransforms', () => {
  it('should convert to GDAL ordering', () => {
    const transform = createAffine([10, 0, 200000, 0, -10, 6100000])
    expect(transform.toGdal()).toEqual([200000, 10, 0, 6100000, 0, -10])
  })

  it('should build from GDAL ordering', () => {
    const transform = fromGdal([200000, 10, 0, 6100000, 0, -10])
    expect(transform.coefficients).toEqual([10, 0, 200000, 0, -10, 6100000])
  })

  it('should reject geotransforms of the wrong length', () => {
    expect(() => fromGdal([1, 2, 3, 4])).toThrow(InvalidTransformError)
  })
})

describe('toAffine', () => {
  it('should return transforms built by createAffine unchanged', () => {
    const transform = scale(3)
    expect(toAffine(transform)).toBe(transform)
  })

  it('should accept coefficient tuples', () => {
    expect(toAffine([1, 0, 0, 0, 1, 0]).equals(identity())).toBe(true)
  })

  it('should adopt foreign transform implementations by their coefficients', () => {
    const foreign: AffineTransform = {
      a: 2,
      b: 0,
      c: 1,
      d: 0,
      e: 2,
      f: 1,
      forward: (col, row) => [2 * col + 1, 2 * row + 1],
      inverse: (x, y) => [(x - 1) / 2, (y - 1) / 2],
    }

    expect(isAffine(foreign)).toBe(false)

    const adopted = toAffine(foreign)
    expect(isAffine(adopted)).toBe(true)
    expect(adopted.coefficients).toEqual([2, 0, 1, 0, 2, 1])
  })
})

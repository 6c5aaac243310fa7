import { describe, expect, it } from 'vitest'
import {
  bipolarFloatRange,
  defaultNormalParam,
  floatRange,
  freqRange,
  intRange,
  logDbRange,
  mapToNormal,
  normalParam,
  snapped,
  unmapToValue,
} from './range'

describe('float range', () => {
  const range = bipolarFloatRange()

  it('maps the ends and the midpoint', () => {
    expect(unmapToValue(range, 0)).toBe(-1)
    expect(unmapToValue(range, 1)).toBe(1)
    expect(unmapToValue(range, 0.5)).toBe(0)
    expect(unmapToValue(range, 0.25)).toBe(-0.5)
  })

  it('maps values back to normals and clamps outside values', () => {
    expect(mapToNormal(range, 0)).toBe(0.5)
    expect(mapToNormal(range, 0.5)).toBe(0.75)
    expect(mapToNormal(range, -3)).toBe(0)
    expect(mapToNormal(range, 5)).toBe(1)
  })

  it('rejects an empty span', () => {
    expect(() => floatRange(1, 1)).toThrow(RangeError)
  })

  it('is frozen', () => {
    expect(Object.isFrozen(range)).toBe(true)
  })
})

describe('int range', () => {
  const range = intRange(0, 10)

  it('rounds to whole steps', () => {
    expect(unmapToValue(range, 0)).toBe(0)
    expect(unmapToValue(range, 0.44)).toBe(4)
    expect(unmapToValue(range, 0.56)).toBe(6)
    expect(unmapToValue(range, 1)).toBe(10)
  })

  it('snaps every value of a step interval to the same normal', () => {
    for (const normal of [0.45, 0.47, 0.5, 0.53, 0.549]) {
      expect(snapped(range, normal)).toBe(0.5)
    }
    expect(snapped(range, 0.56)).toBe(0.6)
  })

  it('rounds a step edge up', () => {
    expect(snapped(intRange(0, 4), 0.125)).toBe(0.25)
  })

  it('leaves snapped values where they are', () => {
    for (let step = 0; step <= 10; step++) {
      const normal = snapped(range, step / 10)
      expect(normal).toBe(step / 10)
      expect(snapped(range, normal)).toBe(normal)
    }
  })

  it('rejects fractional bounds', () => {
    expect(() => intRange(0.5, 3)).toThrow(RangeError)
  })
})

describe('log dB range', () => {
  const range = logDbRange(-12, 12, 0.5)

  it('puts 0 dB at the zero position', () => {
    expect(unmapToValue(range, 0.5)).toBe(0)
    expect(mapToNormal(range, 0)).toBe(0.5)
  })

  it('follows a square curve on both sides', () => {
    expect(unmapToValue(range, 0)).toBe(-12)
    expect(unmapToValue(range, 0.25)).toBe(-3)
    expect(unmapToValue(range, 0.75)).toBe(3)
    expect(unmapToValue(range, 1)).toBe(12)
  })

  it('moves faster away from the center', () => {
    const first = unmapToValue(range, 0.625) - unmapToValue(range, 0.5)
    const second = unmapToValue(range, 0.75) - unmapToValue(range, 0.625)
    const third = unmapToValue(range, 0.875) - unmapToValue(range, 0.75)
    expect(first).toBe(0.75)
    expect(second).toBe(2.25)
    expect(third).toBe(3.75)
  })

  it('maps values back to normals', () => {
    expect(mapToNormal(range, 3)).toBe(0.75)
    expect(mapToNormal(range, -3)).toBe(0.25)
    expect(mapToNormal(range, -40)).toBe(0)
    expect(mapToNormal(range, 40)).toBe(1)
  })

  it('pins the zero position when 0 dB is an end', () => {
    expect(logDbRange(0, 12, 0.5).zeroPosition).toBe(0)
    expect(logDbRange(-12, 0, 0.5).zeroPosition).toBe(1)
  })

  it('rejects ranges without 0 dB', () => {
    expect(() => logDbRange(3, 12, 0.5)).toThrow(RangeError)
    expect(() => logDbRange(-12, 12, 1.5)).toThrow(RangeError)
  })
})

describe('frequency range', () => {
  const range = freqRange()

  it('spans 10 octaves from 20 Hz', () => {
    expect(range.octaves).toBe(10)
    expect(unmapToValue(range, 0)).toBe(20)
    expect(unmapToValue(range, 0.5)).toBe(640)
    expect(unmapToValue(range, 1)).toBe(20480)
  })

  it('gives each tenth of the travel one octave', () => {
    for (let step = 0; step < 10; step++) {
      const low = unmapToValue(range, step / 10)
      const high = unmapToValue(range, (step + 1) / 10)
      expect(high / low).toBeCloseTo(2, 10)
    }
  })

  it('maps frequencies back to normals', () => {
    expect(mapToNormal(range, 1000)).toBeCloseTo(Math.log2(50) / 10, 12)
    expect(mapToNormal(range, 40)).toBeCloseTo(0.1, 12)
    expect(mapToNormal(range, 10)).toBe(0)
    expect(mapToNormal(range, 30000)).toBe(1)
  })

  it('rejects a non-positive minimum', () => {
    expect(() => freqRange(0, 100)).toThrow(RangeError)
  })
})

describe('round trips', () => {
  const grid = Array.from({ length: 21 }, (_, i) => i / 20)

  it('maps float values back to their normals', () => {
    const range = bipolarFloatRange()
    for (const normal of grid) {
      expect(mapToNormal(range, unmapToValue(range, normal))).toBeCloseTo(normal, 12)
    }
  })

  it('maps int values back to the snapped normals', () => {
    const range = intRange(0, 10)
    for (const normal of grid) {
      expect(mapToNormal(range, unmapToValue(range, normal))).toBeCloseTo(Math.round(normal * 10) / 10, 12)
    }
  })

  it('maps dB values back to their normals', () => {
    const range = logDbRange(-12, 12, 0.5)
    for (const normal of grid) {
      expect(mapToNormal(range, unmapToValue(range, normal))).toBeCloseTo(normal, 10)
    }
  })

  it('maps frequencies back to their normals', () => {
    const range = freqRange()
    for (const normal of grid) {
      expect(mapToNormal(range, unmapToValue(range, normal))).toBeCloseTo(normal, 10)
    }
  })
})

describe('normal params', () => {
  it('converts value and default through the range', () => {
    expect(normalParam(intRange(0, 10), 5, 2)).toEqual({ value: 0.5, default: 0.2 })
  })

  it('starts each range at its natural default', () => {
    expect(defaultNormalParam(bipolarFloatRange())).toEqual({ value: 0.5, default: 0.5 })
    expect(defaultNormalParam(logDbRange(-12, 12, 0.5))).toEqual({ value: 0.5, default: 0.5 })
    expect(defaultNormalParam(intRange(2, 6))).toEqual({ value: 0, default: 0 })
    expect(defaultNormalParam(freqRange()).value).toBeCloseTo(Math.log2(50) / 10, 12)
  })
})

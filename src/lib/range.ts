import type { Normal, NormalParam } from '../types'
import { DEFAULT_FREQ, FREQ_MAX, FREQ_MIN } from '../constants'

export type FloatRange = {
  readonly kind: 'float'
  readonly min: number
  readonly max: number
}

export type IntRange = {
  readonly kind: 'int'
  readonly min: number
  readonly max: number
}

export type LogDbRange = {
  readonly kind: 'logDb'
  readonly min: number // dB, <= 0
  readonly max: number // dB, >= 0
  readonly zeroPosition: Normal // where 0 dB sits on the widget
}

export type FreqRange = {
  readonly kind: 'freq'
  readonly min: number // Hz
  readonly max: number // Hz
  readonly octaves: number
}

export type Range = FloatRange | IntRange | LogDbRange | FreqRange

export const clampNormal = (normal: number): Normal => Math.min(Math.max(normal, 0), 1)

const assertSpan = (min: number, max: number) => {
  if (!(max > min)) {
    throw new RangeError(`Invalid range: max (${max}) must be greater than min (${min})`)
  }
}

export function floatRange(min: number, max: number): FloatRange {
  assertSpan(min, max)
  return Object.freeze<FloatRange>({ kind: 'float', min, max })
}

export function bipolarFloatRange(): FloatRange {
  return floatRange(-1, 1)
}

export function intRange(min: number, max: number): IntRange {
  if (!Number.isInteger(min) || !Number.isInteger(max)) {
    throw new RangeError(`Invalid int range: bounds must be integers (got ${min}, ${max})`)
  }
  assertSpan(min, max)
  return Object.freeze<IntRange>({ kind: 'int', min, max })
}

/**
 * Decibel range with a square-law curve on each side of 0 dB, so the widget
 * moves through values near `zeroPosition` more slowly than values near the
 * ends. `zeroPosition` is forced to 0 when `min` is 0 dB and to 1 when `max`
 * is 0 dB.
 */
export function logDbRange(min: number, max: number, zeroPosition: Normal): LogDbRange {
  assertSpan(min, max)
  if (min > 0 || max < 0) {
    throw new RangeError(`Invalid dB range: [${min}, ${max}] must contain 0 dB`)
  }
  if (zeroPosition < 0 || zeroPosition > 1) {
    throw new RangeError(`Invalid dB range: zero position ${zeroPosition} is outside 0..1`)
  }
  const position = min === 0 ? 0 : max === 0 ? 1 : zeroPosition
  return Object.freeze<LogDbRange>({ kind: 'logDb', min, max, zeroPosition: position })
}

/**
 * Frequency range where every octave takes the same share of the widget.
 * The default spans the 10 octaves from 20 Hz to 20480 Hz.
 */
export function freqRange(min = FREQ_MIN, max = FREQ_MAX): FreqRange {
  if (!(min > 0)) {
    throw new RangeError(`Invalid frequency range: min (${min}) must be positive`)
  }
  assertSpan(min, max)
  return Object.freeze<FreqRange>({ kind: 'freq', min, max, octaves: Math.log2(max / min) })
}

export function unmapToValue(range: Range, normal: Normal): number {
  switch (range.kind) {
    case 'float':
      return normal * (range.max - range.min) + range.min
    case 'int':
      // Math.round: a normal on a step edge goes to the upper step
      return Math.round(normal * (range.max - range.min)) + range.min
    case 'logDb': {
      const zero = range.zeroPosition
      if (normal === zero) return 0
      if (normal < zero) {
        const below = 1 - normal / zero
        return below * below * range.min
      }
      const above = (normal - zero) / (1 - zero)
      return above * above * range.max
    }
    case 'freq':
      return range.min * Math.pow(2, normal * range.octaves)
  }
}

export function mapToNormal(range: Range, value: number): Normal {
  switch (range.kind) {
    case 'float':
    case 'int':
      if (value <= range.min) return 0
      if (value >= range.max) return 1
      return (value - range.min) / (range.max - range.min)
    case 'logDb': {
      const zero = range.zeroPosition
      if (value === 0) return zero
      if (value < 0) {
        if (value <= range.min) return 0
        return (1 - Math.sqrt(value / range.min)) * zero
      }
      if (value >= range.max) return 1
      return Math.sqrt(value / range.max) * (1 - zero) + zero
    }
    case 'freq':
      if (value <= range.min) return 0
      if (value >= range.max) return 1
      return Math.log2(value / range.min) / range.octaves
  }
}

// Moves a normal onto the nearest position that maps to a whole step
export function snapped(range: IntRange, normal: Normal): Normal {
  return mapToNormal(range, unmapToValue(range, normal))
}

export function normalParam(range: Range, value: number, defaultValue: number): NormalParam {
  return {
    value: mapToNormal(range, value),
    default: mapToNormal(range, defaultValue),
  }
}

const naturalDefault = (range: Range) => {
  switch (range.kind) {
    case 'float':
    case 'int':
      return Math.min(Math.max(0, range.min), range.max)
    case 'logDb':
      return 0
    case 'freq':
      return Math.min(Math.max(DEFAULT_FREQ, range.min), range.max)
  }
}

export function defaultNormalParam(range: Range): NormalParam {
  const value = naturalDefault(range)
  return normalParam(range, value, value)
}

import type { Normal } from '../types'

// Visual weight of a mark, 'one' is the most prominent
export type TickTier = 'one' | 'two' | 'three'

export type TickMark = {
  position: Normal
  tier: TickTier
}

export type TickMarkGroup = readonly TickMark[]

export function centerTickMarks(tier: TickTier): TickMarkGroup {
  return Object.freeze([{ position: 0.5, tier }])
}

export function minMaxAndCenterTickMarks(minMaxTier: TickTier, centerTier: TickTier): TickMarkGroup {
  return Object.freeze([
    { position: 0, tier: minMaxTier },
    { position: 0.5, tier: centerTier },
    { position: 1, tier: minMaxTier },
  ])
}

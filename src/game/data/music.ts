import type { EnemyKind } from './types'

export type MelodyId = 'normal' | 'knife' | 'holyWater' | 'magicBlade' | 'sacredFlame'

export type RhythmId = 'normal' | 'intense' | 'boss'

export const BASE_BPM = 120

export const MelodyPatterns: Record<MelodyId, readonly number[]> = {
  normal: [0, 4, 7, 4],
  knife: [0, 4, 7, 11],
  holyWater: [0, 3, 7, 10],
  magicBlade: [0, 4, 8, 11],
  sacredFlame: [0, 3, 6, 9],
}

export const RhythmPatterns: Record<RhythmId, readonly number[]> = {
  normal: [0, 2],
  intense: [0, 1, 2, 3],
  boss: [0, 1, 1, 2, 2, 3],
}

/** Highest priority first: the first kind present picks the melody. */
export const MelodyPriority: ReadonlyArray<{ kind: EnemyKind; melody: MelodyId }> = [
  { kind: 'ghost', melody: 'holyWater' },
  { kind: 'skeleton', melody: 'sacredFlame' },
  { kind: 'bat', melody: 'magicBlade' },
  { kind: 'zombie', melody: 'knife' },
]

export const Instruments: Record<EnemyKind, number> = {
  zombie: 0,
  bat: 1,
  ghost: 2,
  skeleton: 3,
}

export const InstrumentNames = ['bass', 'lead', 'pad', 'drum'] as const

export const RHYTHM_THRESHOLDS = {
  intense: 15,
  boss: 30,
}

export const MusicChannels = {
  melody: 0,
  rhythm: 1,
  ambient: 2,
} as const

export const AMBIENT_INTERVAL_TICKS = 120
export const AMBIENT_VARIANTS = 3

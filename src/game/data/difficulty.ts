import type { DifficultyScaling, SpawnWeight } from './types'

export const Difficulty: DifficultyScaling = {
  initialSpawnInterval: 30,
  minSpawnInterval: 10,
  spawnIntervalReductionPerMinute: 2,
  hpIncreasePerMinute: 0.1,
  speedIncreasePerMinute: 0.05,
  expIncreasePerMinute: 0.2,
}

export const SpawnTable: SpawnWeight[] = [
  { kind: 'zombie', weight: 50 },
  { kind: 'bat', weight: 20 },
  { kind: 'skeleton', weight: 15 },
  { kind: 'ghost', weight: 15 },
]

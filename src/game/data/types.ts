import type { ColorIndex } from '../constants/palette'

export type EnemyKind = 'zombie' | 'bat' | 'ghost' | 'skeleton'

export type WeaponKind = 'knife' | 'magicBlade' | 'holyWater' | 'sacredFlame'

export type PassiveSkillKind = 'speedUp' | 'attackSpeed' | 'hpRegen'

export type LevelUpOptionId =
  | 'knifeLevelUp'
  | 'holyWaterAdd'
  | 'holyWaterLevelUp'
  | 'hpUp'
  | 'speedUp'
  | 'attackSpeed'
  | 'hpRegen'

export type EnemyBehaviorConfig =
  | { type: 'chase' }
  | { type: 'circle'; radius: number; angularSpeed: number }
  | { type: 'teleport'; cooldown: number; minDistance: number; maxDistance: number }
  | { type: 'zigzag'; width: number; phaseSpeed: number }

export type EnemyBehaviorType = EnemyBehaviorConfig['type']

export interface EnemyDefinition {
  kind: EnemyKind
  label: string
  hp: number
  speed: number
  exp: number
  color: ColorIndex
  behavior: EnemyBehaviorConfig
}

/**
 * How an attack turns overlap into damage.
 * `contact` hits every overlapping enemy on every tick, `pulse` hits on the
 * first tick and then deals `dotDamage` every `interval` ticks.
 */
export type AttackDamageRule = { type: 'contact' } | { type: 'pulse'; interval: number; dotDamage: number }

export type AttackMotion = { type: 'projectile'; speed: number } | { type: 'area' }

export interface WeaponDefinition {
  kind: WeaponKind
  label: string
  baseDamage: number
  damagePerLevel: number
  baseRange: number
  rangePerLevel: number
  baseCooldown: number
  cooldownPerLevel: number
  minCooldown: number
  attackLifetime: number
  motion: AttackMotion
  damageRule: AttackDamageRule
}

export interface WeaponEvolution {
  level: number
  evolveTo: WeaponKind
  description: string
}

export interface PassiveSkillDefinition {
  kind: PassiveSkillKind
  label: string
  bonusPerLevel: number
  maxOfferedLevel: number
}

export interface SpawnWeight {
  kind: EnemyKind
  weight: number
}

export interface DifficultyScaling {
  initialSpawnInterval: number
  minSpawnInterval: number
  spawnIntervalReductionPerMinute: number
  hpIncreasePerMinute: number
  speedIncreasePerMinute: number
  expIncreasePerMinute: number
}

import { getWeaponDefinition, WeaponEvolutions } from '../data/weapons'
import type { WeaponKind } from '../data/types'

export interface WeaponStats {
  kind: WeaponKind
  level: number
  damage: number
  range: number
  maxCooldown: number
}

export function computeWeaponStats(kind: WeaponKind, level: number): WeaponStats {
  const definition = getWeaponDefinition(kind)
  const steps = Math.max(0, level - 1)
  return {
    kind,
    level,
    damage: definition.baseDamage + steps * definition.damagePerLevel,
    range: definition.baseRange + steps * definition.rangePerLevel,
    maxCooldown: Math.max(definition.minCooldown, definition.baseCooldown - steps * definition.cooldownPerLevel),
  }
}

/** Frames to wait after firing; the attack speed bonus shortens the full cooldown. */
export function scaleCooldown(maxCooldown: number, attackSpeedBonus: number) {
  return Math.max(0, Math.trunc(maxCooldown * (1 - attackSpeedBonus)))
}

export function getEvolutionTarget(kind: WeaponKind, level: number): WeaponKind | undefined {
  const evolution = WeaponEvolutions[kind]
  if (!evolution || level < evolution.level) {
    return undefined
  }
  return evolution.evolveTo
}

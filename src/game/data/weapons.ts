import type { WeaponDefinition, WeaponEvolution, WeaponKind } from './types'

export const WeaponDefinitions: Record<WeaponKind, WeaponDefinition> = {
  knife: {
    kind: 'knife',
    label: 'Knife',
    baseDamage: 5,
    damagePerLevel: 2,
    baseRange: 12,
    rangePerLevel: 2,
    baseCooldown: 30,
    cooldownPerLevel: 2,
    minCooldown: 10,
    attackLifetime: 30,
    motion: { type: 'projectile', speed: 2 },
    damageRule: { type: 'contact' },
  },
  magicBlade: {
    kind: 'magicBlade',
    label: 'Magic Blade',
    baseDamage: 15,
    damagePerLevel: 3,
    baseRange: 24,
    rangePerLevel: 3,
    baseCooldown: 30,
    cooldownPerLevel: 2,
    minCooldown: 8,
    attackLifetime: 45,
    motion: { type: 'projectile', speed: 3 },
    damageRule: { type: 'contact' },
  },
  holyWater: {
    kind: 'holyWater',
    label: 'Holy Water',
    baseDamage: 10,
    damagePerLevel: 3,
    baseRange: 16,
    rangePerLevel: 2,
    baseCooldown: 30,
    cooldownPerLevel: 1,
    minCooldown: 15,
    attackLifetime: 30,
    motion: { type: 'area' },
    damageRule: { type: 'contact' },
  },
  sacredFlame: {
    kind: 'sacredFlame',
    label: 'Sacred Flame',
    baseDamage: 20,
    damagePerLevel: 4,
    baseRange: 24,
    rangePerLevel: 2,
    baseCooldown: 30,
    cooldownPerLevel: 1,
    minCooldown: 12,
    attackLifetime: 90,
    motion: { type: 'area' },
    damageRule: { type: 'pulse', interval: 15, dotDamage: 5 },
  },
}

export const WeaponEvolutions: Partial<Record<WeaponKind, WeaponEvolution>> = {
  knife: {
    level: 5,
    evolveTo: 'magicBlade',
    description: 'The knife becomes a magic blade with a much longer reach',
  },
  holyWater: {
    level: 5,
    evolveTo: 'sacredFlame',
    description: 'Holy water becomes a sacred flame that keeps burning',
  },
}

export function isWeaponKind(value: string): value is WeaponKind {
  return Object.prototype.hasOwnProperty.call(WeaponDefinitions, value)
}

export function getWeaponDefinition(kind: string): WeaponDefinition {
  if (!isWeaponKind(kind)) {
    throw new Error(`Unknown weapon kind: ${kind}`)
  }
  return WeaponDefinitions[kind]
}

import type { PassiveSkillDefinition, PassiveSkillKind } from './types'

export const PassiveSkillDefinitions: Record<PassiveSkillKind, PassiveSkillDefinition> = {
  // movement speed per level
  speedUp: { kind: 'speedUp', label: 'Speed Up', bonusPerLevel: 0.2, maxOfferedLevel: Number.POSITIVE_INFINITY },
  // fraction of weapon cooldown removed per level
  attackSpeed: { kind: 'attackSpeed', label: 'Attack Speed', bonusPerLevel: 0.1, maxOfferedLevel: 5 },
  // hp restored per tick per level
  hpRegen: { kind: 'hpRegen', label: 'HP Regen', bonusPerLevel: 0.1, maxOfferedLevel: 5 },
}

export function isPassiveSkillKind(value: string): value is PassiveSkillKind {
  return Object.prototype.hasOwnProperty.call(PassiveSkillDefinitions, value)
}

export function getPassiveSkillDefinition(kind: string): PassiveSkillDefinition {
  if (!isPassiveSkillKind(kind)) {
    throw new Error(`Unknown passive skill kind: ${kind}`)
  }
  return PassiveSkillDefinitions[kind]
}

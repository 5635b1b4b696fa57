import type { LevelUpOptionId } from './types'

export interface LevelUpOptionDefinition {
  id: LevelUpOptionId
  name: string
  description: string
}

export const LevelUpOptionDefinitions: Record<LevelUpOptionId, LevelUpOptionDefinition> = {
  knifeLevelUp: {
    id: 'knifeLevelUp',
    name: 'Knife +',
    description: 'Knife damage, range and fire rate up; at level 5 it becomes a Magic Blade',
  },
  holyWaterAdd: { id: 'holyWaterAdd', name: 'Holy Water', description: 'Drop pools of holy water' },
  holyWaterLevelUp: {
    id: 'holyWaterLevelUp',
    name: 'Holy Water +',
    description: 'Holy Water grows stronger; at level 5 it becomes Sacred Flame',
  },
  hpUp: { id: 'hpUp', name: 'Heal', description: 'Restore 50 HP' },
  speedUp: { id: 'speedUp', name: 'Speed Up', description: 'Move faster' },
  attackSpeed: { id: 'attackSpeed', name: 'Attack Speed', description: 'Weapons recover 10% faster' },
  hpRegen: { id: 'hpRegen', name: 'HP Regen', description: 'Slowly regenerate HP' },
}

export function isLevelUpOptionId(value: string): value is LevelUpOptionId {
  return Object.prototype.hasOwnProperty.call(LevelUpOptionDefinitions, value)
}

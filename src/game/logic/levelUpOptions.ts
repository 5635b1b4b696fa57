import { isLevelUpOptionId } from '../data/levelUpOptions'
import type { LevelUpOptionId } from '../data/types'
import type Player from '../entities/Player'
import { PLAYER_MAX_HP, PLAYER_MAX_SPEED } from './playerProgression'

export const MAX_LEVEL_UP_OPTIONS = 3
const HP_UP_AMOUNT = 50

// An evolved weapon stays on its line, so its upgrade keeps the original option.
function knifeLine(player: Player) {
  return player.findWeapon('knife') ?? player.findWeapon('magicBlade')
}

function holyWaterLine(player: Player) {
  return player.findWeapon('holyWater') ?? player.findWeapon('sacredFlame')
}

/** Candidates in priority order, cut to the first three. */
export function getLevelUpOptions(player: Player): LevelUpOptionId[] {
  const options: LevelUpOptionId[] = ['knifeLevelUp', holyWaterLine(player) ? 'holyWaterLevelUp' : 'holyWaterAdd']

  if (player.hp < PLAYER_MAX_HP) {
    options.push('hpUp')
  }
  if (player.speed < PLAYER_MAX_SPEED) {
    options.push('speedUp')
  }
  if (player.passiveSkills.get('attackSpeed')?.canBeOffered ?? true) {
    options.push('attackSpeed')
  }
  if (player.passiveSkills.get('hpRegen')?.canBeOffered ?? true) {
    options.push('hpRegen')
  }

  return options.slice(0, MAX_LEVEL_UP_OPTIONS)
}

export function applyLevelUpOption(player: Player, option: string) {
  if (!isLevelUpOptionId(option)) {
    throw new Error(`Unknown level-up option: ${option}`)
  }

  switch (option) {
    case 'knifeLevelUp':
      knifeLine(player)?.upgrade()
      break
    case 'holyWaterAdd':
      player.addWeapon('holyWater')
      break
    case 'holyWaterLevelUp':
      holyWaterLine(player)?.upgrade()
      break
    case 'hpUp':
      player.heal(HP_UP_AMOUNT)
      break
    case 'speedUp':
    case 'attackSpeed':
    case 'hpRegen':
      player.addPassiveSkill(option)
      break
  }
}

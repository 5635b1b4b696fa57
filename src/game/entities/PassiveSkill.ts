import { getPassiveSkillDefinition } from '../data/passiveSkills'
import type { PassiveSkillDefinition, PassiveSkillKind } from '../data/types'

export default class PassiveSkill {
  readonly kind: PassiveSkillKind

  private readonly definition: PassiveSkillDefinition

  level = 1

  constructor(kind: PassiveSkillKind) {
    this.definition = getPassiveSkillDefinition(kind)
    this.kind = kind
  }

  get bonus() {
    return this.definition.bonusPerLevel * this.level
  }

  /** Whether the level-up screen may still offer this skill. */
  get canBeOffered() {
    return this.level < this.definition.maxOfferedLevel
  }

  levelUp() {
    this.level += 1
  }
}

import type { WeaponKind } from '../data/types'
import { computeWeaponStats, getEvolutionTarget, scaleCooldown, type WeaponStats } from '../logic/weaponProgression'

export default class Weapon {
  private stats: WeaponStats

  /** Frames until the weapon can fire again. */
  cooldown = 0

  constructor(kind: WeaponKind, level = 1) {
    this.stats = computeWeaponStats(kind, level)
  }

  get kind() {
    return this.stats.kind
  }

  get level() {
    return this.stats.level
  }

  get damage() {
    return this.stats.damage
  }

  get range() {
    return this.stats.range
  }

  get maxCooldown() {
    return this.stats.maxCooldown
  }

  get evolutionTarget() {
    return getEvolutionTarget(this.kind, this.level)
  }

  snapshot(): Readonly<WeaponStats> {
    return { ...this.stats }
  }

  levelUp() {
    this.stats = computeWeaponStats(this.kind, this.level + 1)
  }

  /** Turns into the evolved kind at level 1; returns false when not yet eligible. */
  evolve() {
    const target = this.evolutionTarget
    if (!target) {
      return false
    }
    this.stats = computeWeaponStats(target, 1)
    return true
  }

  /** Evolves once eligible, otherwise gains a level. */
  upgrade() {
    if (!this.evolve()) {
      this.levelUp()
    }
  }

  update() {
    if (this.cooldown > 0) {
      this.cooldown -= 1
    }
  }

  canAttack() {
    return this.cooldown <= 0
  }

  resetCooldown(attackSpeedBonus = 0) {
    this.cooldown = scaleCooldown(this.maxCooldown, attackSpeedBonus)
  }
}

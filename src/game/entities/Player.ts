import type { GameInput, Renderer } from '../capabilities'
import { ENTITY_SIZE, SCREEN_HEIGHT, SCREEN_WIDTH } from '../constants/dimensions'
import { Colors } from '../constants/palette'
import type { PassiveSkillKind, WeaponKind } from '../data/types'
import type { Rect } from '../logic/collision'
import {
  applyDamage,
  applyExperienceInPlace,
  applyHealing,
  applyLevelUp,
  createInitialPlayerState,
  PLAYER_MAX_SPEED,
} from '../logic/playerProgression'
import type { PlayerState } from '../types/player'
import Attack, { type Vector } from './Attack'
import PassiveSkill from './PassiveSkill'
import Weapon from './Weapon'

export interface ArenaSize {
  width: number
  height: number
}

export default class Player {
  readonly state: PlayerState = createInitialPlayerState()

  readonly weapons: Weapon[] = [new Weapon('knife')]

  readonly passiveSkills = new Map<PassiveSkillKind, PassiveSkill>()

  attacks: Attack[] = []

  /** Unit vector of the last movement input; attacks are fired along it. */
  direction: Vector = { x: 1, y: 0 }

  constructor(
    public x: number,
    public y: number,
    private readonly arena: ArenaSize = { width: SCREEN_WIDTH, height: SCREEN_HEIGHT },
  ) {}

  get hp() {
    return this.state.hp
  }

  get maxHp() {
    return this.state.maxHp
  }

  get level() {
    return this.state.level
  }

  get exp() {
    return this.state.exp
  }

  get nextExp() {
    return this.state.nextExp
  }

  get speed() {
    const bonus = this.passiveSkills.get('speedUp')?.bonus ?? 0
    return Math.min(this.state.baseSpeed + bonus, PLAYER_MAX_SPEED)
  }

  get attackSpeedBonus() {
    return this.passiveSkills.get('attackSpeed')?.bonus ?? 0
  }

  get bounds(): Rect {
    return { x: this.x, y: this.y, w: ENTITY_SIZE, h: ENTITY_SIZE }
  }

  update(input: GameInput) {
    this.updateDirection(input)
    this.move(input)

    const regen = this.passiveSkills.get('hpRegen')
    if (regen) {
      this.heal(regen.bonus)
    }

    for (const weapon of this.weapons) {
      weapon.update()
      if (weapon.canAttack()) {
        this.attacks.push(new Attack({ x: this.x, y: this.y }, weapon.snapshot(), { ...this.direction }))
        weapon.resetCooldown(this.attackSpeedBonus)
      }
    }

    this.pruneAttacks()
    for (const attack of this.attacks) {
      attack.update()
    }
  }

  pruneAttacks() {
    this.attacks = this.attacks.filter((attack) => attack.isAlive())
  }

  /** Returns true when the experience triggered a level up. */
  gainExp(amount: number) {
    return applyExperienceInPlace(this.state, amount).leveledUp
  }

  levelUp() {
    Object.assign(this.state, applyLevelUp(this.state))
  }

  takeDamage(amount: number) {
    Object.assign(this.state, applyDamage(this.state, amount))
  }

  heal(amount: number) {
    Object.assign(this.state, applyHealing(this.state, amount))
  }

  isAlive() {
    return this.state.hp > 0
  }

  addWeapon(kind: WeaponKind) {
    const weapon = new Weapon(kind)
    this.weapons.push(weapon)
    return weapon
  }

  findWeapon(kind: WeaponKind) {
    return this.weapons.find((weapon) => weapon.kind === kind)
  }

  addPassiveSkill(kind: PassiveSkillKind) {
    const existing = this.passiveSkills.get(kind)
    if (existing) {
      existing.levelUp()
      return existing
    }
    const skill = new PassiveSkill(kind)
    this.passiveSkills.set(kind, skill)
    return skill
  }

  draw(renderer: Renderer) {
    renderer.rect(this.x, this.y, ENTITY_SIZE, ENTITY_SIZE, Colors.white)
    const centerX = this.x + ENTITY_SIZE / 2
    const centerY = this.y + ENTITY_SIZE / 2
    renderer.line(centerX, centerY, centerX + this.direction.x * 8, centerY + this.direction.y * 8, Colors.red)
    for (const attack of this.attacks) {
      attack.draw(renderer)
    }
  }

  private updateDirection(input: GameInput) {
    const dx = (input.isHeld('right') ? 1 : 0) - (input.isHeld('left') ? 1 : 0)
    const dy = (input.isHeld('down') ? 1 : 0) - (input.isHeld('up') ? 1 : 0)
    if (dx === 0 && dy === 0) {
      return
    }
    const length = Math.sqrt(dx * dx + dy * dy)
    this.direction = { x: dx / length, y: dy / length }
  }

  // Each axis moves by the full speed, so diagonal movement is faster.
  private move(input: GameInput) {
    const speed = this.speed
    const maxX = this.arena.width - ENTITY_SIZE
    const maxY = this.arena.height - ENTITY_SIZE
    if (input.isHeld('left')) {
      this.x = Math.max(0, this.x - speed)
    }
    if (input.isHeld('right')) {
      this.x = Math.min(maxX, this.x + speed)
    }
    if (input.isHeld('up')) {
      this.y = Math.max(0, this.y - speed)
    }
    if (input.isHeld('down')) {
      this.y = Math.min(maxY, this.y + speed)
    }
  }
}

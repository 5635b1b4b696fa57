import type { Renderer } from '../capabilities'
import { Colors } from '../constants/palette'
import { WeaponDefinitions } from '../data/weapons'
import type { AttackDamageRule, WeaponKind } from '../data/types'
import type { Rect } from '../logic/collision'
import type { WeaponStats } from '../logic/weaponProgression'

export interface Vector {
  x: number
  y: number
}

type AttackPainter = (renderer: Renderer, attack: Attack) => void

const PAINTERS: Record<WeaponKind, AttackPainter> = {
  knife: (renderer, attack) => {
    renderer.rect(attack.x, attack.y, 4, 4, Colors.blue)
  },
  magicBlade: (renderer, attack) => {
    renderer.rect(attack.x, attack.y, 6, 6, Colors.lightBlue)
    for (let i = 0; i < 3; i += 1) {
      const offset = (i + 1) * 2
      renderer.rect(attack.x - attack.velocity.x * offset, attack.y - attack.velocity.y * offset, 4, 4, Colors.lightBlue)
    }
  },
  holyWater: (renderer, attack) => {
    renderer.circle(attack.x, attack.y, Math.floor(attack.weapon.range / 2), Colors.lightBlue)
  },
  sacredFlame: (renderer, attack) => {
    const radius = Math.floor(attack.weapon.range / 2)
    renderer.circle(attack.x, attack.y, radius, Colors.red)
    renderer.circle(attack.x, attack.y, Math.floor((radius * 2) / 3), Colors.red)
    if (attack.lifetime % 4 < 2) {
      renderer.circle(attack.x, attack.y, radius - 2, Colors.red)
    }
  },
}

export default class Attack {
  x: number

  y: number

  readonly velocity: Vector

  lifetime: number

  private readonly damageRule: AttackDamageRule

  private ticks = 0

  private dotTimer = 0

  private pulseDue = false

  constructor(origin: Vector, readonly weapon: Readonly<WeaponStats>, direction: Vector) {
    const definition = WeaponDefinitions[weapon.kind]
    this.x = origin.x
    this.y = origin.y
    this.lifetime = definition.attackLifetime
    this.damageRule = definition.damageRule
    this.velocity =
      definition.motion.type === 'projectile'
        ? { x: direction.x * definition.motion.speed, y: direction.y * definition.motion.speed }
        : { x: 0, y: 0 }
  }

  /** Advances one tick; returns true when a damage-over-time pulse is due this tick. */
  update() {
    this.lifetime -= 1
    this.ticks += 1
    this.x += this.velocity.x
    this.y += this.velocity.y

    this.pulseDue = false
    if (this.damageRule.type === 'pulse') {
      this.dotTimer += 1
      if (this.dotTimer >= this.damageRule.interval) {
        this.dotTimer = 0
        this.pulseDue = true
      }
    }
    return this.pulseDue
  }

  isAlive() {
    return this.lifetime > 0
  }

  get bounds(): Rect {
    return { x: this.x, y: this.y, w: this.weapon.range, h: this.weapon.range }
  }

  /** Damage dealt to each overlapping enemy on the current tick. */
  damageThisTick() {
    const rule = this.damageRule
    switch (rule.type) {
      case 'contact':
        return this.weapon.damage
      case 'pulse':
        return (this.ticks === 1 ? this.weapon.damage : 0) + (this.pulseDue ? rule.dotDamage : 0)
    }
  }

  draw(renderer: Renderer) {
    PAINTERS[this.weapon.kind](renderer, this)
  }
}

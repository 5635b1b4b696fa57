import type { Renderer } from '../capabilities'
import { Colors } from '../constants/palette'
import type { EnemyBehaviorConfig, EnemyBehaviorType } from '../data/types'
import type { RandomSource } from '../logic/random'
import type { Vector } from './Attack'
import type Enemy from './Enemy'

export interface EnemyBehavior {
  readonly type: EnemyBehaviorType
  move(enemy: Enemy, target: Vector): void
  decorate(renderer: Renderer, enemy: Enemy): void
}

function towards(enemy: Enemy, target: Vector) {
  const dx = target.x - enemy.x
  const dy = target.y - enemy.y
  return { dx, dy, distance: Math.sqrt(dx * dx + dy * dy) }
}

export class ChaseBehavior implements EnemyBehavior {
  readonly type = 'chase'

  move(enemy: Enemy, target: Vector) {
    const { dx, dy, distance } = towards(enemy, target)
    if (distance > 0) {
      enemy.x += (dx / distance) * enemy.speed
      enemy.y += (dy / distance) * enemy.speed
    }
  }

  decorate() {}
}

export class CircleBehavior implements EnemyBehavior {
  readonly type = 'circle'

  constructor(
    public angle: number,
    readonly radius: number,
    readonly angularSpeed: number,
  ) {}

  move(enemy: Enemy, target: Vector) {
    this.angle += this.angularSpeed
    const orbitX = target.x + Math.cos(this.angle) * this.radius
    const orbitY = target.y + Math.sin(this.angle) * this.radius
    // speed is the fraction of the gap closed per tick; above 1 it would overshoot
    const ease = Math.min(enemy.speed, 1)
    enemy.x += (orbitX - enemy.x) * ease
    enemy.y += (orbitY - enemy.y) * ease
  }

  decorate(renderer: Renderer, enemy: Enemy) {
    let angle = this.angle - this.angularSpeed * 3
    for (let i = 0; i < 3; i += 1) {
      const trailX = enemy.x - Math.cos(angle) * enemy.speed * 4 * (i + 1)
      const trailY = enemy.y - Math.sin(angle) * enemy.speed * 4 * (i + 1)
      renderer.rect(trailX, trailY, 4, 4, enemy.color)
      angle -= this.angularSpeed
    }
  }
}

export class TeleportBehavior implements EnemyBehavior {
  readonly type = 'teleport'

  timer = 0

  constructor(
    readonly cooldown: number,
    readonly minDistance: number,
    readonly maxDistance: number,
    private readonly random: RandomSource,
  ) {}

  move(enemy: Enemy, target: Vector) {
    const { dx, dy, distance } = towards(enemy, target)
    if (distance > 0) {
      enemy.x += (dx / distance) * enemy.speed * 0.5
      enemy.y += (dy / distance) * enemy.speed * 0.5
    }

    this.timer += 1
    if (this.timer >= this.cooldown) {
      const angle = this.random.float(Math.PI * 2)
      const jump = this.random.int(this.minDistance, this.maxDistance)
      enemy.x = target.x + Math.cos(angle) * jump
      enemy.y = target.y + Math.sin(angle) * jump
      this.timer = 0
    }
  }

  decorate(renderer: Renderer, enemy: Enemy) {
    if (this.timer >= this.cooldown - 10 && enemy.movementTimer % 4 < 2) {
      renderer.rect(enemy.x - 1, enemy.y - 1, 10, 10, Colors.white)
    }
  }
}

export class ZigzagBehavior implements EnemyBehavior {
  readonly type = 'zigzag'

  phase = 0

  constructor(
    readonly width: number,
    readonly phaseSpeed: number,
  ) {}

  move(enemy: Enemy, target: Vector) {
    const { dx, dy, distance } = towards(enemy, target)
    if (distance <= 0) {
      return
    }

    const stepX = (dx / distance) * enemy.speed
    const stepY = (dy / distance) * enemy.speed
    this.phase += this.phaseSpeed
    // the step rotated by 90 degrees, swung from side to side
    const sway = Math.sin(this.phase) * this.width
    enemy.x += stepX - stepY * sway
    enemy.y += stepY + stepX * sway
  }

  decorate(renderer: Renderer, enemy: Enemy) {
    if (enemy.movementTimer % 8 < 4) {
      renderer.line(enemy.x + 4, enemy.y + 4, enemy.x + 4 + Math.sin(this.phase) * 8, enemy.y + 4, enemy.color)
    }
  }
}

export function createEnemyBehavior(config: EnemyBehaviorConfig, random: RandomSource): EnemyBehavior {
  switch (config.type) {
    case 'chase':
      return new ChaseBehavior()
    case 'circle':
      return new CircleBehavior(random.float(Math.PI * 2), config.radius, config.angularSpeed)
    case 'teleport':
      return new TeleportBehavior(config.cooldown, config.minDistance, config.maxDistance, random)
    case 'zigzag':
      return new ZigzagBehavior(config.width, config.phaseSpeed)
  }
}

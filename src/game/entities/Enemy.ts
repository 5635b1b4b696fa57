import type { Renderer } from '../capabilities'
import { ENTITY_SIZE } from '../constants/dimensions'
import { getEnemyDefinition } from '../data/enemies'
import type { EnemyDefinition, EnemyKind } from '../data/types'
import type { Rect } from '../logic/collision'
import { mathRandom, type RandomSource } from '../logic/random'
import { scaleEnemyDefinition } from '../logic/spawnRules'
import type { Vector } from './Attack'
import { createEnemyBehavior, type EnemyBehavior } from './enemyBehaviors'

export default class Enemy {
  readonly kind: EnemyKind

  readonly speed: number

  readonly exp: number

  readonly color: number

  readonly behavior: EnemyBehavior

  x: number

  y: number

  hp: number

  movementTimer = 0

  constructor(position: Vector, definition: EnemyDefinition, random: RandomSource = mathRandom) {
    this.kind = definition.kind
    this.x = position.x
    this.y = position.y
    this.hp = definition.hp
    this.speed = definition.speed
    this.exp = definition.exp
    this.color = definition.color
    this.behavior = createEnemyBehavior(definition.behavior, random)
  }

  /** Creates an enemy of the named kind, scaled for the minutes survived so far. */
  static spawn(position: Vector, kind: string, random: RandomSource = mathRandom, elapsedMinutes = 0) {
    const definition = scaleEnemyDefinition(getEnemyDefinition(kind), elapsedMinutes)
    return new Enemy(position, definition, random)
  }

  update(target: Vector) {
    this.movementTimer += 1
    this.behavior.move(this, target)
  }

  takeDamage(amount: number) {
    this.hp -= amount
  }

  isAlive() {
    return this.hp > 0
  }

  get bounds(): Rect {
    return { x: this.x, y: this.y, w: ENTITY_SIZE, h: ENTITY_SIZE }
  }

  draw(renderer: Renderer) {
    renderer.rect(this.x, this.y, ENTITY_SIZE, ENTITY_SIZE, this.color)
    this.behavior.decorate(renderer, this)
  }
}

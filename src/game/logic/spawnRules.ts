import { ENTITY_SIZE } from '../constants/dimensions'
import { Difficulty, SpawnTable } from '../data/difficulty'
import type { DifficultyScaling, EnemyDefinition, EnemyKind, SpawnWeight } from '../data/types'
import type { RandomFloatFn, RandomIntFn } from './random'

export type ScreenSide = 'top' | 'right' | 'bottom' | 'left'

const SIDES: ScreenSide[] = ['top', 'right', 'bottom', 'left']

export function getSpawnInterval(elapsedMinutes: number, scaling: DifficultyScaling = Difficulty) {
  const reduced = scaling.initialSpawnInterval - scaling.spawnIntervalReductionPerMinute * elapsedMinutes
  return Math.max(scaling.minSpawnInterval, reduced)
}

export function pickEnemyKind(randomFloat: RandomFloatFn, table: SpawnWeight[] = SpawnTable): EnemyKind {
  if (table.length === 0) {
    throw new Error('Spawn table is empty')
  }

  const totalWeight = table.reduce((acc, entry) => acc + Math.max(entry.weight, 0), 0)
  if (totalWeight <= 0) {
    return table[0].kind
  }

  let roll = randomFloat(totalWeight)

  for (const entry of table) {
    roll -= Math.max(entry.weight, 0)
    if (roll < 0) {
      return entry.kind
    }
  }

  return table[table.length - 1].kind
}

/** A point just outside the screen edge on a random side. */
export function pickSpawnPosition(width: number, height: number, randomInt: RandomIntFn) {
  const side = SIDES[randomInt(0, SIDES.length - 1)]
  switch (side) {
    case 'top':
      return { x: randomInt(0, width - ENTITY_SIZE), y: -ENTITY_SIZE }
    case 'right':
      return { x: width, y: randomInt(0, height - ENTITY_SIZE) }
    case 'bottom':
      return { x: randomInt(0, width - ENTITY_SIZE), y: height }
    case 'left':
      return { x: -ENTITY_SIZE, y: randomInt(0, height - ENTITY_SIZE) }
  }
}

export function scaleEnemyDefinition(
  definition: EnemyDefinition,
  elapsedMinutes: number,
  scaling: DifficultyScaling = Difficulty,
): EnemyDefinition {
  if (elapsedMinutes <= 0) {
    return definition
  }
  return {
    ...definition,
    hp: Math.round(definition.hp * (1 + scaling.hpIncreasePerMinute * elapsedMinutes)),
    speed: definition.speed * (1 + scaling.speedIncreasePerMinute * elapsedMinutes),
    exp: Math.round(definition.exp * (1 + scaling.expIncreasePerMinute * elapsedMinutes)),
  }
}
